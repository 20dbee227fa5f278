/**
 * Source Chain Loader
 *
 * Loads the lookup chain (source order and per-service minimum intervals) from YAML.
 * Caches parsed chains in memory per file path.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import { LOOKUP_SOURCE_IDS, LookupSourceId } from './ILookupSource';
import { FatalConfigurationError, asCause } from '../../types/EnrichmentErrors';

const logger = new Logger('SourceChainLoader');

/** config/source-chain.yaml at the repository root, from both src/ and dist/. */
export const DEFAULT_SOURCE_CHAIN_PATH = path.join(__dirname, '../../../config/source-chain.yaml');

const SourceChainFileSchema = z.object({
  source_chain: z.object({
    version: z.string().min(1, 'version is required'),
    description: z.string().optional(),
    rate_limits: z
      .array(
        z.object({
          service: z.string().min(1),
          min_interval_ms: z.number().int().nonnegative(),
        })
      )
      .default([]),
    chain: z
      .array(z.enum(LOOKUP_SOURCE_IDS))
      .min(1, 'chain must list at least one source')
      .refine((ids) => new Set(ids).size === ids.length, {
        message: 'chain must not list a source twice',
      }),
  }),
});

export interface SourceChainConfig {
  version: string;
  description: string;
  /** min interval per rate-limit key, in ms */
  minIntervalsMs: Record<string, number>;
  chain: LookupSourceId[];
}

/**
 * Source Chain Loader
 */
export class SourceChainLoader {
  private static cache: Map<string, SourceChainConfig> = new Map();

  /**
   * Load the chain from a YAML file
   */
  static load(filePath: string = DEFAULT_SOURCE_CHAIN_PATH): SourceChainConfig {
    const resolved = path.resolve(filePath);
    const cached = this.cache.get(resolved);
    if (cached) {
      logger.debug('Source chain loaded from cache', { path: resolved });
      return cached;
    }

    logger.info('Loading source chain from file', { path: resolved });

    let fileContent: string;
    try {
      fileContent = fs.readFileSync(resolved, 'utf8');
    } catch (error) {
      throw new FatalConfigurationError(
        `Source chain file not readable: ${resolved}`,
        'SOURCE_CHAIN_UNREADABLE',
        asCause(error)
      );
    }

    const chain = this.parseSourceChain(yaml.load(fileContent));
    this.cache.set(resolved, chain);

    logger.info('Source chain loaded successfully', {
      version: chain.version,
      chain: chain.chain,
    });
    return chain;
  }

  /**
   * Parse YAML content into a typed chain
   */
  static parseSourceChain(yamlContent: unknown): SourceChainConfig {
    const parsed = SourceChainFileSchema.safeParse(yamlContent);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new FatalConfigurationError(`Invalid source chain: ${details}`, 'INVALID_SOURCE_CHAIN');
    }

    const data = parsed.data.source_chain;
    const minIntervalsMs: Record<string, number> = {};
    for (const limit of data.rate_limits) {
      minIntervalsMs[limit.service] = limit.min_interval_ms;
    }

    return {
      version: data.version,
      description: data.description ?? '',
      minIntervalsMs,
      chain: data.chain,
    };
  }

  static clearCache(): void {
    this.cache.clear();
  }
}
