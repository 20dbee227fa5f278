/**
 * BaseLookupSource - Common lookup source functionality
 *
 * Provides base implementation for lookup sources with:
 * - Stereo-based tier classification
 * - Mapping of HTTP results to lookup outcomes
 * - Error logging
 */

import { ILookupSource } from './ILookupSource';
import { Logger } from '../core/Logger';
import { HttpJsonResult } from '../http/HttpJsonClient';
import { LookupOutcome, QualityTier, WorkItem } from '../../types/EnrichmentTypes';
import { classifySmiles } from '../../utils/smiles-helpers';
import { errorMessage } from '../../types/EnrichmentErrors';

export interface BaseLookupSourceConfig {
  sourceId: string;
  rateLimitKey: string;
  maxTier?: QualityTier;
  logger: Logger;
}

/**
 * Base Lookup Source Class
 *
 * Abstract base class for all lookup sources. Subclasses decide which hints they
 * query and how a response body becomes a structure string.
 */
export abstract class BaseLookupSource implements ILookupSource {
  readonly sourceId: string;
  readonly rateLimitKey: string;
  readonly maxTier: QualityTier;
  protected logger: Logger;

  constructor(config: BaseLookupSourceConfig) {
    this.sourceId = config.sourceId;
    this.rateLimitKey = config.rateLimitKey;
    this.maxTier = config.maxTier ?? 'FULL';
    this.logger = config.logger;
  }

  abstract queryKeys(item: WorkItem): string[];

  abstract lookup(queryKey: string): Promise<LookupOutcome>;

  classify(value: string): QualityTier {
    return classifySmiles(value);
  }

  /**
   * Map an HTTP result to an outcome; extract returns '' when the body holds no
   * structure.
   */
  protected toOutcome<T>(
    queryKey: string,
    result: HttpJsonResult<T>,
    extract: (data: T) => string
  ): LookupOutcome {
    if (result.kind === 'not_found') {
      this.logger.debug('Lookup not found', { source: this.sourceId, queryKey });
      return { kind: 'not_found' };
    }
    if (result.kind === 'error') {
      this.handleError(result.error, { queryKey, errorCode: result.error.error_code });
      return { kind: 'unavailable', error: result.error.message };
    }
    const value = extract(result.data).trim();
    if (value === '') {
      return { kind: 'not_found' };
    }
    return { kind: 'found', value };
  }

  /**
   * Handle errors with consistent logging
   */
  protected handleError(error: unknown, context: Record<string, unknown>): void {
    this.logger.warn('Lookup source error', {
      source: this.sourceId,
      error: errorMessage(error),
      ...context,
    });
  }
}
