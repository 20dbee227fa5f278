/**
 * Enrichment run config, read from the environment (.env is loaded by the entry point).
 * Validation failures are fatal: nothing is processed with a half-valid config.
 */

import * as path from 'path';
import { z } from 'zod';
import { FatalConfigurationError } from '../types/EnrichmentErrors';

/** Treat empty strings from .env files as unset. */
const optionalString = z.preprocess(
  (val) => (val === '' || val == null ? undefined : val),
  z.string().optional()
);

const booleanFlag = (defaultValue: boolean) =>
  z.preprocess((val) => {
    if (val === '' || val == null) return defaultValue;
    if (typeof val === 'boolean') return val;
    if (val === 'true' || val === '1') return true;
    if (val === 'false' || val === '0') return false;
    return val;
  }, z.boolean());

const positiveInt = (defaultValue: number) =>
  z.preprocess(
    (val) => (val === '' || val == null ? defaultValue : Number(val)),
    z.number().int().positive()
  );

export const EnrichmentEnvSchema = z
  .object({
    WORKSET_PATH: z.string({ required_error: 'WORKSET_PATH is required' }).min(1, 'WORKSET_PATH is required'),
    OUTPUT_PATH: z.preprocess(
      (val) => (val === '' || val == null ? undefined : val),
      z.string().default('structure_enrichment_output.txt')
    ),
    EXPORT_PATH: optionalString,
    EXPORT_IDENTIFIER_COLUMN: z.preprocess(
      (val) => (val === '' || val == null ? undefined : val),
      z.string().default('smiles')
    ),
    WORKSET_HAS_HEADER: booleanFlag(false),
    WORKSET_KEY_COLUMN: z.preprocess((val) => (val === '' || val == null ? undefined : val), z.string().default('0')),
    WORKSET_LABEL_COLUMN: z.preprocess((val) => (val === '' || val == null ? undefined : val), z.string().default('1')),
    WORKSET_SECONDARY_KEY_COLUMN: optionalString,
    SYNONYM_SEPARATOR: z.preprocess((val) => (val === '' || val == null ? undefined : val), z.string().default(' or ')),
    COLLECT_PROVENANCE: booleanFlag(true),
    HTTP_TIMEOUT_MS: positiveInt(10000),
    HTTP_USER_AGENT: z.preprocess(
      (val) => (val === '' || val == null ? undefined : val),
      z.string().default('phytochem-enrich/0.1 (batch structure enrichment)')
    ),
    SOURCE_CHAIN_PATH: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.WORKSET_HAS_HEADER) return;
    const positional: Array<[string, string | undefined]> = [
      ['WORKSET_KEY_COLUMN', env.WORKSET_KEY_COLUMN],
      ['WORKSET_LABEL_COLUMN', env.WORKSET_LABEL_COLUMN],
      ['WORKSET_SECONDARY_KEY_COLUMN', env.WORKSET_SECONDARY_KEY_COLUMN],
    ];
    for (const [name, value] of positional) {
      if (value !== undefined && !/^\d+$/.test(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `${name} must be a zero-based column index when WORKSET_HAS_HEADER is false`,
        });
      }
    }
  });

export interface WorkSetColumns {
  hasHeader: boolean;
  keyColumn: string;
  labelColumn: string;
  secondaryKeyColumn?: string;
  synonymSeparator: string;
}

export interface EnrichmentConfig {
  worksetPath: string;
  outputPath: string;
  exportPath: string;
  exportIdentifierColumn: string;
  columns: WorkSetColumns;
  collectProvenance: boolean;
  httpTimeoutMs: number;
  httpUserAgent: string;
  sourceChainPath?: string;
}

/** lotus_output.txt -> lotus_output.csv */
export function defaultExportPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.csv`);
}

export function loadEnrichmentConfig(env: NodeJS.ProcessEnv = process.env): EnrichmentConfig {
  const parsed = EnrichmentEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new FatalConfigurationError(`Invalid enrichment configuration: ${details}`, 'INVALID_CONFIG');
  }

  const e = parsed.data;
  return {
    worksetPath: e.WORKSET_PATH,
    outputPath: e.OUTPUT_PATH,
    exportPath: e.EXPORT_PATH ?? defaultExportPath(e.OUTPUT_PATH),
    exportIdentifierColumn: e.EXPORT_IDENTIFIER_COLUMN,
    columns: {
      hasHeader: e.WORKSET_HAS_HEADER,
      keyColumn: e.WORKSET_KEY_COLUMN,
      labelColumn: e.WORKSET_LABEL_COLUMN,
      secondaryKeyColumn: e.WORKSET_SECONDARY_KEY_COLUMN,
      synonymSeparator: e.SYNONYM_SEPARATOR,
    },
    collectProvenance: e.COLLECT_PROVENANCE,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    httpUserAgent: e.HTTP_USER_AGENT,
    sourceChainPath: e.SOURCE_CHAIN_PATH,
  };
}
