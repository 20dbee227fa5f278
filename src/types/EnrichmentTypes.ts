/**
 * Enrichment Types
 *
 * Work items, lookup outcomes, resolution results and provenance entries shared by
 * the resolver, the orchestrator and the checkpoint store.
 */

/**
 * Quality tiers, best first. FULL > DEGRADED > UNRESOLVED.
 */
export type QualityTier = 'FULL' | 'DEGRADED' | 'UNRESOLVED';

export const TIER_RANK: Record<QualityTier, number> = {
  FULL: 2,
  DEGRADED: 1,
  UNRESOLVED: 0,
};

/** Positive when a is better than b. */
export function compareTiers(a: QualityTier, b: QualityTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

/** Clamp a classified tier to the best tier a source can return. */
export function capTier(tier: QualityTier, maxTier: QualityTier): QualityTier {
  return compareTiers(tier, maxTier) > 0 ? maxTier : tier;
}

/**
 * One row of the work set. Frozen by the loader.
 */
export interface WorkItem {
  /** 1-based position in the work set */
  readonly index: number;
  readonly key: string;
  readonly label: string;
  /** InChIKey, when the row carries one */
  readonly secondaryKey?: string;
  /** label split on the synonym separator */
  readonly synonyms: readonly string[];
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Result of a single lookup attempt against one source.
 */
export type LookupOutcome =
  | { kind: 'found'; value: string }
  | { kind: 'not_found' }
  | { kind: 'unavailable'; error: string };

export interface LookupAttempt {
  sourceId: string;
  queryKey: string;
  outcome: LookupOutcome;
  /** UNRESOLVED unless outcome is found */
  tier: QualityTier;
}

export type UnresolvedReason = 'NO_HINTS' | 'NOT_FOUND' | 'SOURCE_UNAVAILABLE';

export const UNRESOLVED_SOURCE = 'none';

/**
 * Invariant: value is non-empty iff tier !== 'UNRESOLVED'.
 */
export interface ResolutionResult {
  readonly value: string;
  readonly tier: QualityTier;
  readonly source: string;
  readonly unresolvedReason?: UnresolvedReason;
  readonly attempts: readonly LookupAttempt[];
}

export interface RunStatistics {
  /** items processed this run: full + degraded + unresolved + failed */
  total: number;
  full: number;
  degraded: number;
  unresolved: number;
  /** isolated per-item failures */
  failed: number;
  /** already present in the output */
  skipped: number;
}

export function emptyRunStatistics(): RunStatistics {
  return { total: 0, full: 0, degraded: 0, unresolved: 0, failed: 0, skipped: 0 };
}

/**
 * Raw provenance row: one occurrence of a compound in a taxon, as reported by one
 * reference. Absent fields are ''.
 */
export interface ProvenanceRecord {
  /** the occurrence: compound label qualified by taxon */
  entityLabel: string;
  compoundLabel: string;
  structure: string;
  structureKey: string;
  taxonName: string;
  provenanceTitle: string;
  provenanceId: string;
  provenanceDate: string;
}

export type AggregatedEntry = Readonly<ProvenanceRecord>;

export type ItemOutcomeStatus = 'RESOLVED' | 'FAILED_ISOLATED';

export interface ProcessedItemRecord {
  item: WorkItem;
  status: ItemOutcomeStatus;
  result?: ResolutionResult;
  entries: readonly AggregatedEntry[];
  error?: string;
}
