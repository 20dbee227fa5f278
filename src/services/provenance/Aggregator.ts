/**
 * Provenance aggregation: one entry per (entity label, reference title, reference
 * DOI). First occurrence wins and keeps its fields; order of first occurrence is
 * kept. Pure: inputs are neither mutated nor shared with the output.
 */

import { AggregatedEntry, ProvenanceRecord } from '../../types/EnrichmentTypes';

export type AggregateFn = (raw: readonly ProvenanceRecord[]) => AggregatedEntry[];

export function compositeKey(record: ProvenanceRecord): string {
  return JSON.stringify([record.entityLabel, record.provenanceTitle, record.provenanceId]);
}

export const aggregate: AggregateFn = (raw) => {
  const seen = new Map<string, AggregatedEntry>();
  for (const record of raw) {
    const key = compositeKey(record);
    if (!seen.has(key)) {
      seen.set(key, Object.freeze({ ...record }));
    }
  }
  return [...seen.values()];
};

/** Distinct compounds among the entries, by compound label. */
export function countUniqueCompounds(entries: readonly AggregatedEntry[]): number {
  return new Set(entries.map((entry) => entry.compoundLabel)).size;
}
