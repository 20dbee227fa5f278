/**
 * ILookupSource - Abstract interface for structure lookup sources
 *
 * A source turns a query key (InChIKey, compound name) into a tagged outcome and
 * classifies found values into a quality tier. Sources never decide chain order;
 * the resolver does.
 */

import { LookupOutcome, QualityTier, WorkItem } from '../../types/EnrichmentTypes';

export const LOOKUP_SOURCE_IDS = ['pubchem-inchikey', 'pubchem-name', 'wikidata-inchikey'] as const;

export type LookupSourceId = (typeof LOOKUP_SOURCE_IDS)[number];

/**
 * Lookup Source Interface
 */
export interface ILookupSource {
  readonly sourceId: string;

  /**
   * External service this source calls. Sources sharing a service share one
   * rate-limit slot (e.g. both PubChem sources use 'pubchem').
   */
  readonly rateLimitKey: string;

  /**
   * Best tier this source can ever return
   */
  readonly maxTier: QualityTier;

  /**
   * Query keys to try for the item, in order. Empty when the item carries no
   * usable hint for this source.
   */
  queryKeys(item: WorkItem): string[];

  /**
   * Look up one key. Expected failures come back as not_found / unavailable;
   * a rejection is treated as unavailable by the resolver.
   */
  lookup(queryKey: string): Promise<LookupOutcome>;

  /**
   * Classify a found value
   */
  classify(value: string): QualityTier;
}
