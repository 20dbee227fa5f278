/**
 * PubChem Lookup Sources
 *
 * Isomeric SMILES from PubChem PUG REST, by InChIKey or by compound name. Both share
 * the 'pubchem' rate-limit slot.
 */

import { z } from 'zod';
import { BaseLookupSource } from '../BaseLookupSource';
import { HttpJsonClient } from '../../http/HttpJsonClient';
import { Logger } from '../../core/Logger';
import { LookupOutcome, WorkItem } from '../../../types/EnrichmentTypes';

export const PUBCHEM_BASE_URL = 'https://pubchem.ncbi.nlm.nih.gov';
export const PUBCHEM_SERVICE = 'pubchem';

/** Newer PUG REST answers IsomericSMILES requests under the SMILES key. */
const PropertyTableSchema = z.object({
  PropertyTable: z.object({
    Properties: z.array(
      z.object({
        CID: z.number().optional(),
        SMILES: z.string().optional(),
        IsomericSMILES: z.string().optional(),
      })
    ),
  }),
});

type PropertyTable = z.infer<typeof PropertyTableSchema>;

function firstSmiles(data: PropertyTable): string {
  const first = data.PropertyTable.Properties[0];
  if (!first) return '';
  return first.SMILES ?? first.IsomericSMILES ?? '';
}

export interface PubChemLookupSourceConfig {
  http: HttpJsonClient;
  logger: Logger;
}

export function createPubChemHttpClient(config: { timeoutMs: number; userAgent: string; baseURL?: string }): HttpJsonClient {
  return new HttpJsonClient({
    serviceId: PUBCHEM_SERVICE,
    baseURL: config.baseURL ?? PUBCHEM_BASE_URL,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
  });
}

abstract class PubChemPropertySource extends BaseLookupSource {
  protected readonly http: HttpJsonClient;

  constructor(sourceId: string, config: PubChemLookupSourceConfig) {
    super({ sourceId, rateLimitKey: PUBCHEM_SERVICE, logger: config.logger });
    this.http = config.http;
  }

  protected abstract namespace: 'inchikey' | 'name';

  async lookup(queryKey: string): Promise<LookupOutcome> {
    const url = `/rest/pug/compound/${this.namespace}/${encodeURIComponent(queryKey)}/property/IsomericSMILES/JSON`;
    const result = await this.http.getJson(url, PropertyTableSchema);
    return this.toOutcome(queryKey, result, firstSmiles);
  }
}

/**
 * PubChem by InChIKey (high-specificity key)
 */
export class PubChemInchikeyLookupSource extends PubChemPropertySource {
  protected namespace = 'inchikey' as const;

  constructor(config: PubChemLookupSourceConfig) {
    super('pubchem-inchikey', config);
  }

  queryKeys(item: WorkItem): string[] {
    return item.secondaryKey ? [item.secondaryKey] : [];
  }
}

/**
 * PubChem by compound name; every synonym of the label, in order.
 */
export class PubChemNameLookupSource extends PubChemPropertySource {
  protected namespace = 'name' as const;

  constructor(config: PubChemLookupSourceConfig) {
    super('pubchem-name', config);
  }

  queryKeys(item: WorkItem): string[] {
    const names: string[] = [];
    for (const synonym of item.synonyms) {
      const name = synonym.trim();
      if (name !== '' && !names.includes(name)) {
        names.push(name);
      }
    }
    return names;
  }
}
