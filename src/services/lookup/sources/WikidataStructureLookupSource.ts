/**
 * Wikidata structure lookup by InChIKey (P235): isomeric SMILES (P2017) when present,
 * canonical SMILES (P233) otherwise.
 */

import { BaseLookupSource } from '../BaseLookupSource';
import { Logger } from '../../core/Logger';
import {
  WIKIDATA_SPARQL_SERVICE,
  WikidataSparqlClient,
  sparqlString,
} from '../../http/WikidataSparqlClient';
import { LookupOutcome, WorkItem } from '../../../types/EnrichmentTypes';

export function buildStructureQuery(inchikey: string): string {
  return `
SELECT ?isomeric ?canonical WHERE {
  ?compound wdt:P235 ${sparqlString(inchikey)} .
  OPTIONAL { ?compound wdt:P2017 ?isomeric . }
  OPTIONAL { ?compound wdt:P233 ?canonical . }
}
LIMIT 1
`.trim();
}

export class WikidataStructureLookupSource extends BaseLookupSource {
  private readonly sparql: WikidataSparqlClient;

  constructor(config: { sparql: WikidataSparqlClient; logger: Logger }) {
    super({
      sourceId: 'wikidata-inchikey',
      rateLimitKey: WIKIDATA_SPARQL_SERVICE,
      logger: config.logger,
    });
    this.sparql = config.sparql;
  }

  queryKeys(item: WorkItem): string[] {
    return item.secondaryKey ? [item.secondaryKey] : [];
  }

  async lookup(queryKey: string): Promise<LookupOutcome> {
    const result = await this.sparql.select(buildStructureQuery(queryKey));
    if (result.kind === 'error') {
      this.handleError(result.error, { queryKey, errorCode: result.error.error_code });
      return { kind: 'unavailable', error: result.error.message };
    }

    const row = result.rows[0];
    const value = row ? row.isomeric || row.canonical || '' : '';
    if (value === '') {
      this.logger.debug('Lookup not found', { source: this.sourceId, queryKey });
      return { kind: 'not_found' };
    }
    return { kind: 'found', value };
  }
}
