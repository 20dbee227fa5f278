/**
 * LOTUS Provenance Collector
 *
 * Taxon occurrences of a compound as recorded by LOTUS on Wikidata (P703 "found in
 * taxon"), one raw record per occurrence/reference pair. Each record's entity is the
 * occurrence (compound in taxon), so aggregation keeps one entry per taxon and
 * reference and only collapses repeated rows. Compounds are matched by
 * InChIKey when the item has one, otherwise by English label for each synonym.
 * A failed query contributes no records; it never fails the item.
 */

import { Logger } from '../core/Logger';
import { RateLimiterService } from '../lookup/RateLimiterService';
import {
  SparqlRow,
  WIKIDATA_SPARQL_SERVICE,
  WikidataSparqlClient,
  entityIdFromUri,
  sparqlString,
} from '../http/WikidataSparqlClient';
import { WikidataReferenceClient } from './WikidataReferenceClient';
import { ProvenanceRecord, WorkItem } from '../../types/EnrichmentTypes';

export interface IProvenanceCollector {
  collect(item: WorkItem): Promise<ProvenanceRecord[]>;
}

export type CompoundMatch = { by: 'inchikey'; inchikey: string } | { by: 'label'; label: string };

export function buildOccurrenceQuery(match: CompoundMatch): string {
  const compoundPattern =
    match.by === 'inchikey'
      ? `?compound wdt:P235 ${sparqlString(match.inchikey)} .`
      : `?compound rdfs:label ${sparqlString(match.label)}@en .`;

  return `
SELECT ?compound ?compoundLabel ?smiles ?inchikey ?taxonName ?reference WHERE {
  ${compoundPattern}
  ?compound p:P703 ?statement .
  ?statement ps:P703 ?taxon .
  OPTIONAL { ?taxon wdt:P225 ?taxonName . }
  OPTIONAL { ?statement prov:wasDerivedFrom ?refnode .
             ?refnode pr:P248 ?reference . }
  OPTIONAL { ?compound wdt:P233 ?smiles . }
  OPTIONAL { ?compound wdt:P235 ?inchikey . }
  SERVICE wikibase:label { bd:serviceParam wikibase:language "en" . }
}
ORDER BY ?compoundLabel
`.trim();
}

/** `quercetin in Allium cepa`; the bare compound label when the taxon is unknown. */
export function occurrenceLabel(compoundLabel: string, taxonName: string): string {
  return taxonName ? `${compoundLabel} in ${taxonName}` : compoundLabel;
}

export function compoundMatches(item: WorkItem): CompoundMatch[] {
  if (item.secondaryKey) {
    return [{ by: 'inchikey', inchikey: item.secondaryKey }];
  }
  const labels: string[] = [];
  for (const synonym of item.synonyms) {
    const label = synonym.trim();
    if (label !== '' && !labels.includes(label)) labels.push(label);
  }
  return labels.map((label) => ({ by: 'label' as const, label }));
}

export class LotusProvenanceCollector implements IProvenanceCollector {
  constructor(
    private readonly sparql: WikidataSparqlClient,
    private readonly references: WikidataReferenceClient,
    private readonly rateLimiter: RateLimiterService,
    private readonly logger: Logger
  ) {}

  async collect(item: WorkItem): Promise<ProvenanceRecord[]> {
    const records: ProvenanceRecord[] = [];
    for (const match of compoundMatches(item)) {
      await this.rateLimiter.acquire(WIKIDATA_SPARQL_SERVICE);
      const result = await this.sparql.select(buildOccurrenceQuery(match));
      if (result.kind === 'error') {
        this.logger.warn('Occurrence query failed', {
          itemKey: item.key,
          match,
          error: result.error.message,
        });
        continue;
      }
      for (const row of result.rows) {
        records.push(await this.toRecord(row));
      }
    }

    this.logger.debug('Provenance collected', { itemKey: item.key, records: records.length });
    return records;
  }

  private async toRecord(row: SparqlRow): Promise<ProvenanceRecord> {
    const compoundLabel = row.compoundLabel || 'Unknown';
    const taxonName = row.taxonName ?? '';
    const record: ProvenanceRecord = {
      entityLabel: occurrenceLabel(compoundLabel, taxonName),
      compoundLabel,
      structure: row.smiles ?? '',
      structureKey: row.inchikey ?? '',
      taxonName,
      provenanceTitle: '',
      provenanceId: '',
      provenanceDate: '',
    };

    if (row.reference) {
      const metadata = await this.references.getReferenceMetadata(entityIdFromUri(row.reference));
      record.provenanceTitle = metadata.title;
      record.provenanceId = metadata.doi;
      record.provenanceDate = metadata.pubDate;
    }
    return record;
  }
}
