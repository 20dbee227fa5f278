/**
 * Text layout of the output log: a header block, then one delimited section per item.
 * The open/close markers are the ones the checkpoint scan recognises.
 */

import {
  SECTION_CLOSE_PREFIX,
  SECTION_OPEN_PREFIX,
  SECTION_SEPARATOR,
} from '../checkpoint/CheckpointStoreService';
import { cleanWikidataDate } from '../provenance/WikidataReferenceClient';
import { AggregatedEntry, ProcessedItemRecord, WorkItem } from '../../types/EnrichmentTypes';

export const OUTPUT_TITLE = 'STRUCTURE ENRICHMENT RESULTS';
const NOT_AVAILABLE = 'N/A';

/** Field values must not break the line-based layout. */
export function oneLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

function orNotAvailable(value: string): string {
  const cleaned = oneLine(value);
  return cleaned === '' ? NOT_AVAILABLE : cleaned;
}

/** Key as it appears in `ITEM #` and `END ITEM #` markers. */
export function sectionKey(item: WorkItem): string {
  return oneLine(item.key);
}

export function formatHeader(totalItems: number, generatedAt: Date): string {
  return [OUTPUT_TITLE, `Total Items: ${totalItems}`, `Generated: ${generatedAt.toISOString()}`, '', ''].join(
    '\n'
  );
}

function formatEntry(entry: AggregatedEntry, position: number): string[] {
  const lines = [
    `Entry ${position}: ${orNotAvailable(entry.entityLabel)}`,
    `  SMILES: ${orNotAvailable(entry.structure)}`,
    `  InChIKey: ${orNotAvailable(entry.structureKey)}`,
    `  Taxon: ${orNotAvailable(entry.taxonName)}`,
  ];
  if (entry.provenanceId || entry.provenanceTitle) {
    lines.push(
      `  Title: ${orNotAvailable(entry.provenanceTitle)}`,
      `  DOI: ${orNotAvailable(entry.provenanceId)}`,
      `  Published: ${entry.provenanceDate ? orNotAvailable(cleanWikidataDate(entry.provenanceDate)) : NOT_AVAILABLE}`
    );
  }
  lines.push('');
  return lines;
}

export function formatSection(record: ProcessedItemRecord): string {
  const key = sectionKey(record.item);
  const lines = [SECTION_SEPARATOR, `${SECTION_OPEN_PREFIX}${key}`, SECTION_SEPARATOR];
  lines.push(`Label: ${orNotAvailable(record.item.label)}`);

  if (record.status === 'FAILED_ISOLATED' || !record.result) {
    lines.push('Status: FAILED', `Structure: ${NOT_AVAILABLE}`, 'Tier: UNRESOLVED', 'Source: none');
    lines.push(`Error: ${orNotAvailable(record.error ?? '')}`);
  } else {
    const result = record.result;
    lines.push(
      'Status: RESOLVED',
      `Structure: ${orNotAvailable(result.value)}`,
      `Tier: ${result.tier}`,
      `Source: ${result.source}`
    );
    if (result.unresolvedReason) {
      lines.push(`Reason: ${result.unresolvedReason}`);
    }
  }
  lines.push('');

  if (record.entries.length === 0) {
    lines.push('No provenance records found.', '');
  } else {
    record.entries.forEach((entry, index) => lines.push(...formatEntry(entry, index + 1)));
  }

  lines.push(`${SECTION_CLOSE_PREFIX}${key}`, '');
  return `${lines.join('\n')}\n`;
}
