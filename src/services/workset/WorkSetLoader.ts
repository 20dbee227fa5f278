/**
 * Work Set Loader
 *
 * Reads the work set CSV (papaparse) into frozen work items. Columns are addressed by
 * zero-based position in headerless files, by name otherwise. Rows with fewer than
 * two fields are skipped. Hints are not validated here; malformed ones fail their
 * item during the run.
 */

import { promises as fs } from 'fs';
import Papa from 'papaparse';
import { Logger } from '../core/Logger';
import { WorkSetColumns } from '../../config/enrichmentConfig';
import { WorkItem } from '../../types/EnrichmentTypes';
import { FatalConfigurationError, asCause } from '../../types/EnrichmentErrors';

export interface WorkSet {
  /** descriptive column names, in file order */
  columns: string[];
  items: WorkItem[];
}

export function positionalColumnName(index: number): string {
  return `column_${index + 1}`;
}

export function splitSynonyms(label: string, separator: string): string[] {
  return label
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

export class WorkSetLoader {
  constructor(
    private readonly columns: WorkSetColumns,
    private readonly logger: Logger
  ) {}

  async load(filePath: string): Promise<WorkSet> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new FatalConfigurationError(
        `Work set not readable: ${filePath}`,
        'WORKSET_UNREADABLE',
        asCause(error)
      );
    }

    const workSet = this.parse(content);
    this.logger.info('Work set loaded', { path: filePath, items: workSet.items.length });
    return workSet;
  }

  parse(content: string): WorkSet {
    const parsed = Papa.parse<string[]>(content.replace(/^\uFEFF/, ''), {
      delimiter: ',',
      skipEmptyLines: true,
    });
    if (parsed.errors.length > 0) {
      this.logger.warn('Work set has CSV parse errors', {
        errors: parsed.errors.slice(0, 5).map((e) => `row ${e.row ?? '?'}: ${e.message}`),
      });
    }

    let rows = parsed.data;
    let columnNames: string[];
    if (this.columns.hasHeader) {
      const [header, ...body] = rows;
      columnNames = (header ?? []).map((name) => name.trim());
      rows = body;
    } else {
      const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
      columnNames = Array.from({ length: width }, (_, i) => positionalColumnName(i));
    }

    const keyIndex = this.columnIndex(this.columns.keyColumn, columnNames);
    const labelIndex = this.columnIndex(this.columns.labelColumn, columnNames);
    const secondaryIndex =
      this.columns.secondaryKeyColumn !== undefined
        ? this.columnIndex(this.columns.secondaryKeyColumn, columnNames)
        : undefined;

    const items: WorkItem[] = [];
    rows.forEach((row, rowIndex) => {
      if (row.length < 2) {
        this.logger.debug('Skipping short row', { row: rowIndex + 1, fields: row.length });
        return;
      }

      const value = (index: number): string => (row[index] ?? '').trim();
      const label = value(labelIndex);
      const secondaryKey = secondaryIndex !== undefined ? value(secondaryIndex) : '';

      const fields: Record<string, string> = {};
      columnNames.forEach((name, i) => {
        fields[name] = value(i);
      });

      items.push(
        Object.freeze({
          index: items.length + 1,
          key: value(keyIndex),
          label,
          secondaryKey: secondaryKey === '' ? undefined : secondaryKey,
          synonyms: Object.freeze(splitSynonyms(label, this.columns.synonymSeparator)),
          fields: Object.freeze(fields),
        })
      );
    });

    return { columns: columnNames, items };
  }

  private columnIndex(column: string, columnNames: string[]): number {
    if (!this.columns.hasHeader) {
      return Number(column);
    }
    const index = columnNames.indexOf(column);
    if (index === -1) {
      throw new FatalConfigurationError(`Work set has no column named "${column}"`, 'WORKSET_MISSING_COLUMN');
    }
    return index;
  }
}
