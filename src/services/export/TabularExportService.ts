/**
 * Tabular Export Service
 *
 * Collects the records persisted during the run and writes them once, at the end,
 * as CSV: the work set's columns, then the resolved identifier column, tier, source
 * and status. An existing identifier column is overwritten in place.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { Logger } from '../core/Logger';
import { ItemRecordSink } from '../batch/BatchOrchestrator';
import { ProcessedItemRecord } from '../../types/EnrichmentTypes';
import { FatalConfigurationError, asCause } from '../../types/EnrichmentErrors';

export const EXPORT_STATUS_COLUMNS = ['tier', 'source', 'status'] as const;

export interface TabularExportConfig {
  exportPath: string;
  /** work set column names, in file order */
  columns: string[];
  identifierColumn: string;
  logger: Logger;
}

export class TabularExportService implements ItemRecordSink {
  private readonly records: ProcessedItemRecord[] = [];
  private readonly exportPath: string;
  private readonly columns: string[];
  private readonly identifierColumn: string;
  private readonly logger: Logger;

  constructor(config: TabularExportConfig) {
    this.exportPath = config.exportPath;
    this.columns = [...config.columns];
    this.identifierColumn = config.identifierColumn;
    this.logger = config.logger;
  }

  accept(record: ProcessedItemRecord): void {
    this.records.push(record);
  }

  getRecords(): readonly ProcessedItemRecord[] {
    return this.records;
  }

  fieldNames(): string[] {
    const fields = this.columns.includes(this.identifierColumn)
      ? [...this.columns]
      : [...this.columns, this.identifierColumn];
    for (const column of EXPORT_STATUS_COLUMNS) {
      if (!fields.includes(column)) fields.push(column);
    }
    return fields;
  }

  toCsv(): string {
    const fields = this.fieldNames();
    const data = this.records.map((record) => {
      const row: Record<string, string> = { ...record.item.fields };
      row[this.identifierColumn] = record.result?.value ?? '';
      row.tier = record.result?.tier ?? 'UNRESOLVED';
      row.source = record.result?.source ?? 'none';
      row.status = record.status === 'FAILED_ISOLATED' ? 'FAILED' : 'RESOLVED';
      return fields.map((field) => row[field] ?? '');
    });
    return Papa.unparse({ fields, data }, { newline: '\n' });
  }

  /**
   * Write the export. Nothing is written when no item was processed this run.
   */
  async write(): Promise<boolean> {
    if (this.records.length === 0) {
      this.logger.info('No items processed; export not written', { exportPath: this.exportPath });
      return false;
    }

    try {
      await fs.mkdir(path.dirname(path.resolve(this.exportPath)), { recursive: true });
      await fs.writeFile(this.exportPath, `${this.toCsv()}\n`, 'utf8');
    } catch (error) {
      throw new FatalConfigurationError(
        `Export not writable: ${this.exportPath}`,
        'EXPORT_NOT_WRITABLE',
        asCause(error)
      );
    }
    this.logger.info('Export written', { exportPath: this.exportPath, rows: this.records.length });
    return true;
  }
}
