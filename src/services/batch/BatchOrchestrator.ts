/**
 * Batch Orchestrator
 *
 * Order per item: (1) skip if already in the output, (2) validate the item and drop
 * unusable hints, (3) resolve, (4) collect and aggregate provenance, (5) append the
 * section, (6) count it. `total` counts processed items only, so a run over a
 * finished output reports all zeros except `skipped`.
 * The completion set is computed once at the start of the run. A fault in one item is
 * written as a FAILED section and never stops the run; only checkpoint I/O errors do.
 */

import { Logger } from '../core/Logger';
import { IResolver } from '../lookup/FallbackResolverService';
import { CheckpointHandle, ICheckpointStore } from '../checkpoint/CheckpointStoreService';
import { IProvenanceCollector } from '../provenance/LotusProvenanceCollector';
import { AggregateFn } from '../provenance/Aggregator';
import { validateWorkItem } from '../workset/WorkItemValidator';
import { formatHeader, formatSection, sectionKey } from './OutputSectionFormatter';
import {
  ProcessedItemRecord,
  RunStatistics,
  WorkItem,
  emptyRunStatistics,
} from '../../types/EnrichmentTypes';
import { ItemProcessingFault, asCause, errorMessage } from '../../types/EnrichmentErrors';

/** Receives every record after its section is persisted. */
export interface ItemRecordSink {
  accept(record: ProcessedItemRecord): void;
}

export interface BatchOrchestratorConfig {
  logger: Logger;
  /** Optional. Default: no provenance, every section lists no entries. */
  provenanceCollector?: IProvenanceCollector;
  sinks?: ItemRecordSink[];
  /** header timestamp */
  now?: () => Date;
}

export class BatchOrchestrator {
  private provenanceCollector?: IProvenanceCollector;
  private sinks: ItemRecordSink[];
  private now: () => Date;
  private logger: Logger;

  constructor(config: BatchOrchestratorConfig) {
    this.provenanceCollector = config.provenanceCollector;
    this.sinks = config.sinks ?? [];
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger;
  }

  async run(
    workSet: readonly WorkItem[],
    resolver: IResolver,
    checkpoint: ICheckpointStore,
    aggregator: AggregateFn
  ): Promise<RunStatistics> {
    const stats = emptyRunStatistics();

    const { completed } = await checkpoint.loadCheckpoint();
    const pending = workSet.filter((item) => !completed.has(sectionKey(item))).length;
    this.logger.info('Starting enrichment run', {
      outputPath: checkpoint.outputPath,
      workSetSize: workSet.length,
      alreadyCompleted: workSet.length - pending,
      pending,
    });

    await checkpoint.withAppendHandle(formatHeader(workSet.length, this.now()), async (handle) => {
      for (const item of workSet) {
        // the key as written in the section marker
        const key = sectionKey(item);
        if (completed.has(key)) {
          stats.skipped++;
          this.logger.debug('Item already in output; skipping', { itemKey: key });
          continue;
        }
        await this.processItem(item, workSet.length, resolver, aggregator, handle, stats);
        // later rows with the same key are skipped too
        completed.add(key);
      }
    });

    this.logger.info('Enrichment run complete', {
      workSetSize: workSet.length,
      total: stats.total,
      full: stats.full,
      degraded: stats.degraded,
      unresolved: stats.unresolved,
      failed: stats.failed,
      skipped: stats.skipped,
    });
    return stats;
  }

  private async processItem(
    item: WorkItem,
    total: number,
    resolver: IResolver,
    aggregator: AggregateFn,
    handle: CheckpointHandle,
    stats: RunStatistics
  ): Promise<void> {
    let record: ProcessedItemRecord;
    try {
      const validated = validateWorkItem(item);
      for (const hint of validated.droppedHints) {
        this.logger.warn('Ignoring unusable hint', { itemKey: item.key, hint });
      }
      const result = await resolver.resolve(validated.item);
      const raw = this.provenanceCollector ? await this.provenanceCollector.collect(validated.item) : [];
      record = { item, status: 'RESOLVED', result, entries: aggregator(raw) };
    } catch (error) {
      const fault =
        error instanceof ItemProcessingFault
          ? error
          : new ItemProcessingFault(item.key, errorMessage(error), asCause(error));
      this.logger.error('Item failed; continuing with next item', {
        itemKey: item.key,
        error: fault.message,
      });
      record = { item, status: 'FAILED_ISOLATED', entries: [], error: fault.message };
    }

    await handle.append(formatSection(record));

    stats.total++;
    let outcome: string;
    if (record.status === 'FAILED_ISOLATED' || !record.result) {
      stats.failed++;
      outcome = 'FAILED';
    } else {
      const tier = record.result.tier;
      if (tier === 'FULL') stats.full++;
      else if (tier === 'DEGRADED') stats.degraded++;
      else stats.unresolved++;
      outcome = `${tier} (${record.result.source})`;
    }

    for (const sink of this.sinks) {
      sink.accept(record);
    }
    this.logger.info(`[${item.index}/${total}] ${item.label} -> ${outcome}`, {
      itemKey: item.key,
      entries: record.entries.length,
    });
  }
}
