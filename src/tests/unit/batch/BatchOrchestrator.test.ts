/**
 * Unit tests for BatchOrchestrator, against an in-memory output.
 */

import { BatchOrchestrator, ItemRecordSink } from '../../../services/batch/BatchOrchestrator';
import {
  CheckpointHandle,
  CheckpointScan,
  ICheckpointStore,
  scanCheckpoint,
} from '../../../services/checkpoint/CheckpointStoreService';
import { FallbackResolverService, IResolver } from '../../../services/lookup/FallbackResolverService';
import { aggregate } from '../../../services/provenance/Aggregator';
import { Logger } from '../../../services/core/Logger';
import { ProcessedItemRecord, ResolutionResult, WorkItem } from '../../../types/EnrichmentTypes';
import { FatalConfigurationError } from '../../../types/EnrichmentErrors';
import {
  FakeLookupSource,
  FakeProvenanceCollector,
  found,
  provenanceRecord,
  unlimitedRateLimiter,
  workItem,
} from '../../__mocks__/lookup-sources';

const logger = new Logger('BatchOrchestratorTest');
const NOW = new Date('2026-03-01T12:00:00.000Z');
const KEY_A = 'AAAAAAAAAAAAAA-BBBBBBBBBB-C';
const KEY_B = 'DDDDDDDDDDDDDD-EEEEEEEEEE-F';

class MemoryCheckpointStore implements ICheckpointStore {
  readonly outputPath = 'memory://output';
  failWrites = false;

  constructor(public content = '') {}

  async loadCheckpoint(): Promise<CheckpointScan> {
    return scanCheckpoint(this.content);
  }

  async openForAppend(header: string): Promise<CheckpointHandle> {
    if (this.content === '') this.content = header;
    return {
      append: async (text: string) => {
        if (this.failWrites) throw new FatalConfigurationError('disk full', 'OUTPUT_WRITE_FAILED');
        this.content += text;
      },
      close: async () => undefined,
    };
  }

  async withAppendHandle<T>(header: string, fn: (handle: CheckpointHandle) => Promise<T>): Promise<T> {
    const handle = await this.openForAppend(header);
    try {
      return await fn(handle);
    } finally {
      await handle.close();
    }
  }

  sectionKeys(): string[] {
    return this.content
      .split('\n')
      .filter((line) => line.startsWith('ITEM #'))
      .map((line) => line.slice('ITEM #'.length));
  }
}

class CollectingSink implements ItemRecordSink {
  readonly records: ProcessedItemRecord[] = [];
  accept(record: ProcessedItemRecord): void {
    this.records.push(record);
  }
}

function item(index: number, key: string, secondaryKey?: string): WorkItem {
  return workItem({ index, key, label: `compound ${key}`, synonyms: [], secondaryKey });
}

describe('BatchOrchestrator', () => {
  let source: FakeLookupSource;
  let resolver: FallbackResolverService;
  let store: MemoryCheckpointStore;
  let sink: CollectingSink;
  let collector: FakeProvenanceCollector;
  let orchestrator: BatchOrchestrator;

  beforeEach(() => {
    source = new FakeLookupSource({
      sourceId: 'fake',
      answers: { [KEY_A]: found('C[C@H](O)C(=O)O'), [KEY_B]: found('CC(O)C(=O)O') },
    });
    resolver = new FallbackResolverService({ sources: [source], rateLimiter: unlimitedRateLimiter(), logger });
    store = new MemoryCheckpointStore();
    sink = new CollectingSink();
    collector = new FakeProvenanceCollector({
      A: [provenanceRecord(), provenanceRecord({ taxonName: 'Sophora japonica' })],
    });
    orchestrator = new BatchOrchestrator({ logger, provenanceCollector: collector, sinks: [sink], now: () => NOW });
  });

  it('processes every item in order and counts tiers', async () => {
    const workSet = [item(1, 'A', KEY_A), item(2, 'B', KEY_B), item(3, 'C')];

    const stats = await orchestrator.run(workSet, resolver, store, aggregate);

    expect(stats).toEqual({ total: 3, full: 1, degraded: 1, unresolved: 1, failed: 0, skipped: 0 });
    expect(store.content.startsWith('STRUCTURE ENRICHMENT RESULTS\nTotal Items: 3\nGenerated: 2026-03-01T12:00:00.000Z\n\n')).toBe(true);
    expect(store.sectionKeys()).toEqual(['A', 'B', 'C']);
    expect([...scanCheckpoint(store.content).completed]).toEqual(['A', 'B', 'C']);
  });

  it('aggregates provenance before writing and passes records to sinks', async () => {
    await orchestrator.run([item(1, 'A', KEY_A)], resolver, store, aggregate);

    expect(collector.calls).toEqual(['A']);
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]?.status).toBe('RESOLVED');
    expect(sink.records[0]?.entries).toHaveLength(1);
    expect(store.content).toContain('Entry 1: quercetin\n');
    expect(store.content).not.toContain('Entry 2:');
  });

  it('skips items already in the output without resolving them', async () => {
    await orchestrator.run([item(1, 'A', KEY_A)], resolver, store, aggregate);
    source.calls.length = 0;

    const stats = await orchestrator.run([item(1, 'A', KEY_A), item(2, 'B', KEY_B)], resolver, store, aggregate);

    expect(stats).toEqual({ total: 1, full: 0, degraded: 1, unresolved: 0, failed: 0, skipped: 1 });
    expect(source.calls).toEqual([KEY_B]);
    expect(store.sectionKeys()).toEqual(['A', 'B']);
  });

  it('isolates an item with a blank key and continues', async () => {
    const workSet = [item(1, '  ', KEY_A), item(2, 'B', KEY_B)];

    const stats = await orchestrator.run(workSet, resolver, store, aggregate);

    expect(stats).toEqual({ total: 2, full: 0, degraded: 1, unresolved: 0, failed: 1, skipped: 0 });
    expect(source.calls).toEqual([KEY_B]);
    expect(store.content).toContain('Status: FAILED\n');
    expect(store.content).toContain('Error: Malformed work item: key is empty\n');
    expect(sink.records.map((r) => r.status)).toEqual(['FAILED_ISOLATED', 'RESOLVED']);
  });

  it('drops a malformed InChIKey and still tries the name sources', async () => {
    const byName = new FakeLookupSource({
      sourceId: 'by-name',
      keysFor: (i) => [...i.synonyms],
      answers: { quercetin: found('O=C1C(O)=C(Oc2cc(O)cc(O)c12)c1ccc(O)c(O)c1') },
    });
    const chain = new FallbackResolverService({ sources: [source, byName], rateLimiter: unlimitedRateLimiter(), logger });
    const bad = workItem({ index: 1, key: 'Q', label: 'quercetin', secondaryKey: 'not-an-inchikey' });

    const stats = await orchestrator.run([bad], chain, store, aggregate);

    expect(stats).toEqual({ total: 1, full: 0, degraded: 1, unresolved: 0, failed: 0, skipped: 0 });
    expect(source.calls).toEqual([]);
    expect(byName.calls).toEqual(['quercetin']);
    expect(store.content).toContain('Tier: DEGRADED\nSource: by-name\n');
  });

  it('skips an item on the next run when its key has surrounding whitespace', async () => {
    await orchestrator.run([item(1, ' A ', KEY_A)], resolver, store, aggregate);
    source.calls.length = 0;

    const stats = await orchestrator.run([item(1, ' A ', KEY_A)], resolver, store, aggregate);

    expect(stats).toEqual({ total: 0, full: 0, degraded: 0, unresolved: 0, failed: 0, skipped: 1 });
    expect(source.calls).toEqual([]);
    expect(store.sectionKeys()).toEqual(['A']);
  });

  it('reports zero processed items for a run over a finished output', async () => {
    await orchestrator.run([item(1, 'A', KEY_A), item(2, 'B', KEY_B)], resolver, store, aggregate);

    const stats = await orchestrator.run([item(1, 'A', KEY_A), item(2, 'B', KEY_B)], resolver, store, aggregate);

    expect(stats).toEqual({ total: 0, full: 0, degraded: 0, unresolved: 0, failed: 0, skipped: 2 });
  });

  it('isolates unexpected faults from the resolver', async () => {
    const failing: IResolver = {
      resolve: (): Promise<ResolutionResult> => Promise.reject(new Error('resolver exploded')),
    };

    const stats = await orchestrator.run([item(1, 'A', KEY_A)], failing, store, aggregate);

    expect(stats.failed).toBe(1);
    expect(sink.records[0]?.error).toBe('resolver exploded');
    expect([...scanCheckpoint(store.content).completed]).toEqual(['A']);
  });

  it('processes a key only once per run', async () => {
    const stats = await orchestrator.run([item(1, 'A', KEY_A), item(2, 'A', KEY_A)], resolver, store, aggregate);

    expect(stats).toEqual({ total: 1, full: 1, degraded: 0, unresolved: 0, failed: 0, skipped: 1 });
    expect(store.sectionKeys()).toEqual(['A']);
  });

  it('works without a provenance collector', async () => {
    const bare = new BatchOrchestrator({ logger, now: () => NOW });

    await bare.run([item(1, 'A', KEY_A)], resolver, store, aggregate);

    expect(store.content).toContain('No provenance records found.\n');
  });

  it('aborts when the output cannot be written', async () => {
    store.failWrites = true;

    await expect(orchestrator.run([item(1, 'A', KEY_A)], resolver, store, aggregate)).rejects.toBeInstanceOf(
      FatalConfigurationError
    );
  });

  it('logs progress per item', async () => {
    const info = jest.spyOn(logger, 'info');

    await orchestrator.run([item(1, 'A', KEY_A), item(2, 'C')], resolver, store, aggregate);

    const messages = info.mock.calls.map((call) => call[0]);
    expect(messages).toContain('[1/2] compound A -> FULL (fake)');
    expect(messages).toContain('[2/2] compound C -> UNRESOLVED (none)');
    info.mockRestore();
  });
});
