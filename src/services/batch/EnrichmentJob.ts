/**
 * Enrichment Job
 *
 * Wires one run from configuration: source chain, shared rate limiter, lookup
 * sources, provenance collector, checkpoint store, orchestrator and export.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { EnrichmentConfig } from '../../config/enrichmentConfig';
import { SourceChainLoader } from '../lookup/SourceChainLoader';
import { RateLimiterService } from '../lookup/RateLimiterService';
import { FallbackResolverService } from '../lookup/FallbackResolverService';
import { createLookupSources, createPubChemHttpClient } from '../lookup/sources';
import { WikidataSparqlClient } from '../http/WikidataSparqlClient';
import { WikidataReferenceClient } from '../provenance/WikidataReferenceClient';
import { LotusProvenanceCollector } from '../provenance/LotusProvenanceCollector';
import { aggregate, countUniqueCompounds } from '../provenance/Aggregator';
import { CheckpointStoreService } from '../checkpoint/CheckpointStoreService';
import { WorkSetLoader } from '../workset/WorkSetLoader';
import { TabularExportService } from '../export/TabularExportService';
import { BatchOrchestrator } from './BatchOrchestrator';
import { RunStatistics } from '../../types/EnrichmentTypes';

export interface EnrichmentJobOptions {
  logger?: Logger;
  now?: () => Date;
  /** rate limiter sleep */
  sleep?: (ms: number) => Promise<void>;
}

export interface EnrichmentJobResult {
  runId: string;
  stats: RunStatistics;
  /** distinct compounds across provenance entries written this run */
  uniqueCompounds: number;
  exportWritten: boolean;
}

export async function runEnrichmentJob(
  config: EnrichmentConfig,
  options: EnrichmentJobOptions = {}
): Promise<EnrichmentJobResult> {
  const runId = uuidv4();
  const logger = options.logger ?? new Logger('EnrichmentJob', { runId, outputPath: config.outputPath });

  const chain = config.sourceChainPath
    ? SourceChainLoader.load(config.sourceChainPath)
    : SourceChainLoader.load();
  logger.info('Source chain loaded', { version: chain.version, chain: chain.chain });

  const workSet = await new WorkSetLoader(config.columns, logger.child('WorkSetLoader')).load(config.worksetPath);

  const rateLimiter = new RateLimiterService({
    minIntervalsMs: chain.minIntervalsMs,
    logger: logger.child('RateLimiterService'),
    sleep: options.sleep,
  });
  const http = { timeoutMs: config.httpTimeoutMs, userAgent: config.httpUserAgent };
  const sparql = new WikidataSparqlClient(http);

  const resolver = new FallbackResolverService({
    sources: createLookupSources(chain.chain, {
      pubchem: createPubChemHttpClient(http),
      sparql,
      logger: logger.child('LookupSource'),
    }),
    rateLimiter,
    logger: logger.child('FallbackResolverService'),
  });

  const provenanceCollector = config.collectProvenance
    ? new LotusProvenanceCollector(
        sparql,
        new WikidataReferenceClient(
          WikidataReferenceClient.createHttpClient(http),
          rateLimiter,
          logger.child('WikidataReferenceClient')
        ),
        rateLimiter,
        logger.child('LotusProvenanceCollector')
      )
    : undefined;

  const exporter = new TabularExportService({
    exportPath: config.exportPath,
    columns: workSet.columns,
    identifierColumn: config.exportIdentifierColumn,
    logger: logger.child('TabularExportService'),
  });

  const orchestrator = new BatchOrchestrator({
    logger: logger.child('BatchOrchestrator'),
    provenanceCollector,
    sinks: [exporter],
    now: options.now,
  });

  const stats = await orchestrator.run(
    workSet.items,
    resolver,
    new CheckpointStoreService(config.outputPath, logger.child('CheckpointStoreService')),
    aggregate
  );

  const exportWritten = await exporter.write();
  const uniqueCompounds = countUniqueCompounds(exporter.getRecords().flatMap((record) => record.entries));

  logger.info('Summary', {
    total: stats.total,
    full: stats.full,
    degraded: stats.degraded,
    unresolved: stats.unresolved,
    failed: stats.failed,
    skipped: stats.skipped,
    uniqueCompounds,
    outputPath: config.outputPath,
    exportPath: exportWritten ? config.exportPath : undefined,
  });

  return { runId, stats, uniqueCompounds, exportWritten };
}
