#!/usr/bin/env node
/**
 * Structure enrichment batch job
 *
 * Main entry point. Reads configuration from the environment (.env supported), runs
 * the job against the configured work set and output, and exits non-zero when the
 * run cannot start.
 */

import { config } from 'dotenv';
import { loadEnrichmentConfig } from './config/enrichmentConfig';
import { runEnrichmentJob } from './services/batch/EnrichmentJob';
import { Logger } from './services/core/Logger';
import { FatalConfigurationError, errorMessage } from './types/EnrichmentErrors';

// Load environment variables
config();

export async function main(): Promise<number> {
  const logger = new Logger('Main');
  try {
    await runEnrichmentJob(loadEnrichmentConfig());
    return 0;
  } catch (error) {
    if (error instanceof FatalConfigurationError) {
      logger.error('Run aborted', { errorCode: error.error_code, error: error.message });
      return 1;
    }
    logger.error('Run failed', { error: errorMessage(error) });
    return 1;
  }
}

export { runEnrichmentJob } from './services/batch/EnrichmentJob';
export { loadEnrichmentConfig } from './config/enrichmentConfig';

// Run main function if this file is executed directly
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
