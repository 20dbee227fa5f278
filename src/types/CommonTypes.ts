/**
 * Common types used across the system
 */

export interface RunContext {
  runId: string;
  outputPath?: string;
}
