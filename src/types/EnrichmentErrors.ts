/**
 * Enrichment Errors
 *
 * Typed errors with error_class, error_code and retryable flags so callers can tell
 * which failures are recovered locally and which abort the run.
 */

export type EnrichmentErrorClass =
  | 'SOURCE'
  | 'ITEM'
  | 'CHECKPOINT'
  | 'CONFIGURATION'
  | 'UNKNOWN';

/**
 * Base enrichment error
 */
export class EnrichmentError extends Error {
  constructor(
    message: string,
    public readonly error_class: EnrichmentErrorClass,
    public readonly error_code?: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A lookup source call failed (network, timeout, malformed response).
 * Recovered by the resolver: the source contributes nothing.
 */
export class SourceUnavailableError extends EnrichmentError {
  constructor(
    public readonly sourceId: string,
    message: string,
    errorCode?: string
  ) {
    super(`${sourceId}: ${message}`, 'SOURCE', errorCode || 'SOURCE_UNAVAILABLE', true);
  }
}

/**
 * Unexpected failure while handling one item. Recovered by the orchestrator.
 */
export class ItemProcessingFault extends EnrichmentError {
  constructor(
    public readonly itemKey: string,
    message: string,
    originalError?: Error
  ) {
    super(message, 'ITEM', 'ITEM_PROCESSING_FAULT', false);
    if (originalError) {
      this.cause = originalError;
    }
  }
}

export type CheckpointAnomalyReason = 'TRUNCATED' | 'MISMATCHED_END' | 'ORPHAN_END';

/**
 * Malformed or truncated section found while scanning output. The item is treated as
 * not completed.
 */
export class CheckpointParseAnomaly extends EnrichmentError {
  constructor(
    public readonly itemKey: string,
    public readonly reason: CheckpointAnomalyReason,
    public readonly lineNumber: number
  ) {
    super(
      `Section for item ${itemKey} at line ${lineNumber} is incomplete (${reason})`,
      'CHECKPOINT',
      reason,
      false
    );
  }
}

/**
 * Missing work set, unwritable output or invalid configuration. Aborts the run
 * before any item is processed.
 */
export class FatalConfigurationError extends EnrichmentError {
  constructor(message: string, errorCode?: string, originalError?: Error) {
    super(message, 'CONFIGURATION', errorCode || 'FATAL_CONFIGURATION', false);
    if (originalError) {
      this.cause = originalError;
    }
  }
}

/**
 * Errors from Node built-ins can come from another realm (Jest runs tests in a vm
 * context), where `instanceof Error` is false. Match by shape instead.
 */
export function isErrorLike(error: unknown): error is Error {
  if (error instanceof Error) return true;
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'name' in error &&
    typeof error.name === 'string'
  );
}

export function asCause(error: unknown): Error | undefined {
  return isErrorLike(error) ? error : undefined;
}

export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/** `code` of a system error (ENOENT, EACCES, ...), if any. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
