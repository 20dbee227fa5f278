/**
 * Checkpoint Store Service
 *
 * The output log is the checkpoint. A section opens with `ITEM #<key>` and closes with
 * `END ITEM #<key>`; only closed sections count as completed. Completion is derived by
 * scanning the existing output once, before the run starts.
 *
 * A trailing section without its closing marker is cut off before appending, so a
 * restart writes one corrected section for that item instead of leaving two.
 */

import { promises as fs } from 'fs';
import { FileHandle } from 'fs/promises';
import * as path from 'path';
import { Logger } from '../core/Logger';
import { CheckpointParseAnomaly, FatalConfigurationError, asCause, errnoCode } from '../../types/EnrichmentErrors';

export const SECTION_SEPARATOR = '='.repeat(80);
export const SECTION_OPEN_PREFIX = 'ITEM #';
export const SECTION_CLOSE_PREFIX = 'END ITEM #';

export interface CheckpointScan {
  completed: Set<string>;
  anomalies: CheckpointParseAnomaly[];
  /** byte offset where an unclosed trailing section starts */
  truncateAt?: number;
  /** closed sections, duplicates included */
  sectionCount: number;
}

interface OpenSection {
  key: string;
  lineNumber: number;
  startOffset: number;
}

/**
 * Scan prior output. Pure.
 */
export function scanCheckpoint(content: string): CheckpointScan {
  const completed = new Set<string>();
  const anomalies: CheckpointParseAnomaly[] = [];
  let sectionCount = 0;
  let open: OpenSection | undefined;
  // start of a section whose close marker is the last thing in the file but does not match
  let brokenTail: number | undefined;

  let offset = 0;
  let previousLine: string | undefined;
  let previousOffset = 0;

  const lines = content.split('\n');
  lines.forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const lineNumber = index + 1;
    if (line.trim() !== '') {
      brokenTail = undefined;
    }

    if (line.startsWith(SECTION_CLOSE_PREFIX)) {
      const key = line.slice(SECTION_CLOSE_PREFIX.length);
      if (open && open.key === key) {
        completed.add(key);
        sectionCount++;
      } else if (open) {
        anomalies.push(new CheckpointParseAnomaly(open.key, 'MISMATCHED_END', open.lineNumber));
        brokenTail = open.startOffset;
      } else {
        anomalies.push(new CheckpointParseAnomaly(key, 'ORPHAN_END', lineNumber));
      }
      open = undefined;
    } else if (line.startsWith(SECTION_OPEN_PREFIX)) {
      if (open) {
        anomalies.push(new CheckpointParseAnomaly(open.key, 'TRUNCATED', open.lineNumber));
      }
      open = {
        key: line.slice(SECTION_OPEN_PREFIX.length),
        lineNumber,
        startOffset: previousLine === SECTION_SEPARATOR ? previousOffset : offset,
      };
    }

    previousLine = line;
    previousOffset = offset;
    offset += Buffer.byteLength(rawLine, 'utf8') + 1;
  });

  let truncateAt: number | undefined;
  if (open) {
    anomalies.push(new CheckpointParseAnomaly(open.key, 'TRUNCATED', open.lineNumber));
    truncateAt = open.startOffset;
  } else if (brokenTail !== undefined) {
    // e.g. a close marker cut off mid-write
    truncateAt = brokenTail;
  }

  // a key closed earlier stays completed even if a later copy is broken
  return { completed, anomalies, truncateAt, sectionCount };
}

export function computeCompletionSet(content: string): Set<string> {
  return scanCheckpoint(content).completed;
}

export interface CheckpointHandle {
  /** Single write, flushed before resolving. */
  append(text: string): Promise<void>;
  close(): Promise<void>;
}

export interface ICheckpointStore {
  readonly outputPath: string;
  loadCheckpoint(): Promise<CheckpointScan>;
  openForAppend(header: string): Promise<CheckpointHandle>;
  withAppendHandle<T>(header: string, fn: (handle: CheckpointHandle) => Promise<T>): Promise<T>;
}

export class CheckpointStoreService implements ICheckpointStore {
  readonly outputPath: string;

  constructor(
    outputPath: string,
    private readonly logger: Logger
  ) {
    this.outputPath = path.resolve(outputPath);
  }

  /**
   * Scan the current output. A missing file means nothing is completed.
   */
  async loadCheckpoint(): Promise<CheckpointScan> {
    const content = await this.readExisting();
    const scan = scanCheckpoint(content ?? '');

    for (const anomaly of scan.anomalies) {
      this.logger.warn('Incomplete section in output; item will be reprocessed', {
        itemKey: anomaly.itemKey,
        reason: anomaly.reason,
        lineNumber: anomaly.lineNumber,
      });
    }
    this.logger.info('Checkpoint loaded', {
      outputPath: this.outputPath,
      exists: content !== undefined,
      completed: scan.completed.size,
      sections: scan.sectionCount,
      anomalies: scan.anomalies.length,
    });
    if (scan.sectionCount > scan.completed.size) {
      this.logger.warn('Output holds more than one closed section for some items', {
        duplicateSections: scan.sectionCount - scan.completed.size,
      });
    }
    return scan;
  }

  /**
   * Open the output for appending. Writes the header when the output is missing or
   * empty and cuts off an unclosed trailing section.
   */
  async openForAppend(header: string): Promise<CheckpointHandle> {
    try {
      const content = await this.readExisting();
      let remaining = content ?? '';

      if (content !== undefined) {
        const scan = scanCheckpoint(content);
        if (scan.truncateAt !== undefined) {
          await fs.truncate(this.outputPath, scan.truncateAt);
          remaining = Buffer.from(content, 'utf8').subarray(0, scan.truncateAt).toString('utf8');
          this.logger.warn('Removed unclosed trailing section', {
            outputPath: this.outputPath,
            truncatedAt: scan.truncateAt,
          });
        }
      } else {
        await fs.mkdir(path.dirname(this.outputPath), { recursive: true });
      }

      const handle = this.wrapHandle(await fs.open(this.outputPath, 'a'));
      try {
        if (remaining === '') {
          await handle.append(header);
        } else if (!remaining.endsWith('\n')) {
          await handle.append('\n');
        }
      } catch (error) {
        await handle.close();
        throw error;
      }
      return handle;
    } catch (error) {
      if (error instanceof FatalConfigurationError) {
        throw error;
      }
      throw new FatalConfigurationError(
        `Output not writable: ${this.outputPath}`,
        'OUTPUT_NOT_WRITABLE',
        asCause(error)
      );
    }
  }

  /**
   * Run fn with an append handle that is closed on every exit path.
   */
  async withAppendHandle<T>(header: string, fn: (handle: CheckpointHandle) => Promise<T>): Promise<T> {
    const handle = await this.openForAppend(header);
    try {
      return await fn(handle);
    } finally {
      await handle.close();
    }
  }

  private async readExisting(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.outputPath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw new FatalConfigurationError(
        `Output not readable: ${this.outputPath}`,
        'OUTPUT_NOT_READABLE',
        asCause(error)
      );
    }
  }

  private wrapHandle(file: FileHandle): CheckpointHandle {
    let closed = false;
    const outputPath = this.outputPath;
    return {
      async append(text: string): Promise<void> {
        try {
          await file.appendFile(text, 'utf8');
          await file.datasync();
        } catch (error) {
          throw new FatalConfigurationError(
            `Write to output failed: ${outputPath}`,
            'OUTPUT_WRITE_FAILED',
            asCause(error)
          );
        }
      },
      async close(): Promise<void> {
        if (closed) return;
        closed = true;
        await file.close();
      },
    };
  }
}
