import { RunContext } from '../../types/CommonTypes';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogMeta {
  [key: string]: unknown;
  runId?: string;
  itemKey?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** LOG_LEVEL threshold, read per call so tests can flip it. Unknown values mean info. */
export function currentLogLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

export class Logger {
  private serviceName: string;
  private defaultContext?: RunContext;

  constructor(serviceName: string, context?: RunContext) {
    this.serviceName = serviceName;
    this.defaultContext = context;
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, meta));
    }
  }

  // errors are never filtered
  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  setContext(context: RunContext): void {
    this.defaultContext = context;
  }

  /** Logger for another service sharing this logger's run context. */
  child(serviceName: string): Logger {
    return new Logger(serviceName, this.defaultContext);
  }
}
