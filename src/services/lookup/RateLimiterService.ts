/**
 * Rate Limiter Service
 *
 * Minimum delay between calls to the same external service. One last-call timestamp
 * per rate-limit key, owned by this instance; every lookup and provenance call goes
 * through the same instance. Callers for one key are served in arrival order.
 */

import { Logger } from '../core/Logger';

export interface RateLimiterConfig {
  /** min interval per rate-limit key, in ms */
  minIntervalsMs: Record<string, number>;
  /** used for keys missing from minIntervalsMs */
  defaultMinIntervalMs?: number;
  logger: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiterService {
  private readonly minIntervalsMs: Record<string, number>;
  private readonly defaultMinIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly lastAcquiredAt = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();

  constructor(config: RateLimiterConfig) {
    this.minIntervalsMs = { ...config.minIntervalsMs };
    this.defaultMinIntervalMs = config.defaultMinIntervalMs ?? 0;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Resolves once at least the configured interval has passed since the previous
   * acquire for the same key.
   */
  acquire(sourceId: string): Promise<void> {
    const previous = this.tails.get(sourceId) ?? Promise.resolve();
    const turn = previous.then(() => this.waitForSlot(sourceId));
    this.tails.set(sourceId, turn);
    return turn;
  }

  minIntervalFor(sourceId: string): number {
    return this.minIntervalsMs[sourceId] ?? this.defaultMinIntervalMs;
  }

  private async waitForSlot(sourceId: string): Promise<void> {
    const last = this.lastAcquiredAt.get(sourceId);
    if (last !== undefined) {
      const waitMs = last + this.minIntervalFor(sourceId) - this.now();
      if (waitMs > 0) {
        this.logger.debug('Rate limit wait', { sourceId, waitMs });
        await this.sleep(waitMs);
      }
    }
    this.lastAcquiredAt.set(sourceId, this.now());
  }
}
