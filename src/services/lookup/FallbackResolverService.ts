/**
 * Fallback Resolver Service
 *
 * Walks the ordered lookup chain for one item and returns the best structure found.
 * FULL short-circuits the chain; the first DEGRADED answer is kept while later
 * sources are tried; failures contribute nothing. resolve() never rejects.
 *
 * Sources are called one at a time. A slower FULL source must never lose to a
 * faster DEGRADED one, so there is no fan-out.
 */

import { ILookupSource } from './ILookupSource';
import { RateLimiterService } from './RateLimiterService';
import { Logger } from '../core/Logger';
import {
  LookupAttempt,
  ResolutionResult,
  UNRESOLVED_SOURCE,
  UnresolvedReason,
  WorkItem,
  capTier,
} from '../../types/EnrichmentTypes';
import { errorMessage } from '../../types/EnrichmentErrors';

export interface IResolver {
  resolve(item: WorkItem): Promise<ResolutionResult>;
}

export interface LookupCandidate {
  source: ILookupSource;
  queryKey: string;
}

export interface ChainState {
  /** first DEGRADED attempt, or the FULL one once terminal */
  best?: LookupAttempt;
  attempts: LookupAttempt[];
  terminal: boolean;
}

export const INITIAL_CHAIN_STATE: ChainState = { attempts: [], terminal: false };

/**
 * Fold one attempt into the chain state. FULL is terminal; DEGRADED only replaces
 * an empty best (first one wins).
 */
export function foldAttempt(state: ChainState, attempt: LookupAttempt): ChainState {
  const attempts = [...state.attempts, attempt];
  if (attempt.tier === 'FULL') {
    return { best: attempt, attempts, terminal: true };
  }
  if (attempt.tier === 'DEGRADED' && !state.best) {
    return { best: attempt, attempts, terminal: false };
  }
  return { ...state, attempts };
}

function unresolved(reason: UnresolvedReason, attempts: readonly LookupAttempt[]): ResolutionResult {
  return Object.freeze({
    value: '',
    tier: 'UNRESOLVED' as const,
    source: UNRESOLVED_SOURCE,
    unresolvedReason: reason,
    attempts: Object.freeze([...attempts]),
  });
}

/**
 * Turn a final chain state into a result. Without any usable answer the reason is
 * SOURCE_UNAVAILABLE if at least one source failed, NOT_FOUND otherwise.
 */
export function finalizeChain(state: ChainState): ResolutionResult {
  const best = state.best;
  if (best && best.outcome.kind === 'found') {
    return Object.freeze({
      value: best.outcome.value,
      tier: best.tier,
      source: best.sourceId,
      attempts: Object.freeze([...state.attempts]),
    });
  }
  if (state.attempts.length === 0) {
    return unresolved('NO_HINTS', []);
  }
  const anyUnavailable = state.attempts.some((a) => a.outcome.kind === 'unavailable');
  return unresolved(anyUnavailable ? 'SOURCE_UNAVAILABLE' : 'NOT_FOUND', state.attempts);
}

export interface FallbackResolverConfig {
  sources: ILookupSource[];
  rateLimiter: RateLimiterService;
  logger: Logger;
}

export class FallbackResolverService implements IResolver {
  private readonly sources: ILookupSource[];
  private readonly rateLimiter: RateLimiterService;
  private readonly logger: Logger;

  constructor(config: FallbackResolverConfig) {
    this.sources = [...config.sources];
    this.rateLimiter = config.rateLimiter;
    this.logger = config.logger;
  }

  /**
   * Candidates in chain order, then per-source key order. Depends only on the item's
   * hints, never on lookup results.
   */
  buildCandidates(item: WorkItem): LookupCandidate[] {
    const candidates: LookupCandidate[] = [];
    for (const source of this.sources) {
      for (const queryKey of source.queryKeys(item)) {
        candidates.push({ source, queryKey });
      }
    }
    return candidates;
  }

  async resolve(item: WorkItem): Promise<ResolutionResult> {
    let candidates: LookupCandidate[];
    try {
      candidates = this.buildCandidates(item);
    } catch (error) {
      this.logger.warn('Could not derive lookup keys; treating item as unresolved', {
        itemKey: item.key,
        error: errorMessage(error),
      });
      return unresolved('NO_HINTS', []);
    }

    if (candidates.length === 0) {
      this.logger.debug('No usable hints; skipping lookups', { itemKey: item.key });
      return unresolved('NO_HINTS', []);
    }

    let state = INITIAL_CHAIN_STATE;
    for (const candidate of candidates) {
      const attempt = await this.attempt(candidate);
      state = foldAttempt(state, attempt);
      if (state.terminal) {
        break;
      }
    }

    const result = finalizeChain(state);
    this.logger.debug('Item resolved', {
      itemKey: item.key,
      tier: result.tier,
      source: result.source,
      attempts: result.attempts.length,
    });
    return result;
  }

  private async attempt(candidate: LookupCandidate): Promise<LookupAttempt> {
    const { source, queryKey } = candidate;
    try {
      await this.rateLimiter.acquire(source.rateLimitKey);
      const outcome = await source.lookup(queryKey);
      if (outcome.kind !== 'found') {
        return { sourceId: source.sourceId, queryKey, outcome, tier: 'UNRESOLVED' };
      }

      const tier = capTier(source.classify(outcome.value), source.maxTier);
      if (tier === 'UNRESOLVED') {
        // blank value counts as not found so value is non-empty iff resolved
        return { sourceId: source.sourceId, queryKey, outcome: { kind: 'not_found' }, tier };
      }
      return { sourceId: source.sourceId, queryKey, outcome, tier };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Lookup source threw; continuing with next source', {
        source: source.sourceId,
        queryKey,
        error: message,
      });
      return {
        sourceId: source.sourceId,
        queryKey,
        outcome: { kind: 'unavailable', error: message },
        tier: 'UNRESOLVED',
      };
    }
  }
}
