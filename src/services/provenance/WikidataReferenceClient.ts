/**
 * Wikidata Reference Client
 *
 * DOI (P356), title (P1476) and publication date (P577) of a reference entity, read
 * from Special:EntityData JSON. Results are cached for the lifetime of the client;
 * failed fetches are not cached and yield empty metadata.
 */

import { z } from 'zod';
import { HttpJsonClient } from '../http/HttpJsonClient';
import { RateLimiterService } from '../lookup/RateLimiterService';
import { Logger } from '../core/Logger';

export const WIKIDATA_ENTITY_BASE_URL = 'https://www.wikidata.org';
export const WIKIDATA_ENTITY_SERVICE = 'wikidata-entity';

export interface ReferenceMetadata {
  doi: string;
  title: string;
  pubDate: string;
}

export const EMPTY_REFERENCE_METADATA: ReferenceMetadata = Object.freeze({ doi: '', title: '', pubDate: '' });

const ClaimSchema = z.object({
  mainsnak: z.object({
    datavalue: z.object({ value: z.unknown() }).optional(),
  }),
});

// Entities without claims serialize them as [] instead of {}
const ClaimsSchema = z.preprocess(
  (val) => (Array.isArray(val) ? {} : val),
  z.record(z.array(ClaimSchema))
);

const EntityDataSchema = z.object({
  entities: z.record(
    z.object({
      claims: ClaimsSchema.optional(),
    })
  ),
});

type Claims = Record<string, Array<z.infer<typeof ClaimSchema>>>;

const MonolingualTextSchema = z.object({ text: z.string() });
const TimeValueSchema = z.object({ time: z.string() });

function firstValue(claims: Claims, property: string): unknown {
  return claims[property]?.[0]?.mainsnak.datavalue?.value;
}

export function extractReferenceMetadata(claims: Claims): ReferenceMetadata {
  const doiValue = firstValue(claims, 'P356');
  const doi = typeof doiValue === 'string' ? doiValue : '';

  const titleValue = firstValue(claims, 'P1476');
  let title = '';
  const monolingual = MonolingualTextSchema.safeParse(titleValue);
  if (monolingual.success) {
    title = monolingual.data.text;
  } else if (typeof titleValue === 'string') {
    title = titleValue;
  }

  const time = TimeValueSchema.safeParse(firstValue(claims, 'P577'));
  const pubDate = time.success ? time.data.time : '';

  return { doi, title, pubDate };
}

/** Wikidata time value (+2001-05-01T00:00:00Z) to YYYY-MM-DD. */
export function cleanWikidataDate(value: string): string {
  return value.replace('+', '').split('T')[0] ?? '';
}

export class WikidataReferenceClient {
  private readonly cache = new Map<string, ReferenceMetadata>();

  constructor(
    private readonly http: HttpJsonClient,
    private readonly rateLimiter: RateLimiterService,
    private readonly logger: Logger
  ) {}

  static createHttpClient(config: { timeoutMs: number; userAgent: string; baseURL?: string }): HttpJsonClient {
    return new HttpJsonClient({
      serviceId: WIKIDATA_ENTITY_SERVICE,
      baseURL: config.baseURL ?? WIKIDATA_ENTITY_BASE_URL,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
    });
  }

  async getReferenceMetadata(qid: string): Promise<ReferenceMetadata> {
    const cached = this.cache.get(qid);
    if (cached) {
      return cached;
    }

    await this.rateLimiter.acquire(WIKIDATA_ENTITY_SERVICE);
    const result = await this.http.getJson(
      `/wiki/Special:EntityData/${encodeURIComponent(qid)}.json`,
      EntityDataSchema
    );

    if (result.kind === 'error') {
      this.logger.warn('Reference metadata unavailable', {
        qid,
        error: result.error.message,
        errorCode: result.error.error_code,
      });
      return EMPTY_REFERENCE_METADATA;
    }

    let metadata = EMPTY_REFERENCE_METADATA;
    if (result.kind === 'ok') {
      const claims = result.data.entities[qid]?.claims;
      if (claims) {
        metadata = extractReferenceMetadata(claims);
      }
    }
    this.cache.set(qid, metadata);
    return metadata;
  }
}
