/**
 * HTTP JSON Client
 *
 * Thin axios wrapper shared by the lookup sources and the provenance collector.
 * Responses are validated with a zod schema; failures come back as values, never
 * as rejections: 404 is not_found, everything else is an error carrying a
 * SourceUnavailableError.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from '../../types/EnrichmentErrors';

export type HttpJsonResult<T> =
  | { kind: 'ok'; data: T }
  | { kind: 'not_found' }
  | { kind: 'error'; error: SourceUnavailableError };

export interface HttpJsonClientConfig {
  /** used in error messages */
  serviceId: string;
  baseURL: string;
  timeoutMs: number;
  userAgent: string;
  headers?: Record<string, string>;
}

export class HttpJsonClient {
  private readonly http: AxiosInstance;
  readonly serviceId: string;

  constructor(config: HttpJsonClientConfig) {
    this.serviceId = config.serviceId;
    this.http = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json',
        ...config.headers,
      },
    });
  }

  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: Record<string, string>
  ): Promise<HttpJsonResult<T>> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, { params });
      data = response.data;
    } catch (error: unknown) {
      return this.classifyError(error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return {
        kind: 'error',
        error: new SourceUnavailableError(
          this.serviceId,
          `Malformed response: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`,
          'MALFORMED_RESPONSE'
        ),
      };
    }
    return { kind: 'ok', data: parsed.data };
  }

  private classifyError(error: unknown): HttpJsonResult<never> {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 404) {
        return { kind: 'not_found' };
      }
      if (status !== undefined) {
        return {
          kind: 'error',
          error: new SourceUnavailableError(this.serviceId, `HTTP ${status}`, `HTTP_${status}`),
        };
      }
      const isTimeout = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      return {
        kind: 'error',
        error: new SourceUnavailableError(
          this.serviceId,
          error.message,
          isTimeout ? 'TIMEOUT' : 'NETWORK_ERROR'
        ),
      };
    }
    return {
      kind: 'error',
      error: new SourceUnavailableError(
        this.serviceId,
        errorMessage(error),
        'UNKNOWN_ERROR'
      ),
    };
  }
}
