/**
 * Wikidata SPARQL client: SELECT queries returning flat rows of binding values.
 */

import { z } from 'zod';
import { HttpJsonClient } from './HttpJsonClient';
import { SourceUnavailableError } from '../../types/EnrichmentErrors';

export const WIKIDATA_SPARQL_ENDPOINT = 'https://query.wikidata.org';
export const WIKIDATA_SPARQL_SERVICE = 'wikidata-sparql';

const SparqlResultsSchema = z.object({
  head: z.object({ vars: z.array(z.string()) }),
  results: z.object({
    bindings: z.array(z.record(z.object({ type: z.string(), value: z.string() }))),
  }),
});

/** Every head var, '' when unbound in that row. */
export type SparqlRow = Record<string, string>;

export type SparqlSelectResult =
  | { kind: 'ok'; rows: SparqlRow[] }
  | { kind: 'error'; error: SourceUnavailableError };

/** Quote a value as a SPARQL string literal. */
export function sparqlString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}

/** http://www.wikidata.org/entity/Q123 -> Q123 */
export function entityIdFromUri(uri: string): string {
  const parts = uri.split('/');
  return parts[parts.length - 1] ?? '';
}

export class WikidataSparqlClient {
  private readonly http: HttpJsonClient;

  constructor(config: { timeoutMs: number; userAgent: string; baseURL?: string }) {
    this.http = new HttpJsonClient({
      serviceId: WIKIDATA_SPARQL_SERVICE,
      baseURL: config.baseURL ?? WIKIDATA_SPARQL_ENDPOINT,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      headers: { Accept: 'application/sparql-results+json' },
    });
  }

  async select(query: string): Promise<SparqlSelectResult> {
    const result = await this.http.getJson('/sparql', SparqlResultsSchema, {
      query,
      format: 'json',
    });

    if (result.kind === 'error') {
      return result;
    }
    if (result.kind === 'not_found') {
      return {
        kind: 'error',
        error: new SourceUnavailableError(WIKIDATA_SPARQL_SERVICE, 'SPARQL endpoint not found', 'HTTP_404'),
      };
    }

    const vars = result.data.head.vars;
    const rows = result.data.results.bindings.map((binding) => {
      const row: SparqlRow = {};
      for (const name of vars) {
        row[name] = binding[name]?.value ?? '';
      }
      return row;
    });
    return { kind: 'ok', rows };
  }
}
