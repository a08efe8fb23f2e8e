// Fetch-based client for the actions REST API (docs/openapi.yaml)
import type { EmitResult } from '../../services/people/emit';
import type { LintReport } from '../../services/people/lint';
import type { PeopleDocument } from '../../services/people/types';
import type { StudySearchResult } from '../../services/ctgov/client';

export type ActionsClientConfig = {
  baseUrl?: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
};

export type PurifyUrlResponse = { purified_url: string | null; ok: boolean };

export type LintPeopleResponse = LintReport & {
  cleaned_json: PeopleDocument | null;
  csv_base64: string | null;
};

export type HealthResponse = { ok: boolean; ts: string };

export class ActionsApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: unknown,
    method: string,
    path: string,
  ) {
    super(`${method} ${path} ${status}`);
    this.name = 'ActionsApiError';
  }
}

export function createActionsClient(cfg: ActionsClientConfig = {}) {
  const baseUrl = (cfg.baseUrl || 'http://localhost:4000').replace(/\/$/, '');
  const fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));

  async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['content-type'] = 'application/json';
    if (cfg.apiKey) headers['x-api-key'] = cfg.apiKey;
    const res = await fetchImpl(baseUrl + path, {
      method,
      headers,
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });
    const text = await res.text();
    const ct = res.headers.get('content-type') || '';
    const parsed: unknown = ct.includes('application/json') && text ? JSON.parse(text) : text;
    if (!res.ok) throw new ActionsApiError(res.status, parsed, method, path);
    return parsed as T;
  }

  return {
    healthz: () => request<HealthResponse>('GET', '/healthz'),
    emitPeopleJson: (payload: PeopleDocument) =>
      request<EmitResult>('POST', '/emit_people_json', { payload }),
    purifyUrl: (url: string) => request<PurifyUrlResponse>('POST', '/purify_url', { url }),
    lintPeople: (text: string, options: { preclean?: boolean } = {}) =>
      request<LintPeopleResponse>('POST', '/lint_people', { text, preclean: options.preclean ?? false }),
    searchTrials: (term: string, options: { pageSize?: number } = {}) => {
      const params = new URLSearchParams({ term });
      if (options.pageSize !== undefined) params.set('page_size', String(options.pageSize));
      return request<StudySearchResult>('GET', `/trials/search?${params}`);
    },
  };
}

export type ActionsClient = ReturnType<typeof createActionsClient>;
