/**
 * ClinicalTrials.gov study lookup.
 *
 * Queries the v2 REST API first and falls back to the legacy v1
 * study_fields endpoint when v2 answers with an error, non-JSON body or a
 * network failure. Successful lookups are cached in Redis when a client is
 * supplied.
 */

import { createLogger } from '../../server/common/logger';
import { type CtgovConfig, getCtgovConfig } from '../../server/common/config';
import { isRecord, recordsOf } from '../people/types';

const logger = createLogger('ctgov');

const V1_FIELDS = 'NCTId,OfficialTitle,OverallStatus,Phase,InterventionName,LocationFacility';
const BODY_PREVIEW_CHARS = 300;

// ============================================================================
// Types
// ============================================================================

export type CtgovApiVersion = 'v2' | 'v1';

export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { EX?: number }): Promise<unknown>;
}

export interface StudySearchResult {
  term: string;
  source: CtgovApiVersion;
  totalCount: number | null;
  nctIds: string[];
}

/** Outcome of one raw API call, kept whole for the probe CLI. */
export interface ApiAttempt {
  version: CtgovApiVersion;
  ok: boolean;
  status: number;
  totalCount: number | null;
  nctIds: string[];
  bodyPreview: string;
  error?: string;
}

export interface SearchOptions {
  pageSize?: number;
}

export interface CtgovClientOptions {
  redis?: RedisLike;
  config?: Partial<CtgovConfig>;
  fetchImpl?: typeof fetch;
}

export class CtgovUnavailableError extends Error {
  constructor(
    readonly term: string,
    readonly attempts: ApiAttempt[],
  ) {
    super(`ClinicalTrials.gov lookup failed for "${term}"`);
    this.name = 'CtgovUnavailableError';
  }
}

// ============================================================================
// Response mapping
// ============================================================================

export function summarizeV2(body: unknown): { totalCount: number | null; nctIds: string[] } {
  if (!isRecord(body)) return { totalCount: null, nctIds: [] };
  const nctIds: string[] = [];
  for (const study of recordsOf(body.studies)) {
    const protocol = study.protocolSection;
    const identification = isRecord(protocol) ? protocol.identificationModule : undefined;
    const nctId = isRecord(identification) ? identification.nctId : undefined;
    if (typeof nctId === 'string') nctIds.push(nctId);
  }
  return { totalCount: typeof body.totalCount === 'number' ? body.totalCount : null, nctIds };
}

export function summarizeV1(body: unknown): { totalCount: number | null; nctIds: string[] } {
  const root = isRecord(body) ? body.StudyFieldsResponse : undefined;
  if (!isRecord(root)) return { totalCount: null, nctIds: [] };
  const nctIds: string[] = [];
  for (const row of recordsOf(root.StudyFields)) {
    const ids = row.NCTId;
    const first = Array.isArray(ids) ? ids[0] : undefined;
    if (typeof first === 'string') nctIds.push(first);
  }
  return { totalCount: typeof root.NStudiesFound === 'number' ? root.NStudiesFound : null, nctIds };
}

// ============================================================================
// Client
// ============================================================================

export class CtgovClient {
  private redis?: RedisLike;
  private config: CtgovConfig;
  private fetchImpl: typeof fetch;

  constructor(options: CtgovClientOptions = {}) {
    if (options.redis) this.redis = options.redis;
    this.config = { ...getCtgovConfig(), ...options.config };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async searchStudies(term: string, options: SearchOptions = {}): Promise<StudySearchResult> {
    const pageSize = options.pageSize ?? 20;
    const cacheKey = `ctgov:search:${pageSize}:${term.toLowerCase()}`;
    const cached = await this.getCached(cacheKey);
    if (cached) {
      logger.debug('ctgov_cache_hit', { term });
      return cached;
    }

    const attempts: ApiAttempt[] = [];
    for (const query of [() => this.queryV2(term, pageSize), () => this.queryV1(term, pageSize)]) {
      const attempt = await query();
      attempts.push(attempt);
      if (!attempt.ok) {
        logger.warn('ctgov_attempt_failed', {
          term,
          version: attempt.version,
          status: attempt.status,
          error: attempt.error,
        });
        continue;
      }
      const result: StudySearchResult = {
        term,
        source: attempt.version,
        totalCount: attempt.totalCount,
        nctIds: attempt.nctIds,
      };
      await this.setCached(cacheKey, result);
      return result;
    }
    throw new CtgovUnavailableError(term, attempts);
  }

  queryV2(term: string, pageSize: number): Promise<ApiAttempt> {
    const params = new URLSearchParams({
      'query.term': term,
      pageSize: String(pageSize),
      countTotal: 'true',
      format: 'json',
    });
    return this.attempt('v2', `${this.config.baseUrl}/api/v2/studies?${params}`, summarizeV2);
  }

  queryV1(term: string, pageSize: number): Promise<ApiAttempt> {
    const params = new URLSearchParams({
      expr: term,
      fields: V1_FIELDS,
      min_rnk: '1',
      max_rnk: String(pageSize),
      fmt: 'json',
    });
    return this.attempt('v1', `${this.config.baseUrl}/api/query/study_fields?${params}`, summarizeV1);
  }

  private async attempt(
    version: CtgovApiVersion,
    url: string,
    summarize: (body: unknown) => { totalCount: number | null; nctIds: string[] },
  ): Promise<ApiAttempt> {
    const failed = (status: number, bodyPreview: string, error: string): ApiAttempt => ({
      version,
      ok: false,
      status,
      totalCount: null,
      nctIds: [],
      bodyPreview,
      error,
    });

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { Accept: 'application/json', 'User-Agent': this.config.userAgent },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      return failed(0, '', String(err));
    }

    const text = await res.text();
    const bodyPreview = text.slice(0, BODY_PREVIEW_CHARS);
    const contentType = res.headers.get('content-type') || '';
    if (res.status !== 200) return failed(res.status, bodyPreview, `http_${res.status}`);
    if (!contentType.startsWith('application/json')) {
      return failed(res.status, bodyPreview, 'non_json_response');
    }
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      return failed(res.status, bodyPreview, String(err));
    }
    return { version, ok: true, status: res.status, bodyPreview, ...summarize(body) };
  }

  // --------------------------------------------------------------------------
  // Caching
  // --------------------------------------------------------------------------

  private async getCached(key: string): Promise<StudySearchResult | null> {
    if (!this.redis) return null;
    try {
      const raw = await this.redis.get(key);
      if (!raw) return null;
      const parsed: unknown = JSON.parse(raw);
      return isStudySearchResult(parsed) ? parsed : null;
    } catch (err) {
      logger.warn('ctgov_cache_read_failed', { key, err: String(err) });
      return null;
    }
  }

  private async setCached(key: string, result: StudySearchResult): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.set(key, JSON.stringify(result), { EX: this.config.cacheSeconds });
    } catch (err) {
      logger.warn('ctgov_cache_write_failed', { key, err: String(err) });
    }
  }
}

function isStudySearchResult(value: unknown): value is StudySearchResult {
  return (
    isRecord(value) &&
    typeof value.term === 'string' &&
    (value.source === 'v2' || value.source === 'v1') &&
    (value.totalCount === null || typeof value.totalCount === 'number') &&
    Array.isArray(value.nctIds) &&
    value.nctIds.every((id) => typeof id === 'string')
  );
}
