import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './api';
import { CtgovClient, type StudySearchResult } from '../services/ctgov/client';

const KEY = { 'x-api-key': 'test-secret' };

function summary(words: number): string {
  return Array.from({ length: words }, (_, i) => `w${i}`).join(' ');
}

function ctgovReturning(...responses: Array<() => Response>): CtgovClient {
  const fetchImpl = vi.fn<typeof fetch>();
  for (const make of responses) fetchImpl.mockImplementationOnce(async () => make());
  return new CtgovClient({ fetchImpl, config: { baseUrl: 'http://ctgov.test', timeoutMs: 1000 } });
}

class BrokenCtgov extends CtgovClient {
  override async searchStudies(): Promise<StudySearchResult> {
    throw new Error('boom');
  }
}

describe('actions API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    vi.stubEnv('ACTIONS_API_KEY', 'test-secret');
    app = await buildApp();
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it('healthz is public and echoes the request id', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz', headers: { 'x-request-id': 'req-123' } });
    expect(res.statusCode).toBe(200);
    expect(res.headers['x-request-id']).toBe('req-123');
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(typeof body.ts).toBe('string');
  });

  it('mints a request id when none is sent', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects action calls without a valid key', async () => {
    const res = await app.inject({ method: 'POST', url: '/purify_url', payload: { url: 'https://a.org' } });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: 'INVALID_API_KEY',
      message: 'A valid X-API-Key header is required.',
    });

    const wrong = await app.inject({
      method: 'POST',
      url: '/purify_url',
      headers: { 'x-api-key': 'nope' },
      payload: { url: 'https://a.org' },
    });
    expect(wrong.statusCode).toBe(401);
  });

  describe('POST /purify_url', () => {
    it('purifies the last https token', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/purify_url',
        headers: KEY,
        payload: { url: 'see [trial](https://clinicaltrials.gov/ct2/show/NCT01234567?utm_source=gpt)' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        purified_url: 'https://clinicaltrials.gov/study/NCT01234567',
        ok: true,
      });
    });

    it('reports ok=false when there is no https URL', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/purify_url',
        headers: KEY,
        payload: { url: 'http://plain.example.org' },
      });
      expect(res.json()).toEqual({ purified_url: null, ok: false });
    });

    it('validates the body', async () => {
      const res = await app.inject({ method: 'POST', url: '/purify_url', headers: KEY, payload: {} });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'invalid_input',
        message: "body must have required property 'url'",
      });
    });
  });

  describe('POST /emit_people_json', () => {
    it('returns the cleaned document and CSV on pass', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/emit_people_json',
        headers: KEY,
        payload: {
          payload: {
            people: [{ id: 'p1', full_name: 'Ana', original_order: 1, summary_text: summary(150) }],
          },
        },
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('pass');
      expect(body.cleaned_json.people[0].id).toBe('p1');
      expect(Buffer.from(body.csv_base64, 'base64').toString('utf-8')).toBe(
        'full_name,section,role,primary_affiliation,country,pins,score_total,contact_labels,trial_ncts\r\n' +
          'Ana,,,,,,,,\r\n',
      );
    });

    it('returns errors and no output on fail', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/emit_people_json',
        headers: KEY,
        payload: { payload: { people: [] } },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'fail',
        cleaned_json: null,
        csv_base64: null,
        errors: ['`people` must be a non-empty array.'],
        warnings: [],
      });
    });

    it('requires an object payload', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/emit_people_json',
        headers: KEY,
        payload: { payload: 'people' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('invalid_input');
    });
  });

  describe('POST /lint_people', () => {
    it('lints raw text and encodes the CSV', async () => {
      const doc = {
        people: [{ id: 'p1', full_name: 'Ana', section: 'Models & Assays', summary_text: summary(150) }],
      };
      const res = await app.inject({
        method: 'POST',
        url: '/lint_people',
        headers: KEY,
        payload: { text: `\`\`\`json\n${JSON.stringify(doc)}\n\`\`\``, preclean: true },
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('pass');
      expect(body.people_count).toBe(1);
      expect(body.cleaned_json.people[0].original_order).toBe(1);
      expect(Buffer.from(body.csv_base64, 'base64').toString('utf-8')).toBe(
        'full_name,section,role,primary_affiliation,country,pins,score_total,contact_labels,trial_ncts\r\n' +
          'Ana,Models & Assays,,,,,,,\r\n',
      );
    });

    it('returns a fail report for unparseable text', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/lint_people',
        headers: KEY,
        payload: { text: 'no json here' },
      });
      const body = res.json();
      expect(body.status).toBe('fail');
      expect(body.cleaned_json).toBeNull();
      expect(body.csv_base64).toBeNull();
    });
  });

  describe('GET /trials/search', () => {
    it('returns the study lookup', async () => {
      await app.close();
      app = await buildApp({
        ctgov: ctgovReturning(
          () =>
            new Response(
              JSON.stringify({
                totalCount: 1,
                studies: [{ protocolSection: { identificationModule: { nctId: 'NCT00000001' } } }],
              }),
              { status: 200, headers: { 'content-type': 'application/json' } },
            ),
        ),
      });

      const res = await app.inject({
        method: 'GET',
        url: '/trials/search?term=STXBP1&page_size=5',
        headers: KEY,
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ term: 'STXBP1', source: 'v2', totalCount: 1, nctIds: ['NCT00000001'] });
    });

    it('answers 502 when both registry APIs fail', async () => {
      await app.close();
      app = await buildApp({
        ctgov: ctgovReturning(
          () => new Response('down', { status: 503 }),
          () => new Response('down', { status: 503 }),
        ),
      });

      const res = await app.inject({ method: 'GET', url: '/trials/search?term=STXBP1', headers: KEY });
      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({
        error: 'ctgov_unavailable',
        message: 'ClinicalTrials.gov lookup failed for "STXBP1"',
        attempts: [
          { version: 'v2', status: 503, error: 'http_503' },
          { version: 'v1', status: 503, error: 'http_503' },
        ],
      });
    });

    it('rejects an out-of-range page size', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/trials/search?term=STXBP1&page_size=0',
        headers: KEY,
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('invalid_input');
    });

    it('hides unexpected failures behind internal_error', async () => {
      await app.close();
      app = await buildApp({ ctgov: new BrokenCtgov() });

      const res = await app.inject({ method: 'GET', url: '/trials/search?term=x', headers: KEY });
      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'internal_error' });
    });
  });

  it('answers not_found for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'not_found' });
  });

  it('serves the OpenAPI document', async () => {
    const res = await app.inject({ method: 'GET', url: '/openapi.yaml' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toMatch(/^application\/yaml/);
    expect(res.body).toMatch(/^openapi: 3\.1\.0/);
  });

  it('exposes request metrics behind the key', async () => {
    await app.inject({ method: 'GET', url: '/healthz' });

    const denied = await app.inject({ method: 'GET', url: '/metrics' });
    expect(denied.statusCode).toBe(401);

    const res = await app.inject({ method: 'GET', url: '/metrics', headers: KEY });
    const snap = res.json();
    expect(snap.byRoute['GET /healthz']).toMatchObject({ count: 1, errors: 0 });
    expect(snap.statusDistribution['401']).toBe(1);
  });
});

describe('rate limiting', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('answers 429 with Retry-After once the window is spent', async () => {
    vi.stubEnv('RATE_LIMIT_MAX', '2');
    const app = await buildApp();
    try {
      await app.inject({ method: 'GET', url: '/healthz' });
      await app.inject({ method: 'GET', url: '/healthz' });
      const res = await app.inject({ method: 'GET', url: '/healthz' });

      expect(res.statusCode).toBe(429);
      expect(res.json().error).toBe('rate_limited');
      expect(res.headers['retry-after']).toBeDefined();
    } finally {
      await app.close();
    }
  });

  it('limits action routes and advertises the limit', async () => {
    vi.stubEnv('RATE_LIMIT_MAX', '1');
    vi.stubEnv('ACTIONS_API_KEY', 'test-secret');
    const app = await buildApp();
    try {
      const responses = [];
      for (let i = 0; i < 3; i++) {
        responses.push(
          await app.inject({ method: 'POST', url: '/purify_url', headers: KEY, payload: { url: 'https://a.org' } }),
        );
      }

      expect(responses.map((r) => r.statusCode)).toEqual([200, 429, 429]);
      expect(responses[0]?.headers['x-ratelimit-limit']).toBe('1');
    } finally {
      await app.close();
    }
  });
});

describe('key enforcement', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('leaves actions open when no key is configured', async () => {
    vi.stubEnv('ACTIONS_API_KEY', '');
    const app = await buildApp();
    try {
      const res = await app.inject({ method: 'POST', url: '/purify_url', payload: { url: 'https://a.org' } });
      expect(res.json()).toEqual({ purified_url: 'https://a.org', ok: true });
    } finally {
      await app.close();
    }
  });

  it('closes actions when a key is required but missing', async () => {
    vi.stubEnv('ACTIONS_API_KEY', '');
    vi.stubEnv('ACTIONS_REQUIRE_KEY', 'true');
    const app = await buildApp();
    try {
      const res = await app.inject({ method: 'POST', url: '/purify_url', payload: { url: 'https://a.org' } });
      expect(res.statusCode).toBe(401);
    } finally {
      await app.close();
    }
  });
});
