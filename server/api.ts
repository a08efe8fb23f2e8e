import * as fs from 'fs';
import { fileURLToPath } from 'url';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { REQUEST_ID_HEADER, resolveRequestId } from './common/requestId';
import { createLogger } from './common/logger';
import { getServerConfig } from './common/config';
import { errorCodeFor, HttpError } from './common/errors';
import { apiKeyGate } from './auth/apiKeyGate';
import { MetricsRecorder } from './apm/metrics';
import { emitPeopleJson, encodeCsvBase64 } from '../services/people/emit';
import { lintPeopleText } from '../services/people/lint';
import type { PeopleDocument } from '../services/people/types';
import { purifyUrl } from '../services/people/urls';
import { CtgovClient, CtgovUnavailableError, type RedisLike } from '../services/ctgov/client';

const logger = createLogger('api');

const OPENAPI_PATH = fileURLToPath(new URL('../docs/openapi.yaml', import.meta.url));

export interface BuildAppOptions {
  ctgov?: CtgovClient;
  redis?: RedisLike;
}

interface EmitBody {
  payload: PeopleDocument;
}

interface PurifyBody {
  url: string;
}

interface LintBody {
  text: string;
  preclean: boolean;
}

interface TrialsQuery {
  term: string;
  page_size: number;
}

const errorSchema = {
  type: 'object',
  properties: { error: { type: 'string' }, message: { type: 'string' } },
  required: ['error'],
} as const;

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = getServerConfig();
  const ctgov = options.ctgov ?? new CtgovClient(options.redis ? { redis: options.redis } : {});
  const metrics = new MetricsRecorder();

  const app = Fastify({
    logger: false,
    trustProxy: true,
    bodyLimit: config.bodyLimitBytes,
    requestIdHeader: false,
    genReqId: (req) => resolveRequestId(req.headers),
  });

  // Routes declared below must see the rate-limit onRoute hook.
  await app.register(cors, { origin: config.corsOrigin });
  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    errorResponseBuilder: (_request, context) =>
      new HttpError(429, `Rate limit exceeded, retry in ${context.after}`),
  });

  app.addHook('onSend', async (request, reply) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    if (reply.statusCode === 429 && !reply.hasHeader('Retry-After')) {
      reply.header('Retry-After', '60');
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url || 'unmatched';
    const latencyMs = Math.round(reply.elapsedTime);
    metrics.record({ method: request.method, route, statusCode: reply.statusCode, latencyMs });
    logger.info('request_completed', {
      method: request.method,
      route,
      status: reply.statusCode,
      latencyMs,
      requestId: request.id,
    });
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.validation ? 400 : err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error('unhandled_error', { requestId: request.id, err: String(err), stack: err.stack });
      return reply.code(500).send({ error: 'internal_error' });
    }
    return reply.code(statusCode).send({ error: errorCodeFor(statusCode), message: err.message });
  });

  app.setNotFoundHandler((_request, reply) => reply.code(404).send({ error: 'not_found' }));

  // ---- Public ----

  app.get(
    '/healthz',
    {
      schema: {
        response: {
          200: {
            type: 'object',
            properties: { ok: { type: 'boolean' }, ts: { type: 'string' } },
            required: ['ok', 'ts'],
          },
        },
      },
    },
    async () => ({ ok: true, ts: new Date().toISOString() }),
  );

  app.get('/openapi.yaml', async (_request, reply) => {
    let yaml: string;
    try {
      yaml = await fs.promises.readFile(OPENAPI_PATH, 'utf8');
    } catch (err) {
      logger.warn('openapi_unreadable', { err: String(err) });
      return reply.code(404).send({ error: 'not_found' });
    }
    return reply.type('application/yaml').send(yaml);
  });

  // ---- Actions (X-API-Key) ----

  app.post<{ Body: EmitBody }>(
    '/emit_people_json',
    {
      preHandler: apiKeyGate,
      schema: {
        body: {
          type: 'object',
          properties: { payload: { type: 'object' } },
          required: ['payload'],
        },
        response: { 400: errorSchema, 401: errorSchema },
      },
    },
    async (request) => {
      const result = emitPeopleJson(request.body.payload);
      logger.info('people_emitted', {
        requestId: request.id,
        status: result.status,
        errors: result.errors.length,
        warnings: result.warnings.length,
      });
      return result;
    },
  );

  app.post<{ Body: PurifyBody }>(
    '/purify_url',
    {
      preHandler: apiKeyGate,
      schema: {
        body: {
          type: 'object',
          properties: { url: { type: 'string' } },
          required: ['url'],
        },
        response: {
          200: {
            type: 'object',
            properties: {
              purified_url: { type: ['string', 'null'] },
              ok: { type: 'boolean' },
            },
            required: ['purified_url', 'ok'],
          },
          400: errorSchema,
          401: errorSchema,
        },
      },
    },
    async (request) => {
      const purified = purifyUrl(request.body.url);
      return { purified_url: purified, ok: Boolean(purified) };
    },
  );

  app.post<{ Body: LintBody }>(
    '/lint_people',
    {
      preHandler: apiKeyGate,
      schema: {
        body: {
          type: 'object',
          properties: {
            text: { type: 'string' },
            preclean: { type: 'boolean', default: false },
          },
          required: ['text'],
        },
        response: { 400: errorSchema, 401: errorSchema },
      },
    },
    async (request) => {
      const { report, cleaned, csv } = lintPeopleText(request.body.text, {
        preclean: request.body.preclean,
      });
      return {
        ...report,
        cleaned_json: cleaned,
        csv_base64: csv === null ? null : encodeCsvBase64(csv),
      };
    },
  );

  app.get<{ Querystring: TrialsQuery }>(
    '/trials/search',
    {
      preHandler: apiKeyGate,
      schema: {
        querystring: {
          type: 'object',
          properties: {
            term: { type: 'string', minLength: 1 },
            page_size: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
          },
          required: ['term'],
        },
        response: { 400: errorSchema, 401: errorSchema },
      },
    },
    async (request, reply) => {
      const { term, page_size: pageSize } = request.query;
      try {
        return await ctgov.searchStudies(term, { pageSize });
      } catch (err) {
        if (!(err instanceof CtgovUnavailableError)) throw err;
        logger.warn('ctgov_unavailable', { requestId: request.id, term });
        return reply.code(502).send({
          error: 'ctgov_unavailable',
          message: err.message,
          attempts: err.attempts.map(({ version, status, error }) => ({ version, status, error })),
        });
      }
    },
  );

  app.get('/metrics', { preHandler: apiKeyGate }, async () => metrics.snapshot());

  return app;
}
