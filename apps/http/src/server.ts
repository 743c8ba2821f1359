// apps/http/src/server.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  DIALECT_PROMPTS,
  EngineError,
  GRAPH_BACKEND_KINDS,
  GenerateRequestSchema,
  QueryRequestSchema,
  errorMessage,
  hasDialectPrompt,
} from '@kgq/core';
import type { EventTracer, GraphBackend, RecordingEventHandler } from '@kgq/core';
import type { KnowledgeGraphQueryEngine, QueryOutcome } from '@kgq/engine';

export interface ServerDeps {
  engine: KnowledgeGraphQueryEngine;
  backend: GraphBackend;
  /** Completed spans, for `?debug=1` traces. */
  recorder: RecordingEventHandler;
  corsOrigin?: string;
  rateLimitMax?: number;
  logger?: boolean | { level: string };
}

const STATUS: Record<string, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,
  CONFIGURATION: 500,
  TRACE: 500,
  GENERATION: 502,
  BACKEND_QUERY: 502,
  SYNTHESIS: 502,
  INTERNAL: 500,
};

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null || !('statusCode' in e)) return undefined;
  return typeof e.statusCode === 'number' ? e.statusCode : undefined;
}

export function classifyError(e: unknown): { code: string; status: number; message: string } {
  let code = 'INTERNAL';
  let message = errorMessage(e);
  if (e instanceof ZodError) {
    code = 'VALIDATION';
    message = e.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
  } else if (e instanceof EngineError) {
    code = e.code;
  } else {
    // fastify's own 4xx: body parsing, content type, rate limit
    const status = statusCodeOf(e);
    if (status === 429) code = 'RATE_LIMITED';
    else if (status === 404) code = 'NOT_FOUND';
    else if (status !== undefined && status >= 400 && status < 500) code = 'VALIDATION';
  }
  return { code, status: STATUS[code] ?? 500, message };
}

function shouldDebug(req: FastifyRequest<{ Querystring: { debug?: string } }>): boolean {
  return req.query.debug === '1' || req.headers['x-debug'] === '1';
}

function traceOf(outcome: QueryOutcome, recorder: RecordingEventHandler) {
  return {
    generatedQuery: outcome.evidence.metadata.generatedQuery,
    backendResult: outcome.evidence.metadata.backendResult,
    spans: recorder.spansUnder(outcome.queryEventId),
  };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { engine, backend, recorder } = deps;
  const tracer: EventTracer = engine.tracer;

  const app = Fastify({
    logger: deps.logger ?? false,
    bodyLimit: 1_000_000,
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = (deps.corsOrigin ?? '').split(',').map((s) => s.trim()).filter(Boolean);
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true,
  });

  await app.register(rateLimit, {
    max: deps.rateLimitMax ?? 600,
    timeWindow: '1 minute',
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { code, status, message } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code, error: message, requestId: req.id }, 'request-rejected');
    return reply.status(status).send({ code, message: 'Request failed', error: message, requestId: req.id });
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    try {
      const health = backend.health ? await backend.health() : { ok: true };
      return { ok: health.ok, backend: { kind: backend.kind, ...health } };
    } catch (e) {
      return { ok: false, backend: { kind: backend.kind, ok: false, details: { error: errorMessage(e) } } };
    }
  });

  app.post<{ Querystring: { debug?: string } }>('/query', async (req) => {
    const { question, mode } = QueryRequestSchema.parse(req.body);
    const t0 = Date.now();
    const outcome = mode === 'sync' ? engine.run(question) : await engine.arun(question);
    const totalMs = Date.now() - t0;

    return {
      answer: outcome.answer,
      meta: { backend: engine.kind, mode, totalMs },
      ...(shouldDebug(req) ? { trace: traceOf(outcome, recorder) } : {}),
    };
  });

  app.post('/generate', async (req) => {
    const { question } = GenerateRequestSchema.parse(req.body);
    return { query: await engine.agenerateQuery(question) };
  });

  app.get('/schema', async () => ({ kind: engine.kind, schema: await engine.loadSchema() }));

  app.post('/schema/refresh', async () => ({ kind: engine.kind, schema: await engine.refreshSchema() }));

  app.get('/dialects', async () => ({ kinds: GRAPH_BACKEND_KINDS }));

  app.get<{ Params: { kind: string } }>('/dialects/:kind', async (req, reply) => {
    const { kind } = req.params;
    if (!hasDialectPrompt(kind)) {
      return reply.code(404).send({
        code: 'NOT_FOUND',
        message: 'Request failed',
        error: `no query prompt for graph backend '${kind}'`,
        requestId: req.id,
      });
    }
    const prompt = DIALECT_PROMPTS[kind];
    return { kind, template: prompt.template, variables: prompt.variables };
  });

  app.get('/spans/open', async () => ({ spans: tracer.openSpans() }));

  return app;
}
