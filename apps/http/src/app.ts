// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { GenerateRuleRequestSchema, MapRequestSchema, ValidateRequestSchema } from '@lexirule/core';
import type { AppContext } from './context';
import { classifyError } from './errors';
import {
  generateRule, mapPrompt, serializeMappingReport, serializeValidation, validateRule, validateTree
} from './pipeline';

function shouldDebug(req: FastifyRequest): boolean {
  const q = req.query;
  const flag = typeof q === 'object' && q !== null && 'debug' in q ? String(q.debug) : '';
  const h = String(req.headers['x-debug'] ?? '');
  return flag === '1' || h === '1' || process.env.DEBUG_ERRORS === '1';
}

// aborts when the client goes away before the reply is written
function clientAbortSignal(reply: FastifyReply): AbortSignal {
  const ac = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) ac.abort();
  });
  return ac.signal;
}

export async function buildApp(ctx: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: ctx.config.logLevel,
      name: 'lexirule-http',
      redact: ['req.headers.authorization']
    },
    bodyLimit: 1_000_000
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = ctx.config.server.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: ctx.config.server.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, rep) => {
    const { code, status, message, details } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.info({ code, requestId: req.id }, 'request-rejected');
    return rep.status(status).send({
      code,
      message: status >= 500 ? 'Request failed' : message,
      error: message,
      requestId: req.id,
      ...(details !== undefined ? { details } : {}),
      ...(shouldDebug(req) ? { trace: { errorCode: code } } : {})
    });
  });

  // ---------- discovery ----------
  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => ({
    ok: ctx.registry.size > 0,
    keys: ctx.registry.size,
    embedder: ctx.embedder.name,
    drafter: ctx.drafter.name,
    retrievalChunks: ctx.retriever.size
  }));

  app.get('/keys', async () => {
    const keys = ctx.registry.identifiers();
    return { keys, count: keys.length };
  });

  // ---------- POST /map  (prompt → key mappings) ----------
  app.post('/map', async (req) => {
    const body = MapRequestSchema.parse(req.body);
    const report = await mapPrompt(ctx, body.prompt);
    req.log.info(
      { candidates: report.candidates, mapped: report.mappings.length, rejected: report.rejected.length, confidence: report.confidence },
      'mapping-summary'
    );
    return {
      ...serializeMappingReport(report),
      ...(shouldDebug(req) ? { trace: { candidates: report.candidates } } : {})
    };
  });

  // ---------- POST /validate  (JSON Logic or expression tree → validation) ----------
  app.post('/validate', async (req) => {
    const body = ValidateRequestSchema.parse(req.body);
    const result = body.expression !== undefined
      ? validateTree(ctx, body.expression, body.mapped_keys)
      : validateRule(ctx, body.json_logic, body.mapped_keys);
    req.log.info({ valid: result.valid, errors: result.errors.length }, 'validation-summary');
    return { validation: serializeValidation(result) };
  });

  // ---------- POST /generate-rule ----------
  app.post('/generate-rule', async (req, reply) => {
    const body = GenerateRuleRequestSchema.parse(req.body);
    const out = await generateRule(
      ctx,
      { prompt: body.prompt, contextDocs: body.context_docs },
      { signal: clientAbortSignal(reply) }
    );
    req.log.info(
      {
        mapped: out.report.mappings.length,
        confidence: out.report.confidence,
        valid: out.validation.valid,
        errors: out.validation.errors.length,
        ...out.timings
      },
      'generate-summary'
    );
    return {
      ...out.body,
      ...(shouldDebug(req)
        ? { trace: { candidates: out.report.candidates, snippets: out.snippets, drafter: ctx.drafter.name, ...out.timings } }
        : {})
    };
  });

  return app;
}
