// apps/http/src/app.ts
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import {
  NetlaceError,
  UnknownNameError,
  type Id,
  type NodeRegistry,
  type Store
} from '@netlace/core';

export interface AppOptions {
  registry: NodeRegistry;
  store: Store;
  logLevel?: string | false;
  corsOrigins?: string[];
  rateLimitMax?: number;
}

const NodeParams = z.object({
  entity: z.string().min(1),
  id: z.string().min(1),
  accessor: z.string().min(1)
});

const FindQuery = z.object({
  ids: z.string().min(1)
});

const LinkBody = z.object({
  targetId: z.union([z.string().min(1), z.number()])
}).strict();

// canonical integer segments address integer keys; "007" and digits past
// MAX_SAFE_INTEGER stay strings
export function parseId(raw: string): Id {
  if (!/^(0|[1-9]\d*)$/.test(raw)) return raw;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : raw;
}

export function classifyError(e: unknown): {
  code: string;
  status: number;
  message: string;
  details?: Record<string, unknown>;
} {
  if (e instanceof ZodError) {
    return { code: 'VALIDATION', status: 400, message: e.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  if (e instanceof NetlaceError) {
    const status =
      e.code === 'NET_NOT_FOUND' || e.code === 'NET_UNKNOWN' ? 404 :
      e.code === 'NET_UNSUPPORTED' ? 400 : 500;
    return { code: e.code, status, message: e.message, details: e.details };
  }
  const msg = e instanceof Error ? e.message : String(e);
  if (e instanceof Error && 'statusCode' in e && typeof e.statusCode === 'number' && e.statusCode < 500) {
    return { code: 'VALIDATION', status: e.statusCode, message: msg };
  }
  if (/sql|mysql|sqlite|pool|connection|ECONNREFUSED/i.test(msg)) return { code: 'ADAPTER', status: 502, message: msg };
  return { code: 'NET_INTERNAL', status: 500, message: msg };
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { registry, store } = opts;
  const app = Fastify({
    logger: opts.logLevel === false ? false : { level: opts.logLevel ?? 'info' },
    bodyLimit: 1_000_000
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = opts.corsOrigins ?? [];
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
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
    rep.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(details ? { details } : {})
    });
  });

  function nodeFor(params: unknown) {
    const p = NodeParams.parse(params);
    const type = registry.get(p.entity);
    if (!type.has(p.accessor)) throw new UnknownNameError('accessor', p.accessor);
    return { node: type.bind(store, parseId(p.id)), accessor: p.accessor };
  }

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const health = await store.health();
    return { ok: health.ok, store: { name: store.name, ...health } };
  });

  // ------------------------------------
  // GET /nodes  (declared node types and their accessors)
  // ------------------------------------
  app.get('/nodes', async () => ({
    nodes: registry.list().map((t) => ({ entity: t.entity, table: t.table, accessors: t.describe() }))
  }));

  // ------------------------------------
  // GET /nodes/:entity/:id/:accessor  (full, deduplicated membership)
  // ------------------------------------
  app.get('/nodes/:entity/:id/:accessor', async (req) => {
    const { node, accessor } = nodeFor(req.params);
    const rows = await node.related(accessor).toArray();
    return { rows, count: rows.length };
  });

  // ------------------------------------
  // GET /nodes/:entity/:id/:accessor/find?ids=1,2  (all-or-nothing lookup)
  // ------------------------------------
  app.get('/nodes/:entity/:id/:accessor/find', async (req) => {
    const { node, accessor } = nodeFor(req.params);
    const ids = FindQuery.parse(req.query).ids.split(',').map((s) => s.trim()).filter(Boolean).map(parseId);
    const view = node.related(accessor);
    if (ids.length === 1) return { row: await view.find(ids[0]) };
    return { rows: await view.find(ids) };
  });

  // ------------------------------------
  // POST /nodes/:entity/:id/:accessor  (add a join row)
  // ------------------------------------
  app.post('/nodes/:entity/:id/:accessor', async (req, reply) => {
    const { node, accessor } = nodeFor(req.params);
    const { targetId } = LinkBody.parse(req.body);
    await node.link(accessor, typeof targetId === 'string' ? parseId(targetId) : targetId);
    return reply.code(201).send({ ok: true });
  });

  return app;
}
