import express from 'express';
import type { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  SessionNotFoundError,
  ValidationError,
  activeTraceId,
  features,
  logger,
  preview,
  toParleyError,
  type CircuitSnapshot,
  type ModelGateway,
  type ModelHandle,
  type ModelInfo,
} from '@parley/shared';
import type { ChatConfig } from './config.js';
import { ConversationState } from './conversation.js';
import type { RunRequest, ToolOrchestrator } from './orchestrator.js';
import { roleInputSchema, roleUpdateSchema, type RoleManager } from './role-manager.js';
import type { SessionManager } from './session-manager.js';
import { StreamEncoder } from './stream-encoder.js';
import type { ToolContext, ToolRegistry } from './tool-registry.js';
import type { RoleProxy } from './tools/role-tools.js';

const log = logger.child({ module: 'api' });

const DEFAULT_USER = 'default_user';

/** What the API needs from the model router beyond running models. */
export interface ModelCatalog extends ModelGateway {
  listModels(): ModelInfo[];
  getModelInfo(modelId: string): ModelInfo | undefined;
  setDefaultModel(modelId: string): ModelHandle;
  breakerStates(): CircuitSnapshot[];
}

export interface ApiDeps {
  config: ChatConfig;
  models: ModelCatalog;
  registry: ToolRegistry;
  orchestrator: ToolOrchestrator;
  sessions: SessionManager;
  roles: RoleManager;
  roleProxy: RoleProxy;
  startTime?: number;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const chatBodySchema = z.object({
  messages: z
    .array(z.object({ role: z.enum(['user', 'assistant', 'system']), content: z.string() }))
    .min(1, 'messages must contain at least one message'),
  stream: z.boolean().default(true),
  systemPrompt: z.string().optional(),
  sessionId: z.string().min(1).optional(),
  useMemory: z.boolean().default(true),
  userId: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

const createSessionSchema = z.object({
  systemPrompt: z.string().optional(),
  roleId: z.string().min(1).optional(),
  userInfo: z.record(z.unknown()).optional(),
});

const systemPromptSchema = z.object({ systemPrompt: z.string() });
const cleanupSchema = z.object({ days: z.number().nonnegative().optional() });
const limitQuerySchema = z.object({ limit: z.coerce.number().int().positive().optional() });
const roleListQuerySchema = z.object({ category: z.string().optional(), userId: z.string().optional() });
const searchQuerySchema = z.object({ q: z.string().min(1, 'q is required') });
const userQuerySchema = z.object({ userId: z.string().min(1).optional() });
const setModelSchema = z.object({ modelId: z.string().min(1) });

type ChatBody = z.infer<typeof chatBodySchema>;

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(detail);
  }
  return result.data;
}

function sendError(res: Response, err: unknown, route: string): void {
  const error = toParleyError(err);
  if (error.status >= 500) {
    log.error({ err, route, kind: error.kind }, 'request failed');
  } else {
    log.warn({ route, kind: error.kind, error: error.message }, 'request rejected');
  }
  res.status(error.status).json({ error: error.message, kind: error.kind });
}

/** Async handler whose failures become `{ error, kind }` responses. */
function route(name: string, handler: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response): void => {
    handler(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        log.error({ err, route: name }, 'request failed after response started');
        res.end();
        return;
      }
      sendError(res, err, name);
    });
  };
}

export function createApi(deps: ApiDeps) {
  const { config, models, registry, orchestrator, sessions, roles, roleProxy } = deps;
  const startTime = deps.startTime ?? Date.now();
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // CORS: restrict to configured origins, permissive when none are set
  const allowedOrigins = config.corsOrigins.length > 0 ? config.corsOrigins : null;

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (!allowedOrigins || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    }
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use((_req, res, next) => {
    const traceId = activeTraceId();
    if (traceId) {
      res.setHeader('X-Trace-Id', traceId);
    }
    next();
  });

  app.get('/ping', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'chat',
      mode: features.mode,
      features: features.allFlags(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    '/status',
    route('status', async (_req, res) => {
      const context: ToolContext = { userId: DEFAULT_USER, depth: 0 };
      res.json({
        status: 'running',
        uptimeMs: Date.now() - startTime,
        defaultModel: models.defaultModelId,
        sessionBackend: sessions.backend,
        roleBackend: roles.backend,
        sessionCount: await sessions.count(),
        toolCount: (await registry.list(context)).length,
        toolProviders: registry.providerNames,
        circuitBreakers: models.breakerStates(),
        timestamp: new Date().toISOString(),
      });
    }),
  );

  // -------------------------------------------------------------------------
  // Chat
  // -------------------------------------------------------------------------

  async function prepareRun(body: ChatBody): Promise<{ run: RunRequest; sessionId: string }> {
    const session = body.sessionId
      ? await sessions.require(body.sessionId)
      : await sessions.create({ systemPrompt: body.systemPrompt });
    const sessionId = session.sessionId;

    const systemPrompt = body.systemPrompt || session.systemPrompt || config.defaultSystemPrompt;
    const history = body.useMemory ? await sessions.loadHistory(sessionId, config.sessions.historyLimit) : [];

    const state = new ConversationState(systemPrompt, history);
    for (const message of body.messages) {
      state.append({ role: message.role, content: message.content, toolCalls: [] });
    }

    const handle = models.resolveHandle(body.model);
    const context: ToolContext = {
      userId: body.userId ?? DEFAULT_USER,
      sessionId,
      depth: 0,
      requestId: randomUUID(),
    };

    return {
      sessionId,
      run: {
        state,
        context,
        handle,
        sessionId,
        onCheckpoint: (checkpoint) => sessions.persistCheckpoint(sessionId, checkpoint),
      },
    };
  }

  app.post(
    '/chat',
    route('chat', async (req, res) => {
      const body = parse(chatBodySchema, req.body);
      const { run, sessionId } = await prepareRun(body);
      const last = body.messages[body.messages.length - 1];

      log.info(
        {
          requestId: run.context.requestId,
          sessionId,
          stream: body.stream,
          model: run.handle?.modelId,
          message: preview(last?.content ?? ''),
        },
        'chat request',
      );

      if (!body.stream) {
        const result = await orchestrator.complete(run);
        res.json({
          message: { role: 'assistant', content: result.message.content },
          toolCalls: result.toolCalls.map(({ id, name, arguments: args, result: output }) => ({
            id,
            name,
            arguments: args,
            result: output,
          })),
          finishReason: result.finishReason,
          sessionId,
        });
        return;
      }

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) {
          log.info({ requestId: run.context.requestId }, 'client disconnected, aborting run');
          controller.abort();
        }
      });

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      const encoder = new StreamEncoder();
      for await (const event of orchestrator.run({ ...run, signal: controller.signal })) {
        res.write(encoder.encode(event));
      }
      res.end();
    }),
  );

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  app.post(
    '/sessions',
    route('create session', async (req, res) => {
      const input = parse(createSessionSchema, req.body ?? {});
      res.status(201).json(await sessions.create(input));
    }),
  );

  app.get(
    '/sessions',
    route('list sessions', async (req, res) => {
      const { limit } = parse(limitQuerySchema, req.query);
      res.json({ sessions: await sessions.list(limit), total: await sessions.count() });
    }),
  );

  // Registered before /sessions/:id so "cleanup" is not taken for an id
  app.post(
    '/sessions/cleanup',
    route('cleanup sessions', async (req, res) => {
      const { days } = parse(cleanupSchema, req.body ?? {});
      res.json({ removed: await sessions.cleanupExpired(days) });
    }),
  );

  app.get(
    '/sessions/:id',
    route('get session', async (req, res) => {
      res.json(await sessions.require(req.params.id));
    }),
  );

  app.get(
    '/sessions/:id/messages',
    route('session messages', async (req, res) => {
      const { limit } = parse(limitQuerySchema, req.query);
      res.json({ sessionId: req.params.id, messages: await sessions.messages(req.params.id, limit) });
    }),
  );

  app.put(
    '/sessions/:id/system-prompt',
    route('update system prompt', async (req, res) => {
      const { systemPrompt } = parse(systemPromptSchema, req.body);
      res.json(await sessions.updateSystemPrompt(req.params.id, systemPrompt));
    }),
  );

  app.delete(
    '/sessions/:id',
    route('delete session', async (req, res) => {
      if (!(await sessions.delete(req.params.id))) {
        throw new SessionNotFoundError(req.params.id);
      }
      res.json({ deleted: true, sessionId: req.params.id });
    }),
  );

  // -------------------------------------------------------------------------
  // Models
  // -------------------------------------------------------------------------

  app.get('/models', (_req, res) => {
    res.json({ models: models.listModels(), current: models.defaultModelId });
  });

  app.get('/models/current', (_req, res) => {
    res.json(models.getModelInfo(models.defaultModelId));
  });

  app.put(
    '/models/current',
    route('set model', async (req, res) => {
      const { modelId } = parse(setModelSchema, req.body);
      if (!models.getModelInfo(modelId)) {
        throw new ValidationError(`unknown model '${modelId}'`);
      }
      const handle = models.setDefaultModel(modelId);
      res.json({ current: models.getModelInfo(handle.modelId) });
    }),
  );

  app.get('/models/:id', (req, res) => {
    const info = models.getModelInfo(req.params.id);
    if (!info) {
      res.status(404).json({ error: `Model ${req.params.id} not found` });
      return;
    }
    res.json(info);
  });

  // -------------------------------------------------------------------------
  // Roles
  // -------------------------------------------------------------------------

  app.get(
    '/roles',
    route('list roles', async (req, res) => {
      const filter = parse(roleListQuerySchema, req.query);
      res.json({ roles: await roles.list(filter) });
    }),
  );

  app.get(
    '/roles/search',
    route('search roles', async (req, res) => {
      const { q } = parse(searchQuerySchema, req.query);
      res.json({ query: q, roles: await roles.search(q) });
    }),
  );

  app.get(
    '/roles/categories',
    route('role categories', async (_req, res) => {
      res.json({ categories: await roles.categories() });
    }),
  );

  app.get(
    '/roles/:id',
    route('get role', async (req, res) => {
      res.json(await roles.require(req.params.id));
    }),
  );

  app.post(
    '/roles',
    route('create role', async (req, res) => {
      const input = parse(roleInputSchema, req.body);
      res.status(201).json(await roles.create(input));
    }),
  );

  app.put(
    '/roles/:id',
    route('update role', async (req, res) => {
      const patch = parse(roleUpdateSchema, req.body);
      res.json(await roles.update(req.params.id, patch));
    }),
  );

  app.delete(
    '/roles/:id',
    route('delete role', async (req, res) => {
      await roles.delete(req.params.id);
      res.json({ deleted: true, roleId: req.params.id });
    }),
  );

  // -------------------------------------------------------------------------
  // Role contexts
  // -------------------------------------------------------------------------

  app.get(
    '/role-contexts',
    route('list role contexts', async (req, res) => {
      const { userId } = parse(userQuerySchema, req.query);
      res.json({ userId: userId ?? DEFAULT_USER, contexts: await roleProxy.listContexts(userId) });
    }),
  );

  app.get(
    '/role-contexts/:roleId',
    route('role context', async (req, res) => {
      const { userId } = parse(userQuerySchema, req.query);
      res.json(await roleProxy.getContextInfo(req.params.roleId, userId));
    }),
  );

  app.delete(
    '/role-contexts/:roleId',
    route('clear role context', async (req, res) => {
      const { userId } = parse(userQuerySchema, req.query);
      res.json({ cleared: await roleProxy.clearContext(req.params.roleId, userId), roleId: req.params.roleId });
    }),
  );

  // -------------------------------------------------------------------------
  // Tools
  // -------------------------------------------------------------------------

  app.get(
    '/tools',
    route('list tools', async (req, res) => {
      const { userId } = parse(userQuerySchema, req.query);
      const defs = await registry.list({ userId: userId ?? DEFAULT_USER, depth: 0 });
      res.json({
        tools: defs.map((def) => ({ name: def.name, description: def.description, kind: def.kind.type })),
        count: defs.length,
      });
    }),
  );

  return app;
}
