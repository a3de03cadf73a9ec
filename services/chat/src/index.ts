import path from 'node:path';
import { ModelRouter, errorMessage, loadModelConfig, logger } from '@parley/shared';
import { createApi } from './api.js';
import { loadConfig, type ChatConfig } from './config.js';
import { closeDb, getDb } from './db.js';
import { ToolOrchestrator } from './orchestrator.js';
import { RoleManager, loadSystemRoles } from './role-manager.js';
import { FileRoleStore, SqliteRoleStore, type RoleStore } from './role-store.js';
import { SessionManager } from './session-manager.js';
import { FileSessionStore, SqliteSessionStore, type SessionStore } from './session-store.js';
import { ToolRegistry } from './tool-registry.js';
import { createMathTools } from './tools/math-tools.js';
import { RoleProxy } from './tools/role-tools.js';
import { createDuckDuckGoSearch } from './tools/search-client.js';
import { createSearchTools } from './tools/search-tools.js';
import { createStringTools } from './tools/string-tools.js';

const log = logger.child({ module: 'chat' });
const startTime = Date.now();

async function openSessionStore(config: ChatConfig): Promise<SessionStore> {
  if (config.sessionBackend === 'file') {
    return new FileSessionStore(path.join(config.dataDir, 'sessions')).init();
  }
  return new SqliteSessionStore(getDb(config.dataDir));
}

async function openRoleStore(config: ChatConfig): Promise<RoleStore> {
  if (config.roleBackend === 'file') {
    return new FileRoleStore(path.join(config.dataDir, 'roles')).init();
  }
  return new SqliteRoleStore(getDb(config.dataDir));
}

async function main() {
  log.info('starting chat service');
  const config = loadConfig();

  // Storage
  const roles = new RoleManager(await openRoleStore(config));
  const seeded = await roles.seedSystemRoles(await loadSystemRoles());
  const sessions = new SessionManager(await openSessionStore(config), config.sessions, roles);
  log.info({ seededRoles: seeded, sessions: await sessions.count() }, 'storage ready');

  // Models
  const modelRouter = await ModelRouter.create(await loadModelConfig());

  // Tools
  const registry = new ToolRegistry({ timeoutMs: config.orchestrator.toolTimeoutMs });
  const orchestrator = new ToolOrchestrator(modelRouter, registry, config.orchestrator);
  const roleProxy = new RoleProxy(
    { roles, sessions, gateway: modelRouter, orchestrator },
    { ...config.roles, timeoutMs: config.orchestrator.modelTimeoutMs },
  );
  registry
    .register(createMathTools())
    .register(createStringTools())
    .register(createSearchTools(createDuckDuckGoSearch(config.search.endpoint), () => config.search.enabled))
    .register(roleProxy.provider());

  const app = createApi({
    config,
    models: modelRouter,
    registry,
    orchestrator,
    sessions,
    roles,
    roleProxy,
    startTime,
  });
  const server = app.listen(config.port, () => {
    log.info({ port: config.port, model: modelRouter.defaultModelId }, 'chat API listening');
  });

  if (config.sessions.sweepEnabled) {
    await sessions.cleanupExpired();
    sessions.startSweeper(config.sessions.sweepIntervalMs);
  }

  // Graceful shutdown
  const shutdown = () => {
    log.info('shutting down');
    sessions.stopSweeper();
    server.close((err) => {
      if (err) log.error({ error: errorMessage(err) }, 'error closing HTTP server');
      closeDb();
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'chat service failed to start');
  process.exit(1);
});
