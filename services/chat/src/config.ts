import { features, logger, type Features } from '@parley/shared';

const log = logger.child({ module: 'config' });

export type StorageBackend = 'sqlite' | 'file';

const VALID_BACKENDS: StorageBackend[] = ['sqlite', 'file'];

export const BUILTIN_SYSTEM_PROMPT =
  'You are a helpful assistant. Use the available tools when they help answer accurately, ' +
  'and explain results clearly.';

export interface ChatConfig {
  port: number;
  dataDir: string;
  sessionBackend: StorageBackend;
  roleBackend: StorageBackend;
  defaultSystemPrompt: string;
  corsOrigins: string[];
  orchestrator: {
    /** undefined: no round ceiling */
    maxRounds?: number;
    chunkDelayMs: number;
    modelTimeoutMs: number;
    toolTimeoutMs: number;
  };
  roles: {
    enabled: boolean;
    maxDepth: number;
    historyWindow: number;
    ringBufferSize: number;
  };
  sessions: {
    historyLimit: number;
    maxMessages: number;
    ttlDays: number;
    sweepIntervalMs: number;
    sweepEnabled: boolean;
  };
  search: {
    enabled: boolean;
    endpoint: string;
  };
}

function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseNumber(name: string, raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    log.warn({ name, configured: raw, using: fallback }, 'invalid numeric setting, using default');
    return fallback;
  }
  return value;
}

function parseBackend(name: string, raw: string | undefined): StorageBackend {
  const value = (raw ?? 'sqlite').toLowerCase();
  const backend = VALID_BACKENDS.find((b) => b === value);
  if (!backend) {
    log.warn({ name, configured: raw, using: 'sqlite' }, 'invalid storage backend, falling back to sqlite');
    return 'sqlite';
  }
  return backend;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, flags: Features = features): ChatConfig {
  const maxRoundsRaw = env.MAX_TOOL_ROUNDS;

  const config: ChatConfig = {
    port: parseNumber('PORT', env.PORT, 8000, 1),
    dataDir: env.DATA_DIR ?? './data',
    sessionBackend: parseBackend('STORAGE_BACKEND', env.STORAGE_BACKEND),
    roleBackend: parseBackend('ROLE_STORAGE_BACKEND', env.ROLE_STORAGE_BACKEND),
    defaultSystemPrompt: env.DEFAULT_SYSTEM_PROMPT || BUILTIN_SYSTEM_PROMPT,
    corsOrigins: parseCommaSeparated(env.CORS_ORIGINS),
    orchestrator: {
      maxRounds: maxRoundsRaw ? parseNumber('MAX_TOOL_ROUNDS', maxRoundsRaw, 10, 1) : undefined,
      chunkDelayMs: parseNumber('CHUNK_DELAY_MS', env.CHUNK_DELAY_MS, 100),
      modelTimeoutMs: parseNumber('MODEL_TIMEOUT_MS', env.MODEL_TIMEOUT_MS, 120_000, 1),
      toolTimeoutMs: parseNumber('TOOL_TIMEOUT_MS', env.TOOL_TIMEOUT_MS, 30_000, 1),
    },
    roles: {
      enabled: flags.isEnabled('roleTools'),
      maxDepth: parseNumber('MAX_ROLE_DEPTH', env.MAX_ROLE_DEPTH, 1),
      historyWindow: 10,
      ringBufferSize: 20,
    },
    sessions: {
      historyLimit: parseNumber('HISTORY_LIMIT', env.HISTORY_LIMIT, 20),
      maxMessages: 100,
      ttlDays: parseNumber('SESSION_TTL_DAYS', env.SESSION_TTL_DAYS, 7),
      sweepIntervalMs: parseNumber('SESSION_SWEEP_INTERVAL_MS', env.SESSION_SWEEP_INTERVAL_MS, 3_600_000, 1_000),
      sweepEnabled: flags.isEnabled('sessionSweep'),
    },
    search: {
      enabled: flags.isEnabled('webSearch'),
      endpoint: env.SEARCH_ENDPOINT || 'https://api.duckduckgo.com/',
    },
  };

  log.info(
    {
      port: config.port,
      dataDir: config.dataDir,
      sessionBackend: config.sessionBackend,
      roleBackend: config.roleBackend,
      maxRounds: config.orchestrator.maxRounds ?? 'unbounded',
      roleTools: config.roles.enabled,
      webSearch: config.search.enabled,
    },
    'chat config loaded',
  );

  return config;
}
