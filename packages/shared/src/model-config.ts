/**
 * Model configuration loader.
 *
 * Builds a ModelRouterConfig from:
 *   1. A JSON file at MODEL_ROUTER_CONFIG_PATH (optional)
 *   2. Provider credentials found in the environment
 *   3. DEFAULT_MODEL override (catalog id or raw provider model name)
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';
import type { ModelDefinition, ModelRouterConfig, ProviderConfig } from './model-types.js';

const log = logger.child({ module: 'model-config' });

const DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';
const OPENAI_BASE_URL = 'https://api.openai.com/v1';

/** Preferred defaults, first configured one wins. */
const DEFAULT_PREFERENCE = ['qwen-plus', 'gpt-4o-mini', 'claude-sonnet-4', 'llama3.1'];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

function defaultProviders(env: NodeJS.ProcessEnv): Record<string, ProviderConfig> {
  const providers: Record<string, ProviderConfig> = {};

  const oauthToken = env.ANTHROPIC_OAUTH_TOKEN;
  const anthropicKey = env.ANTHROPIC_API_KEY;
  if (oauthToken || anthropicKey) {
    providers['anthropic'] = {
      provider: 'anthropic',
      oauthToken: oauthToken || undefined,
      apiKey: anthropicKey || undefined,
    };
  }
  if (env.OPENROUTER_API_KEY) {
    providers['openrouter'] = { provider: 'openrouter', apiKey: env.OPENROUTER_API_KEY };
  }
  if (env.DASHSCOPE_API_KEY) {
    providers['dashscope'] = {
      provider: 'openai-compatible',
      apiKey: env.DASHSCOPE_API_KEY,
      baseURL: env.DASHSCOPE_BASE_URL || DASHSCOPE_BASE_URL,
    };
  }
  if (env.OPENAI_API_KEY) {
    providers['openai'] = {
      provider: 'openai-compatible',
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL || OPENAI_BASE_URL,
    };
  }
  if (env.OLLAMA_BASE_URL) {
    providers['ollama'] = { provider: 'ollama', baseURL: env.OLLAMA_BASE_URL };
  }

  return providers;
}

function defaultModels(): ModelDefinition[] {
  return [
    {
      id: 'qwen-plus',
      modelName: 'qwen-plus',
      provider: 'dashscope',
      displayName: 'Qwen Plus',
      description: 'Balanced Qwen model with tool calling',
      maxTokens: 4096,
      temperature: 0.7,
    },
    {
      id: 'qwen-turbo',
      modelName: 'qwen-turbo',
      provider: 'dashscope',
      displayName: 'Qwen Turbo',
      description: 'Fast, low-cost Qwen model',
      maxTokens: 4096,
      temperature: 0.7,
    },
    {
      id: 'gpt-4o-mini',
      modelName: 'gpt-4o-mini',
      provider: 'openai',
      displayName: 'GPT-4o mini',
      description: 'Small OpenAI model with tool calling',
      maxTokens: 4096,
      temperature: 0.7,
    },
    {
      id: 'gpt-4o',
      modelName: 'gpt-4o',
      provider: 'openai',
      displayName: 'GPT-4o',
      description: 'OpenAI flagship multimodal model',
      maxTokens: 4096,
      temperature: 0.7,
    },
    {
      id: 'claude-sonnet-4',
      modelName: 'claude-sonnet-4-20250514',
      provider: 'anthropic',
      displayName: 'Claude Sonnet 4',
      description: 'Anthropic general-purpose model',
      maxTokens: 4096,
    },
    {
      id: 'llama3.1',
      modelName: 'llama3.1',
      provider: 'ollama',
      displayName: 'Llama 3.1 (local)',
      description: 'Local model served by Ollama',
      maxTokens: 2048,
      temperature: 0.7,
    },
  ];
}

function pickDefaultModel(providers: Record<string, ProviderConfig>, models: ModelDefinition[]): string {
  const usable = (id: string) => {
    const model = models.find((m) => m.id === id);
    return model !== undefined && providers[model.provider] !== undefined;
  };
  return DEFAULT_PREFERENCE.find(usable) ?? models.find((m) => usable(m.id))?.id ?? 'qwen-plus';
}

export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): ModelRouterConfig {
  const providers = defaultProviders(env);
  const models = defaultModels();
  return { providers, models, defaultModel: pickDefaultModel(providers, models) };
}

// ---------------------------------------------------------------------------
// File-based config loading
// ---------------------------------------------------------------------------

const providerSchema = z.discriminatedUnion('provider', [
  z.object({ provider: z.literal('anthropic'), oauthToken: z.string().optional(), apiKey: z.string().optional() }),
  z.object({ provider: z.literal('openrouter'), apiKey: z.string(), baseURL: z.string().optional() }),
  z.object({ provider: z.literal('ollama'), baseURL: z.string().optional() }),
  z.object({ provider: z.literal('openai-compatible'), apiKey: z.string().optional(), baseURL: z.string() }),
]);

const fileConfigSchema = z.object({
  providers: z.record(providerSchema).default({}),
  models: z.array(
    z.object({
      id: z.string().min(1),
      modelName: z.string().min(1),
      provider: z.string().min(1),
      displayName: z.string().optional(),
      description: z.string().optional(),
      maxTokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(2).optional(),
    }),
  ),
  defaultModel: z.string().optional(),
  fallbackChain: z.array(z.string()).optional(),
});

async function loadConfigFromFile(path: string, env: NodeJS.ProcessEnv): Promise<ModelRouterConfig> {
  const raw = await readFile(path, 'utf-8');
  const result = fileConfigSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`model-config: invalid config file at '${path}': ${result.error.message}`);
  }
  // credentials from the environment fill providers the file does not name
  const providers = { ...defaultProviders(env), ...result.data.providers };
  return {
    providers,
    models: result.data.models,
    defaultModel: result.data.defaultModel ?? pickDefaultModel(providers, result.data.models),
    fallbackChain: result.data.fallbackChain,
  };
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

function applyEnvOverrides(config: ModelRouterConfig, env: NodeJS.ProcessEnv): ModelRouterConfig {
  const defaultModel = env.DEFAULT_MODEL;
  if (defaultModel) {
    const existing = config.models.find((m) => m.id === defaultModel || m.modelName === defaultModel);
    if (existing) {
      config.defaultModel = existing.id;
    } else {
      // raw provider model name: add an ad-hoc catalog entry
      config.models.push({
        id: 'custom-default',
        modelName: defaultModel,
        provider: guessProvider(defaultModel, config),
        displayName: defaultModel,
        maxTokens: 4096,
      });
      config.defaultModel = 'custom-default';
    }
    log.info({ defaultModel, resolved: config.defaultModel }, 'DEFAULT_MODEL override applied');
  }

  if (env.FALLBACK_MODELS) {
    config.fallbackChain = env.FALLBACK_MODELS.split(',').map((s) => s.trim()).filter(Boolean);
  }

  return config;
}

/** Best-effort guess of a provider for a raw model name, validated against config */
function guessProvider(modelName: string, config: ModelRouterConfig): string {
  let guessed: string;
  if (modelName.startsWith('claude')) guessed = 'anthropic';
  else if (modelName.startsWith('qwen')) guessed = 'dashscope';
  else if (modelName.startsWith('gpt-') || /^o\d/.test(modelName)) guessed = 'openai';
  else if (config.providers['openrouter']) guessed = 'openrouter';
  else guessed = 'ollama';

  if (!config.providers[guessed]) {
    throw new Error(
      `Model '${modelName}' appears to be a ${guessed} model but no ${guessed} provider is configured`,
    );
  }
  return guessed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: ModelRouterConfig): void {
  if (Object.keys(config.providers).length === 0) {
    throw new Error(
      'model-config: no providers configured. Set one of DASHSCOPE_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY, OPENROUTER_API_KEY or OLLAMA_BASE_URL.',
    );
  }

  const model = config.models.find((m) => m.id === config.defaultModel);
  if (!model) {
    throw new Error(
      `model-config: default model '${config.defaultModel}' is not in the catalog. ` +
        `Available models: ${config.models.map((m) => m.id).join(', ')}`,
    );
  }
  if (!config.providers[model.provider]) {
    throw new Error(
      `model-config: model '${model.id}' uses provider '${model.provider}' but no config exists for that provider.`,
    );
  }

  for (const modelId of config.fallbackChain ?? []) {
    if (!config.models.find((m) => m.id === modelId)) {
      throw new Error(`model-config: fallback chain references unknown model id '${modelId}'.`);
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and return a fully resolved ModelRouterConfig.
 *
 * Resolution order:
 *   1. MODEL_ROUTER_CONFIG_PATH JSON file, else the built-in catalog
 *   2. DEFAULT_MODEL and FALLBACK_MODELS overrides
 *   3. Validation
 */
export async function loadModelConfig(env: NodeJS.ProcessEnv = process.env): Promise<ModelRouterConfig> {
  let config: ModelRouterConfig;

  const configPath = env.MODEL_ROUTER_CONFIG_PATH;
  if (configPath) {
    log.info({ configPath }, 'loading model router config from file');
    config = await loadConfigFromFile(configPath, env);
  } else {
    config = createDefaultConfig(env);
  }

  config = applyEnvOverrides(config, env);
  validateConfig(config);

  log.info(
    {
      providers: Object.keys(config.providers),
      models: config.models.map((m) => m.id),
      defaultModel: config.defaultModel,
    },
    'model router config loaded',
  );

  return config;
}
