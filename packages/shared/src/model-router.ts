/**
 * ModelRouter: the model gateway.
 *
 * Supports:
 *   - Anthropic (direct, OAuth or API key)
 *   - OpenRouter (Anthropic SDK with custom baseURL)
 *   - Ollama / OpenAI / DashScope and other OpenAI-compatible endpoints (openai SDK)
 *
 * Callers resolve a ModelHandle, bind a tool catalog to it and invoke the
 * bound model with provider-agnostic turns. Each adapter maps turns and tool
 * specs to its wire format and maps tool-call responses back. Every
 * invocation goes through the provider's circuit breaker and the fallback
 * chain.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { randomUUID } from 'node:crypto';
import { logger } from './logger.js';
import { withSpan } from './tracing.js';
import { CircuitBreaker, type CircuitSnapshot } from './circuit-breaker.js';
import { CancelledError, ModelUnavailableError, errorMessage } from './errors.js';
import type {
  AnthropicProviderConfig,
  AssistantTurn,
  BoundModel,
  InvokeOptions,
  ModelDefinition,
  ModelGateway,
  ModelHandle,
  ModelInfo,
  ModelRouterConfig,
  OllamaProviderConfig,
  OpenAICompatibleProviderConfig,
  OpenRouterProviderConfig,
  ToolCallRequest,
  ToolSpec,
  Turn,
} from './model-types.js';

const log = logger.child({ module: 'model-router' });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isOAuthToken(key: string): boolean {
  return key.includes('sk-ant-oat');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Provider arguments arrive as an object (Anthropic) or a JSON string (OpenAI). */
function parseArguments(raw: unknown, toolName: string): Record<string, unknown> {
  if (isRecord(raw)) return raw;
  if (typeof raw === 'string' && raw.trim() !== '') {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isRecord(parsed)) return parsed;
    } catch (err) {
      log.warn({ err, toolName }, 'tool call arguments are not valid JSON');
      return {};
    }
  }
  return {};
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

interface ProviderRequest {
  turns: readonly Turn[];
  tools: readonly ToolSpec[];
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

interface ProviderAdapter {
  invoke(model: ModelDefinition, request: ProviderRequest): Promise<AssistantTurn>;
}

// ---------------------------------------------------------------------------
// Anthropic wire mapping (shared by the anthropic and openrouter adapters)
// ---------------------------------------------------------------------------

function toAnthropicMessages(turns: readonly Turn[]): {
  system?: string;
  messages: Anthropic.Messages.MessageParam[];
} {
  const system: string[] = [];
  const messages: Anthropic.Messages.MessageParam[] = [];
  // consecutive tool turns answer one assistant turn and travel as one user message
  let results: Anthropic.Messages.ToolResultBlockParam[] = [];
  const flush = () => {
    if (results.length === 0) return;
    messages.push({ role: 'user', content: results });
    results = [];
  };

  for (const turn of turns) {
    switch (turn.role) {
      case 'system':
        system.push(turn.content);
        break;
      case 'tool':
        results.push({ type: 'tool_result', tool_use_id: turn.toolCallId ?? '', content: turn.content });
        break;
      case 'user':
        flush();
        messages.push({ role: 'user', content: turn.content });
        break;
      case 'assistant': {
        flush();
        const blocks: Anthropic.Messages.ContentBlockParam[] = [];
        if (turn.content) blocks.push({ type: 'text', text: turn.content });
        for (const call of turn.toolCalls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        messages.push({ role: 'assistant', content: blocks });
        break;
      }
    }
  }
  flush();

  return { system: system.length > 0 ? system.join('\n\n') : undefined, messages };
}

function toAnthropicTool(spec: ToolSpec): Anthropic.Messages.Tool {
  return { name: spec.name, description: spec.description, input_schema: spec.parameters };
}

function fromAnthropicMessage(message: Anthropic.Messages.Message, adapterName: string): AssistantTurn {
  if (!Array.isArray(message.content)) {
    throw new Error(`${adapterName} adapter: invalid response shape from API`);
  }
  const text: string[] = [];
  const toolCalls: ToolCallRequest[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      text.push(block.text);
    } else if (block.type === 'tool_use') {
      toolCalls.push({ id: block.id, name: block.name, arguments: parseArguments(block.input, block.name) });
    } else {
      log.debug({ type: block.type }, 'ignoring unsupported content block');
    }
  }
  return { role: 'assistant', content: text.join(''), toolCalls };
}

function anthropicAdapter(client: Anthropic, adapterName: string): ProviderAdapter {
  return {
    async invoke(model, request) {
      const { system, messages } = toAnthropicMessages(request.turns);
      const response = await client.messages.create(
        {
          model: model.modelName,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system,
          tools: request.tools.length > 0 ? request.tools.map(toAnthropicTool) : undefined,
          messages,
        },
        { signal: request.signal },
      );
      return fromAnthropicMessage(response, adapterName);
    },
  };
}

function createAnthropicAdapter(providerCfg: AnthropicProviderConfig): ProviderAdapter {
  const oauthToken = providerCfg.oauthToken || process.env.ANTHROPIC_OAUTH_TOKEN;
  const apiKey = providerCfg.apiKey || process.env.ANTHROPIC_API_KEY;

  if (oauthToken && isOAuthToken(oauthToken)) {
    log.info('anthropic adapter: using OAuth token');
    return anthropicAdapter(
      new Anthropic({
        authToken: oauthToken,
        apiKey: null,
        defaultHeaders: { 'anthropic-beta': 'oauth-2025-04-20' },
      }),
      'anthropic',
    );
  }
  if (apiKey) {
    log.info('anthropic adapter: using API key');
    return anthropicAdapter(new Anthropic({ apiKey }), 'anthropic');
  }
  throw new ModelUnavailableError('anthropic adapter: no credentials found');
}

function createOpenRouterAdapter(providerCfg: OpenRouterProviderConfig): ProviderAdapter {
  const baseURL = providerCfg.baseURL ?? 'https://openrouter.ai/api/v1';
  log.info({ baseURL }, 'openrouter adapter: initialized');
  return anthropicAdapter(new Anthropic({ apiKey: providerCfg.apiKey, baseURL }), 'openrouter');
}

// ---------------------------------------------------------------------------
// Ollama / OpenAI-compatible adapter (uses openai SDK)
// ---------------------------------------------------------------------------

function toOpenAIMessages(turns: readonly Turn[]): ChatCompletionMessageParam[] {
  return turns.map((turn): ChatCompletionMessageParam => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content };
      case 'user':
        return { role: 'user', content: turn.content };
      case 'tool':
        return { role: 'tool', tool_call_id: turn.toolCallId ?? '', content: turn.content };
      case 'assistant':
        if (turn.toolCalls.length === 0) return { role: 'assistant', content: turn.content };
        return {
          role: 'assistant',
          content: turn.content || null,
          tool_calls: turn.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
    }
  });
}

function toOpenAITool(spec: ToolSpec): ChatCompletionTool {
  return {
    type: 'function',
    function: { name: spec.name, description: spec.description, parameters: spec.parameters },
  };
}

async function createOpenAICompatibleAdapter(
  name: string,
  providerCfg: OllamaProviderConfig | OpenAICompatibleProviderConfig,
): Promise<ProviderAdapter> {
  // loaded only if such a provider is actually used
  const { default: OpenAI } = await import('openai');

  const baseURL =
    providerCfg.provider === 'ollama'
      ? providerCfg.baseURL ?? 'http://localhost:11434/v1'
      : providerCfg.baseURL;
  const apiKey = providerCfg.provider === 'openai-compatible' ? providerCfg.apiKey ?? 'not-needed' : 'not-needed';

  const client = new OpenAI({ baseURL, apiKey });
  log.info({ baseURL, provider: name }, 'openai-compatible adapter: initialized');

  return {
    async invoke(model, request) {
      const response = await client.chat.completions.create(
        {
          model: model.modelName,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: toOpenAIMessages(request.turns),
          tools: request.tools.length > 0 ? request.tools.map(toOpenAITool) : undefined,
        },
        { signal: request.signal },
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new Error(`${name} adapter: no choices in response`);
      }

      const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id || `call_${randomUUID()}`,
        name: call.function.name,
        arguments: parseArguments(call.function.arguments, call.function.name),
      }));
      return { role: 'assistant', content: choice.message.content ?? '', toolCalls };
    },
  };
}

// ---------------------------------------------------------------------------
// ModelRouter class
// ---------------------------------------------------------------------------

export class ModelRouter implements ModelGateway {
  private adapters: Map<string, ProviderAdapter> = new Map();
  private circuitBreakers: Map<string, CircuitBreaker> = new Map();
  private config: ModelRouterConfig;

  private constructor(config: ModelRouterConfig) {
    this.config = config;
  }

  /**
   * Create a router. Anthropic-SDK adapters are built eagerly; OpenAI-compatible
   * ones on first use.
   */
  static async create(config: ModelRouterConfig): Promise<ModelRouter> {
    const router = new ModelRouter(config);
    for (const [name, providerCfg] of Object.entries(config.providers)) {
      if (providerCfg.provider === 'anthropic') {
        router.adapters.set(name, createAnthropicAdapter(providerCfg));
      } else if (providerCfg.provider === 'openrouter') {
        router.adapters.set(name, createOpenRouterAdapter(providerCfg));
      }
    }
    return router;
  }

  get defaultModelId(): string {
    return this.config.defaultModel;
  }

  private getOrCreateBreaker(provider: string): CircuitBreaker {
    let cb = this.circuitBreakers.get(provider);
    if (!cb) {
      cb = new CircuitBreaker({ name: `model-router-${provider}`, failureThreshold: 5, resetTimeoutMs: 30_000 });
      this.circuitBreakers.set(provider, cb);
    }
    return cb;
  }

  private async getAdapter(provider: string): Promise<ProviderAdapter> {
    const existing = this.adapters.get(provider);
    if (existing) return existing;

    const providerCfg = this.config.providers[provider];
    if (!providerCfg) {
      throw new ModelUnavailableError(`model-router: no provider config for '${provider}'`);
    }
    if (providerCfg.provider === 'ollama' || providerCfg.provider === 'openai-compatible') {
      const adapter = await createOpenAICompatibleAdapter(provider, providerCfg);
      this.adapters.set(provider, adapter);
      return adapter;
    }
    throw new ModelUnavailableError(`model-router: cannot create adapter for provider '${provider}'`);
  }

  private findModel(modelId: string): ModelDefinition | undefined {
    return this.config.models.find((m) => m.id === modelId);
  }

  // -----------------------------------------------------------------------
  // Catalog
  // -----------------------------------------------------------------------

  isAvailable(modelId: string): boolean {
    const model = this.findModel(modelId);
    return model !== undefined && this.config.providers[model.provider] !== undefined;
  }

  getModelInfo(modelId: string): ModelInfo | undefined {
    const model = this.findModel(modelId);
    if (!model) return undefined;
    return {
      id: model.id,
      displayName: model.displayName ?? model.id,
      modelName: model.modelName,
      provider: model.provider,
      description: model.description ?? '',
      maxTokens: model.maxTokens,
      available: this.isAvailable(model.id),
      isDefault: model.id === this.config.defaultModel,
    };
  }

  listModels(): ModelInfo[] {
    return this.config.models.flatMap((m) => {
      const info = this.getModelInfo(m.id);
      return info ? [info] : [];
    });
  }

  /** Change the default for handles resolved from now on. */
  setDefaultModel(modelId: string): ModelHandle {
    const handle = this.resolveHandle(modelId);
    const previous = this.config.defaultModel;
    this.config.defaultModel = handle.modelId;
    log.info({ previous, current: handle.modelId }, 'default model switched');
    return handle;
  }

  resolveHandle(modelId?: string): ModelHandle {
    const id = modelId ?? this.config.defaultModel;
    const model = this.findModel(id);
    if (!model) {
      throw new ModelUnavailableError(`model-router: unknown model id '${id}'`);
    }
    if (!this.config.providers[model.provider]) {
      throw new ModelUnavailableError(
        `model-router: model '${id}' uses provider '${model.provider}' but no config exists for that provider`,
      );
    }
    return Object.freeze({ modelId: model.id, modelName: model.modelName, provider: model.provider });
  }

  breakerStates(): CircuitSnapshot[] {
    return [...this.circuitBreakers.values()].map((cb) => cb.snapshot());
  }

  // -----------------------------------------------------------------------
  // Invocation
  // -----------------------------------------------------------------------

  bindTools(tools: readonly ToolSpec[], handle: ModelHandle = this.resolveHandle()): BoundModel {
    const catalog = Object.freeze([...tools]);
    return {
      handle,
      tools: catalog,
      invoke: (turns, options) => this.invoke(handle, catalog, turns, options ?? {}),
    };
  }

  private candidates(handle: ModelHandle): ModelDefinition[] {
    const primary = this.findModel(handle.modelId) ?? {
      id: handle.modelId,
      modelName: handle.modelName,
      provider: handle.provider,
      maxTokens: 4096,
    };
    const models = [primary];
    for (const fbId of this.config.fallbackChain ?? []) {
      if (fbId === primary.id) continue;
      const fb = this.findModel(fbId);
      if (fb && this.config.providers[fb.provider]) models.push(fb);
    }
    return models;
  }

  private async invoke(
    handle: ModelHandle,
    tools: readonly ToolSpec[],
    turns: readonly Turn[],
    options: InvokeOptions,
  ): Promise<AssistantTurn> {
    let lastError: unknown = new Error('no model candidates');

    for (const model of this.candidates(handle)) {
      if (options.signal?.aborted) throw new CancelledError('model invocation cancelled');
      const start = Date.now();
      try {
        const adapter = await this.getAdapter(model.provider);
        const breaker = this.getOrCreateBreaker(model.provider);
        const turn = await withSpan(
          'llm.invoke',
          { model: model.id, provider: model.provider, tools: tools.length },
          () =>
            breaker.execute(() =>
              adapter.invoke(model, {
                turns,
                tools,
                maxTokens: options.maxTokens ?? model.maxTokens,
                temperature: options.temperature ?? model.temperature,
                signal: options.signal,
              }),
            ),
        );
        log.info(
          { model: model.id, provider: model.provider, durationMs: Date.now() - start, toolCalls: turn.toolCalls.length },
          'model invocation complete',
        );
        return turn;
      } catch (err) {
        if (options.signal?.aborted) throw err;
        lastError = err;
        log.warn({ err, model: model.id, provider: model.provider }, 'model invocation failed, trying fallback');
      }
    }

    throw new ModelUnavailableError(errorMessage(lastError), { cause: lastError });
  }
}
