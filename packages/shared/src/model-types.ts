/**
 * Model gateway types: provider configuration, the model catalog and the
 * provider-agnostic conversation primitives the orchestrator works with.
 */

// ---------------------------------------------------------------------------
// Provider credential configuration
// ---------------------------------------------------------------------------

export type ModelProvider = 'anthropic' | 'openrouter' | 'ollama' | 'openai-compatible';

export interface AnthropicProviderConfig {
  provider: 'anthropic';
  /** OAuth token (sk-ant-oat prefix), preferred over apiKey */
  oauthToken?: string;
  apiKey?: string;
}

export interface OpenRouterProviderConfig {
  provider: 'openrouter';
  apiKey: string;
  /** default: https://openrouter.ai/api/v1 */
  baseURL?: string;
}

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** default: http://localhost:11434/v1 */
  baseURL?: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  apiKey?: string;
  baseURL: string;
}

export type ProviderConfig =
  | AnthropicProviderConfig
  | OpenRouterProviderConfig
  | OllamaProviderConfig
  | OpenAICompatibleProviderConfig;

// ---------------------------------------------------------------------------
// Model catalog
// ---------------------------------------------------------------------------

export interface ModelDefinition {
  /** Catalog id used by requests and personas (e.g. "qwen-plus") */
  id: string;
  /** Model string sent to the provider API */
  modelName: string;
  /** Key into ModelRouterConfig.providers (e.g. "anthropic", "dashscope") */
  provider: string;
  displayName?: string;
  description?: string;
  maxTokens: number;
  /** Sampling temperature used when the caller does not set one */
  temperature?: number;
}

export interface ModelRouterConfig {
  /** Provider configurations keyed by provider name */
  providers: Record<string, ProviderConfig>;
  models: ModelDefinition[];
  /** Model id used when a request names none */
  defaultModel: string;
  /** Model ids tried in order when the requested model fails */
  fallbackChain?: string[];
}

export interface ModelInfo {
  id: string;
  displayName: string;
  modelName: string;
  provider: string;
  description: string;
  maxTokens: number;
  available: boolean;
  isDefault: boolean;
}

/**
 * A resolved, immutable reference to one catalog model. Resolved once per
 * request and threaded through the run; changing the default model never
 * affects handles already handed out.
 */
export interface ModelHandle {
  readonly modelId: string;
  readonly modelName: string;
  readonly provider: string;
}

// ---------------------------------------------------------------------------
// Conversation primitives
// ---------------------------------------------------------------------------

export type TurnRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  /** Provider-assigned (or generated) id echoed back by the answering tool turn */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  /** Non-empty only on assistant turns that request tools */
  readonly toolCalls: readonly ToolCallRequest[];
  /** role=tool: the request this turn answers */
  readonly toolCallId?: string;
  /** role=tool: name of the tool that produced the content */
  readonly name?: string;
}

export interface AssistantTurn extends Turn {
  readonly role: 'assistant';
}

export interface JsonSchemaObject {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** What a model sees of a tool */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/** A model with a fixed tool catalog attached */
export interface BoundModel {
  readonly handle: ModelHandle;
  readonly tools: readonly ToolSpec[];
  invoke(turns: readonly Turn[], options?: InvokeOptions): Promise<AssistantTurn>;
}

export interface ModelGateway {
  readonly defaultModelId: string;
  bindTools(tools: readonly ToolSpec[], handle?: ModelHandle): BoundModel;
  resolveHandle(modelId?: string): ModelHandle;
  isAvailable(modelId: string): boolean;
}
