import {
  ModelUnavailableError,
  type AssistantTurn,
  type BoundModel,
  type CircuitSnapshot,
  type InvokeOptions,
  type ModelHandle,
  type ModelInfo,
  type ToolCallRequest,
  type ToolSpec,
  type Turn,
} from '@parley/shared';
import type { ModelCatalog } from '../api.js';

export interface Invocation {
  handle: ModelHandle;
  tools: readonly ToolSpec[];
  turns: readonly Turn[];
  options: InvokeOptions;
}

/** Decides the next assistant turn from the conversation so far; `call` counts from 1. */
export type Script = (turns: readonly Turn[], call: number) => AssistantTurn | Promise<AssistantTurn>;

export function reply(content: string, toolCalls: ToolCallRequest[] = []): AssistantTurn {
  return { role: 'assistant', content, toolCalls };
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCallRequest {
  return { id, name, arguments: args };
}

/** Plays back scripted replies in order; the last one repeats. */
export function sequence(...turns: AssistantTurn[]): Script {
  return (_turns, call) => {
    const turn = turns[Math.min(call, turns.length) - 1];
    if (!turn) throw new Error('empty script');
    return turn;
  };
}

/** In-process model gateway that answers from a script and records every invocation. */
export class ScriptedGateway implements ModelCatalog {
  readonly invocations: Invocation[] = [];
  defaultModelId: string;

  constructor(
    private readonly script: Script,
    private readonly models: string[] = ['fake-default', 'fake-alt'],
  ) {
    this.defaultModelId = models[0] ?? 'fake-default';
  }

  bindTools(tools: readonly ToolSpec[], handle: ModelHandle = this.resolveHandle()): BoundModel {
    return {
      handle,
      tools,
      invoke: async (turns, options = {}) => {
        this.invocations.push({ handle, tools, turns, options });
        return this.script(turns, this.invocations.length);
      },
    };
  }

  resolveHandle(modelId?: string): ModelHandle {
    const id = modelId ?? this.defaultModelId;
    if (!this.models.includes(id)) throw new ModelUnavailableError(`model-router: unknown model id '${id}'`);
    return { modelId: id, modelName: `${id}-name`, provider: 'fake' };
  }

  isAvailable(modelId: string): boolean {
    return this.models.includes(modelId);
  }

  getModelInfo(modelId: string): ModelInfo | undefined {
    if (!this.models.includes(modelId)) return undefined;
    return {
      id: modelId,
      displayName: modelId,
      modelName: `${modelId}-name`,
      provider: 'fake',
      description: '',
      maxTokens: 1024,
      available: true,
      isDefault: modelId === this.defaultModelId,
    };
  }

  listModels(): ModelInfo[] {
    return this.models.flatMap((id) => {
      const info = this.getModelInfo(id);
      return info ? [info] : [];
    });
  }

  setDefaultModel(modelId: string): ModelHandle {
    const handle = this.resolveHandle(modelId);
    this.defaultModelId = handle.modelId;
    return handle;
  }

  breakerStates(): CircuitSnapshot[] {
    return [];
  }
}

export async function collect<T>(events: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const event of events) out.push(event);
  return out;
}
