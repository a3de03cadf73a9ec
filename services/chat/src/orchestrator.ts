import {
  CancelledError,
  MaxRoundsExceededError,
  ModelUnavailableError,
  ParleyError,
  ToolNotFoundError,
  errorMessage,
  logger,
  sleep,
  toParleyError,
  withTimeout,
  type AssistantTurn,
  type BoundModel,
  type ErrorKind,
  type ModelGateway,
  type ModelHandle,
  type ToolCallRequest,
  type Turn,
} from '@parley/shared';
import { chunkContent } from './content-chunker.js';
import type { ConversationState } from './conversation.js';
import {
  toToolSpec,
  type ToolContext,
  type ToolDefinition,
  type ToolOutcome,
  type ToolRegistry,
} from './tool-registry.js';

const log = logger.child({ module: 'orchestrator' });

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type OrchestratorEvent =
  | { type: 'thinking'; content: string; toolCalls: ToolCallRequest[] }
  | {
      type: 'tool_result';
      toolName: string;
      toolArgs: Record<string, unknown>;
      result: string;
      step: number;
      totalSteps: number;
      round: number;
    }
  | { type: 'content'; content: string; isFinal: boolean }
  | { type: 'done'; finishReason: 'stop'; sessionId?: string }
  | { type: 'error'; error: string; kind: ErrorKind };

export interface ToolCallRecord {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  result: string;
  ok: boolean;
  round: number;
}

/** Turns appended since the previous checkpoint, handed to persistence. */
export interface Checkpoint {
  turns: readonly Turn[];
  /** Every tool call of the run so far */
  toolCalls: readonly ToolCallRecord[];
  /** True for the checkpoint that carries the final assistant turn */
  final: boolean;
}

export interface RunRequest {
  state: ConversationState;
  context: ToolContext;
  /** Model for this run; the gateway default when omitted */
  handle?: ModelHandle;
  /** Narrows the registry catalog for this run */
  toolFilter?: (def: ToolDefinition) => boolean;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  /** Echoed in the `done` event */
  sessionId?: string;
  onCheckpoint?: (checkpoint: Checkpoint) => Promise<void>;
}

export interface CompletionResult {
  message: AssistantTurn;
  toolCalls: ToolCallRecord[];
  finishReason: 'stop';
  rounds: number;
  modelId: string;
}

export interface OrchestratorOptions {
  /** Round ceiling; unbounded when undefined */
  maxRounds?: number;
  chunkDelayMs: number;
  modelTimeoutMs: number;
}

interface Completion {
  turn: AssistantTurn;
  toolCalls: ToolCallRecord[];
  rounds: number;
  modelId: string;
}

// ---------------------------------------------------------------------------
// Tool output handling
// ---------------------------------------------------------------------------

const SENSITIVE_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g, // Anthropic API keys
  /sk-[a-zA-Z0-9]{32,}/g, // OpenAI / DashScope API keys
  /\b[a-f0-9]{64}\b/g, // 64-char hex tokens
];

/** Strip sensitive tokens/keys from tool output before sending it to the model */
export function sanitizeToolOutput(text: string): string {
  let sanitized = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

export function stringifyToolOutput(output: unknown): string {
  if (typeof output === 'string') return output;
  if (output === undefined || output === null) return '';
  if (typeof output === 'number' || typeof output === 'boolean' || typeof output === 'bigint') {
    return String(output);
  }
  return JSON.stringify(output);
}

/** Give every call in the turn a unique, non-empty id so tool turns can answer it. */
function normalizeCallIds(turn: AssistantTurn, round: number): AssistantTurn {
  const seen = new Set<string>();
  let changed = false;
  const toolCalls = turn.toolCalls.map((call, index) => {
    if (call.id && !seen.has(call.id)) {
      seen.add(call.id);
      return call;
    }
    changed = true;
    const id = `call_${round}_${index}`;
    seen.add(id);
    return { ...call, id };
  });
  return changed ? { ...turn, toolCalls } : turn;
}

function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof CancelledError || signal?.aborted === true;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Drives the model/tool loop: invoke the model, run the tools it asks for in
 * order, feed the results back, repeat until it answers without tool calls.
 */
export class ToolOrchestrator {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly registry: ToolRegistry,
    private readonly options: OrchestratorOptions,
    private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
  ) {}

  /**
   * Streaming run. Yields thinking/tool_result events as rounds progress, then
   * the final answer as paced sentence chunks and one `done`; any failure ends
   * the stream with exactly one `error`. A cancelled run just stops.
   */
  async *run(req: RunRequest): AsyncGenerator<OrchestratorEvent> {
    const steps = this.drive(req);
    let completion: Completion | undefined;

    try {
      for (;;) {
        const next = await steps.next();
        if (next.done) {
          completion = next.value;
          break;
        }
        yield next.value;
      }
    } catch (err) {
      if (isCancellation(err, req.signal)) {
        log.info({ requestId: req.context.requestId }, 'run cancelled');
        return;
      }
      const error = toParleyError(err);
      log.error({ err, kind: error.kind, requestId: req.context.requestId }, 'orchestration failed');
      yield { type: 'error', error: error.message, kind: error.kind };
      return;
    }

    if (!completion) return;
    const chunks = chunkContent(completion.turn.content);
    for (const [index, chunk] of chunks.entries()) {
      if (index > 0 && this.options.chunkDelayMs > 0) {
        try {
          await this.pause(this.options.chunkDelayMs, req.signal);
        } catch (err) {
          if (isCancellation(err, req.signal)) return;
          throw err;
        }
      }
      if (req.signal?.aborted) return;
      yield { type: 'content', content: chunk.content, isFinal: chunk.isFinal };
    }

    yield { type: 'done', finishReason: 'stop', sessionId: req.sessionId };
  }

  /** Non-streaming run: same loop, no intermediate events; failures reject typed. */
  async complete(req: RunRequest): Promise<CompletionResult> {
    try {
      const steps = this.drive(req);
      let next = await steps.next();
      while (!next.done) next = await steps.next();
      const { turn, toolCalls, rounds, modelId } = next.value;
      return { message: turn, toolCalls, finishReason: 'stop', rounds, modelId };
    } catch (err) {
      throw toParleyError(err);
    }
  }

  private async *drive(req: RunRequest): AsyncGenerator<OrchestratorEvent, Completion> {
    const { state, context } = req;
    const filter = req.toolFilter ?? (() => true);
    const catalog = (await this.registry.list(context)).filter(filter);
    const byName = new Map(catalog.map((def) => [def.name, def]));
    const bound = this.gateway.bindTools(catalog.map(toToolSpec), req.handle);
    const toolContext: ToolContext = { ...context, signal: req.signal };
    const records: ToolCallRecord[] = [];

    log.info(
      { requestId: context.requestId, model: bound.handle.modelId, tools: catalog.length, depth: context.depth },
      'run started',
    );

    for (;;) {
      const round = state.nextRound();
      if (this.options.maxRounds !== undefined && round > this.options.maxRounds) {
        throw new MaxRoundsExceededError(this.options.maxRounds);
      }

      const reply = normalizeCallIds(await this.invokeModel(bound, state, req), round);

      if (reply.toolCalls.length === 0) {
        state.append(reply);
        await this.checkpoint(req, records, true);
        log.info({ requestId: context.requestId, rounds: round, toolCalls: records.length }, 'run complete');
        return { turn: reply, toolCalls: records, rounds: round, modelId: bound.handle.modelId };
      }

      if (reply.content.trim() !== '') {
        yield { type: 'thinking', content: reply.content, toolCalls: [...reply.toolCalls] };
      }
      state.append(reply);

      const totalSteps = reply.toolCalls.length;
      for (const [index, call] of reply.toolCalls.entries()) {
        const def = byName.get(call.name);
        const outcome: ToolOutcome = def
          ? await this.registry.invoke(def, call.arguments, toolContext)
          : { ok: false, error: new ToolNotFoundError(call.name) };
        if (req.signal?.aborted) throw new CancelledError('run cancelled');

        const result = sanitizeToolOutput(outcome.ok ? stringifyToolOutput(outcome.output) : outcome.error.message);
        records.push({ id: call.id, name: call.name, arguments: call.arguments, result, ok: outcome.ok, round });
        yield {
          type: 'tool_result',
          toolName: call.name,
          toolArgs: call.arguments,
          result,
          step: index + 1,
          totalSteps,
          round,
        };
        state.append({ role: 'tool', content: result, toolCalls: [], toolCallId: call.id, name: call.name });
      }

      await this.checkpoint(req, records, false);
    }
  }

  private async invokeModel(bound: BoundModel, state: ConversationState, req: RunRequest): Promise<AssistantTurn> {
    try {
      return await withTimeout(
        'model invocation',
        this.options.modelTimeoutMs,
        (signal) => bound.invoke(state.snapshot(), { signal, temperature: req.temperature, maxTokens: req.maxTokens }),
        req.signal,
      );
    } catch (err) {
      if (err instanceof ParleyError) throw err;
      throw new ModelUnavailableError(errorMessage(err), { cause: err });
    }
  }

  private async checkpoint(req: RunRequest, records: ToolCallRecord[], final: boolean): Promise<void> {
    const turns = req.state.checkpoint();
    if (!req.onCheckpoint || turns.length === 0) return;
    await req.onCheckpoint({ turns, toolCalls: Object.freeze([...records]), final });
  }
}
