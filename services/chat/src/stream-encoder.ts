import { ParleyError } from '@parley/shared';
import type { OrchestratorEvent } from './orchestrator.js';

/** One wire record; only the fields of its `type` are present. */
export type WireRecord =
  | { type: 'thinking'; content: string; toolCalls: { id: string; name: string; arguments: Record<string, unknown> }[] }
  | {
      type: 'tool_result';
      toolName: string;
      toolArgs: Record<string, unknown>;
      result: string;
      step: number;
      totalSteps: number;
    }
  | { type: 'content'; content: string; isFinal: boolean }
  | { type: 'done'; finishReason: 'stop'; sessionId?: string }
  | { type: 'error'; error: string; kind: string };

export function toWireRecord(event: OrchestratorEvent): WireRecord {
  switch (event.type) {
    case 'thinking':
      return {
        type: 'thinking',
        content: event.content,
        toolCalls: event.toolCalls.map((c) => ({ id: c.id, name: c.name, arguments: c.arguments })),
      };
    case 'tool_result':
      return {
        type: 'tool_result',
        toolName: event.toolName,
        toolArgs: event.toolArgs,
        result: event.result,
        step: event.step,
        totalSteps: event.totalSteps,
      };
    case 'content':
      return { type: 'content', content: event.content, isFinal: event.isFinal };
    case 'done':
      return event.sessionId
        ? { type: 'done', finishReason: event.finishReason, sessionId: event.sessionId }
        : { type: 'done', finishReason: event.finishReason };
    case 'error':
      return { type: 'error', error: event.error, kind: event.kind };
  }
}

export function formatRecord(record: WireRecord): string {
  return `data: ${JSON.stringify(record)}\n\n`;
}

/**
 * Single-use encoder for one response stream. Exactly one terminal record
 * (`done` or `error`) may be written; anything after it is refused.
 */
export class StreamEncoder {
  private terminal: 'done' | 'error' | undefined;

  get finished(): boolean {
    return this.terminal !== undefined;
  }

  encode(event: OrchestratorEvent): string {
    if (this.terminal) {
      throw new ParleyError('Internal', `stream already terminated by '${this.terminal}', refusing '${event.type}'`);
    }
    if (event.type === 'done' || event.type === 'error') this.terminal = event.type;
    return formatRecord(toWireRecord(event));
  }
}
