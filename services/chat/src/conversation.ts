import { ParleyError, type ToolCallRequest, type Turn } from '@parley/shared';

function freezeTurn(turn: Turn): Turn {
  return Object.freeze({
    ...turn,
    toolCalls: Object.freeze(turn.toolCalls.map((call) => Object.freeze({ ...call }))),
  });
}

/**
 * Ordered, append-only turn list for one exchange.
 *
 * Turns before the commit watermark came from persisted history; `checkpoint()`
 * hands out the turns appended since the last checkpoint and moves the mark.
 */
export class ConversationState {
  private readonly turns: Turn[] = [];
  private pending = new Map<string, ToolCallRequest>();
  private committed = 0;
  private rounds = 0;
  readonly systemPrompt: string;

  constructor(systemPrompt: string, history: readonly Turn[] = []) {
    this.systemPrompt = systemPrompt;
    if (systemPrompt) this.append({ role: 'system', content: systemPrompt, toolCalls: [] });
    for (const turn of history) this.append(turn);
    this.committed = this.turns.length;
  }

  get round(): number {
    return this.rounds;
  }

  /** Advance and return the 1-based round number. */
  nextRound(): number {
    this.rounds += 1;
    return this.rounds;
  }

  get length(): number {
    return this.turns.length;
  }

  /** Tool calls of the latest assistant turn that no tool turn answered yet. */
  unansweredCalls(): ToolCallRequest[] {
    return [...this.pending.values()];
  }

  append(turn: Turn): Turn {
    switch (turn.role) {
      case 'tool': {
        if (!turn.toolCallId || !this.pending.has(turn.toolCallId)) {
          throw new ParleyError(
            'Internal',
            `tool turn answers unknown or already answered call '${turn.toolCallId ?? ''}'`,
          );
        }
        this.pending.delete(turn.toolCallId);
        break;
      }
      case 'assistant': {
        if (this.pending.size > 0) {
          throw new ParleyError(
            'Internal',
            `assistant turn appended with ${this.pending.size} unanswered tool call(s)`,
          );
        }
        const ids = new Set(turn.toolCalls.map((c) => c.id));
        if (ids.size !== turn.toolCalls.length) {
          throw new ParleyError('Internal', 'assistant turn carries duplicate tool call ids');
        }
        this.pending = new Map(turn.toolCalls.map((c) => [c.id, c]));
        break;
      }
      default:
        break;
    }

    const frozen = freezeTurn(turn);
    this.turns.push(frozen);
    return frozen;
  }

  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  /** Turns appended since the last checkpoint (or since construction). */
  uncommitted(): readonly Turn[] {
    return Object.freeze(this.turns.slice(this.committed));
  }

  checkpoint(): readonly Turn[] {
    const fresh = this.uncommitted();
    this.committed = this.turns.length;
    return fresh;
  }
}
