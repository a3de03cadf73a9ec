import { describe, it, expect } from 'vitest';
import { ConversationState } from '../conversation.js';

const user = (content: string) => ({ role: 'user' as const, content, toolCalls: [] });

describe('ConversationState', () => {
  it('starts with the system prompt and history, all committed', () => {
    const state = new ConversationState('be brief', [user('earlier'), { role: 'assistant', content: 'ok', toolCalls: [] }]);

    expect(state.snapshot().map((t) => t.role)).toEqual(['system', 'user', 'assistant']);
    expect(state.uncommitted()).toEqual([]);
  });

  it('omits the system turn when the prompt is empty', () => {
    const state = new ConversationState('');
    expect(state.length).toBe(0);
  });

  it('hands out only turns appended since the last checkpoint', () => {
    const state = new ConversationState('sys');
    state.append(user('first'));

    expect(state.checkpoint().map((t) => t.content)).toEqual(['first']);
    expect(state.checkpoint()).toEqual([]);

    state.append({ role: 'assistant', content: 'reply', toolCalls: [] });
    expect(state.uncommitted().map((t) => t.content)).toEqual(['reply']);
  });

  it('requires every tool turn to answer a pending call', () => {
    const state = new ConversationState('sys');
    state.append(user('go'));
    state.append({ role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'add', arguments: {} }] });

    expect(() => state.append({ role: 'tool', content: 'x', toolCalls: [], toolCallId: 'c9' })).toThrow(
      "tool turn answers unknown or already answered call 'c9'",
    );

    state.append({ role: 'tool', content: '2', toolCalls: [], toolCallId: 'c1', name: 'add' });
    expect(() => state.append({ role: 'tool', content: '2', toolCalls: [], toolCallId: 'c1' })).toThrow(
      "tool turn answers unknown or already answered call 'c1'",
    );
  });

  it('refuses an assistant turn while calls are unanswered', () => {
    const state = new ConversationState('sys');
    state.append({
      role: 'assistant',
      content: '',
      toolCalls: [
        { id: 'c1', name: 'add', arguments: {} },
        { id: 'c2', name: 'add', arguments: {} },
      ],
    });
    state.append({ role: 'tool', content: '1', toolCalls: [], toolCallId: 'c1' });

    expect(state.unansweredCalls().map((c) => c.id)).toEqual(['c2']);
    expect(() => state.append({ role: 'assistant', content: 'done', toolCalls: [] })).toThrow(
      'assistant turn appended with 1 unanswered tool call(s)',
    );
  });

  it('rejects duplicate call ids in one turn', () => {
    const state = new ConversationState('sys');
    expect(() =>
      state.append({
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 'dup', name: 'a', arguments: {} },
          { id: 'dup', name: 'b', arguments: {} },
        ],
      }),
    ).toThrow('assistant turn carries duplicate tool call ids');
  });

  it('freezes appended turns', () => {
    const state = new ConversationState('sys');
    const turn = state.append(user('hello'));

    expect(Object.isFrozen(turn)).toBe(true);
    expect(Object.isFrozen(turn.toolCalls)).toBe(true);
  });

  it('counts rounds from one', () => {
    const state = new ConversationState('sys');
    expect(state.round).toBe(0);
    expect(state.nextRound()).toBe(1);
    expect(state.nextRound()).toBe(2);
  });
});
