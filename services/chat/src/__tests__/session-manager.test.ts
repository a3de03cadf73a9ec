import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { closeDb, getDb } from '../db.js';
import { ConversationState } from '../conversation.js';
import { ToolOrchestrator, type Checkpoint } from '../orchestrator.js';
import { RoleManager } from '../role-manager.js';
import { SqliteRoleStore } from '../role-store.js';
import { SessionManager, checkpointMessages } from '../session-manager.js';
import { FileSessionStore, SqliteSessionStore } from '../session-store.js';
import { ToolRegistry } from '../tool-registry.js';
import { createMathTools } from '../tools/math-tools.js';
import { ScriptedGateway, collect, reply, sequence, toolCall } from './helpers.js';

let tmpDir: string;
let clock: Date;
const now = () => clock;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(tmpdir(), 'parley-sessions-'));
  clock = new Date('2026-03-10T12:00:00.000Z');
});

afterEach(async () => {
  closeDb();
  await rm(tmpDir, { recursive: true, force: true });
});

function manager(maxMessages = 100) {
  const roles = new RoleManager(new SqliteRoleStore(getDb(tmpDir)), now);
  const sessions = new SessionManager(new SqliteSessionStore(getDb(tmpDir)), { maxMessages, ttlDays: 7 }, roles, now);
  return { roles, sessions };
}

const toolRound: Checkpoint = {
  turns: [
    { role: 'user', content: 'add 1 and 2', toolCalls: [] },
    { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'add', arguments: { a: 1, b: 2 } }] },
    { role: 'tool', content: '3', toolCalls: [], toolCallId: 'c1', name: 'add' },
  ],
  toolCalls: [{ id: 'c1', name: 'add', arguments: { a: 1, b: 2 }, result: '3', ok: true, round: 1 }],
  final: false,
};

const finalRound: Checkpoint = {
  turns: [{ role: 'assistant', content: 'It is 3.', toolCalls: [] }],
  toolCalls: toolRound.toolCalls,
  final: true,
};

describe('checkpointMessages', () => {
  it('keeps user and tool turns and drops tool-requesting assistant turns', () => {
    expect(checkpointMessages(toolRound)).toEqual([
      { role: 'user', content: 'add 1 and 2' },
      { role: 'tool', content: '3', toolCallId: 'c1', toolName: 'add', toolArgs: { a: 1, b: 2 } },
    ]);
  });

  it('attaches the run tool calls to the final assistant turn', () => {
    expect(checkpointMessages(finalRound)).toEqual([
      {
        role: 'assistant',
        content: 'It is 3.',
        toolCalls: [{ id: 'c1', name: 'add', arguments: { a: 1, b: 2 }, result: '3' }],
      },
    ]);
  });

  it('leaves request assistant turns out', () => {
    const checkpoint: Checkpoint = {
      turns: [
        { role: 'assistant', content: 'earlier reply', toolCalls: [] },
        { role: 'user', content: 'next', toolCalls: [] },
        { role: 'assistant', content: 'final', toolCalls: [] },
      ],
      toolCalls: [],
      final: true,
    };
    expect(checkpointMessages(checkpoint)).toEqual([
      { role: 'user', content: 'next' },
      { role: 'assistant', content: 'final' },
    ]);
  });
});

describe('SessionManager', () => {
  it('creates a session seeded from a persona', async () => {
    const { roles, sessions } = manager();
    const role = await roles.create({ name: 'Chef', systemPrompt: 'You cook.' });

    const session = await sessions.create({ roleId: role.roleId });

    expect(session.systemPrompt).toBe('You cook.');
    expect(session.userInfo).toEqual({ roleId: role.roleId, roleName: 'Chef' });
    expect(session.createdAt).toBe('2026-03-10T12:00:00.000Z');
    expect(await sessions.get(session.sessionId)).toEqual(session);
  });

  it('rejects an unknown persona', async () => {
    const { sessions } = manager();
    await expect(sessions.create({ roleId: 'nobody' })).rejects.toMatchObject({ kind: 'RoleNotFound' });
  });

  it('reports a missing session as SessionNotFound', async () => {
    const { sessions } = manager();
    await expect(sessions.require('missing')).rejects.toMatchObject({
      kind: 'SessionNotFound',
      message: 'Session missing not found',
    });
  });

  it('persists checkpoints as user, tool and final assistant messages', async () => {
    const { sessions } = manager();
    const { sessionId } = await sessions.create();

    await sessions.persistCheckpoint(sessionId, toolRound);
    await sessions.persistCheckpoint(sessionId, finalRound);

    const messages = await sessions.messages(sessionId);
    expect(messages.map((m) => m.role)).toEqual(['user', 'tool', 'assistant']);
    expect(messages[2]?.timestamp).toBe('2026-03-10T12:00:00.000Z');
  });

  it('keeps only the newest messages past the cap', async () => {
    const { sessions } = manager(3);
    const { sessionId } = await sessions.create();

    await sessions.append(
      sessionId,
      ['m1', 'm2', 'm3', 'm4', 'm5'].map((content) => ({ role: 'user' as const, content })),
    );

    expect((await sessions.messages(sessionId)).map((m) => m.content)).toEqual(['m3', 'm4', 'm5']);
  });

  it('loads history as user and assistant text only', async () => {
    const { sessions } = manager();
    const { sessionId } = await sessions.create();
    await sessions.persistCheckpoint(sessionId, toolRound);
    await sessions.persistCheckpoint(sessionId, finalRound);

    expect(await sessions.loadHistory(sessionId, 20)).toEqual([
      { role: 'user', content: 'add 1 and 2', toolCalls: [] },
      { role: 'assistant', content: 'It is 3.', toolCalls: [] },
    ]);
    expect(await sessions.loadHistory(sessionId, 1)).toEqual([
      { role: 'assistant', content: 'It is 3.', toolCalls: [] },
    ]);
  });

  it('updates the system prompt and activity time', async () => {
    const { sessions } = manager();
    const { sessionId } = await sessions.create({ systemPrompt: 'old' });
    clock = new Date('2026-03-11T00:00:00.000Z');

    const updated = await sessions.updateSystemPrompt(sessionId, 'new');

    expect(updated.systemPrompt).toBe('new');
    expect(updated.lastActiveAt).toBe('2026-03-11T00:00:00.000Z');
  });

  it('sweeps sessions idle longer than the ttl', async () => {
    const { sessions } = manager();
    clock = new Date('2026-03-01T00:00:00.000Z');
    const stale = await sessions.create();
    clock = new Date('2026-03-07T00:00:00.000Z');
    const fresh = await sessions.create();
    clock = new Date('2026-03-10T00:00:00.000Z');

    expect(await sessions.cleanupExpired()).toBe(1);
    expect(await sessions.get(stale.sessionId)).toBeUndefined();
    expect(await sessions.get(fresh.sessionId)).toBeDefined();
  });

  it('keeps a session that an append revives while the sweep runs', async () => {
    const { sessions } = manager();
    clock = new Date('2026-03-01T00:00:00.000Z');
    const { sessionId } = await sessions.create();
    clock = new Date('2026-03-09T00:00:00.000Z');

    const [appended, removed] = await Promise.all([
      sessions.append(sessionId, [{ role: 'user', content: 'hi' }]),
      sessions.cleanupExpired(),
    ]);

    expect(appended.lastActiveAt).toBe('2026-03-09T00:00:00.000Z');
    expect(removed).toBe(0);
    expect((await sessions.messages(sessionId)).map((m) => m.content)).toEqual(['hi']);
  });

  it('serializes concurrent appends to one session', async () => {
    const sessions = new SessionManager(
      await new FileSessionStore(path.join(tmpDir, 'sessions')).init(),
      { maxMessages: 100, ttlDays: 7 },
      undefined,
      now,
    );
    const { sessionId } = await sessions.create();

    await Promise.all(
      Array.from({ length: 10 }, (_, i) => sessions.append(sessionId, [{ role: 'user', content: `m${i}` }])),
    );

    expect((await sessions.messages(sessionId)).map((m) => m.content)).toEqual(
      Array.from({ length: 10 }, (_, i) => `m${i}`),
    );
  });

  it('grows by user turns plus tool turns plus one for a streamed run', async () => {
    const { sessions } = manager();
    const { sessionId } = await sessions.create();
    const gateway = new ScriptedGateway(
      sequence(
        reply('', [toolCall('c1', 'add', { a: 1, b: 1 }), toolCall('c2', 'multiply', { a: 2, b: 2 })]),
        reply('', [toolCall('c3', 'subtract', { a: 5, b: 1 })]),
        reply('Two, four and four.'),
      ),
    );
    const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(createMathTools());
    const orchestrator = new ToolOrchestrator(gateway, registry, { chunkDelayMs: 0, modelTimeoutMs: 1_000 });

    const state = new ConversationState('sys', await sessions.loadHistory(sessionId, 20));
    state.append({ role: 'user', content: 'do some math', toolCalls: [] });
    await collect(
      orchestrator.run({
        state,
        context: { userId: 'u1', sessionId, depth: 0 },
        sessionId,
        onCheckpoint: (checkpoint) => sessions.persistCheckpoint(sessionId, checkpoint),
      }),
    );

    const messages = await sessions.messages(sessionId);
    expect(messages).toHaveLength(1 + 3 + 1);
    expect(messages.map((m) => m.toolName ?? m.role)).toEqual(['user', 'add', 'multiply', 'subtract', 'assistant']);
    expect(messages[4]?.toolCalls?.map((c) => c.result)).toEqual(['2', '4', '4']);
  });
});
