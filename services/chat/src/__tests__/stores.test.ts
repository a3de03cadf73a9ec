import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { closeDb, getDb } from '../db.js';
import { FileRoleStore, SqliteRoleStore, type RoleConfig, type RoleStore } from '../role-store.js';
import { FileSessionStore, SqliteSessionStore, type Session, type SessionStore } from '../session-store.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(tmpdir(), 'parley-store-'));
});

afterEach(async () => {
  closeDb();
  await rm(tmpDir, { recursive: true, force: true });
});

function makeSession(sessionId: string, lastActiveAt: string, overrides: Partial<Session> = {}): Session {
  return {
    sessionId,
    createdAt: '2026-01-01T00:00:00.000Z',
    lastActiveAt,
    systemPrompt: 'You are terse.',
    messages: [],
    userInfo: {},
    ...overrides,
  };
}

function makeRole(roleId: string, updatedAt: string, overrides: Partial<RoleConfig> = {}): RoleConfig {
  return {
    roleId,
    name: `Role ${roleId}`,
    description: 'A test persona',
    systemPrompt: 'Stay in character.',
    avatar: '🤖',
    category: 'general',
    tags: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt,
    isSystem: false,
    modelConfig: {},
    ...overrides,
  };
}

const sessionBackends: [string, () => Promise<SessionStore>][] = [
  ['sqlite', async () => new SqliteSessionStore(getDb(tmpDir))],
  ['file', async () => new FileSessionStore(path.join(tmpDir, 'sessions')).init()],
];

describe.each(sessionBackends)('%s session store', (_name, open) => {
  it('saves and loads a session with its messages', async () => {
    const store = await open();
    const session = makeSession('s1', '2026-03-01T10:00:00.000Z', {
      userInfo: { roleId: 'teacher' },
      messages: [
        { role: 'user', content: 'hi', timestamp: '2026-03-01T10:00:00.000Z' },
        {
          role: 'tool',
          content: '3',
          timestamp: '2026-03-01T10:00:01.000Z',
          toolCallId: 'c1',
          toolName: 'add',
          toolArgs: { a: 1, b: 2 },
        },
      ],
    });

    await store.save(session);

    expect(await store.load('s1')).toEqual(session);
    expect(await store.load('missing')).toBeUndefined();
  });

  it('overwrites on save', async () => {
    const store = await open();
    await store.save(makeSession('s1', '2026-03-01T10:00:00.000Z'));
    await store.save(makeSession('s1', '2026-03-02T10:00:00.000Z', { systemPrompt: 'changed' }));

    expect((await store.load('s1'))?.systemPrompt).toBe('changed');
    expect(await store.count()).toBe(1);
  });

  it('lists most recent first with truncated prompts', async () => {
    const store = await open();
    await store.save(makeSession('old', '2026-03-01T00:00:00.000Z'));
    await store.save(makeSession('new', '2026-03-03T00:00:00.000Z', { systemPrompt: 'x'.repeat(120) }));
    await store.save(makeSession('mid', '2026-03-02T00:00:00.000Z'));

    const summaries = await store.list(2);

    expect(summaries.map((s) => s.sessionId)).toEqual(['new', 'mid']);
    expect(summaries[0]?.systemPrompt).toBe(`${'x'.repeat(100)}...`);
    expect(summaries[1]).toEqual({
      sessionId: 'mid',
      createdAt: '2026-01-01T00:00:00.000Z',
      lastActiveAt: '2026-03-02T00:00:00.000Z',
      messageCount: 0,
      systemPrompt: 'You are terse.',
    });
  });

  it('deletes and reports whether anything was removed', async () => {
    const store = await open();
    await store.save(makeSession('s1', '2026-03-01T00:00:00.000Z'));

    expect(await store.delete('s1')).toBe(true);
    expect(await store.delete('s1')).toBe(false);
    expect(await store.count()).toBe(0);
  });

  it('removes sessions idle since before the cutoff', async () => {
    const store = await open();
    await store.save(makeSession('stale', '2026-01-01T00:00:00.000Z'));
    await store.save(makeSession('fresh', '2026-03-01T00:00:00.000Z'));

    expect(await store.cleanupExpired(new Date('2026-02-01T00:00:00.000Z'))).toBe(1);
    expect(await store.load('stale')).toBeUndefined();
    expect(await store.load('fresh')).toBeDefined();
  });

  it('lists idle sessions and removes one only while it is still idle', async () => {
    const store = await open();
    await store.save(makeSession('older', '2026-01-01T00:00:00.000Z'));
    await store.save(makeSession('old', '2026-01-15T00:00:00.000Z'));
    await store.save(makeSession('fresh', '2026-03-01T00:00:00.000Z'));
    const cutoff = new Date('2026-02-01T00:00:00.000Z');

    expect(await store.listExpired(cutoff)).toEqual(['older', 'old']);

    await store.save(makeSession('old', '2026-03-02T00:00:00.000Z'));
    expect(await store.cleanupExpired(cutoff, 'old')).toBe(0);
    expect(await store.cleanupExpired(cutoff, 'older')).toBe(1);
    expect(await store.cleanupExpired(cutoff, 'missing')).toBe(0);
    expect(await store.load('old')).toBeDefined();
    expect(await store.count()).toBe(2);
  });
});

describe('file session store', () => {
  it('refuses ids that are not plain file names', async () => {
    const store = await new FileSessionStore(path.join(tmpDir, 'sessions')).init();

    expect(await store.load('../escape')).toBeUndefined();
    await expect(store.save(makeSession('../escape', '2026-03-01T00:00:00.000Z'))).rejects.toThrow(
      "invalid session id '../escape'",
    );
  });
});

const roleBackends: [string, () => Promise<RoleStore>][] = [
  ['sqlite', async () => new SqliteRoleStore(getDb(tmpDir))],
  ['file', async () => new FileRoleStore(path.join(tmpDir, 'roles')).init()],
];

describe.each(roleBackends)('%s role store', (_name, open) => {
  it('saves, loads and deletes', async () => {
    const store = await open();
    const role = makeRole('r1', '2026-03-01T00:00:00.000Z', { userId: 'u1', defaultModel: 'gpt-4o', modelConfig: { temperature: 0.2 } });

    await store.save(role);

    expect(await store.load('r1')).toEqual(role);
    expect(await store.delete('r1')).toBe(true);
    expect(await store.load('r1')).toBeUndefined();
  });

  it('lists by most recent update with optional filters', async () => {
    const store = await open();
    await store.save(makeRole('a', '2026-03-01T00:00:00.000Z', { category: 'fun', userId: 'u1' }));
    await store.save(makeRole('b', '2026-03-03T00:00:00.000Z', { category: 'work', userId: 'u1' }));
    await store.save(makeRole('c', '2026-03-02T00:00:00.000Z', { category: 'fun', userId: 'u2' }));

    expect((await store.list()).map((r) => r.roleId)).toEqual(['b', 'c', 'a']);
    expect((await store.list({ category: 'fun' })).map((r) => r.roleId)).toEqual(['c', 'a']);
    expect((await store.list({ userId: 'u1' })).map((r) => r.roleId)).toEqual(['b', 'a']);
    expect((await store.list({ category: 'fun', userId: 'u2' })).map((r) => r.roleId)).toEqual(['c']);
  });

  it('searches name, description and tags without case', async () => {
    const store = await open();
    await store.save(makeRole('chef', '2026-03-01T00:00:00.000Z', { name: 'Chef', tags: [] }));
    await store.save(makeRole('poet', '2026-03-02T00:00:00.000Z', { name: 'Poet', tags: ['Writing'] }));
    await store.save(makeRole('coder', '2026-03-03T00:00:00.000Z', { name: 'Coder', description: 'writes code' }));

    expect((await store.search('WRIT')).map((r) => r.roleId)).toEqual(['coder', 'poet']);
    expect((await store.search('chef')).map((r) => r.roleId)).toEqual(['chef']);
    expect(await store.search('nothing')).toEqual([]);
  });
});
