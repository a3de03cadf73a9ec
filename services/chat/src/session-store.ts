import type Database from 'better-sqlite3';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage, logger } from '@parley/shared';

const log = logger.child({ module: 'session-store' });

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export const storedToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
  result: z.string(),
});

export const sessionMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  timestamp: z.string(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
  toolArgs: z.record(z.unknown()).optional(),
  toolCalls: z.array(storedToolCallSchema).optional(),
});

export const sessionSchema = z.object({
  sessionId: z.string(),
  createdAt: z.string(),
  lastActiveAt: z.string(),
  systemPrompt: z.string(),
  messages: z.array(sessionMessageSchema),
  userInfo: z.record(z.unknown()),
});

export type StoredToolCall = z.infer<typeof storedToolCallSchema>;
export type SessionMessage = z.infer<typeof sessionMessageSchema>;
export type Session = z.infer<typeof sessionSchema>;

export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  lastActiveAt: string;
  messageCount: number;
  systemPrompt: string;
}

/** Persistence contract shared by every session backend. */
export interface SessionStore {
  readonly backend: string;
  save(session: Session): Promise<void>;
  load(sessionId: string): Promise<Session | undefined>;
  delete(sessionId: string): Promise<boolean>;
  /** Most recently active first */
  list(limit: number): Promise<SessionSummary[]>;
  /** Ids of sessions idle since before `cutoff`, oldest first */
  listExpired(cutoff: Date): Promise<string[]>;
  /**
   * Delete sessions idle since before `cutoff` (only `sessionId` when given);
   * returns how many went. The idle check and the delete happen together.
   */
  cleanupExpired(cutoff: Date, sessionId?: string): Promise<number>;
  count(): Promise<number>;
}

const SUMMARY_PROMPT_LENGTH = 100;

export function summarizePrompt(prompt: string): string {
  return prompt.length > SUMMARY_PROMPT_LENGTH ? `${prompt.slice(0, SUMMARY_PROMPT_LENGTH)}...` : prompt;
}

function toSummary(session: Session): SessionSummary {
  return {
    sessionId: session.sessionId,
    createdAt: session.createdAt,
    lastActiveAt: session.lastActiveAt,
    messageCount: session.messages.length,
    systemPrompt: summarizePrompt(session.systemPrompt),
  };
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

const sessionRowSchema = z.object({
  session_id: z.string(),
  created_at: z.string(),
  last_active_at: z.string(),
  system_prompt: z.string(),
  user_info: z.string(),
  messages: z.string(),
});

const countRowSchema = z.object({ n: z.number() });
const idRowSchema = z.object({ session_id: z.string() });

function fromRow(raw: unknown): Session {
  const row = sessionRowSchema.parse(raw);
  return sessionSchema.parse({
    sessionId: row.session_id,
    createdAt: row.created_at,
    lastActiveAt: row.last_active_at,
    systemPrompt: row.system_prompt,
    userInfo: JSON.parse(row.user_info),
    messages: JSON.parse(row.messages),
  });
}

export class SqliteSessionStore implements SessionStore {
  readonly backend = 'sqlite';

  constructor(private readonly db: Database.Database) {}

  async save(session: Session): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO sessions (session_id, created_at, last_active_at, system_prompt, user_info, messages)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET
           last_active_at = excluded.last_active_at,
           system_prompt  = excluded.system_prompt,
           user_info      = excluded.user_info,
           messages       = excluded.messages`,
      )
      .run(
        session.sessionId,
        session.createdAt,
        session.lastActiveAt,
        session.systemPrompt,
        JSON.stringify(session.userInfo),
        JSON.stringify(session.messages),
      );
  }

  async load(sessionId: string): Promise<Session | undefined> {
    const row: unknown = this.db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId);
    return row === undefined ? undefined : fromRow(row);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId).changes > 0;
  }

  async list(limit: number): Promise<SessionSummary[]> {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM sessions ORDER BY last_active_at DESC LIMIT ?')
      .all(limit);
    return rows.map((row) => toSummary(fromRow(row)));
  }

  async listExpired(cutoff: Date): Promise<string[]> {
    const rows: unknown[] = this.db
      .prepare('SELECT session_id FROM sessions WHERE last_active_at < ? ORDER BY last_active_at')
      .all(cutoff.toISOString());
    return rows.map((row) => idRowSchema.parse(row).session_id);
  }

  async cleanupExpired(cutoff: Date, sessionId?: string): Promise<number> {
    if (sessionId === undefined) {
      return this.db.prepare('DELETE FROM sessions WHERE last_active_at < ?').run(cutoff.toISOString()).changes;
    }
    return this.db
      .prepare('DELETE FROM sessions WHERE session_id = ? AND last_active_at < ?')
      .run(sessionId, cutoff.toISOString()).changes;
  }

  async count(): Promise<number> {
    return countRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS n FROM sessions').get()).n;
  }
}

// ---------------------------------------------------------------------------
// File: one JSON document per session
// ---------------------------------------------------------------------------

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export class FileSessionStore implements SessionStore {
  readonly backend = 'file';

  constructor(private readonly directory: string) {}

  async init(): Promise<this> {
    await mkdir(this.directory, { recursive: true });
    log.info({ directory: this.directory }, 'file session store ready');
    return this;
  }

  private fileFor(sessionId: string): string | undefined {
    return SAFE_ID.test(sessionId) ? path.join(this.directory, `${sessionId}.json`) : undefined;
  }

  async save(session: Session): Promise<void> {
    const file = this.fileFor(session.sessionId);
    if (!file) throw new Error(`invalid session id '${session.sessionId}'`);
    await writeFile(file, JSON.stringify(session, null, 2), 'utf-8');
  }

  async load(sessionId: string): Promise<Session | undefined> {
    const file = this.fileFor(sessionId);
    if (!file) return undefined;
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
    return sessionSchema.parse(JSON.parse(raw));
  }

  async delete(sessionId: string): Promise<boolean> {
    const file = this.fileFor(sessionId);
    if (!file || !(await this.load(sessionId))) return false;
    await rm(file, { force: true });
    return true;
  }

  private async readAll(): Promise<Session[]> {
    const entries = await readdir(this.directory);
    const sessions: Session[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      try {
        sessions.push(sessionSchema.parse(JSON.parse(await readFile(path.join(this.directory, entry), 'utf-8'))));
      } catch (err) {
        log.error({ file: entry, error: errorMessage(err) }, 'unreadable session file skipped');
      }
    }
    return sessions;
  }

  async list(limit: number): Promise<SessionSummary[]> {
    const sessions = await this.readAll();
    sessions.sort((a, b) => b.lastActiveAt.localeCompare(a.lastActiveAt));
    return sessions.slice(0, limit).map(toSummary);
  }

  async listExpired(cutoff: Date): Promise<string[]> {
    const threshold = cutoff.toISOString();
    return (await this.readAll())
      .filter((session) => session.lastActiveAt < threshold)
      .sort((a, b) => a.lastActiveAt.localeCompare(b.lastActiveAt))
      .map((session) => session.sessionId);
  }

  async cleanupExpired(cutoff: Date, sessionId?: string): Promise<number> {
    const threshold = cutoff.toISOString();
    const candidates = sessionId === undefined ? await this.readAll() : [await this.load(sessionId)];
    let removed = 0;
    for (const session of candidates) {
      if (session && session.lastActiveAt < threshold && (await this.delete(session.sessionId))) removed += 1;
    }
    return removed;
  }

  async count(): Promise<number> {
    return (await this.readAll()).length;
  }
}
