import { randomUUID } from 'node:crypto';
import {
  KeyedMutex,
  SessionNotFoundError,
  errorMessage,
  logger,
  type Turn,
} from '@parley/shared';
import type { Checkpoint, ToolCallRecord } from './orchestrator.js';
import type { RoleManager } from './role-manager.js';
import type { Session, SessionMessage, SessionStore, SessionSummary } from './session-store.js';

const log = logger.child({ module: 'session-manager' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionManagerOptions {
  /** Oldest messages are dropped beyond this */
  maxMessages: number;
  ttlDays: number;
}

export interface CreateSessionInput {
  systemPrompt?: string;
  /** Seeds the system prompt and userInfo from a persona */
  roleId?: string;
  userInfo?: Record<string, unknown>;
}

export type NewSessionMessage = Omit<SessionMessage, 'timestamp'>;

/** Session messages one checkpoint contributes; see the persistence rules on `persistCheckpoint`. */
export function checkpointMessages(checkpoint: Checkpoint): NewSessionMessage[] {
  const byId = new Map<string, ToolCallRecord>(checkpoint.toolCalls.map((call) => [call.id, call]));
  const last = checkpoint.turns[checkpoint.turns.length - 1];
  const messages: NewSessionMessage[] = [];

  for (const turn of checkpoint.turns) {
    if (turn.role === 'user') {
      messages.push({ role: 'user', content: turn.content });
    } else if (turn.role === 'tool') {
      const call = turn.toolCallId ? byId.get(turn.toolCallId) : undefined;
      messages.push({
        role: 'tool',
        content: turn.content,
        toolCallId: turn.toolCallId,
        toolName: turn.name ?? call?.name,
        toolArgs: call?.arguments,
      });
    } else if (checkpoint.final && turn === last && turn.role === 'assistant') {
      const toolCalls = checkpoint.toolCalls.map(({ id, name, arguments: args, result }) => ({
        id,
        name,
        arguments: args,
        result,
      }));
      messages.push({ role: 'assistant', content: turn.content, ...(toolCalls.length > 0 ? { toolCalls } : {}) });
    }
  }
  return messages;
}

/**
 * Session lifecycle over a SessionStore. Reads and writes for one session id
 * are serialized; different sessions proceed concurrently.
 */
export class SessionManager {
  private readonly locks = new KeyedMutex();
  private sweeper: NodeJS.Timeout | undefined;

  constructor(
    private readonly store: SessionStore,
    private readonly options: SessionManagerOptions,
    private readonly roles?: RoleManager,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get backend(): string {
    return this.store.backend;
  }

  async create(input: CreateSessionInput = {}): Promise<Session> {
    let systemPrompt = input.systemPrompt ?? '';
    let userInfo: Record<string, unknown> = { ...input.userInfo };

    if (input.roleId && this.roles) {
      const role = await this.roles.require(input.roleId);
      systemPrompt = role.systemPrompt;
      userInfo = { ...userInfo, roleId: role.roleId, roleName: role.name };
    }

    const stamp = this.now().toISOString();
    const session: Session = {
      sessionId: randomUUID(),
      createdAt: stamp,
      lastActiveAt: stamp,
      systemPrompt,
      messages: [],
      userInfo,
    };
    await this.store.save(session);
    log.info({ sessionId: session.sessionId, roleId: input.roleId }, 'session created');
    return session;
  }

  get(sessionId: string): Promise<Session | undefined> {
    return this.store.load(sessionId);
  }

  async require(sessionId: string): Promise<Session> {
    const session = await this.store.load(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  list(limit = 50): Promise<SessionSummary[]> {
    return this.store.list(limit);
  }

  count(): Promise<number> {
    return this.store.count();
  }

  async messages(sessionId: string, limit?: number): Promise<SessionMessage[]> {
    const { messages } = await this.require(sessionId);
    return limit ? messages.slice(-limit) : messages;
  }

  /** The last `limit` user/assistant text messages as turns for a new run. */
  async loadHistory(sessionId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const { messages } = await this.require(sessionId);
    return messages
      .filter((m) => (m.role === 'user' || m.role === 'assistant') && m.content !== '')
      .slice(-limit)
      .map((m) => ({ role: m.role, content: m.content, toolCalls: [] }));
  }

  updateSystemPrompt(sessionId: string, systemPrompt: string): Promise<Session> {
    return this.locks.run(sessionId, async () => {
      const session = await this.require(sessionId);
      const updated = { ...session, systemPrompt, lastActiveAt: this.now().toISOString() };
      await this.store.save(updated);
      log.info({ sessionId }, 'session system prompt updated');
      return updated;
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    const removed = await this.locks.run(sessionId, () => this.store.delete(sessionId));
    if (removed) log.info({ sessionId }, 'session deleted');
    return removed;
  }

  append(sessionId: string, additions: readonly NewSessionMessage[]): Promise<Session> {
    return this.locks.run(sessionId, async () => {
      const session = await this.require(sessionId);
      const timestamp = this.now().toISOString();
      let messages = [...session.messages, ...additions.map((m) => ({ ...m, timestamp }))];
      if (messages.length > this.options.maxMessages) {
        messages = messages.slice(-this.options.maxMessages);
        log.info({ sessionId, kept: this.options.maxMessages }, 'session message cap reached, oldest dropped');
      }
      const updated = { ...session, messages, lastActiveAt: timestamp };
      await this.store.save(updated);
      log.debug({ sessionId, added: additions.length }, 'session messages appended');
      return updated;
    });
  }

  /**
   * Persist one orchestrator checkpoint: user turns, every tool turn with its
   * name and arguments, and the final assistant turn with the run's tool
   * calls. Assistant turns that only request tools are not stored.
   */
  async persistCheckpoint(sessionId: string, checkpoint: Checkpoint): Promise<void> {
    const messages = checkpointMessages(checkpoint);
    if (messages.length === 0) return;
    await this.append(sessionId, messages);
  }

  async cleanupExpired(ttlDays: number = this.options.ttlDays): Promise<number> {
    const cutoff = new Date(this.now().getTime() - ttlDays * DAY_MS);
    let removed = 0;
    // idleness is re-checked under the session lock
    for (const sessionId of await this.store.listExpired(cutoff)) {
      removed += await this.locks.run(sessionId, () => this.store.cleanupExpired(cutoff, sessionId));
    }
    if (removed > 0) log.info({ removed, ttlDays }, 'expired sessions removed');
    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => {
      this.cleanupExpired().catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, 'session sweep failed');
      });
    }, intervalMs);
    this.sweeper.unref();
    log.info({ intervalMs, ttlDays: this.options.ttlDays }, 'session sweeper started');
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }
}
