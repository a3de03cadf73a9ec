import type Database from 'better-sqlite3';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage, logger } from '@parley/shared';

const log = logger.child({ module: 'role-store' });

export const modelSettingsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  topP: z.number().min(0).max(1).optional(),
});

export const roleConfigSchema = z.object({
  roleId: z.string(),
  name: z.string(),
  description: z.string(),
  systemPrompt: z.string(),
  avatar: z.string(),
  category: z.string(),
  tags: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
  isSystem: z.boolean(),
  userId: z.string().optional(),
  defaultModel: z.string().optional(),
  modelConfig: modelSettingsSchema,
});

export type ModelSettings = z.infer<typeof modelSettingsSchema>;
export type RoleConfig = z.infer<typeof roleConfigSchema>;

export interface RoleFilter {
  category?: string;
  userId?: string;
}

/** Persistence contract shared by every persona backend. */
export interface RoleStore {
  readonly backend: string;
  save(role: RoleConfig): Promise<void>;
  load(roleId: string): Promise<RoleConfig | undefined>;
  delete(roleId: string): Promise<boolean>;
  /** Most recently updated first */
  list(filter?: RoleFilter): Promise<RoleConfig[]>;
  /** Case-insensitive match on name, description or any tag */
  search(query: string): Promise<RoleConfig[]>;
}

export function matchesQuery(role: RoleConfig, query: string): boolean {
  const q = query.toLowerCase();
  return (
    role.name.toLowerCase().includes(q) ||
    role.description.toLowerCase().includes(q) ||
    role.tags.some((tag) => tag.toLowerCase().includes(q))
  );
}

function byUpdatedDesc(a: RoleConfig, b: RoleConfig): number {
  return b.updatedAt.localeCompare(a.updatedAt);
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

const roleRowSchema = z.object({ data: z.string() });

function fromRow(raw: unknown): RoleConfig {
  return roleConfigSchema.parse(JSON.parse(roleRowSchema.parse(raw).data));
}

export class SqliteRoleStore implements RoleStore {
  readonly backend = 'sqlite';

  constructor(private readonly db: Database.Database) {}

  async save(role: RoleConfig): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO roles (role_id, category, user_id, is_system, updated_at, data)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(role_id) DO UPDATE SET
           category   = excluded.category,
           user_id    = excluded.user_id,
           is_system  = excluded.is_system,
           updated_at = excluded.updated_at,
           data       = excluded.data`,
      )
      .run(role.roleId, role.category, role.userId ?? null, role.isSystem ? 1 : 0, role.updatedAt, JSON.stringify(role));
  }

  async load(roleId: string): Promise<RoleConfig | undefined> {
    const row: unknown = this.db.prepare('SELECT data FROM roles WHERE role_id = ?').get(roleId);
    return row === undefined ? undefined : fromRow(row);
  }

  async delete(roleId: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM roles WHERE role_id = ?').run(roleId).changes > 0;
  }

  async list(filter: RoleFilter = {}): Promise<RoleConfig[]> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.category) {
      clauses.push('category = ?');
      params.push(filter.category);
    }
    if (filter.userId) {
      clauses.push('user_id = ?');
      params.push(filter.userId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows: unknown[] = this.db
      .prepare(`SELECT data FROM roles ${where} ORDER BY updated_at DESC`)
      .all(...params);
    return rows.map(fromRow);
  }

  async search(query: string): Promise<RoleConfig[]> {
    return (await this.list()).filter((role) => matchesQuery(role, query));
  }
}

// ---------------------------------------------------------------------------
// File: one JSON document per persona
// ---------------------------------------------------------------------------

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export class FileRoleStore implements RoleStore {
  readonly backend = 'file';

  constructor(private readonly directory: string) {}

  async init(): Promise<this> {
    await mkdir(this.directory, { recursive: true });
    log.info({ directory: this.directory }, 'file role store ready');
    return this;
  }

  private fileFor(roleId: string): string | undefined {
    return SAFE_ID.test(roleId) ? path.join(this.directory, `${roleId}.json`) : undefined;
  }

  async save(role: RoleConfig): Promise<void> {
    const file = this.fileFor(role.roleId);
    if (!file) throw new Error(`invalid role id '${role.roleId}'`);
    await writeFile(file, JSON.stringify(role, null, 2), 'utf-8');
  }

  async load(roleId: string): Promise<RoleConfig | undefined> {
    const file = this.fileFor(roleId);
    if (!file) return undefined;
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
    return roleConfigSchema.parse(JSON.parse(raw));
  }

  async delete(roleId: string): Promise<boolean> {
    const file = this.fileFor(roleId);
    if (!file || !(await this.load(roleId))) return false;
    await rm(file, { force: true });
    return true;
  }

  async list(filter: RoleFilter = {}): Promise<RoleConfig[]> {
    const roles: RoleConfig[] = [];
    for (const entry of await readdir(this.directory)) {
      if (!entry.endsWith('.json')) continue;
      try {
        roles.push(roleConfigSchema.parse(JSON.parse(await readFile(path.join(this.directory, entry), 'utf-8'))));
      } catch (err) {
        log.error({ file: entry, error: errorMessage(err) }, 'unreadable role file skipped');
      }
    }
    return roles
      .filter((role) => !filter.category || role.category === filter.category)
      .filter((role) => !filter.userId || role.userId === filter.userId)
      .sort(byUpdatedDesc);
  }

  async search(query: string): Promise<RoleConfig[]> {
    return (await this.list()).filter((role) => matchesQuery(role, query));
  }
}
