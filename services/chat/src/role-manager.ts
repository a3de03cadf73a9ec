import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ParleyError, RoleNotFoundError, logger } from '@parley/shared';
import {
  modelSettingsSchema,
  type RoleConfig,
  type RoleFilter,
  type RoleStore,
} from './role-store.js';

const log = logger.child({ module: 'role-manager' });

const SYSTEM_ROLES_FILE = new URL('../data/system-roles.json', import.meta.url);

export const roleInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500).default(''),
  systemPrompt: z.string().min(1),
  avatar: z.string().default('🤖'),
  category: z.string().min(1).default('general'),
  tags: z.array(z.string()).default([]),
  userId: z.string().optional(),
  defaultModel: z.string().optional(),
  modelConfig: modelSettingsSchema.default({}),
});

export const roleUpdateSchema = roleInputSchema.omit({ userId: true }).partial();

export type RoleInput = z.input<typeof roleInputSchema>;
export type RoleUpdate = z.infer<typeof roleUpdateSchema>;

const systemRoleSchema = roleInputSchema.omit({ userId: true }).extend({ roleId: z.string().min(1) });
export type SystemRoleSeed = z.infer<typeof systemRoleSchema>;

export async function loadSystemRoles(file: URL = SYSTEM_ROLES_FILE): Promise<SystemRoleSeed[]> {
  return z.array(systemRoleSchema).parse(JSON.parse(await readFile(file, 'utf-8')));
}

/** Persona catalog over a RoleStore. System personas are read-only. */
export class RoleManager {
  constructor(
    private readonly store: RoleStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get backend(): string {
    return this.store.backend;
  }

  /** Insert any missing system persona; existing records are left alone. */
  async seedSystemRoles(seeds: readonly SystemRoleSeed[]): Promise<number> {
    let created = 0;
    for (const seed of seeds) {
      if (await this.store.load(seed.roleId)) continue;
      const stamp = this.now().toISOString();
      await this.store.save({ ...seed, createdAt: stamp, updatedAt: stamp, isSystem: true });
      created += 1;
      log.info({ roleId: seed.roleId, name: seed.name }, 'system role seeded');
    }
    return created;
  }

  get(roleId: string): Promise<RoleConfig | undefined> {
    return this.store.load(roleId);
  }

  async require(roleId: string): Promise<RoleConfig> {
    const role = await this.store.load(roleId);
    if (!role) throw new RoleNotFoundError(roleId);
    return role;
  }

  list(filter: RoleFilter = {}): Promise<RoleConfig[]> {
    return this.store.list(filter);
  }

  search(query: string): Promise<RoleConfig[]> {
    return this.store.search(query);
  }

  async categories(): Promise<string[]> {
    const roles = await this.store.list();
    return [...new Set(roles.map((r) => r.category))].sort();
  }

  async create(input: RoleInput): Promise<RoleConfig> {
    const parsed = roleInputSchema.parse(input);
    const stamp = this.now().toISOString();
    const role: RoleConfig = {
      ...parsed,
      roleId: randomUUID(),
      createdAt: stamp,
      updatedAt: stamp,
      isSystem: false,
    };
    await this.store.save(role);
    log.info({ roleId: role.roleId, name: role.name }, 'role created');
    return role;
  }

  async update(roleId: string, patch: RoleUpdate): Promise<RoleConfig> {
    const existing = await this.require(roleId);
    if (existing.isSystem) {
      log.warn({ roleId }, 'attempt to modify a system role');
      throw new ParleyError('Conflict', `Role ${roleId} is a system role and cannot be modified`);
    }
    const updated: RoleConfig = {
      ...existing,
      name: patch.name ?? existing.name,
      description: patch.description ?? existing.description,
      systemPrompt: patch.systemPrompt ?? existing.systemPrompt,
      avatar: patch.avatar ?? existing.avatar,
      category: patch.category ?? existing.category,
      tags: patch.tags ?? existing.tags,
      defaultModel: patch.defaultModel ?? existing.defaultModel,
      modelConfig: patch.modelConfig ?? existing.modelConfig,
      updatedAt: this.now().toISOString(),
    };
    await this.store.save(updated);
    log.info({ roleId }, 'role updated');
    return updated;
  }

  async delete(roleId: string): Promise<void> {
    const existing = await this.require(roleId);
    if (existing.isSystem) {
      log.warn({ roleId }, 'attempt to delete a system role');
      throw new ParleyError('Conflict', `Role ${roleId} is a system role and cannot be deleted`);
    }
    await this.store.delete(roleId);
    log.info({ roleId }, 'role deleted');
  }
}
