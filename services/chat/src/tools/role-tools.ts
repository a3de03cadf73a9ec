import { z } from 'zod';
import {
  CancelledError,
  KeyedMutex,
  MalformedToolArgumentsError,
  RecursionLimitError,
  errorMessage,
  logger,
  preview,
  type ModelGateway,
  type ModelHandle,
  type Turn,
} from '@parley/shared';
import { ConversationState } from '../conversation.js';
import type { ToolOrchestrator } from '../orchestrator.js';
import type { RoleManager } from '../role-manager.js';
import type { RoleConfig } from '../role-store.js';
import type { SessionManager } from '../session-manager.js';
import type { ToolContext, ToolDefinition, ToolProvider } from '../tool-registry.js';
import { toParameters } from './define-tool.js';

const log = logger.child({ module: 'role-tools' });

export const ROLE_TOOL_PREFIX = 'call_role_';
const DEFAULT_USER = 'default_user';

export interface RoleContext {
  roleId: string;
  userId: string;
  sessionId: string;
  /** Latest user/assistant exchanges, oldest first */
  recentTurns: Turn[];
  /** Model that served the latest call */
  modelId: string;
  createdAt: Date;
  lastUsedAt: Date;
}

export type RoleContextInfo =
  | { roleId: string; hasContext: false }
  | {
      roleId: string;
      roleName: string;
      sessionId: string;
      messageCount: number;
      modelName: string;
      hasContext: true;
      createdAt: string;
      lastUsedAt: string;
    };

export type RoleCallResult =
  | {
      success: true;
      roleName: string;
      roleId: string;
      response: string;
      modelUsed: string;
      contextLength: number;
    }
  | { success: false; roleId: string; error: string };

export interface RoleCall {
  roleId: string;
  message: string;
  userId?: string;
  modelOverride?: string;
}

export interface RoleProxyOptions {
  enabled: boolean;
  /** Delegation depth at which persona calls are refused */
  maxDepth: number;
  /** Persisted user/assistant turns replayed into each call */
  historyWindow: number;
  /** Size of the in-memory recent-turn buffer per context */
  ringBufferSize: number;
  /** Tool timeout for a whole nested completion */
  timeoutMs: number;
}

export interface RoleProxyDeps {
  roles: RoleManager;
  sessions: SessionManager;
  gateway: ModelGateway;
  orchestrator: ToolOrchestrator;
}

const roleArgsSchema = z.object({
  message: z.string().min(1).describe('The message to send to the persona'),
  user_id: z.string().min(1).optional().describe('User whose conversation with the persona continues'),
  model_override: z.string().min(1).optional().describe('Model id to use instead of the persona default'),
});

function contextKey(userId: string, roleId: string): string {
  return `${userId}\u0000${roleId}`;
}

/**
 * Exposes personas as tools. Each call runs a nested, non-streaming
 * completion with the persona's system prompt and the (userId, roleId)
 * conversation; role tools are hidden from the nested run.
 */
export class RoleProxy {
  private readonly contexts = new Map<string, RoleContext>();
  private readonly locks = new KeyedMutex();
  private readonly parameters = toParameters(roleArgsSchema);

  constructor(
    private readonly deps: RoleProxyDeps,
    private readonly options: RoleProxyOptions,
  ) {}

  provider(): ToolProvider {
    return {
      name: 'roles',
      isEnabled: (context) => this.options.enabled && context.depth < this.options.maxDepth,
      definitions: async () => (await this.deps.roles.list()).map((role) => this.definitionFor(role)),
    };
  }

  private definitionFor(role: RoleConfig): ToolDefinition {
    const roleId = role.roleId;
    return {
      name: `${ROLE_TOOL_PREFIX}${roleId}`,
      description: `Ask the persona "${role.name}" (${role.description || role.category}). It keeps its own conversation memory per user.`,
      parameters: this.parameters,
      kind: { type: 'role_proxy', roleId },
      timeoutMs: this.options.timeoutMs,
      invoke: async (args, context) => {
        const parsed = roleArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new MalformedToolArgumentsError(
            `${ROLE_TOOL_PREFIX}${roleId}`,
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
          );
        }
        return this.call(
          { roleId, message: parsed.data.message, userId: parsed.data.user_id, modelOverride: parsed.data.model_override },
          context,
        );
      },
    };
  }

  /** Run one persona call. Failures come back as `{ success: false }`; cancellation throws. */
  async call(request: RoleCall, context: ToolContext): Promise<RoleCallResult> {
    const { roleId } = request;
    const userId = request.userId || context.userId || DEFAULT_USER;
    try {
      if (context.depth >= this.options.maxDepth) {
        throw new RecursionLimitError(context.depth + 1, this.options.maxDepth);
      }
      const role = await this.deps.roles.require(roleId);
      return await this.locks.run(contextKey(userId, roleId), () =>
        this.callLocked(role, userId, request, context),
      );
    } catch (err) {
      if (context.signal?.aborted) throw new CancelledError(`role ${roleId} call cancelled`);
      const error = errorMessage(err);
      log.warn({ roleId, userId, error }, 'role call failed');
      return { success: false, roleId, error };
    }
  }

  private async callLocked(
    role: RoleConfig,
    userId: string,
    request: RoleCall,
    context: ToolContext,
  ): Promise<RoleCallResult> {
    const roleContext = await this.contextFor(role, userId);
    const handle = this.chooseHandle(role, request.modelOverride);
    const history = await this.deps.sessions.loadHistory(roleContext.sessionId, this.options.historyWindow);

    const state = new ConversationState(role.systemPrompt, history);
    state.append({ role: 'user', content: request.message, toolCalls: [] });

    log.info(
      { roleId: role.roleId, userId, model: handle.modelId, depth: context.depth + 1, message: preview(request.message) },
      'role call started',
    );

    const result = await this.deps.orchestrator.complete({
      state,
      context: {
        userId,
        sessionId: roleContext.sessionId,
        depth: context.depth + 1,
        requestId: context.requestId,
      },
      handle,
      toolFilter: (def) => def.kind.type !== 'role_proxy',
      temperature: role.modelConfig.temperature,
      maxTokens: role.modelConfig.maxTokens,
      signal: context.signal,
    });

    const response = result.message.content;
    await this.deps.sessions.append(roleContext.sessionId, [
      { role: 'user', content: request.message },
      { role: 'assistant', content: response },
    ]);

    roleContext.recentTurns.push(
      { role: 'user', content: request.message, toolCalls: [] },
      { role: 'assistant', content: response, toolCalls: [] },
    );
    if (roleContext.recentTurns.length > this.options.ringBufferSize) {
      roleContext.recentTurns.splice(0, roleContext.recentTurns.length - this.options.ringBufferSize);
    }
    roleContext.modelId = result.modelId;
    roleContext.lastUsedAt = new Date();

    log.info({ roleId: role.roleId, userId, rounds: result.rounds, response: preview(response) }, 'role call complete');

    return {
      success: true,
      roleName: role.name,
      roleId: role.roleId,
      response,
      modelUsed: result.modelId,
      contextLength: roleContext.recentTurns.length,
    };
  }

  private async contextFor(role: RoleConfig, userId: string): Promise<RoleContext> {
    const key = contextKey(userId, role.roleId);
    const existing = this.contexts.get(key);
    if (existing) {
      // the idle sweep may have removed the bound session; the context outlives it
      if (!(await this.deps.sessions.get(existing.sessionId))) {
        const previous = existing.sessionId;
        existing.sessionId = await this.openSession(role, userId);
        log.warn(
          { roleId: role.roleId, userId, previous, sessionId: existing.sessionId },
          'role context session was gone, bound a fresh one',
        );
      }
      return existing;
    }

    const sessionId = await this.openSession(role, userId);
    const now = new Date();
    const created: RoleContext = {
      roleId: role.roleId,
      userId,
      sessionId,
      recentTurns: [],
      modelId: this.chooseHandle(role).modelId,
      createdAt: now,
      lastUsedAt: now,
    };
    this.contexts.set(key, created);
    log.info({ roleId: role.roleId, userId, sessionId }, 'role context created');
    return created;
  }

  private async openSession(role: RoleConfig, userId: string): Promise<string> {
    const session = await this.deps.sessions.create({
      systemPrompt: role.systemPrompt,
      userInfo: { roleId: role.roleId, roleName: role.name, userId },
    });
    return session.sessionId;
  }

  /** Override when it differs from the persona model and is available, then the persona model, then the default. */
  chooseHandle(role: RoleConfig, modelOverride?: string): ModelHandle {
    const { gateway } = this.deps;
    if (modelOverride && modelOverride !== role.defaultModel && gateway.isAvailable(modelOverride)) {
      return gateway.resolveHandle(modelOverride);
    }
    if (role.defaultModel && gateway.isAvailable(role.defaultModel)) {
      return gateway.resolveHandle(role.defaultModel);
    }
    return gateway.resolveHandle();
  }

  async getContextInfo(roleId: string, userId: string = DEFAULT_USER): Promise<RoleContextInfo> {
    const context = this.contexts.get(contextKey(userId, roleId));
    if (!context) return { roleId, hasContext: false };
    const role = await this.deps.roles.get(roleId);
    return {
      roleId,
      roleName: role?.name ?? 'unknown',
      sessionId: context.sessionId,
      messageCount: context.recentTurns.length,
      modelName: context.modelId,
      hasContext: true,
      createdAt: context.createdAt.toISOString(),
      lastUsedAt: context.lastUsedAt.toISOString(),
    };
  }

  async listContexts(userId: string = DEFAULT_USER): Promise<RoleContextInfo[]> {
    const roleIds = [...this.contexts.values()].filter((c) => c.userId === userId).map((c) => c.roleId);
    return Promise.all(roleIds.map((roleId) => this.getContextInfo(roleId, userId)));
  }

  /** Drop the context and its session. False when there was none. */
  clearContext(roleId: string, userId: string = DEFAULT_USER): Promise<boolean> {
    const key = contextKey(userId, roleId);
    return this.locks.run(key, async () => {
      const context = this.contexts.get(key);
      if (!context) return false;
      await this.deps.sessions.delete(context.sessionId);
      this.contexts.delete(key);
      log.info({ roleId, userId }, 'role context cleared');
      return true;
    });
  }
}
