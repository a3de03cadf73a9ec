import {
  CancelledError,
  ToolExecutionError,
  ToolNotFoundError,
  logger,
  preview,
  withSpan,
  withTimeout,
  type JsonSchemaObject,
  type ParleyError,
  type ToolSpec,
} from '@parley/shared';

const log = logger.child({ module: 'tool-registry' });

/** Per-call context handed to every tool invocation. */
export interface ToolContext {
  userId: string;
  sessionId?: string;
  /** Role delegation depth: 0 for a top-level run, +1 per nested persona call */
  depth: number;
  requestId?: string;
  signal?: AbortSignal;
}

export type ToolKind =
  | { type: 'builtin'; provider: string }
  | { type: 'role_proxy'; roleId: string };

export interface ToolDefinition {
  /** Globally unique within a registry */
  name: string;
  description: string;
  parameters: JsonSchemaObject;
  kind: ToolKind;
  /** Overrides the registry-wide timeout (nested model calls need longer) */
  timeoutMs?: number;
  invoke(args: Record<string, unknown>, context: ToolContext): Promise<unknown>;
}

export interface ToolProvider {
  readonly name: string;
  isEnabled(context: ToolContext): boolean;
  definitions(context: ToolContext): Promise<readonly ToolDefinition[]>;
}

export type ToolOutcome =
  | { ok: true; output: unknown }
  | { ok: false; error: ParleyError };

export interface ToolRegistryOptions {
  timeoutMs: number;
}

export function toToolSpec(def: ToolDefinition): ToolSpec {
  return { name: def.name, description: def.description, parameters: def.parameters };
}

/**
 * Composes tool providers into one name -> tool catalog. The catalog is
 * recomputed on every call so providers backed by live data (personas) stay
 * current.
 */
export class ToolRegistry {
  private readonly providers: ToolProvider[] = [];

  constructor(private readonly options: ToolRegistryOptions) {}

  register(provider: ToolProvider): this {
    this.providers.push(provider);
    log.info({ provider: provider.name }, 'tool provider registered');
    return this;
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  async list(context: ToolContext): Promise<ToolDefinition[]> {
    const byName = new Map<string, ToolDefinition>();
    for (const provider of this.providers) {
      if (!provider.isEnabled(context)) continue;
      for (const def of await provider.definitions(context)) {
        const existing = byName.get(def.name);
        if (existing) {
          log.warn(
            { tool: def.name, kept: existing.kind, dropped: def.kind },
            'duplicate tool name, keeping the first registration',
          );
          continue;
        }
        byName.set(def.name, def);
      }
    }
    return [...byName.values()];
  }

  async resolve(name: string, context: ToolContext): Promise<ToolDefinition | undefined> {
    return (await this.list(context)).find((def) => def.name === name);
  }

  /**
   * Run a tool. Unknown names and failures (including timeouts and malformed
   * arguments) come back as `{ ok: false }`; only cancellation throws.
   */
  async execute(name: string, args: Record<string, unknown>, context: ToolContext): Promise<ToolOutcome> {
    const def = await this.resolve(name, context);
    if (!def) {
      log.warn({ tool: name }, 'model requested unknown tool');
      return { ok: false, error: new ToolNotFoundError(name) };
    }
    return this.invoke(def, args, context);
  }

  /** Run an already resolved definition under the tool timeout and a span. */
  async invoke(def: ToolDefinition, args: Record<string, unknown>, context: ToolContext): Promise<ToolOutcome> {
    const name = def.name;
    const timeoutMs = def.timeoutMs ?? this.options.timeoutMs;
    const start = Date.now();
    try {
      const output = await withSpan(`tool.${name}`, { 'tool.name': name, 'tool.kind': def.kind.type }, () =>
        withTimeout(`tool ${name}`, timeoutMs, (signal) => def.invoke(args, { ...context, signal }), context.signal),
      );
      log.info({ tool: name, durationMs: Date.now() - start }, 'tool executed');
      return { ok: true, output };
    } catch (err) {
      if (context.signal?.aborted) throw new CancelledError(`tool ${name} cancelled`);
      const error = new ToolExecutionError(name, err);
      log.warn({ tool: name, durationMs: Date.now() - start, error: preview(error.message) }, 'tool failed');
      return { ok: false, error };
    }
  }
}
