import { describe, it, expect } from 'vitest';
import { ToolRegistry, type ToolContext, type ToolDefinition, type ToolProvider } from '../tool-registry.js';
import { staticProvider } from '../tools/define-tool.js';

function tool(name: string, provider: string, invoke: ToolDefinition['invoke'] = async () => name): ToolDefinition {
  return {
    name,
    description: `${name} from ${provider}`,
    parameters: { type: 'object', properties: {} },
    kind: { type: 'builtin', provider },
    invoke,
  };
}

const context: ToolContext = { userId: 'user-1', depth: 0 };

describe('ToolRegistry', () => {
  it('keeps the first registration when names clash', async () => {
    const registry = new ToolRegistry({ timeoutMs: 1_000 })
      .register(staticProvider('first', [tool('echo', 'first'), tool('only_first', 'first')]))
      .register(staticProvider('second', [tool('echo', 'second')]));

    const defs = await registry.list(context);

    expect(defs.map((d) => d.name)).toEqual(['echo', 'only_first']);
    expect(defs[0]?.kind).toEqual({ type: 'builtin', provider: 'first' });
    expect(registry.providerNames).toEqual(['first', 'second']);
  });

  it('skips disabled providers', async () => {
    const registry = new ToolRegistry({ timeoutMs: 1_000 })
      .register(staticProvider('on', [tool('a', 'on')]))
      .register(staticProvider('off', [tool('b', 'off')], () => false));

    expect((await registry.list(context)).map((d) => d.name)).toEqual(['a']);
    expect(await registry.resolve('b', context)).toBeUndefined();
  });

  it('recomputes the catalog on every call', async () => {
    const names = ['one'];
    const live: ToolProvider = {
      name: 'live',
      isEnabled: () => true,
      definitions: async () => names.map((n) => tool(n, 'live')),
    };
    const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(live);

    expect((await registry.list(context)).map((d) => d.name)).toEqual(['one']);
    names.push('two');
    expect((await registry.list(context)).map((d) => d.name)).toEqual(['one', 'two']);
  });

  it('passes the depth-aware context to providers', async () => {
    const shallow: ToolProvider = {
      name: 'shallow',
      isEnabled: (ctx) => ctx.depth === 0,
      definitions: async () => [tool('top_only', 'shallow')],
    };
    const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(shallow);

    expect(await registry.list({ ...context, depth: 1 })).toEqual([]);
  });

  describe('execute', () => {
    it('returns the output of a successful call', async () => {
      const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(
        staticProvider('p', [tool('sum', 'p', async (args) => Number(args.a) + Number(args.b))]),
      );

      expect(await registry.execute('sum', { a: 2, b: 5 }, context)).toEqual({ ok: true, output: 7 });
    });

    it('reports an unknown tool', async () => {
      const outcome = await new ToolRegistry({ timeoutMs: 1_000 }).execute('nope', {}, context);

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe('ToolNotFound');
        expect(outcome.error.message).toBe('Tool nope not found');
      }
    });

    it('wraps a failure as ToolExecutionFailed', async () => {
      const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(
        staticProvider('p', [
          tool('fail', 'p', async () => {
            throw new Error('disk full');
          }),
        ]),
      );

      const outcome = await registry.execute('fail', {}, context);

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe('ToolExecutionFailed');
        expect(outcome.error.message).toBe('Error executing fail: disk full');
      }
    });

    it('applies a per-tool timeout over the registry default', async () => {
      const hang: ToolDefinition = { ...tool('hang', 'p', () => new Promise(() => {})), timeoutMs: 10 };
      const registry = new ToolRegistry({ timeoutMs: 60_000 }).register(staticProvider('p', [hang]));

      const outcome = await registry.execute('hang', {}, context);

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.error.message).toBe('Error executing hang: tool hang timed out after 10ms');
    });

    it('throws when the caller has cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const registry = new ToolRegistry({ timeoutMs: 1_000 }).register(staticProvider('p', [tool('echo', 'p')]));

      await expect(registry.execute('echo', {}, { ...context, signal: controller.signal })).rejects.toMatchObject({
        kind: 'Cancelled',
        message: 'tool echo cancelled',
      });
    });
  });
});
