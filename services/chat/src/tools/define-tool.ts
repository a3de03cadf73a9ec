import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { MalformedToolArgumentsError, type JsonSchemaObject } from '@parley/shared';
import type { ToolContext, ToolDefinition, ToolProvider } from '../tool-registry.js';

export interface BuiltinToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  run(input: z.infer<S>, context: ToolContext): unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON schema for the model, derived from the zod schema (never written by hand). */
export function toParameters(schema: z.ZodTypeAny): JsonSchemaObject {
  const raw: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = isRecord(raw) && isRecord(raw.properties) ? raw.properties : {};
  const required =
    isRecord(raw) && Array.isArray(raw.required)
      ? raw.required.filter((key): key is string => typeof key === 'string')
      : [];
  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** A built-in tool whose arguments are validated against `spec.schema` before `run`. */
export function defineTool<S extends z.ZodTypeAny>(provider: string, spec: BuiltinToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    parameters: toParameters(spec.schema),
    kind: { type: 'builtin', provider },
    async invoke(args, context) {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        throw new MalformedToolArgumentsError(spec.name, describeIssues(parsed.error));
      }
      return spec.run(parsed.data, context);
    },
  };
}

/** Provider over a fixed tool list. */
export function staticProvider(
  name: string,
  tools: readonly ToolDefinition[],
  enabled: () => boolean = () => true,
): ToolProvider {
  return {
    name,
    isEnabled: () => enabled(),
    definitions: async () => tools,
  };
}
