import { z } from 'zod';
import { logger } from '@parley/shared';
import type { WireRecord } from './stream-encoder.js';

const log = logger.child({ module: 'chat-client' });

const toolCallSchema = z.object({ id: z.string(), name: z.string(), arguments: z.record(z.unknown()) });

const wireRecordSchema: z.ZodType<WireRecord> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('thinking'), content: z.string(), toolCalls: z.array(toolCallSchema) }),
  z.object({
    type: z.literal('tool_result'),
    toolName: z.string(),
    toolArgs: z.record(z.unknown()),
    result: z.string(),
    step: z.number(),
    totalSteps: z.number(),
  }),
  z.object({ type: z.literal('content'), content: z.string(), isFinal: z.boolean() }),
  z.object({ type: z.literal('done'), finishReason: z.literal('stop'), sessionId: z.string().optional() }),
  z.object({ type: z.literal('error'), error: z.string(), kind: z.string() }),
]);

const chatResponseSchema = z.object({
  message: z.object({ role: z.literal('assistant'), content: z.string() }),
  toolCalls: z.array(toolCallSchema.extend({ result: z.string() })),
  finishReason: z.literal('stop'),
  sessionId: z.string(),
});

const sessionCreatedSchema = z.object({ sessionId: z.string(), systemPrompt: z.string() });

const toolListSchema = z.object({
  tools: z.array(z.object({ name: z.string(), description: z.string(), kind: z.string() })),
});

export type ChatResponse = z.infer<typeof chatResponseSchema>;
export type ToolSummary = z.infer<typeof toolListSchema>['tools'][number];

export interface ChatRequest {
  messages: { role: 'user' | 'assistant' | 'system'; content: string }[];
  systemPrompt?: string;
  sessionId?: string;
  useMemory?: boolean;
  userId?: string;
  model?: string;
}

export interface ChatClient {
  chat(request: ChatRequest): Promise<ChatResponse>;
  chatStream(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<WireRecord>;
  createSession(input?: { systemPrompt?: string; roleId?: string }): Promise<{ sessionId: string; systemPrompt: string }>;
  listTools(userId?: string): Promise<ToolSummary[]>;
}

function parseRecord(payload: string): WireRecord | undefined {
  try {
    const parsed = wireRecordSchema.safeParse(JSON.parse(payload));
    if (parsed.success) return parsed.data;
    log.warn({ payload }, 'unrecognized SSE record');
  } catch {
    log.warn({ payload }, 'failed to parse SSE record');
  }
  return undefined;
}

/** Decode `data: <json>` records from an SSE body. */
export async function* decodeSseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<WireRecord> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      // Keep the last (potentially incomplete) line in the buffer
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed.startsWith('data: ')) continue;
        const record = parseRecord(trimmed.slice(6));
        if (record) yield record;
      }
    }

    const rest = buffer.trim();
    if (rest.startsWith('data: ')) {
      const record = parseRecord(rest.slice(6));
      if (record) yield record;
    }
  } finally {
    reader.releaseLock();
  }
}

export function createChatClient(baseUrl: string): ChatClient {
  const headers = { 'Content-Type': 'application/json' };

  async function request(path: string, init: RequestInit): Promise<Response> {
    const res = await fetch(`${baseUrl}${path}`, { ...init, headers });
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new Error(`chat service returned ${res.status}: ${text}`);
    }
    return res;
  }

  async function chat(body: ChatRequest): Promise<ChatResponse> {
    log.info({ sessionId: body.sessionId, messages: body.messages.length }, 'calling chat service');
    const res = await request('/chat', {
      method: 'POST',
      body: JSON.stringify({ ...body, stream: false }),
      signal: AbortSignal.timeout(150_000),
    });
    return chatResponseSchema.parse(await res.json());
  }

  async function* chatStream(body: ChatRequest, signal?: AbortSignal): AsyncGenerator<WireRecord> {
    log.info({ sessionId: body.sessionId, messages: body.messages.length }, 'calling chat service (stream)');
    const res = await request('/chat', {
      method: 'POST',
      body: JSON.stringify({ ...body, stream: true }),
      signal: signal ?? AbortSignal.timeout(300_000),
    });
    if (!res.body) {
      throw new Error('chat service response has no body');
    }
    yield* decodeSseStream(res.body);
  }

  async function createSession(input: { systemPrompt?: string; roleId?: string } = {}) {
    const res = await request('/sessions', { method: 'POST', body: JSON.stringify(input) });
    return sessionCreatedSchema.parse(await res.json());
  }

  async function listTools(userId?: string): Promise<ToolSummary[]> {
    const query = userId ? `?userId=${encodeURIComponent(userId)}` : '';
    const res = await request(`/tools${query}`, { method: 'GET' });
    return toolListSchema.parse(await res.json()).tools;
  }

  return { chat, chatStream, createSession, listTools };
}
