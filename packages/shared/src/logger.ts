import pino from 'pino';
import { trace } from '@opentelemetry/api';

/** Root logger; modules derive children with `logger.child({ module })`. */
export const logger = pino({
  name: 'parley',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: {
    paths: ['apiKey', 'oauthToken', '*.apiKey', '*.oauthToken', 'headers.authorization'],
    censor: '[redacted]',
  },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const { traceId, spanId } = span.spanContext();
    return { traceId, spanId };
  },
});

export type Logger = typeof logger;

/** Clip long payloads (tool output, model text) before they go into a log line. */
export function preview(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…(${text.length} chars)` : text;
}
