/**
 * Span helpers over the OpenTelemetry API. Without a registered SDK every
 * span is a no-op, so callers never need to check whether tracing is on.
 */
import { trace, context, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';

const TRACER_NAME = 'parley';

export type SpanAttributes = Record<string, string | number | boolean>;

function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME);
}

/** Trace id of the active span, if any (used to correlate HTTP responses). */
export function activeTraceId(): string | undefined {
  return trace.getActiveSpan()?.spanContext().traceId;
}

/**
 * Run `fn` inside a child span of the active context. Errors are recorded on
 * the span and rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, context.active(), async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      span.recordException(err);
      throw error;
    } finally {
      span.end();
    }
  });
}
