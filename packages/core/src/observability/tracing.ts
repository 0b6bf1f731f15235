import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'bankdw-dimensions';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function startSpan(name: string, attributes?: Record<string, string | number>): Span {
  const tracer = getTracer();
  const span = tracer.startSpan(name);
  if (attributes) {
    for (const [key, value] of Object.entries(attributes)) {
      span.setAttribute(key, value);
    }
  }
  return span;
}

export function endSpan(span: Span, error?: Error): void {
  if (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

/**
 * Run `fn` inside a span, recording the thrown error (if any) before rethrowing.
 */
export async function traced<T>(
  name: string,
  attributes: Record<string, string | number>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const span = startSpan(name, attributes);
  try {
    const result = await fn(span);
    endSpan(span);
    return result;
  } catch (error) {
    endSpan(span, error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

export { SpanStatusCode } from '@opentelemetry/api';
