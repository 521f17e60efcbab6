/**
 * Span helper wrapping tracer.startActiveSpan with attribute setting,
 * error recording and guaranteed span end.
 *
 * With no tracer provider registered the OTel API hands out no-op spans.
 */

import { type Attributes, SpanStatusCode, trace } from "@opentelemetry/api";

const TRACER_NAME = "a2a-bridge";

/**
 * Execute an async function within a named span.
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
