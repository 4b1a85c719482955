/**
 * Span helper: wraps tracer.startActiveSpan with attribute setting,
 * error recording and guaranteed span end.
 *
 * Without a registered tracer provider the spans are no-ops.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

export const TRACER_NAME = "droidprobe";

/**
 * Execute an async function within a named span.
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
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
