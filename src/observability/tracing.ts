/**
 * Span helpers over the OpenTelemetry API
 *
 * Without a registered SDK the API hands out non-recording spans, so these
 * helpers cost next to nothing when telemetry is disabled.
 */

import { trace, SpanStatusCode, type Span, type Attributes } from '@opentelemetry/api';

export const TRACER_NAME = 'dbchat-agent';

/**
 * Run `fn` inside an active span. The span is ended when `fn` settles; a thrown
 * error marks it ERROR and is rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
