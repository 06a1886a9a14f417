import {
  context,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type Span,
} from "@opentelemetry/api";
import { NO_CONNECTION_STATUS } from "./client/message/response";
import type {
  BackendOutcome,
  BeforeForwardResult,
  BridgeInstrumentation,
  InboundRecord,
  MessageHeaders,
} from "./client/types";

function spanKey(record: InboundRecord): string {
  return `${record.topic}:${record.partition}:${record.offset}`;
}

/**
 * Create a `BridgeInstrumentation` that traces every bridged record and
 * carries W3C Trace Context across the bridge.
 *
 * **Inbound:** extracts `traceparent` from the record's headers and starts a
 * `CONSUMER` span as its child. The backend call and the publish run inside
 * that span.
 *
 * **Outbound:** injects the span's context into the response headers, so the
 * ETL processor sees the response as part of the same trace.
 *
 * @example
 * ```ts
 * const bridge = new KafkaBridge(config, {
 *   instrumentation: [otelInstrumentation()],
 * });
 * ```
 */
export function otelInstrumentation(): BridgeInstrumentation {
  const tracer = trace.getTracer("mtb-kafka-bridge");
  const activeSpans = new Map<string, Span>();

  return {
    beforeForward(record: InboundRecord): BeforeForwardResult {
      const parentCtx = propagation.extract(context.active(), record.headers);
      const span = tracer.startSpan(
        `kafka.bridge ${record.topic}`,
        {
          kind: SpanKind.CONSUMER,
          attributes: {
            "messaging.system": "kafka",
            "messaging.destination.name": record.topic,
            "messaging.destination.partition.id": String(record.partition),
            "messaging.kafka.offset": record.offset,
          },
        },
        parentCtx,
      );
      const spanCtx = trace.setSpan(parentCtx, span);
      const key = spanKey(record);
      activeSpans.set(key, span);
      return {
        cleanup() {
          span.end();
          activeSpans.delete(key);
        },
        wrap<R>(fn: () => Promise<R>): Promise<R> {
          return context.with(spanCtx, fn);
        },
      };
    },

    beforePublish(_record: InboundRecord, headers: MessageHeaders) {
      propagation.inject(context.active(), headers);
    },

    onOutcome(record: InboundRecord, outcome: BackendOutcome) {
      const span = activeSpans.get(spanKey(record));
      if (!span) return;
      if (outcome.type === "success") {
        span.setAttribute("http.response.status_code", outcome.statusCode);
        return;
      }
      span.setAttribute("http.response.status_code", NO_CONNECTION_STATUS);
      span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.reason });
    },

    onRecordError(record: InboundRecord, error: Error) {
      const span = activeSpans.get(spanKey(record));
      if (span) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        span.recordException(error);
      }
    },
  };
}
