const mockSpan = {
  end: jest.fn(),
  setAttribute: jest.fn(),
  setStatus: jest.fn(),
  recordException: jest.fn(),
};
const mockSpanCtx = Symbol("spanCtx");
const mockParentCtx = Symbol("parentCtx");

jest.mock("@opentelemetry/api", () => ({
  trace: {
    getTracer: jest.fn(() => ({ startSpan: jest.fn(() => mockSpan) })),
    setSpan: jest.fn(() => mockSpanCtx),
  },
  context: {
    active: jest.fn(() => mockParentCtx),
    with: jest.fn((_ctx: unknown, fn: () => Promise<void>) => fn()),
  },
  propagation: {
    extract: jest.fn(() => mockParentCtx),
    inject: jest.fn(),
  },
  SpanKind: { CONSUMER: 4 },
  SpanStatusCode: { ERROR: 2, OK: 1, UNSET: 0 },
}));

import { context, propagation, trace } from "@opentelemetry/api";
import { otelInstrumentation } from "../../otel";
import type {
  BeforeForwardResult,
  BridgeInstrumentation,
  InboundRecord,
} from "../types";

function makeRecord(offset = "5"): InboundRecord {
  return {
    topic: "requests",
    partition: 1,
    offset,
    key: Buffer.from("case-1"),
    value: Buffer.from("{}"),
    headers: { traceparent: "00-abc-def-01" },
  };
}

function forward(
  record: InboundRecord,
  inst: BridgeInstrumentation = otelInstrumentation(),
): BeforeForwardResult {
  const result = inst.beforeForward?.(record);
  if (typeof result !== "object" || result === null) {
    throw new Error("beforeForward returned nothing");
  }
  return result;
}

describe("otelInstrumentation", () => {
  const mockTracer = { startSpan: jest.fn(() => mockSpan) };

  beforeEach(() => {
    jest.clearAllMocks();
    (trace.getTracer as jest.Mock).mockReturnValue(mockTracer);
  });

  describe("beforeForward", () => {
    it("extracts the parent context from the inbound headers", () => {
      const record = makeRecord();

      forward(record);

      expect(propagation.extract).toHaveBeenCalledWith(
        mockParentCtx,
        record.headers,
      );
    });

    it("starts a CONSUMER span as child of the extracted context", () => {
      forward(makeRecord());

      expect(mockTracer.startSpan).toHaveBeenCalledWith(
        "kafka.bridge requests",
        {
          kind: 4,
          attributes: {
            "messaging.system": "kafka",
            "messaging.destination.name": "requests",
            "messaging.destination.partition.id": "1",
            "messaging.kafka.offset": "5",
          },
        },
        mockParentCtx,
      );
      expect(trace.setSpan).toHaveBeenCalledWith(mockParentCtx, mockSpan);
    });

    it("runs the wrapped cycle inside the span context", async () => {
      const { wrap } = forward(makeRecord());

      const result = await wrap?.(async () => "done");

      expect(result).toBe("done");
      expect(context.with).toHaveBeenCalledWith(
        mockSpanCtx,
        expect.any(Function),
      );
    });

    it("ends the span on cleanup", () => {
      forward(makeRecord()).cleanup?.();

      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });
  });

  describe("beforePublish", () => {
    it("injects the active context into the outbound headers", () => {
      const inst = otelInstrumentation();
      const headers = { "x-status-code": "200" };

      inst.beforePublish?.(makeRecord(), headers);

      expect(propagation.inject).toHaveBeenCalledWith(mockParentCtx, headers);
    });
  });

  describe("onOutcome", () => {
    it("records the backend status on the span", () => {
      const inst = otelInstrumentation();
      const record = makeRecord();
      inst.beforeForward?.(record);

      inst.onOutcome?.(record, {
        type: "success",
        statusCode: 422,
        body: Buffer.from("{}"),
      });

      expect(mockSpan.setAttribute).toHaveBeenCalledWith(
        "http.response.status_code",
        422,
      );
      expect(mockSpan.setStatus).not.toHaveBeenCalled();
    });

    it("marks the span as failed when the backend was unreachable", () => {
      const inst = otelInstrumentation();
      const record = makeRecord();
      inst.beforeForward?.(record);

      inst.onOutcome?.(record, {
        type: "transport-failure",
        reason: "connection refused",
      });

      expect(mockSpan.setAttribute).toHaveBeenCalledWith(
        "http.response.status_code",
        900,
      );
      expect(mockSpan.setStatus).toHaveBeenCalledWith({
        code: 2,
        message: "connection refused",
      });
    });

    it("ignores records it has no span for", () => {
      const inst = otelInstrumentation();

      inst.onOutcome?.(makeRecord("99"), {
        type: "transport-failure",
        reason: "timed out after 5000ms",
      });

      expect(mockSpan.setAttribute).not.toHaveBeenCalled();
    });
  });

  describe("onRecordError", () => {
    it("sets ERROR status and records the exception", () => {
      const inst = otelInstrumentation();
      const record = makeRecord();
      inst.beforeForward?.(record);
      const error = new Error("broker down");

      inst.onRecordError?.(record, error);

      expect(mockSpan.setStatus).toHaveBeenCalledWith({
        code: 2,
        message: "broker down",
      });
      expect(mockSpan.recordException).toHaveBeenCalledWith(error);
    });

    it("does nothing once the span was cleaned up", () => {
      const inst = otelInstrumentation();
      const record = makeRecord();
      forward(record, inst).cleanup?.();

      inst.onRecordError?.(record, new Error("late"));

      expect(mockSpan.recordException).not.toHaveBeenCalled();
    });
  });
});
