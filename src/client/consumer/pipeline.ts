import type { Producer } from "kafkajs";
import { BridgePublishError } from "../errors";
import { buildResponse } from "../message/response";
import type {
  BeforeForwardResult,
  BridgeInstrumentation,
  BridgeLogger,
  IBackendClient,
  InboundRecord,
} from "../types";

// ── Helpers ──────────────────────────────────────────────────────────

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Offset to commit once `offset` is done: the next one to read. */
export function nextOffset(offset: string): string {
  return (BigInt(offset) + 1n).toString();
}

/** `topic[partition]@offset (key=...)`, for log lines. */
export function describeRecord(record: InboundRecord): string {
  const key = record.key === null ? "<none>" : record.key.toString();
  return `${record.topic}[${record.partition}]@${record.offset} (key=${key})`;
}

// ── Record cycle ────────────────────────────────────────────────────

export interface PipelineDeps {
  backend: IBackendClient;
  producer: Pick<Producer, "send">;
  responseTopic: string;
  instrumentation: BridgeInstrumentation[];
  logger: BridgeLogger;
  /** Commit the record's offset. Only called after its response was published. */
  commit: (record: InboundRecord) => Promise<void>;
}

/**
 * Take one record through forward → build → publish → commit.
 *
 * A transport failure is an outcome like any other: it is published as a
 * `900` document and committed. Only a failed publish stops the cycle,
 * with a `BridgePublishError`, and the offset stays uncommitted.
 */
export async function processRecord(
  record: InboundRecord,
  deps: PipelineDeps,
): Promise<void> {
  const { backend, instrumentation, logger } = deps;

  const outcome = await backend.forward(record.value);
  for (const inst of instrumentation) inst.onOutcome?.(record, outcome);
  if (outcome.type === "transport-failure") {
    logger.warn(
      `Backend unreachable for ${describeRecord(record)}: ${outcome.reason}`,
    );
  } else {
    logger.debug?.(
      `Backend answered ${outcome.statusCode} for ${describeRecord(record)}`,
    );
  }

  const response = buildResponse(record.key, outcome);
  for (const inst of instrumentation) {
    inst.beforePublish?.(record, response.headers);
  }

  try {
    await deps.producer.send({
      topic: deps.responseTopic,
      messages: [
        { key: response.key, value: response.value, headers: response.headers },
      ],
      acks: -1,
    });
  } catch (error) {
    throw new BridgePublishError(
      deps.responseTopic,
      record.topic,
      record.partition,
      record.offset,
      { cause: toError(error) },
    );
  }

  await deps.commit(record);
}

/**
 * Run `processRecord` inside every instrumentation's `beforeForward` scope.
 * Errors are reported to `onRecordError` and rethrown.
 */
export async function runInstrumented(
  record: InboundRecord,
  deps: PipelineDeps,
): Promise<void> {
  const hooks: BeforeForwardResult[] = [];
  for (const inst of deps.instrumentation) {
    const hook = inst.beforeForward?.(record);
    if (typeof hook === "object" && hook !== null) hooks.push(hook);
  }

  let run = () => processRecord(record, deps);
  for (const hook of hooks) {
    if (!hook.wrap) continue;
    const inner = run;
    const wrap = hook.wrap.bind(hook);
    run = () => wrap(inner);
  }

  try {
    await run();
  } catch (error) {
    const err = toError(error);
    for (const inst of deps.instrumentation) inst.onRecordError?.(record, err);
    throw err;
  } finally {
    for (const hook of hooks) hook.cleanup?.();
  }
}
