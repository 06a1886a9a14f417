export type ClientId = string;
export type GroupId = string;

export type MessageHeaders = Record<string, string>;

/** A record read from the inbound topic. Key and value are raw bytes, `null` when absent. */
export interface InboundRecord {
  topic: string;
  partition: number;
  /** Broker offset of this record, as kafkajs reports it. */
  offset: string;
  key: Buffer | null;
  value: Buffer | null;
  headers: MessageHeaders;
}

/**
 * Result of one backend call.
 *
 * `success` covers every HTTP response, whatever its status code. The bridge
 * never interprets backend statuses. `transport-failure` means no response
 * was received at all (refused, unreachable, timed out).
 */
export type BackendOutcome =
  | { type: "success"; statusCode: number; body: Buffer }
  | { type: "transport-failure"; reason: string };

/** A record to publish on the response topic. */
export interface OutboundRecord {
  /** Inbound key, byte for byte. */
  key: Buffer | null;
  value: Buffer;
  headers: MessageHeaders;
}

/** Anything that can turn a payload into a `BackendOutcome`. */
export interface IBackendClient {
  forward(payload: Buffer | null): Promise<BackendOutcome>;
  close(): Promise<void>;
}

/** Returned from `BridgeInstrumentation.beforeForward`. */
export interface BeforeForwardResult {
  /** Called once the record's cycle is over, whether it succeeded or not. */
  cleanup?(): void;
  /** Run the record's cycle inside a specific async context (e.g. an active span). */
  wrap?<R>(fn: () => Promise<R>): Promise<R>;
}

/**
 * Bridge-wide instrumentation hooks. Use this for cross-cutting concerns like
 * tracing and metrics.
 *
 * @see `otelInstrumentation()` from `./otel`
 */
export interface BridgeInstrumentation {
  /** Called when a record is received, before the backend call. */
  beforeForward?(record: InboundRecord): BeforeForwardResult | void;
  /** Called before publishing. Can mutate `headers` (e.g. inject `traceparent`). */
  beforePublish?(record: InboundRecord, headers: MessageHeaders): void;
  /** Called with every backend outcome, including transport failures. */
  onOutcome?(record: InboundRecord, outcome: BackendOutcome): void;
  /** Called when a record's cycle fails and its offset is left uncommitted. */
  onRecordError?(record: InboundRecord, error: Error): void;
}

/**
 * Logger interface for KafkaBridge.
 * Compatible with NestJS Logger, console, or any custom logger.
 *
 * `debug` is optional. Omit it to suppress debug output.
 */
export interface BridgeLogger {
  log(message: string): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

/** Options for consumer subscribe retry when the inbound topic doesn't exist yet. */
export interface SubscribeRetryOptions {
  /** Maximum number of subscribe attempts. Default: `5`. */
  retries?: number;
  /** Upper bound of the wait between attempts in ms. The bound starts at 500 ms and doubles per attempt until it reaches this value. Default: `5000`. */
  backoffMs?: number;
}

/** Options for the `KafkaBridge` constructor. */
export interface KafkaBridgeOptions {
  /** Custom logger. Defaults to console with `[KafkaBridge:<clientId>]` prefix. */
  logger?: BridgeLogger;
  /** Backend client. Defaults to an `undici`-backed `BackendClient` built from the config. */
  backend?: IBackendClient;
  /** Tracing / metrics hooks applied to every record. */
  instrumentation?: BridgeInstrumentation[];
  subscribeRetry?: SubscribeRetryOptions;
  /** How long `disconnect()` waits for in-flight records. Default: `30_000`. */
  drainTimeoutMs?: number;
  /**
   * Called when the consumer crashed and kafkajs will not restart it.
   * The bridge no longer makes progress after this fires, so the usual
   * reaction is to exit the process.
   */
  onFatal?: (error: Error) => void;
}

/** Result returned by `KafkaBridge.getStatus()`. */
export type BridgeStatus =
  | { status: "idle"; clientId: ClientId }
  | { status: "running"; clientId: ClientId; groupId: GroupId; inFlight: number }
  | { status: "stopping"; clientId: ClientId; inFlight: number }
  | { status: "stopped"; clientId: ClientId };
