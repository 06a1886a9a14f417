import {
  Kafka,
  Partitioners,
  logLevel as KafkaLogLevel,
  type Consumer,
  type EachMessagePayload,
  type Producer,
} from "kafkajs";
import type { BridgeConfig } from "../config/bridge.config";
import { BackendClient } from "./backend/backend.client";
import {
  describeRecord,
  nextOffset,
  runInstrumented,
  toError,
  type PipelineDeps,
} from "./consumer/pipeline";
import { InFlightTracker } from "./consumer/in-flight";
import { subscribeWithRetry } from "./consumer/subscribe-retry";
import { createConsoleLogger } from "./logger";
import { decodeHeaders } from "./message/headers";
import type {
  BridgeLogger,
  BridgeStatus,
  ClientId,
  InboundRecord,
  KafkaBridgeOptions,
  SubscribeRetryOptions,
} from "./types";

export * from "./types";

type BridgeState = BridgeStatus["status"];

/**
 * Consumes MTB files from the inbound topic, forwards each one to the
 * backend, and publishes the backend's answer to the response topic under
 * the inbound key.
 *
 * Offsets are committed by hand, one record at a time, and only after the
 * response for that record was acknowledged by the broker. A crash between
 * publish and commit means the record is forwarded again, never lost.
 */
export class KafkaBridge {
  private readonly kafka: Kafka;
  private readonly producer: Producer;
  private readonly consumer: Consumer;
  private readonly logger: BridgeLogger;
  private readonly pipelineDeps: PipelineDeps;
  private readonly subscribeRetry: SubscribeRetryOptions | undefined;
  private readonly drainTimeoutMs: number;
  private readonly onFatal: KafkaBridgeOptions["onFatal"];

  private state: BridgeState = "idle";
  private readonly inFlight = new InFlightTracker();
  private disconnectPromise: Promise<void> | undefined;
  public readonly clientId: ClientId;

  constructor(
    private readonly config: BridgeConfig,
    options: KafkaBridgeOptions = {},
  ) {
    this.clientId = config.clientId;
    this.logger =
      options.logger ?? createConsoleLogger(config.clientId, config.logLevel);
    this.subscribeRetry = options.subscribeRetry;
    this.drainTimeoutMs = options.drainTimeoutMs ?? 30_000;
    this.onFatal = options.onFatal;

    this.kafka = new Kafka({
      clientId: this.clientId,
      brokers: [...config.brokers],
      logLevel: KafkaLogLevel.ERROR,
    });
    this.producer = this.kafka.producer({
      createPartitioner: Partitioners.DefaultPartitioner,
      idempotent: true,
      maxInFlightRequests: 1,
    });
    this.consumer = this.kafka.consumer({ groupId: config.groupId });

    this.pipelineDeps = {
      backend:
        options.backend ??
        new BackendClient({
          baseUri: config.backendUri,
          timeoutMs: config.requestTimeoutMs,
        }),
      producer: this.producer,
      responseTopic: config.responseTopic,
      instrumentation: options.instrumentation ?? [],
      logger: this.logger,
      commit: (record) => this.commit(record),
    };
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /**
   * Connect producer and consumer, subscribe to the inbound topic and start
   * consuming. Resolves once the consumer is running.
   *
   * @throws {Error} if the bridge was already started.
   */
  public async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`start() called while the bridge is ${this.state}`);
    }
    this.state = "running";
    const { inboundTopic, responseTopic, groupId, backendUri } = this.config;

    await this.producer.connect();
    this.logger.log("Producer connected");

    await this.consumer.connect();
    this.registerConsumerEvents();
    await subscribeWithRetry(
      this.consumer,
      inboundTopic,
      this.logger,
      this.subscribeRetry,
    );
    await this.consumer.run({
      autoCommit: false,
      partitionsConsumedConcurrently: this.config.partitionsConcurrency,
      eachMessage: (payload) => this.handleMessage(payload),
    });
    this.logger.log(
      `Forwarding "${inboundTopic}" to ${backendUri}, responses to "${responseTopic}" (group "${groupId}")`,
    );
  }

  /** Current lifecycle state and number of records in flight. */
  public getStatus(): BridgeStatus {
    switch (this.state) {
      case "idle":
      case "stopped":
        return { status: this.state, clientId: this.clientId };
      case "running":
        return {
          status: "running",
          clientId: this.clientId,
          groupId: this.config.groupId,
          inFlight: this.inFlight.size,
        };
      case "stopping":
        return {
          status: "stopping",
          clientId: this.clientId,
          inFlight: this.inFlight.size,
        };
    }
  }

  /**
   * Stop taking new records, let in-flight ones finish their cycle, then
   * close consumer, producer and backend connections. Safe to call more
   * than once; later calls return the first call's promise.
   */
  public disconnect(drainTimeoutMs = this.drainTimeoutMs): Promise<void> {
    if (!this.disconnectPromise) {
      this.disconnectPromise = this.shutdown(drainTimeoutMs);
    }
    return this.disconnectPromise;
  }

  // ── Graceful shutdown ────────────────────────────────────────────

  /**
   * NestJS lifecycle hook, called when the host module is torn down.
   * Drains in-flight records and disconnects everything.
   */
  public async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  /**
   * Register SIGTERM / SIGINT handlers that drain in-flight records before
   * disconnecting. Call this once after `start()` in non-NestJS apps.
   */
  public enableGracefulShutdown(
    signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"],
    drainTimeoutMs = this.drainTimeoutMs,
  ): void {
    const handler = () => {
      this.logger.log("Shutdown signal received, draining in-flight records...");
      this.disconnect(drainTimeoutMs).catch((err) =>
        this.logger.error(
          `Error during graceful shutdown: ${toError(err).message}`,
        ),
      );
    };
    for (const signal of signals) {
      process.once(signal, handler);
    }
  }

  // ── Private helpers ──────────────────────────────────────────────

  private async handleMessage({
    topic,
    partition,
    message,
  }: EachMessagePayload): Promise<void> {
    const record: InboundRecord = {
      topic,
      partition,
      offset: message.offset,
      key: message.key,
      value: message.value,
      headers: decodeHeaders(message.headers),
    };
    if (this.state !== "running") {
      this.logger.debug?.(
        `Shutting down, leaving ${describeRecord(record)} uncommitted`,
      );
      return;
    }

    try {
      await this.inFlight.track(() => runInstrumented(record, this.pipelineDeps));
    } catch (error) {
      const err = toError(error);
      this.logger.error(
        `Failed to process ${describeRecord(record)}, offset not committed: ${err.message}`,
        err.stack,
      );
      throw err;
    }
  }

  private async commit(record: InboundRecord): Promise<void> {
    const offset = nextOffset(record.offset);
    try {
      await this.consumer.commitOffsets([
        { topic: record.topic, partition: record.partition, offset },
      ]);
      this.logger.debug?.(
        `Committed ${record.topic}[${record.partition}] up to ${offset}`,
      );
    } catch (error) {
      // A later commit on the same partition supersedes this one.
      this.logger.error(
        `Failed to commit ${record.topic}[${record.partition}]@${offset}, the record may be forwarded again: ${toError(error).message}`,
      );
    }
  }

  private registerConsumerEvents(): void {
    const { CRASH, GROUP_JOIN } = this.consumer.events;

    this.consumer.on(GROUP_JOIN, ({ payload }) => {
      const assigned = Object.entries(payload.memberAssignment)
        .map(([topic, partitions]) => `${topic}[${partitions.join(",")}]`)
        .join(" ");
      this.logger.debug?.(
        `Joined group "${payload.groupId}", assigned ${assigned || "nothing"}`,
      );
    });

    this.consumer.on(CRASH, ({ payload }) => {
      const { error, restart } = payload;
      if (restart) {
        this.logger.warn(`Consumer crashed, restarting: ${error.message}`);
        return;
      }
      this.logger.error(
        `Consumer crashed and will not restart: ${error.message}`,
        error.stack,
      );
      this.onFatal?.(error);
    });
  }

  private async shutdown(drainTimeoutMs: number): Promise<void> {
    this.state = "stopping";
    if (!(await this.inFlight.drained(drainTimeoutMs))) {
      this.logger.warn(
        `Drain timed out after ${drainTimeoutMs}ms, ${this.inFlight.size} record(s) still in flight`,
      );
    }
    const results = await Promise.allSettled([
      this.consumer.disconnect(),
      this.producer.disconnect(),
      this.pipelineDeps.backend.close(),
    ]);
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn(
          `Error while closing a connection: ${toError(result.reason).message}`,
        );
      }
    }
    this.state = "stopped";
    this.logger.log("All connections closed");
  }
}
