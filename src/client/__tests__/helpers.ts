jest.mock("kafkajs");

import type { BridgeConfig } from "../../config/bridge.config";
import { KafkaBridge } from "../kafka.bridge";
import type {
  BackendOutcome,
  IBackendClient,
  KafkaBridgeOptions,
} from "../types";

export const kafkaMock =
  jest.requireMock<typeof import("../../__mocks__/kafkajs")>("kafkajs");

export const TEST_CONFIG: BridgeConfig = {
  backendUri: "http://backend.test/api",
  inboundTopic: "requests",
  responseTopic: "requests_response",
  groupId: "requests_group",
  brokers: ["localhost:9092"],
  clientId: "test-bridge",
  requestTimeoutMs: 1000,
  partitionsConcurrency: 1,
  logLevel: "info",
};

export interface FakeBackend extends IBackendClient {
  forward: jest.Mock<Promise<BackendOutcome>, [Buffer | null]>;
  close: jest.Mock<Promise<void>, []>;
}

/** Backend that answers with `outcomes` in order. */
export function fakeBackend(...outcomes: BackendOutcome[]): FakeBackend {
  const forward = jest.fn<Promise<BackendOutcome>, [Buffer | null]>();
  for (const outcome of outcomes) forward.mockResolvedValueOnce(outcome);
  return {
    forward,
    close: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
  };
}

export function success(statusCode: number, body: string): BackendOutcome {
  return { type: "success", statusCode, body: Buffer.from(body) };
}

export function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

export function createBridge(options: KafkaBridgeOptions = {}) {
  return new KafkaBridge(TEST_CONFIG, { logger: createLogger(), ...options });
}

/** Shape of the payload kafkajs hands to `eachMessage`. */
export interface DeliveredMessage {
  topic: string;
  partition: number;
  message: {
    key: Buffer | null;
    value: Buffer | null;
    offset: string;
    timestamp: string;
    attributes: number;
    headers: Record<string, Buffer | string | undefined>;
  };
}

export type EachMessage = (payload: DeliveredMessage) => Promise<void>;

export function delivered(opts: {
  key?: string | null;
  value?: string | null;
  offset?: string;
  partition?: number;
  headers?: Record<string, Buffer | string | undefined>;
}): DeliveredMessage {
  const key = opts.key === undefined ? "case-1" : opts.key;
  const value = opts.value === undefined ? "<mtb-file-xml>" : opts.value;
  return {
    topic: TEST_CONFIG.inboundTopic,
    partition: opts.partition ?? 0,
    message: {
      key: key === null ? null : Buffer.from(key),
      value: value === null ? null : Buffer.from(value),
      offset: opts.offset ?? "0",
      timestamp: "1700000000000",
      attributes: 0,
      headers: opts.headers ?? {},
    },
  };
}

/** Start `bridge` and return the `eachMessage` handler it passed to `consumer.run`. */
export async function startAndCapture(bridge: KafkaBridge): Promise<EachMessage> {
  let handler: EachMessage | undefined;
  kafkaMock.mockRun.mockImplementationOnce(
    async ({ eachMessage }: { eachMessage: EachMessage }) => {
      handler = eachMessage;
    },
  );
  await bridge.start();
  if (!handler) throw new Error("consumer.run was not called");
  return handler;
}

export { KafkaBridge } from "../kafka.bridge";
