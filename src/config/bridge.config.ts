import type { LogLevel as NestLogLevel } from "@nestjs/common";
import { z } from "zod";
import { BridgeConfigError } from "../client/errors";
import { resolveTopics } from "./topics";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CLIENT_ID = "mtb-kafka-bridge";
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

const positiveInt = z.coerce
  .number({ invalid_type_error: "must be a number" })
  .int("must be an integer")
  .positive("must be positive");

/** Raw environment accepted by the bridge. zod's url() also accepts non-HTTP schemes. */
export const BridgeEnvSchema = z.object({
  APP_REST_URI: z
    .string({ required_error: "is required" })
    .url("must be an absolute URL")
    .refine((uri) => /^https?:\/\//i.test(uri), "must use http or https"),
  APP_KAFKA_TOPIC: z
    .string({ required_error: "is required" })
    .trim()
    .min(1, "is required"),
  APP_KAFKA_RESPONSE_TOPIC: z.string().optional(),
  APP_KAFKA_GROUP_ID: z.string().optional(),
  KAFKA_BOOTSTRAP_SERVERS: z
    .string({ required_error: "is required" })
    .min(1, "is required")
    .transform((servers) =>
      servers
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    )
    .refine((brokers) => brokers.length > 0, "must list at least one broker"),
  APP_KAFKA_CLIENT_ID: z.string().min(1).default(DEFAULT_CLIENT_ID),
  APP_REST_TIMEOUT_MS: positiveInt.default(DEFAULT_REQUEST_TIMEOUT_MS),
  APP_KAFKA_PARTITIONS_CONCURRENCY: positiveInt.default(1),
  LOG_LEVEL: z
    .enum(LOG_LEVELS, {
      errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(", ")}` }),
    })
    .default("info"),
});

export type BridgeEnv = z.infer<typeof BridgeEnvSchema>;

/** Process-wide bridge settings. Resolved once at startup and frozen. */
export interface BridgeConfig {
  /** Backend base URI, without a trailing slash. */
  readonly backendUri: string;
  readonly inboundTopic: string;
  readonly responseTopic: string;
  readonly groupId: string;
  readonly brokers: readonly string[];
  readonly clientId: string;
  readonly requestTimeoutMs: number;
  /** Number of partitions processed in parallel. Order within a partition is kept. */
  readonly partitionsConcurrency: number;
  readonly logLevel: LogLevel;
}

/**
 * Read the bridge configuration from environment variables.
 *
 * @throws {BridgeConfigError} listing every missing or invalid variable.
 */
export function loadBridgeConfig(
  env: Record<string, string | undefined> = process.env,
): BridgeConfig {
  const parsed = BridgeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new BridgeConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")} ${issue.message}`,
      ),
    );
  }
  const raw = parsed.data;
  const { responseTopic, groupId } = resolveTopics({
    inboundTopic: raw.APP_KAFKA_TOPIC,
    responseTopic: raw.APP_KAFKA_RESPONSE_TOPIC,
    groupId: raw.APP_KAFKA_GROUP_ID,
  });

  return Object.freeze({
    backendUri: raw.APP_REST_URI.replace(/\/+$/, ""),
    inboundTopic: raw.APP_KAFKA_TOPIC,
    responseTopic,
    groupId,
    brokers: Object.freeze([...raw.KAFKA_BOOTSTRAP_SERVERS]),
    clientId: raw.APP_KAFKA_CLIENT_ID,
    requestTimeoutMs: raw.APP_REST_TIMEOUT_MS,
    partitionsConcurrency: raw.APP_KAFKA_PARTITIONS_CONCURRENCY,
    logLevel: raw.LOG_LEVEL,
  });
}

/** NestJS logger levels enabled for a given `LOG_LEVEL`. */
export function nestLogLevels(level: LogLevel): NestLogLevel[] {
  switch (level) {
    case "debug":
      return ["fatal", "error", "warn", "log", "debug"];
    case "info":
      return ["fatal", "error", "warn", "log"];
    case "warn":
      return ["fatal", "error", "warn"];
    case "error":
      return ["fatal", "error"];
  }
}
