export * from "./client/kafka.bridge";
export * from "./client/errors";
export * from "./client/backend/backend.client";
export * from "./client/backend/mtb-file";
export * from "./client/message/response";
export * from "./client/message/headers";
export * from "./client/logger";
export * from "./config/bridge.config";
export * from "./config/topics";
export * from "./nest/bridge.module";
export * from "./nest/bridge.constants";
export * from "./otel";
