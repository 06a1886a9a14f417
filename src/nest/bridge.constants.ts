/** DI token for the `KafkaBridge` instance. */
export const KAFKA_BRIDGE = "KAFKA_BRIDGE";
