/** Error thrown when the environment does not describe a usable bridge. */
export class BridgeConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid bridge configuration: ${issues.join("; ")}`);
    this.name = "BridgeConfigError";
  }
}

/** Error thrown when a record cannot be taken through its cycle. */
export class BridgeProcessingError extends Error {
  declare readonly cause?: Error;

  constructor(
    message: string,
    public readonly topic: string,
    public readonly partition: number,
    public readonly offset: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "BridgeProcessingError";
    if (options?.cause) this.cause = options.cause;
  }
}

/**
 * Error thrown when the response for a record could not be published.
 * The record's offset is left uncommitted so it is delivered again.
 */
export class BridgePublishError extends BridgeProcessingError {
  constructor(
    public readonly responseTopic: string,
    topic: string,
    partition: number,
    offset: string,
    options?: { cause?: Error },
  ) {
    super(
      `Failed to publish response to "${responseTopic}" for ${topic}[${partition}]@${offset}`,
      topic,
      partition,
      offset,
      options,
    );
    this.name = "BridgePublishError";
  }
}
