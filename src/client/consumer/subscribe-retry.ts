import type { Consumer } from "kafkajs";
import type { BridgeLogger, SubscribeRetryOptions } from "../types";
import { sleep, toError } from "./pipeline";

/** Ceiling of the first retry delay; it doubles on every further attempt. */
export const FIRST_RETRY_CEILING_MS = 500;

/**
 * Subscribe to the inbound topic from its beginning, retrying while the
 * broker does not know the topic yet. Each wait is drawn at random below a
 * ceiling that doubles per attempt, capped at `backoffMs`.
 */
export async function subscribeWithRetry(
  consumer: Pick<Consumer, "subscribe">,
  topic: string,
  logger: BridgeLogger,
  retryOpts?: SubscribeRetryOptions,
): Promise<void> {
  const maxAttempts = retryOpts?.retries ?? 5;
  const maxDelayMs = retryOpts?.backoffMs ?? 5000;

  for (let attempt = 1; ; attempt++) {
    try {
      await consumer.subscribe({ topic, fromBeginning: true });
      return;
    } catch (error) {
      if (attempt >= maxAttempts) throw error;
      const ceiling = Math.min(
        maxDelayMs,
        FIRST_RETRY_CEILING_MS * 2 ** (attempt - 1),
      );
      const delay = Math.floor(Math.random() * ceiling);
      logger.warn(
        `Cannot subscribe to "${topic}" yet (attempt ${attempt}/${maxAttempts}): ${toError(error).message}. Retrying in ${delay}ms`,
      );
      await sleep(delay);
    }
  }
}
