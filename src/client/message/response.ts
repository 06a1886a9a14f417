import type { BackendOutcome, OutboundRecord } from "../types";
import { HEADER_STATUS_CODE } from "./headers";

/**
 * Status reported when the backend could not be reached. Lies outside the
 * HTTP status range so it never collides with a status the backend returns.
 * Downstream consumers match on this exact value.
 */
export const NO_CONNECTION_STATUS = 900;

/** Body published in place of a backend response when the backend was unreachable. */
export interface NoConnectionDocument {
  status: typeof NO_CONNECTION_STATUS;
  reason: string;
}

/**
 * Build the record published on the response topic.
 *
 * On success the value is the backend body, byte for byte. On a transport
 * failure it is a `NoConnectionDocument`. The key is always the inbound key.
 */
export function buildResponse(
  originalKey: Buffer | null,
  outcome: BackendOutcome,
): OutboundRecord {
  if (outcome.type === "success") {
    return {
      key: originalKey,
      value: outcome.body,
      headers: { [HEADER_STATUS_CODE]: String(outcome.statusCode) },
    };
  }
  const document: NoConnectionDocument = {
    status: NO_CONNECTION_STATUS,
    reason: outcome.reason,
  };
  return {
    key: originalKey,
    value: Buffer.from(JSON.stringify(document)),
    headers: { [HEADER_STATUS_CODE]: String(NO_CONNECTION_STATUS) },
  };
}
