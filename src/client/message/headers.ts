import type { IHeaders } from "kafkajs";
import type { MessageHeaders } from "../types";

/** Status of the backend exchange: the HTTP status, or `900` when the backend was unreachable. */
export const HEADER_STATUS_CODE = "x-status-code";

/**
 * Decode kafkajs headers (`Record<string, Buffer | string | undefined>`)
 * into plain `Record<string, string>`.
 */
export function decodeHeaders(raw: IHeaders | undefined): MessageHeaders {
  if (!raw) return {};
  const result: MessageHeaders = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      // Repeated header keys: last one wins.
      const items = value.map((v) => (Buffer.isBuffer(v) ? v.toString() : v));
      result[key] = items[items.length - 1] ?? "";
    } else {
      result[key] = Buffer.isBuffer(value) ? value.toString() : value;
    }
  }
  return result;
}
