import { Agent, type Dispatcher, request } from "undici";
import type { BackendOutcome, IBackendClient } from "../types";
import { routeRequest } from "./mtb-file";

export interface BackendClientOptions {
  /** Base URI without a trailing slash, e.g. `http://backend:8080/api`. */
  baseUri: string;
  /** Upper bound for one exchange, connect to last body byte. */
  timeoutMs: number;
  /** Dispatcher to send through. Defaults to a keep-alive `Agent` owned by this client. */
  dispatcher?: Dispatcher;
}

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_ABORTED",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

const CODE_REASONS = new Map<string, string>([
  ["ECONNREFUSED", "connection refused"],
  ["ECONNRESET", "connection reset"],
  ["ENOTFOUND", "host not found"],
  ["EAI_AGAIN", "host not found"],
  ["EHOSTUNREACH", "host unreachable"],
  ["ENETUNREACH", "network unreachable"],
  ["UND_ERR_SOCKET", "connection closed"],
]);

/** Used when an error carries neither a known code nor a message. */
export const DEFAULT_FAILURE_REASON = "No HTTP connection";

type ErrorField = "code" | "name" | "message";

// Read from the raw value: errors thrown by undici may come from another
// realm and fail `instanceof Error`.
function stringField(value: unknown, field: ErrorField): string | undefined {
  if (typeof value === "object" && value !== null && field in value) {
    const found: unknown = Reflect.get(value, field);
    if (typeof found === "string") return found;
  }
  return undefined;
}

function causeOf(value: unknown): unknown {
  return typeof value === "object" && value !== null && "cause" in value
    ? value.cause
    : undefined;
}

/** Turn whatever the HTTP stack threw into a short, non-empty reason. */
export function describeTransportFailure(
  error: unknown,
  timeoutMs: number,
): string {
  const code = stringField(error, "code") ?? stringField(causeOf(error), "code");
  const name = stringField(error, "name");
  if (
    name === "TimeoutError" ||
    name === "AbortError" ||
    (code !== undefined && TIMEOUT_CODES.has(code))
  ) {
    return `timed out after ${timeoutMs}ms`;
  }
  const known = code !== undefined ? CODE_REASONS.get(code) : undefined;
  const message = stringField(error, "message") ?? String(error);
  return known ?? (message.trim() || DEFAULT_FAILURE_REASON);
}

/**
 * Read the whole response body. The status line already arrived, so a body
 * cut off midway still counts as an answer, with an empty body.
 */
async function readBody(response: Dispatcher.ResponseData): Promise<Buffer> {
  try {
    return Buffer.from(await response.body.arrayBuffer());
  } catch {
    return Buffer.alloc(0);
  }
}

/**
 * Sends MTB files to the backend, one request per call, no retries.
 *
 * Any response the backend sends back is a `success`, whatever its status.
 * Only failing to get a response at all is a `transport-failure`.
 */
export class BackendClient implements IBackendClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: BackendClientOptions) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: { timeout: options.timeoutMs },
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      });
  }

  public async forward(payload: Buffer | null): Promise<BackendOutcome> {
    const target = routeRequest(payload);
    let response: Dispatcher.ResponseData;
    try {
      response = await request(`${this.options.baseUri}${target.path}`, {
        method: target.method,
        headers: { "content-type": "application/json" },
        body: target.body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      return {
        type: "transport-failure",
        reason: describeTransportFailure(error, this.options.timeoutMs),
      };
    }
    return {
      type: "success",
      statusCode: response.statusCode,
      body: await readBody(response),
    };
  }

  /** Close the keep-alive connections. An injected dispatcher is left open. */
  public async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }
}
