import { Agent, fetch, type Dispatcher } from "undici";
import { BoPiConfigError, BoPiConnectionError, BoPiError } from "./errors.js";
import { parseSensorState, SENSORS_PATH, type SensorState } from "./sensors.js";

export interface BoPiClientConfig {
  /** Hostname or IP address of the device, e.g. "192.168.1.50" */
  host: string;
  /** HTTP port. Default: 80. */
  port?: number;
  /** Timeout for a whole request/response exchange, in seconds. Default: 10. */
  requestTimeout?: number;
  /**
   * Dispatcher to send requests through. A supplied session is borrowed and
   * left open by {@link BoPiClient.close}; without one the client creates and
   * owns an `Agent`.
   */
  session?: Dispatcher;
}

export type HttpMethod = "GET" | "POST";

export interface RequestOptions {
  method?: HttpMethod;
  query?: Record<string, string | number | undefined>;
  /** Strings are sent as-is, anything else JSON-encoded. */
  body?: unknown;
}

/** Decoded response: the JSON object, or `{ message }` for plain-text bodies. */
export type BoPiPayload = Record<string, unknown>;

const DEFAULT_PORT = 80;
const DEFAULT_REQUEST_TIMEOUT = 10;
/** Largest delay Node's timers accept, in milliseconds. */
const MAX_TIMER_MS = 2_147_483_647;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return isRecord(err) && err.name === "TimeoutError";
}

function errorStatus(status: number, text: string): BoPiError {
  let detail: unknown;
  try {
    const body: unknown = JSON.parse(text);
    if (isRecord(body)) detail = body.error;
  } catch {
    // Not JSON: report the status alone.
  }
  const message = detail === undefined || detail === null
    ? `API returned error status ${status}`
    : `API returned error status ${status}: ${typeof detail === "string" ? detail : JSON.stringify(detail)}`;
  return new BoPiError(message, { status });
}

/**
 * Async HTTP client for the BoPi pH/redox monitoring box.
 *
 * Configuration is validated in the constructor. Call {@link close} when done,
 * or use {@link withBoPiClient}.
 */
export class BoPiClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private session?: Dispatcher;
  private readonly ownsSession: boolean;

  constructor(config: BoPiClientConfig) {
    const { host, port = DEFAULT_PORT, requestTimeout = DEFAULT_REQUEST_TIMEOUT } = config;

    if (typeof host !== "string" || host.trim() === "") {
      throw new BoPiConfigError("host must be a non-empty string");
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new BoPiConfigError("port must be between 1 and 65535");
    }
    if (!Number.isFinite(requestTimeout) || requestTimeout <= 0) {
      throw new BoPiConfigError("request_timeout must be positive");
    }
    const timeoutMs = Math.max(1, Math.round(requestTimeout * 1000));
    if (timeoutMs > MAX_TIMER_MS) {
      throw new BoPiConfigError(`request_timeout must be at most ${MAX_TIMER_MS / 1000} seconds`);
    }

    const hostname = host.trim();
    this.baseUrl = hostname.includes(":") && !hostname.startsWith("[")
      ? `http://[${hostname}]:${port}`
      : `http://${hostname}:${port}`;
    let parsed: URL;
    try {
      parsed = new URL(this.baseUrl);
    } catch {
      throw new BoPiConfigError("host must be a valid hostname or IP address");
    }
    if (parsed.pathname !== "/" || parsed.search !== "" || parsed.hash !== "" || parsed.username !== "") {
      throw new BoPiConfigError("host must be a valid hostname or IP address");
    }
    this.timeoutMs = timeoutMs;
    this.session = config.session;
    this.ownsSession = config.session === undefined;
  }

  private getSession(): Dispatcher {
    if (!this.session) {
      this.session = new Agent();
    }
    return this.session;
  }

  /**
   * Performs one request against the device and decodes the response.
   *
   * @throws {BoPiConnectionError} on network failure or timeout.
   * @throws {BoPiError} on an error status or undecodable JSON.
   */
  async request(path: string, options: RequestOptions = {}): Promise<BoPiPayload> {
    const { method = "GET", query = {}, body } = options;

    // Appended, not resolved: "//other.host/x" must stay a path on the device.
    const url = new URL(`${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`);
    for (const [k, v] of Object.entries(query)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const headers: Record<string, string> = {
      Accept: "application/json, text/plain, */*",
    };
    let payload: string | undefined;
    if (typeof body === "string") {
      payload = body;
    } else if (body !== undefined) {
      payload = JSON.stringify(body);
      headers["Content-Type"] = "application/json";
    }

    let status: number;
    let contentType: string;
    let text: string;
    try {
      const res = await fetch(url, {
        method,
        headers,
        body: payload,
        dispatcher: this.getSession(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = res.status;
      contentType = res.headers.get("content-type") ?? "";
      text = await res.text();
    } catch (err) {
      if (isTimeout(err)) {
        throw new BoPiConnectionError(
          `Timeout occurred while connecting to the BoPi device at ${url.host}`,
          err,
        );
      }
      throw new BoPiConnectionError(
        `Error occurred while communicating with the BoPi device at ${url.host}`,
        err,
      );
    }

    if (status >= 400) {
      throw errorStatus(status, text);
    }

    if (!contentType.includes("application/json")) {
      return { message: text };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new BoPiError("Failed to parse JSON response", { status, cause: err });
    }
    if (!isRecord(data)) {
      throw new BoPiError("Unexpected JSON response: expected an object", { status });
    }
    return data;
  }

  /** Reads and validates every sensor of the device. */
  async getSensorsState(): Promise<SensorState> {
    const data = await this.request(SENSORS_PATH);
    return parseSensorState(data);
  }

  /** Closes the session if this client created it. */
  async close(): Promise<void> {
    if (!this.ownsSession || !this.session) return;
    const session = this.session;
    this.session = undefined;
    await session.close();
  }
}

/** Runs `fn` with a fresh client and closes it afterwards, whatever the outcome. */
export async function withBoPiClient<T>(
  config: BoPiClientConfig,
  fn: (client: BoPiClient) => Promise<T>,
): Promise<T> {
  const client = new BoPiClient(config);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
