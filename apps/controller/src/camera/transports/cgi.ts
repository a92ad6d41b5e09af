/**
 * CGI Transport
 *
 * HTTP digest-authenticated access to the camera's imaging CGI.
 *
 * - GET  /command/inquiry.cgi?inqjs=imaging  → `var Name="value";` lines
 * - POST /command/imaging.cgi?Name=value&... (plus fixed trailing parameters)
 *
 * HTTP 200 means applied. 408, 429, 5xx and the request deadline are
 * transient and retried up to `maxRetries` times; 401 is an auth fault;
 * any other 4xx is a rejection. At most `poolSize` requests are open at once.
 */

import DigestClient from "digest-fetch";
import { CGI_DEFAULTS, HTTP_STATUS } from "@ptz-exposure/config";
import type { CommandKind, CommandOutcome, CommandResult } from "@ptz-exposure/types";
import { errorMessage, sleep } from "@ptz-exposure/utils";
import { Semaphore } from "../../concurrency/mutex";
import { CameraConnectionError } from "../errors";
import { cameraLogger } from "../logger";
import type { CameraEndpoint, CameraTransport, TransportCallOptions } from "../types";
import { failAll, failedResult, okResult } from "./results";

export type HttpMethod = "GET" | "POST";

/** The part of a response the transport reads; met by both fetch Response types */
export interface DigestResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface DigestRequestInit {
  method: HttpMethod;
  signal?: AbortSignal;
}

export interface DigestHttpClient {
  fetch(url: string, init?: DigestRequestInit): Promise<DigestResponse>;
}

export type DigestClientFactory = (username: string, password: string) => DigestHttpClient;

export interface CgiTransportOptions {
  timeoutMs?: number;
  /** Extra attempts after the first, for transient failures only */
  maxRetries?: number;
  retryDelayMs?: number;
  poolSize?: number;
  batchSize?: number;
  /** Appended to every SET request */
  fixedSetParameters?: Record<string, string>;
  createClient?: DigestClientFactory;
  sleep?: (ms: number) => Promise<void>;
}


type HttpOutcome =
  | { outcome: "ok"; body: string; attempts: number }
  | { outcome: Exclude<CommandOutcome, "ok">; detail: string; attempts: number };

const createDigestClient: DigestClientFactory = (username, password) =>
  new DigestClient(username, password);

const INQUIRY_LINE = /var\s+(\w+)\s*=\s*"([^"]*)"/g;

/**
 * Parse an imaging inquiry body into name → raw value
 */
export function parseInquiry(body: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const match of body.matchAll(INQUIRY_LINE)) {
    values.set(match[1], match[2]);
  }
  return values;
}

export function isTransientStatus(status: number): boolean {
  return (
    status === HTTP_STATUS.REQUEST_TIMEOUT ||
    status === HTTP_STATUS.TOO_MANY_REQUESTS ||
    status >= HTTP_STATUS.INTERNAL_SERVER_ERROR
  );
}

export class CgiTransport implements CameraTransport {
  readonly protocol = "cgi" as const;
  readonly batchSize: number;

  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fixedSetParameters: Record<string, string>;
  private readonly createClient: DigestClientFactory;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly pool: Semaphore;

  private client: DigestHttpClient | null = null;

  constructor(
    readonly endpoint: CameraEndpoint,
    options: CgiTransportOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? CGI_DEFAULTS.TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? CGI_DEFAULTS.MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? CGI_DEFAULTS.RETRY_DELAY_MS;
    this.batchSize = options.batchSize ?? CGI_DEFAULTS.BATCH_SIZE;
    this.fixedSetParameters = options.fixedSetParameters ?? CGI_DEFAULTS.FIXED_SET_PARAMETERS;
    this.createClient = options.createClient ?? createDigestClient;
    this.sleep = options.sleep ?? sleep;
    this.pool = new Semaphore(options.poolSize ?? CGI_DEFAULTS.POOL_SIZE);
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Open an authenticated session and probe the inquiry endpoint once
   */
  async connect(): Promise<void> {
    if (this.client) return;

    this.client = this.newClient();
    const probe = await this.request("GET", CGI_DEFAULTS.INQUIRY_PATH);

    if (probe.outcome !== "ok") {
      this.client = null;
      throw new CameraConnectionError(probe.detail, {
        operation: "connect",
        cameraId: this.endpoint.cameraId,
        metadata: { outcome: probe.outcome, attempts: probe.attempts },
      });
    }

    cameraLogger.info("CgiTransport: Connected", {
      cameraId: this.endpoint.cameraId,
      host: this.endpoint.host,
    });
  }

  async disconnect(): Promise<void> {
    if (!this.client) return;
    this.client = null;
    this.pool.cancelWaiting();
    cameraLogger.info("CgiTransport: Disconnected", { cameraId: this.endpoint.cameraId });
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  // ============================================================================
  // Commands
  // ============================================================================

  async getParameters(names: string[], options?: TransportCallOptions): Promise<CommandResult[]> {
    const signal = options?.signal;
    if (!this.client) {
      return failAll(names.map((n) => [n, null]), "get", "error", "not connected");
    }

    const results: CommandResult[] = [];
    for (const batch of chunk(names, this.batchSize)) {
      const response = await this.request("GET", CGI_DEFAULTS.INQUIRY_PATH, signal);

      if (response.outcome !== "ok") {
        results.push(...this.failBatch(batch.map((n) => [n, null]), "get", response));
        continue;
      }

      const values = parseInquiry(response.body);
      for (const name of batch) {
        const raw = values.get(name);
        const value = raw === undefined || raw.trim() === "" ? Number.NaN : Number(raw);

        if (Number.isFinite(value)) {
          results.push(okResult(name, "get", null, value, response.attempts));
        } else {
          results.push(
            failedResult(
              name,
              "get",
              null,
              "rejected",
              response.attempts,
              raw === undefined ? "not reported by camera" : `non-numeric value "${raw}"`,
            ),
          );
        }
      }
    }
    return results;
  }

  async setParameters(
    values: Record<string, number>,
    options?: TransportCallOptions,
  ): Promise<CommandResult[]> {
    const signal = options?.signal;
    const entries = Object.entries(values);
    if (!this.client) {
      return failAll(entries, "set", "error", "not connected");
    }

    const results: CommandResult[] = [];
    for (const batch of chunk(entries, this.batchSize)) {
      const query = new URLSearchParams();
      for (const [name, value] of batch) query.append(name, String(value));
      for (const [name, value] of Object.entries(this.fixedSetParameters)) query.append(name, value);

      const response = await this.request("POST", `${CGI_DEFAULTS.SET_PATH}?${query.toString()}`, signal);

      if (response.outcome === "ok") {
        for (const [name, value] of batch) {
          results.push(okResult(name, "set", value, value, response.attempts));
        }
      } else {
        results.push(...this.failBatch(batch, "set", response));
      }
    }
    return results;
  }

  // ============================================================================
  // HTTP
  // ============================================================================

  private async request(method: HttpMethod, path: string, signal?: AbortSignal): Promise<HttpOutcome> {
    const url = this.url(path);
    const maxAttempts = this.maxRetries + 1;
    let last: HttpOutcome = { outcome: "timeout", detail: "no attempt made", attempts: 0 };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { outcome: "cancelled", detail: "aborted", attempts: attempt - 1 };
      }
      if (attempt > 1) {
        await this.sleep(this.retryDelayMs);
      }

      const client = this.client;
      if (!client) {
        return { outcome: "error", detail: "not connected", attempts: attempt - 1 };
      }

      let release: () => void;
      try {
        release = await this.pool.acquire(signal);
      } catch {
        return { outcome: "cancelled", detail: "aborted", attempts: attempt - 1 };
      }

      const deadline = new AbortController();
      const timer = setTimeout(() => deadline.abort(), this.timeoutMs);
      const onAbort = () => deadline.abort();
      signal?.addEventListener("abort", onAbort, { once: true });

      try {
        const response = await client.fetch(url, { method, signal: deadline.signal });
        const body = await response.text();

        if (response.ok) {
          return { outcome: "ok", body, attempts: attempt };
        }

        if (response.status === HTTP_STATUS.UNAUTHORIZED) {
          return { outcome: "error", detail: "authentication failed (401)", attempts: attempt };
        }

        if (!isTransientStatus(response.status)) {
          return {
            outcome: "rejected",
            detail: `HTTP ${response.status}${body ? `: ${body.trim()}` : ""}`,
            attempts: attempt,
          };
        }

        last = {
          outcome: response.status >= HTTP_STATUS.INTERNAL_SERVER_ERROR ? "error" : "timeout",
          detail: `HTTP ${response.status}`,
          attempts: attempt,
        };
      } catch (error) {
        if (deadline.signal.aborted) {
          this.resetSession();
          if (signal?.aborted) {
            return { outcome: "cancelled", detail: "aborted", attempts: attempt };
          }
          last = { outcome: "timeout", detail: `no response within ${this.timeoutMs}ms`, attempts: attempt };
        } else {
          return { outcome: "error", detail: errorMessage(error), attempts: attempt };
        }
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        release();
      }

      cameraLogger.debug("CgiTransport: Transient failure", {
        cameraId: this.endpoint.cameraId,
        method,
        attempt,
        maxAttempts,
        detail: last.detail,
      });
    }

    return last;
  }

  /**
   * Replace the digest session so no half-finished challenge survives an abort
   */
  private resetSession(): void {
    if (this.client) {
      this.client = this.newClient();
    }
  }

  private newClient(): DigestHttpClient {
    return this.createClient(this.endpoint.username ?? "", this.endpoint.password ?? "");
  }

  private url(path: string): string {
    const port = this.endpoint.port ? `:${this.endpoint.port}` : "";
    return `http://${this.endpoint.host}${port}${path}`;
  }

  private failBatch(
    entries: Array<[string, number | null]>,
    kind: CommandKind,
    response: Exclude<HttpOutcome, { outcome: "ok" }>,
  ): CommandResult[] {
    return entries.map(([name, value]) =>
      failedResult(name, kind, value, response.outcome, response.attempts, response.detail),
    );
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  const step = Math.max(1, size);
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}
