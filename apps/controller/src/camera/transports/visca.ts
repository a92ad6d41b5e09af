/**
 * VISCA-over-IP Transport
 *
 * UDP command/inquiry exchange with one camera. Every attempt is a
 * ViscaExchange keyed by its sequence number; replies are routed back to it
 * by the sequence number in the VISCA-over-IP header. Parameters are sent in
 * batches, back-to-back with a fixed spacing between packets.
 */

import { VISCA_DEFAULTS } from "@ptz-exposure/config";
import type { CommandKind, CommandOutcome, CommandResult } from "@ptz-exposure/types";
import { errorMessage, formatHex, sleep } from "@ptz-exposure/utils";
import { cameraLogger } from "../logger";
import type { CameraEndpoint, CameraTransport, TransportCallOptions } from "../types";
import { failAll, failedResult, okResult } from "./results";
import { openUdpChannel } from "./visca/channel";
import type { ChannelOpener, DatagramChannel } from "./visca/channel";
import { ViscaExchange } from "./visca/exchange";
import type { ExchangeOutcome } from "./visca/exchange";
import {
  buildInquiryPayload,
  buildSetPayload,
  decodeInquiryValue,
  decodePacket,
  decodeReply,
  encodePacket,
  PAYLOAD_TYPE,
  VISCA_COMMANDS,
} from "./visca/packet";

export interface ViscaTransportOptions {
  timeoutMs?: number;
  /** Extra attempts after the first */
  maxRetries?: number;
  retryDelayMs?: number;
  batchSize?: number;
  commandSpacingMs?: number;
  openChannel?: ChannelOpener;
  sleep?: (ms: number) => Promise<void>;
}

type ViscaRequest =
  | { kind: "get"; name: string }
  | { kind: "set"; name: string; value: number };

const MAX_SEQUENCE = 0xffffffff;

export class ViscaTransport implements CameraTransport {
  readonly protocol = "visca" as const;
  readonly batchSize: number;

  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly commandSpacingMs: number;
  private readonly openChannel: ChannelOpener;
  private readonly sleep: (ms: number) => Promise<void>;

  private channel: DatagramChannel | null = null;
  /** Set by a socket fault; the channel is replaced on the next connect() */
  private broken = false;
  private sequence = 0;
  private readonly pending = new Map<number, ViscaExchange>();

  constructor(
    readonly endpoint: CameraEndpoint,
    options: ViscaTransportOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? VISCA_DEFAULTS.TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? VISCA_DEFAULTS.MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? VISCA_DEFAULTS.RETRY_DELAY_MS;
    this.batchSize = options.batchSize ?? VISCA_DEFAULTS.BATCH_SIZE;
    this.commandSpacingMs = options.commandSpacingMs ?? VISCA_DEFAULTS.COMMAND_SPACING_MS;
    this.openChannel = options.openChannel ?? openUdpChannel;
    this.sleep = options.sleep ?? sleep;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async connect(): Promise<void> {
    if (this.channel && !this.broken) return;
    if (this.channel) await this.disconnect();

    const port = this.endpoint.port ?? VISCA_DEFAULTS.PORT;
    const channel = await this.openChannel(this.endpoint.host, port);
    channel.onMessage((packet) => this.handlePacket(packet));
    channel.onError((error) => this.handleSocketError(channel, error));
    this.channel = channel;
    this.broken = false;

    cameraLogger.info("ViscaTransport: Connected", {
      cameraId: this.endpoint.cameraId,
      host: this.endpoint.host,
      port,
    });
  }

  async disconnect(): Promise<void> {
    const channel = this.channel;
    if (!channel) return;

    this.channel = null;
    this.broken = false;
    for (const exchange of this.pending.values()) {
      exchange.abandon();
    }
    this.pending.clear();
    await channel.close();

    cameraLogger.info("ViscaTransport: Disconnected", {
      cameraId: this.endpoint.cameraId,
    });
  }

  isConnected(): boolean {
    return this.channel !== null && !this.broken;
  }

  // ============================================================================
  // Commands
  // ============================================================================

  getParameters(names: string[], options?: TransportCallOptions): Promise<CommandResult[]> {
    return this.runBatches(
      names.map((name): ViscaRequest => ({ kind: "get", name })),
      options?.signal,
    );
  }

  setParameters(
    values: Record<string, number>,
    options?: TransportCallOptions,
  ): Promise<CommandResult[]> {
    return this.runBatches(
      Object.entries(values).map(([name, value]): ViscaRequest => ({ kind: "set", name, value })),
      options?.signal,
    );
  }

  private async runBatches(
    requests: ViscaRequest[],
    signal?: AbortSignal,
  ): Promise<CommandResult[]> {
    if (requests.length === 0) return [];

    if (!this.isConnected()) {
      return failAll(
        requests.map((r) => [r.name, requestedValue(r)]),
        requests[0].kind,
        "error",
        "not connected",
      );
    }

    const results: CommandResult[] = [];
    for (let start = 0; start < requests.length; start += this.batchSize) {
      const batch = requests.slice(start, start + this.batchSize);
      const inFlight: Array<Promise<CommandResult>> = [];

      for (const [index, request] of batch.entries()) {
        if (index > 0) await this.sleep(this.commandSpacingMs);
        inFlight.push(this.execute(request, signal));
      }

      results.push(...(await Promise.all(inFlight)));

      if (start + this.batchSize < requests.length) {
        await this.sleep(this.commandSpacingMs);
      }
    }
    return results;
  }

  /**
   * Run one request through up to maxRetries + 1 exchanges
   */
  private async execute(request: ViscaRequest, signal?: AbortSignal): Promise<CommandResult> {
    const { kind, name } = request;
    const value = requestedValue(request);
    const command = VISCA_COMMANDS[name];

    if (!command) {
      return failedResult(name, kind, value, "rejected", 0, "unsupported parameter");
    }

    let payload: Buffer;
    try {
      payload =
        request.kind === "set"
          ? buildSetPayload(command, request.value)
          : buildInquiryPayload(command);
    } catch (error) {
      if (error instanceof RangeError) {
        return failedResult(name, kind, value, "rejected", 0, error.message);
      }
      throw error;
    }

    const maxAttempts = this.maxRetries + 1;
    let lastOutcome: Exclude<CommandOutcome, "ok"> = "timeout";
    let lastDetail = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return failedResult(name, kind, value, "cancelled", attempt - 1, "aborted");
      }
      if (attempt > 1) {
        await this.sleep(this.retryDelayMs);
      }

      const channel = this.channel;
      if (!channel || this.broken) {
        return failedResult(name, kind, value, "error", attempt - 1, "socket closed");
      }

      const outcome = await this.exchange(channel, kind, payload, signal);

      switch (outcome.state) {
        case "DONE": {
          if (request.kind === "set") {
            return okResult(name, kind, request.value, request.value, attempt);
          }
          const read = decodeInquiryValue(command, outcome.data);
          if (read !== null) {
            return okResult(name, kind, null, read, attempt);
          }
          lastOutcome = "error";
          lastDetail = `malformed inquiry reply ${formatHex(outcome.data)}`;
          break;
        }

        case "REJECTED":
          return failedResult(name, kind, value, "rejected", attempt, outcome.reason);

        case "TIMEOUT":
          lastOutcome = "timeout";
          lastDetail = `no ${outcome.phase} within ${this.timeoutMs}ms`;
          break;

        case "FAILED":
          if (signal?.aborted) {
            return failedResult(name, kind, value, "cancelled", attempt, "aborted");
          }
          if (!outcome.retryable) {
            return failedResult(name, kind, value, "error", attempt, outcome.reason);
          }
          lastOutcome = "error";
          lastDetail = outcome.reason;
          break;
      }

      cameraLogger.debug("ViscaTransport: Attempt failed", {
        cameraId: this.endpoint.cameraId,
        parameter: name,
        attempt,
        maxAttempts,
        detail: lastDetail,
      });
    }

    return failedResult(name, kind, value, lastOutcome, maxAttempts, lastDetail);
  }

  private async exchange(
    channel: DatagramChannel,
    kind: CommandKind,
    payload: Buffer,
    signal?: AbortSignal,
  ): Promise<ExchangeOutcome> {
    const sequence = this.nextSequence();
    const exchange = new ViscaExchange(
      kind === "set" ? "command" : "inquiry",
      sequence,
      this.timeoutMs,
    );
    const onAbort = () => exchange.abandon();

    this.pending.set(sequence, exchange);
    signal?.addEventListener("abort", onAbort, { once: true });

    const packet = encodePacket(
      kind === "set" ? PAYLOAD_TYPE.COMMAND : PAYLOAD_TYPE.INQUIRY,
      sequence,
      payload,
    );

    try {
      exchange.sent();
      await channel.send(packet);
    } catch (error) {
      cameraLogger.warn("ViscaTransport: Send failed", {
        cameraId: this.endpoint.cameraId,
        sequence,
        error: errorMessage(error),
      });
      exchange.sendFailed();
    }

    try {
      return await exchange.outcome;
    } finally {
      this.pending.delete(sequence);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Fail every open exchange and report the link as down until reconnected
   */
  private handleSocketError(channel: DatagramChannel, error: Error): void {
    if (channel !== this.channel) return;

    this.broken = true;
    for (const exchange of this.pending.values()) {
      exchange.socketError();
    }

    cameraLogger.warn("ViscaTransport: Link lost", {
      cameraId: this.endpoint.cameraId,
      error: error.message,
      pending: this.pending.size,
    });
  }

  private handlePacket(packet: Buffer): void {
    const decoded = decodePacket(packet);
    if (!decoded) {
      cameraLogger.debug("ViscaTransport: Dropped malformed packet", {
        cameraId: this.endpoint.cameraId,
        bytes: formatHex(packet),
      });
      return;
    }

    const exchange = this.pending.get(decoded.sequence);
    if (!exchange) {
      cameraLogger.debug("ViscaTransport: Dropped reply for unknown sequence", {
        cameraId: this.endpoint.cameraId,
        sequence: decoded.sequence,
      });
      return;
    }

    exchange.receive(decodeReply(decoded.payload));
  }

  private nextSequence(): number {
    this.sequence = this.sequence >= MAX_SEQUENCE ? 1 : this.sequence + 1;
    return this.sequence;
  }
}

function requestedValue(request: ViscaRequest): number | null {
  return request.kind === "set" ? request.value : null;
}
