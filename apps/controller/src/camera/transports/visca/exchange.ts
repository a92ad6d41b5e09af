/**
 * VISCA Command Exchange
 *
 * One attempt of one command or inquiry, tracked as an explicit state machine.
 * Commands move SENT → AWAITING_ACK → AWAITING_COMPLETION → DONE; inquiries
 * skip the ACK. A completion that arrives before its ACK is held until the
 * ACK is seen. A single deadline covers the whole exchange.
 */

import type { ViscaErrorReason, ViscaReply } from "./packet";
import { isRejection, isRetryableReason } from "./packet";

// ============================================================================
// States
// ============================================================================

export type ViscaCommandState =
  | "SENT"
  | "AWAITING_ACK"
  | "AWAITING_COMPLETION"
  | "DONE"
  | "TIMEOUT"
  | "REJECTED"
  | "FAILED";

export const TERMINAL_STATES: ViscaCommandState[] = [
  "DONE",
  "TIMEOUT",
  "REJECTED",
  "FAILED",
];

export const VALID_TRANSITIONS: Record<ViscaCommandState, ViscaCommandState[]> = {
  SENT: ["AWAITING_ACK", "AWAITING_COMPLETION", "FAILED"],
  AWAITING_ACK: ["AWAITING_COMPLETION", "REJECTED", "FAILED", "TIMEOUT"],
  AWAITING_COMPLETION: ["DONE", "REJECTED", "FAILED", "TIMEOUT"],
  DONE: [],
  TIMEOUT: [],
  REJECTED: [],
  FAILED: [],
};

export type ExchangeKind = "command" | "inquiry";

export type ExchangeOutcome =
  | { state: "DONE"; data: Buffer }
  | { state: "TIMEOUT"; phase: "ack" | "completion" }
  | { state: "REJECTED"; reason: ViscaErrorReason }
  | { state: "FAILED"; reason: ViscaErrorReason | "send_failed" | "socket_error"; retryable: boolean };

export interface ExchangeTransition {
  from: ViscaCommandState;
  to: ViscaCommandState;
}

export class ViscaExchange {
  private current: ViscaCommandState = "SENT";
  private earlyCompletion: Buffer | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly settle: Array<(outcome: ExchangeOutcome) => void> = [];

  readonly history: ExchangeTransition[] = [];
  readonly outcome = new Promise<ExchangeOutcome>((resolve) => {
    this.settle.push(resolve);
  });

  constructor(
    readonly kind: ExchangeKind,
    readonly sequence: number,
    private readonly timeoutMs: number,
  ) {}

  get state(): ViscaCommandState {
    return this.current;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.current);
  }

  /**
   * The packet is handed to the socket; start the deadline
   */
  sent(): void {
    this.transition(this.kind === "command" ? "AWAITING_ACK" : "AWAITING_COMPLETION");
    this.timer = setTimeout(() => {
      this.timer = null;
      const phase = this.current === "AWAITING_ACK" ? "ack" : "completion";
      this.finish("TIMEOUT", { state: "TIMEOUT", phase });
    }, this.timeoutMs);
  }

  sendFailed(): void {
    if (this.isTerminal()) return;
    this.finish("FAILED", { state: "FAILED", reason: "send_failed", retryable: false });
  }

  /**
   * The socket reported a fault while the exchange was open
   */
  socketError(): void {
    if (this.isTerminal()) return;
    this.finish("FAILED", { state: "FAILED", reason: "socket_error", retryable: false });
  }

  receive(reply: ViscaReply): void {
    if (this.isTerminal()) return;

    switch (reply.kind) {
      case "ack":
        if (this.current === "AWAITING_ACK") {
          this.transition("AWAITING_COMPLETION");
          if (this.earlyCompletion) {
            const data = this.earlyCompletion;
            this.earlyCompletion = null;
            this.finish("DONE", { state: "DONE", data });
          }
        }
        return;

      case "completion":
        if (this.current === "AWAITING_ACK") {
          this.earlyCompletion = reply.data;
          return;
        }
        if (this.current === "AWAITING_COMPLETION") {
          this.finish("DONE", { state: "DONE", data: reply.data });
        }
        return;

      case "error":
        if (isRejection(reply.reason)) {
          this.finish("REJECTED", { state: "REJECTED", reason: reply.reason });
        } else {
          this.finish("FAILED", {
            state: "FAILED",
            reason: reply.reason,
            retryable: isRetryableReason(reply.reason),
          });
        }
        return;

      case "unknown":
        return;
    }
  }

  /**
   * Abandon the exchange (shutdown or socket closed)
   */
  abandon(): void {
    if (this.isTerminal()) return;
    this.finish("FAILED", { state: "FAILED", reason: "cancelled", retryable: false });
  }

  private finish(to: ViscaCommandState, outcome: ExchangeOutcome): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.transition(to);
    for (const resolve of this.settle) resolve(outcome);
  }

  private transition(to: ViscaCommandState): void {
    const allowed = VALID_TRANSITIONS[this.current];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid VISCA exchange transition ${this.current} → ${to}`);
    }
    this.history.push({ from: this.current, to });
    this.current = to;
  }
}
