/**
 * Control Error Types
 *
 * Typed error hierarchy for transports, the concurrency controller and
 * configuration loading. All errors carry structured context for logging.
 */

import type { CommandOutcome } from "@ptz-exposure/types";

// ============================================================================
// Error Context Types
// ============================================================================

export interface ControlErrorContext {
  /** Operation being performed when error occurred */
  operation: string;
  cameraId?: string;
  parameter?: string;
  /** Error timestamp (ISO string) */
  timestamp: string;
  metadata?: Record<string, unknown>;
}

type ContextInput = Partial<Omit<ControlErrorContext, "timestamp">>;

// ============================================================================
// Base Control Error
// ============================================================================

export class ControlError extends Error {
  public readonly context: ControlErrorContext;
  public readonly timestamp: string;

  constructor(message: string, context: ContextInput & { operation: string }) {
    super(message);
    this.name = "ControlError";
    this.timestamp = new Date().toISOString();
    this.context = { ...context, timestamp: this.timestamp };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, ControlError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Connection Errors
// ============================================================================

export class CameraConnectionError extends ControlError {
  constructor(message: string, context?: ContextInput, cause?: unknown) {
    super(`Camera connection error: ${message}`, {
      ...context,
      operation: context?.operation || "connect",
    });
    this.name = "CameraConnectionError";
    this.cause = cause;
    Object.setPrototypeOf(this, CameraConnectionError.prototype);
  }
}

export class ReconnectFailedError extends ControlError {
  public readonly attempts: number;

  constructor(attempts: number, context?: ContextInput) {
    super(`Camera reconnection failed after ${attempts} attempts`, {
      ...context,
      operation: context?.operation || "reconnect",
    });
    this.name = "ReconnectFailedError";
    this.attempts = attempts;
    Object.setPrototypeOf(this, ReconnectFailedError.prototype);
  }
}

// ============================================================================
// Command Errors
// ============================================================================

export class ProtocolRejectedError extends ControlError {
  public readonly reason: string;

  constructor(reason: string, context?: ContextInput) {
    super(`Camera rejected command: ${reason}`, {
      ...context,
      operation: context?.operation || "set",
    });
    this.name = "ProtocolRejectedError";
    this.reason = reason;
    Object.setPrototypeOf(this, ProtocolRejectedError.prototype);
  }
}

export class CommandTimeoutError extends ControlError {
  public readonly timeoutMs: number;
  public readonly attempts: number;

  constructor(timeoutMs: number, attempts: number, context?: ContextInput) {
    super(`Command timed out after ${attempts} attempt(s) of ${timeoutMs}ms`, {
      ...context,
      operation: context?.operation || "command",
    });
    this.name = "CommandTimeoutError";
    this.timeoutMs = timeoutMs;
    this.attempts = attempts;
    Object.setPrototypeOf(this, CommandTimeoutError.prototype);
  }
}

export class OperationCancelledError extends ControlError {
  constructor(context?: ContextInput) {
    super("Operation cancelled", {
      ...context,
      operation: context?.operation || "command",
    });
    this.name = "OperationCancelledError";
    Object.setPrototypeOf(this, OperationCancelledError.prototype);
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends ControlError {
  public readonly issues: string[];

  constructor(issues: string[], context?: ContextInput) {
    super(`Invalid configuration: ${issues.join("; ")}`, {
      ...context,
      operation: context?.operation || "configure",
    });
    this.name = "ConfigurationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class UnknownTransportError extends ConfigurationError {
  public readonly transport: string;

  constructor(transport: string, registered: string[]) {
    super([
      `Unknown transport "${transport}" (registered: ${registered.join(", ") || "none"})`,
    ]);
    this.name = "UnknownTransportError";
    this.transport = transport;
    Object.setPrototypeOf(this, UnknownTransportError.prototype);
  }
}

// ============================================================================
// Outcome Mapping
// ============================================================================

/**
 * Map a thrown error to the outcome recorded on a CommandResult
 */
export function outcomeForError(error: unknown): CommandOutcome {
  if (error instanceof ProtocolRejectedError) return "rejected";
  if (error instanceof CommandTimeoutError) return "timeout";
  if (error instanceof OperationCancelledError) return "cancelled";
  return "error";
}

/**
 * Check if an error is transient and worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof CommandTimeoutError) return true;
  if (error instanceof CameraConnectionError) return true;
  return false;
}

/**
 * Outcomes that count against a connection's health
 */
export function isFailureOutcome(outcome: CommandOutcome): boolean {
  return outcome === "timeout" || outcome === "error";
}
