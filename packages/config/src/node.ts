/**
 * Node.js-specific configuration constants
 * These require Node.js environment (process.env access)
 */

// ============================================================================
// Paths Configuration (Node.js only - uses process.env)
// ============================================================================

export const PATHS = {
  /** Control configuration (cameras, cost weights, hysteresis, concurrency) */
  CONTROL_CONFIG: process.env.CONTROL_CONFIG_PATH ?? "./config/control.json",
  /** Log files */
  LOGS: "./logs",
} as const;

// ============================================================================
// Environment Detection
// ============================================================================

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

export function isLogSilent(): boolean {
  return process.env.LOG_SILENT === "true";
}
