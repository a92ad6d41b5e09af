/**
 * CommandResult builders shared by the transports
 */

import type { CommandKind, CommandOutcome, CommandResult } from "@ptz-exposure/types";

export function okResult(
  parameterName: string,
  kind: CommandKind,
  requestedValue: number | null,
  achievedValue: number,
  attempts: number,
): CommandResult {
  return {
    parameterName,
    kind,
    requestedValue,
    achievedValue,
    outcome: "ok",
    attempts,
  };
}

export function failedResult(
  parameterName: string,
  kind: CommandKind,
  requestedValue: number | null,
  outcome: Exclude<CommandOutcome, "ok">,
  attempts: number,
  detail?: string,
): CommandResult {
  return {
    parameterName,
    kind,
    requestedValue,
    achievedValue: null,
    outcome,
    attempts,
    ...(detail ? { detail } : {}),
  };
}

/**
 * Same outcome for every requested parameter (not connected, cancelled before dispatch)
 */
export function failAll(
  entries: Array<[string, number | null]>,
  kind: CommandKind,
  outcome: Exclude<CommandOutcome, "ok">,
  detail: string,
): CommandResult[] {
  return entries.map(([name, value]) => failedResult(name, kind, value, outcome, 0, detail));
}
