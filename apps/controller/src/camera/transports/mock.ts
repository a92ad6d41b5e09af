/**
 * Mock Camera Transport
 * Simulated camera for development without hardware and for tests.
 * Failure simulation via the `failureMode` option (MOCK_FAILURE_MODE).
 */

import type { CommandKind, CommandResult, ParameterRange } from "@ptz-exposure/types";
import { sleep } from "@ptz-exposure/utils";
import { CameraConnectionError } from "../errors";
import { cameraLogger } from "../logger";
import type { CameraEndpoint, CameraTransport, TransportCallOptions } from "../types";
import { failAll, failedResult, okResult } from "./results";

export type MockFailureMode = "none" | "flaky" | "timeout" | "reject" | "disconnect";

export const MOCK_FAILURE_MODES: MockFailureMode[] = [
  "none",
  "flaky",
  "timeout",
  "reject",
  "disconnect",
];

export interface MockParameter extends ParameterRange {
  value: number;
}

export interface MockTransportOptions {
  parameters?: Record<string, MockParameter>;
  failureMode?: MockFailureMode;
  /** Simulated round trip per operation */
  latencyMs?: number;
  /** Share of operations that time out in `flaky` mode */
  flakyRate?: number;
  /** Operations served before the link drops in `disconnect` mode */
  disconnectAfter?: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_PARAMETERS: Record<string, MockParameter> = {
  ExposureIris: { min: 0, max: 17, step: 1, value: 8 },
  ExposureExposureTime: { min: 0, max: 21, step: 1, value: 10 },
  ExposureGain: { min: 0, max: 15, step: 1, value: 2 },
  DigitalBrightLevel: { min: 0, max: 15, step: 1, value: 7 },
  ColorSaturation: { min: 0, max: 14, step: 1, value: 7 },
};

export class MockTransport implements CameraTransport {
  readonly protocol = "mock" as const;
  readonly batchSize = 5;

  private readonly parameters: Map<string, MockParameter>;
  private readonly failureMode: MockFailureMode;
  private readonly latencyMs: number;
  private readonly flakyRate: number;
  private readonly disconnectAfter: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private connected = false;
  private served = 0;

  constructor(
    readonly endpoint: CameraEndpoint,
    options: MockTransportOptions = {},
  ) {
    const table = options.parameters ?? DEFAULT_PARAMETERS;
    this.parameters = new Map(Object.entries(table).map(([name, p]) => [name, { ...p }]));
    this.failureMode = options.failureMode ?? "none";
    this.latencyMs = options.latencyMs ?? 5;
    this.flakyRate = options.flakyRate ?? 0.2;
    this.disconnectAfter = options.disconnectAfter ?? 50;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;

    cameraLogger.info("MockTransport: Created", {
      cameraId: endpoint.cameraId,
      failureMode: this.failureMode,
    });
  }

  async connect(): Promise<void> {
    if (this.failureMode === "disconnect" && this.served >= this.disconnectAfter) {
      throw new CameraConnectionError("simulated camera unreachable", {
        cameraId: this.endpoint.cameraId,
      });
    }
    await this.sleep(this.latencyMs);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Current simulated value, for tests and the development console
   */
  peek(name: string): number | undefined {
    return this.parameters.get(name)?.value;
  }

  async getParameters(names: string[], options?: TransportCallOptions): Promise<CommandResult[]> {
    return this.run(
      names.map((name): [string, number | null] => [name, null]),
      "get",
      options?.signal,
    );
  }

  async setParameters(
    values: Record<string, number>,
    options?: TransportCallOptions,
  ): Promise<CommandResult[]> {
    return this.run(Object.entries(values), "set", options?.signal);
  }

  private async run(
    entries: Array<[string, number | null]>,
    kind: CommandKind,
    signal?: AbortSignal,
  ): Promise<CommandResult[]> {
    if (!this.connected) {
      return failAll(entries, kind, "error", "not connected");
    }

    const results: CommandResult[] = [];
    for (const [name, value] of entries) {
      if (signal?.aborted) {
        results.push(failedResult(name, kind, value, "cancelled", 0, "aborted"));
        continue;
      }
      await this.sleep(this.latencyMs);
      results.push(this.apply(name, kind, value));
    }
    return results;
  }

  private apply(name: string, kind: CommandKind, value: number | null): CommandResult {
    this.served++;

    switch (this.failureMode) {
      case "timeout":
        return failedResult(name, kind, value, "timeout", 1, "simulated timeout");
      case "flaky":
        if (this.random() < this.flakyRate) {
          return failedResult(name, kind, value, "timeout", 1, "simulated flaky link");
        }
        break;
      case "disconnect":
        if (this.served > this.disconnectAfter) {
          if (this.connected) {
            cameraLogger.warn("MockTransport: Simulated disconnect", {
              cameraId: this.endpoint.cameraId,
              served: this.served,
            });
          }
          this.connected = false;
          return failedResult(name, kind, value, "error", 1, "simulated disconnect");
        }
        break;
      case "reject":
        if (kind === "set") {
          return failedResult(name, kind, value, "rejected", 1, "simulated rejection");
        }
        break;
      case "none":
        break;
    }

    const parameter = this.parameters.get(name);
    if (!parameter) {
      return failedResult(name, kind, value, "rejected", 1, "unsupported parameter");
    }

    if (value === null) {
      return okResult(name, kind, null, parameter.value, 1);
    }

    if (value < parameter.min || value > parameter.max) {
      return failedResult(name, kind, value, "rejected", 1, `value outside ${parameter.min}..${parameter.max}`);
    }

    parameter.value = value;
    return okResult(name, kind, value, value, 1);
  }
}
