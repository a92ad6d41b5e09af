/**
 * Camera transport type definitions
 */

import type { CommandResult, ProtocolType } from "@ptz-exposure/types";

export interface CameraEndpoint {
  cameraId: string;
  host: string;
  port?: number;
  username?: string;
  password?: string;
}

export interface TransportCallOptions {
  /** Aborts queued retries and in-flight requests; results surface as `cancelled` */
  signal?: AbortSignal;
}

/**
 * Camera transport interface
 * One instance talks to one camera. Per-parameter failures are reported
 * through CommandResult outcomes, never thrown.
 */
export interface CameraTransport {
  readonly protocol: ProtocolType;
  readonly endpoint: CameraEndpoint;
  /** Parameters sent back-to-back in one batch */
  readonly batchSize: number;

  // Lifecycle

  /**
   * Open the connection (socket, connection pool, auth session)
   * @throws CameraConnectionError when the camera is unreachable
   */
  connect(): Promise<void>;

  disconnect(): Promise<void>;

  isConnected(): boolean;

  // Commands

  /**
   * Read parameter values; one result per requested name, in order
   */
  getParameters(
    names: string[],
    options?: TransportCallOptions,
  ): Promise<CommandResult[]>;

  /**
   * Write parameter values; one result per entry, in insertion order
   */
  setParameters(
    values: Record<string, number>,
    options?: TransportCallOptions,
  ): Promise<CommandResult[]>;
}

export type TransportFactory<TOptions = unknown> = (
  endpoint: CameraEndpoint,
  options: TOptions,
) => CameraTransport;
