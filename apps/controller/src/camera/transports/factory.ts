/**
 * Transport Registry
 * Transports are registered by name; new protocols are added by registering
 * another factory, never by subclassing an existing transport.
 */

import { UnknownTransportError } from "../errors";
import { cameraLogger } from "../logger";
import type { CameraEndpoint, CameraTransport, TransportFactory } from "../types";
import { CgiTransport } from "./cgi";
import type { CgiTransportOptions } from "./cgi";
import { MockTransport } from "./mock";
import type { MockTransportOptions } from "./mock";
import { ViscaTransport } from "./visca";
import type { ViscaTransportOptions } from "./visca";

/**
 * Per-protocol options; each factory reads its own section
 */
export interface TransportOptions {
  cgi?: CgiTransportOptions;
  visca?: ViscaTransportOptions;
  mock?: MockTransportOptions;
}

const registry = new Map<string, TransportFactory<TransportOptions>>();

export function registerTransport(name: string, factory: TransportFactory<TransportOptions>): void {
  if (registry.has(name)) {
    cameraLogger.warn(`TransportRegistry: Replacing transport "${name}"`);
  }
  registry.set(name, factory);
}

export function registeredTransports(): string[] {
  return Array.from(registry.keys());
}

/**
 * Create a transport by registered name
 * @throws UnknownTransportError
 */
export function createTransport(
  name: string,
  endpoint: CameraEndpoint,
  options: TransportOptions = {},
): CameraTransport {
  const factory = registry.get(name);
  if (!factory) {
    throw new UnknownTransportError(name, registeredTransports());
  }

  cameraLogger.info("TransportRegistry: Creating transport", {
    transport: name,
    cameraId: endpoint.cameraId,
    host: endpoint.host,
  });
  return factory(endpoint, options);
}

registerTransport("cgi", (endpoint, options) => new CgiTransport(endpoint, options.cgi));
registerTransport("visca", (endpoint, options) => new ViscaTransport(endpoint, options.visca));
registerTransport("mock", (endpoint, options) => new MockTransport(endpoint, options.mock));
