/**
 * Mock Transport and Registry Tests
 *
 * Critical Invariants:
 * - The mock keeps a parameter table and enforces its ranges
 * - Each failure mode produces the outcome it simulates
 * - Transports are created by registered name; unknown names are refused
 */

import { describe, it, expect, vi } from "vitest";
import { UnknownTransportError } from "../errors";
import { createTransport, registeredTransports, registerTransport } from "../transports/factory";
import { MockTransport } from "../transports/mock";
import type { MockTransportOptions } from "../transports/mock";
import { CgiTransport } from "../transports/cgi";
import { ViscaTransport } from "../transports/visca";

const endpoint = { cameraId: "cam-mock", host: "127.0.0.1" };
const noSleep = () => Promise.resolve();

async function connectedMock(options: MockTransportOptions = {}): Promise<MockTransport> {
  const transport = new MockTransport(endpoint, { latencyMs: 0, sleep: noSleep, ...options });
  await transport.connect();
  return transport;
}

describe("MockTransport", () => {
  it("serves the default parameter table", async () => {
    const transport = await connectedMock();

    const results = await transport.getParameters(["ExposureIris", "ExposureGain"]);

    expect(results.map((r) => r.achievedValue)).toEqual([8, 2]);
  });

  it("applies values inside the range and rejects the rest", async () => {
    const transport = await connectedMock();

    const results = await transport.setParameters({ ExposureIris: 12, ExposureGain: 16 });

    expect(results.map((r) => r.outcome)).toEqual(["ok", "rejected"]);
    expect(results[1]?.detail).toBe("value outside 0..15");
    expect(transport.peek("ExposureIris")).toBe(12);
    expect(transport.peek("ExposureGain")).toBe(2);
  });

  it("rejects parameters it does not know", async () => {
    const transport = await connectedMock();

    const [result] = await transport.getParameters(["Zoom"]);

    expect(result).toMatchObject({ outcome: "rejected", detail: "unsupported parameter" });
  });

  it("answers every request with an error before connect", async () => {
    const transport = new MockTransport(endpoint, { latencyMs: 0, sleep: noSleep });

    const results = await transport.getParameters(["ExposureIris"]);

    expect(results[0]).toMatchObject({ outcome: "error", detail: "not connected" });
  });

  it("times out everything in timeout mode", async () => {
    const transport = await connectedMock({ failureMode: "timeout" });

    const results = await transport.setParameters({ ExposureIris: 9, ColorSaturation: 5 });

    expect(results.map((r) => r.outcome)).toEqual(["timeout", "timeout"]);
  });

  it("rejects SET but serves GET in reject mode", async () => {
    const transport = await connectedMock({ failureMode: "reject" });

    const [set] = await transport.setParameters({ ExposureIris: 9 });
    const [get] = await transport.getParameters(["ExposureIris"]);

    expect(set.outcome).toBe("rejected");
    expect(get).toMatchObject({ outcome: "ok", achievedValue: 8 });
  });

  it("times out at the configured rate in flaky mode", async () => {
    const random = vi.fn().mockReturnValueOnce(0.1).mockReturnValueOnce(0.5);
    const transport = await connectedMock({ failureMode: "flaky", flakyRate: 0.2, random });

    const results = await transport.getParameters(["ExposureIris", "ExposureGain"]);

    expect(results.map((r) => r.outcome)).toEqual(["timeout", "ok"]);
  });

  it("drops the link after disconnectAfter operations and refuses to reconnect", async () => {
    const transport = await connectedMock({ failureMode: "disconnect", disconnectAfter: 2 });

    const results = await transport.getParameters(["ExposureIris", "ExposureGain", "ColorSaturation"]);

    expect(results.map((r) => r.outcome)).toEqual(["ok", "ok", "error"]);
    expect(transport.isConnected()).toBe(false);
    await expect(transport.connect()).rejects.toThrow("simulated camera unreachable");
  });

  it("marks operations cancelled once the signal aborts", async () => {
    const transport = await connectedMock();
    const controller = new AbortController();
    controller.abort();

    const results = await transport.setParameters({ ExposureIris: 9 }, { signal: controller.signal });

    expect(results[0]?.outcome).toBe("cancelled");
    expect(transport.peek("ExposureIris")).toBe(8);
  });
});

describe("Transport registry", () => {
  it("has cgi, visca and mock registered", () => {
    expect(registeredTransports()).toEqual(expect.arrayContaining(["cgi", "visca", "mock"]));
  });

  it("creates the transport registered under a name", () => {
    expect(createTransport("cgi", endpoint)).toBeInstanceOf(CgiTransport);
    expect(createTransport("visca", endpoint)).toBeInstanceOf(ViscaTransport);
    expect(createTransport("mock", endpoint, { mock: { failureMode: "reject" } })).toBeInstanceOf(MockTransport);
  });

  it("refuses unknown transports", () => {
    expect(() => createTransport("serial", endpoint)).toThrow(UnknownTransportError);
  });

  it("accepts new protocols by registration", () => {
    registerTransport("loopback", (target) => new MockTransport(target, { latencyMs: 0 }));

    const transport = createTransport("loopback", endpoint);

    expect(transport.protocol).toBe("mock");
    expect(registeredTransports()).toContain("loopback");
  });
});
