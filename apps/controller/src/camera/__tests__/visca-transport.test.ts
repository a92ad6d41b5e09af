/**
 * VISCA Transport Tests
 *
 * Drives the VISCA-over-IP transport against an in-process camera that
 * answers on a fake datagram channel.
 *
 * Critical Invariants:
 * - Replies are matched to requests by sequence number
 * - A command that is only ACKed is retried maxRetries times, then times out
 * - Rejections are never retried
 * - Retryable camera errors (buffer full) are retried
 * - Values outside the command's range never reach the wire
 * - Commands in a batch are spaced by commandSpacingMs
 * - A socket fault fails open exchanges and drops the link until reconnected
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import { DEFAULT_COST_WEIGHTS } from "@ptz-exposure/config";
import { AdjustmentEngine } from "../../adjustment/engine";
import { ParameterCostModel } from "../../adjustment/cost-model";
import { ViscaTransport } from "../transports/visca";
import type { DatagramChannel } from "../transports/visca/channel";
import {
  decodePacket,
  encodePacket,
  fromNibbles,
  PAYLOAD_TYPE,
  toNibbles,
  VISCA_COMMANDS,
} from "../transports/visca/packet";

type Behavior = "complete" | "ack_only" | "silent" | "syntax_error" | "buffer_full";

/**
 * In-process VISCA camera
 * Each send consumes the next scripted behavior; "complete" once the script is empty.
 */
class FakeViscaCamera implements DatagramChannel {
  readonly sent: Buffer[] = [];
  readonly values = new Map<number, number>();
  script: Behavior[] = [];
  closed = false;

  private listener: ((packet: Buffer) => void) | null = null;
  private errorListener: ((error: Error) => void) | null = null;

  async send(packet: Buffer): Promise<void> {
    this.sent.push(packet);
    const behavior = this.script.shift() ?? "complete";
    setImmediate(() => this.answer(packet, behavior));
  }

  onMessage(listener: (packet: Buffer) => void): void {
    this.listener = listener;
  }

  onError(listener: (error: Error) => void): void {
    this.errorListener = listener;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  fail(error: Error): void {
    this.errorListener?.(error);
  }

  private answer(packet: Buffer, behavior: Behavior): void {
    const decoded = decodePacket(packet);
    if (!decoded || behavior === "silent") return;

    const { sequence, payload } = decoded;
    const reply = (bytes: number[]) =>
      this.listener?.(encodePacket(PAYLOAD_TYPE.REPLY, sequence, Buffer.from(bytes)));

    if (behavior === "syntax_error") return reply([0x90, 0x60, 0x02, 0xff]);
    if (behavior === "buffer_full") return reply([0x90, 0x60, 0x03, 0xff]);

    const code = payload[3];
    const isInquiry = payload[1] === 0x09;

    if (isInquiry) {
      const command = Object.values(VISCA_COMMANDS).find((c) => c.code === code);
      const value = this.values.get(code) ?? 0;
      return reply([0x90, 0x50, ...toNibbles(value, command?.nibbles ?? 4), 0xff]);
    }

    reply([0x90, 0x41, 0xff]);
    if (behavior === "ack_only") return;

    this.values.set(code, fromNibbles(payload.subarray(4, payload.length - 1)));
    reply([0x90, 0x51, 0xff]);
  }
}

describe("ViscaTransport", () => {
  let camera: FakeViscaCamera;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const createTransport = (maxRetries = 2) =>
    new ViscaTransport(
      { cameraId: "cam-visca", host: "192.0.2.10" },
      {
        timeoutMs: 20,
        maxRetries,
        retryDelayMs: 1,
        batchSize: 2,
        commandSpacingMs: 20,
        openChannel: async () => camera,
        sleep,
      },
    );

  beforeEach(() => {
    camera = new FakeViscaCamera();
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  it("reads parameter values through inquiries", async () => {
    camera.values.set(VISCA_COMMANDS.ExposureIris.code, 8);
    camera.values.set(VISCA_COMMANDS.DigitalBrightLevel.code, 11);
    const transport = createTransport();
    await transport.connect();

    const results = await transport.getParameters(["ExposureIris", "DigitalBrightLevel"]);

    expect(results.map((r) => [r.parameterName, r.outcome, r.achievedValue])).toEqual([
      ["ExposureIris", "ok", 8],
      ["DigitalBrightLevel", "ok", 11],
    ]);
    expect(decodePacket(camera.sent[0])?.payloadType).toBe(PAYLOAD_TYPE.INQUIRY);
  });

  it("applies a value once ACK and completion arrive", async () => {
    const transport = createTransport();
    await transport.connect();

    const [result] = await transport.setParameters({ ExposureGain: 5 });

    expect(result).toEqual({
      parameterName: "ExposureGain",
      kind: "set",
      requestedValue: 5,
      achievedValue: 5,
      outcome: "ok",
      attempts: 1,
    });
    expect(camera.values.get(VISCA_COMMANDS.ExposureGain.code)).toBe(5);
  });

  it("retries an ACK-only command, then reports a timeout that marks the parameter stale", async () => {
    camera.script = ["ack_only", "ack_only"];
    const transport = createTransport(1);
    await transport.connect();

    const [result] = await transport.setParameters({ ExposureIris: 9 });

    expect(camera.sent).toHaveLength(2);
    expect(result.outcome).toBe("timeout");
    expect(result.attempts).toBe(2);
    expect(result.detail).toBe("no completion within 20ms");

    const tracked = new AdjustmentEngine(
      {
        cameraId: "cam-visca",
        features: {
          brightness: {
            band: { acceptableLow: 0.25, acceptableHigh: 0.5, deadBandPct: 0.05, innerPct: 0.02, outerPct: 0.08 },
            parameters: ["ExposureIris"],
          },
        },
        ranges: { ExposureIris: { min: 0, max: 17, step: 1 } },
        historySize: 10,
        featureMaxAgeMs: 1000,
      },
      {
        commands: { get: async () => [], set: async () => [] },
        costModel: new ParameterCostModel(DEFAULT_COST_WEIGHTS),
      },
    );

    tracked.applyResults([
      { parameterName: "ExposureIris", kind: "get", requestedValue: null, achievedValue: 8, outcome: "ok", attempts: 1 },
    ]);
    expect(tracked.getParameters()[0]?.stale).toBe(false);

    tracked.applyResults([result]);
    expect(tracked.getParameters()[0]).toMatchObject({ currentValue: 8, stale: true });
  });

  it("does not retry a rejected command", async () => {
    camera.script = ["syntax_error"];
    const transport = createTransport();
    await transport.connect();

    const [result] = await transport.setParameters({ ExposureIris: 3 });

    expect(result.outcome).toBe("rejected");
    expect(result.detail).toBe("syntax");
    expect(camera.sent).toHaveLength(1);
  });

  it("retries when the camera's command buffer is full", async () => {
    camera.script = ["buffer_full"];
    const transport = createTransport();
    await transport.connect();

    const [result] = await transport.setParameters({ ExposureIris: 3 });

    expect(result.outcome).toBe("ok");
    expect(result.attempts).toBe(2);
    expect(sleep).toHaveBeenCalledWith(1);
  });

  it("refuses unsupported parameters and out-of-range values without sending", async () => {
    const transport = createTransport();
    await transport.connect();

    const results = await transport.setParameters({ Zoom: 1, DigitalBrightLevel: 16 });

    expect(results.map((r) => [r.outcome, r.attempts])).toEqual([
      ["rejected", 0],
      ["rejected", 0],
    ]);
    expect(results[0]?.detail).toBe("unsupported parameter");
    expect(camera.sent).toHaveLength(0);
  });

  it("reports every request as an error while disconnected", async () => {
    const transport = createTransport();

    const results = await transport.getParameters(["ExposureIris", "ExposureGain"]);

    expect(results.map((r) => [r.outcome, r.detail])).toEqual([
      ["error", "not connected"],
      ["error", "not connected"],
    ]);
  });

  it("spaces commands within a batch and between batches", async () => {
    const transport = createTransport();
    await transport.connect();

    await transport.setParameters({ ExposureIris: 1, ExposureGain: 2, ColorSaturation: 3 });

    expect(camera.sent).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[20], [20]]);
  });

  it("reports cancelled when the caller aborts an exchange", async () => {
    camera.script = ["silent"];
    const transport = createTransport();
    await transport.connect();
    const controller = new AbortController();

    const pending = transport.setParameters({ ExposureIris: 4 }, { signal: controller.signal });
    controller.abort();
    const [result] = await pending;

    expect(result.outcome).toBe("cancelled");
  });

  it("abandons pending exchanges on disconnect", async () => {
    camera.script = ["silent"];
    const transport = createTransport(0);
    await transport.connect();

    const pending = transport.getParameters(["ExposureIris"]);
    await transport.disconnect();
    const [result] = await pending;

    expect(result.outcome).toBe("error");
    expect(result.detail).toBe("cancelled");
    expect(camera.closed).toBe(true);
    expect(transport.isConnected()).toBe(false);
  });

  it("fails open exchanges on a socket error and reconnects on a fresh channel", async () => {
    const replacement = new FakeViscaCamera();
    const openChannel = vi.fn<(host: string, port: number) => Promise<DatagramChannel>>();
    openChannel.mockResolvedValueOnce(camera).mockResolvedValueOnce(replacement);
    camera.script = ["silent"];
    const transport = new ViscaTransport(
      { cameraId: "cam-visca", host: "192.0.2.10" },
      { timeoutMs: 20, maxRetries: 2, retryDelayMs: 1, openChannel, sleep },
    );
    await transport.connect();

    const pending = transport.getParameters(["ExposureIris"]);
    camera.fail(new Error("recvmsg ECONNREFUSED"));
    const [result] = await pending;

    expect(result).toMatchObject({ outcome: "error", detail: "socket_error", attempts: 1 });
    expect(transport.isConnected()).toBe(false);
    expect((await transport.getParameters(["ExposureGain"]))[0]?.detail).toBe("not connected");

    await transport.connect();

    expect(camera.closed).toBe(true);
    expect(openChannel).toHaveBeenCalledTimes(2);
    expect(transport.isConnected()).toBe(true);
    expect((await transport.setParameters({ ExposureGain: 6 }))[0]?.outcome).toBe("ok");
    expect(replacement.sent).toHaveLength(1);
  });

  it("ignores errors from a channel it has already replaced", async () => {
    const replacement = new FakeViscaCamera();
    const openChannel = vi.fn<(host: string, port: number) => Promise<DatagramChannel>>();
    openChannel.mockResolvedValueOnce(camera).mockResolvedValueOnce(replacement);
    const transport = new ViscaTransport(
      { cameraId: "cam-visca", host: "192.0.2.10" },
      { openChannel, sleep },
    );
    await transport.connect();
    await transport.disconnect();
    await transport.connect();

    camera.fail(new Error("recvmsg ECONNREFUSED"));

    expect(transport.isConnected()).toBe(true);
  });
});
