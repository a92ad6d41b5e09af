/**
 * VISCA-over-IP packet encoding
 *
 * Header (8 bytes, big endian):
 *   0-1  payload type (0x0100 command, 0x0110 inquiry, 0x0111 reply)
 *   2-3  payload length
 *   4-7  sequence number
 * followed by the VISCA payload (0x81 ... 0xFF).
 */

export const PAYLOAD_TYPE = {
  COMMAND: 0x0100,
  INQUIRY: 0x0110,
  REPLY: 0x0111,
} as const;

const HEADER_LENGTH = 8;
const TERMINATOR = 0xff;
const CAMERA_ADDRESS = 0x81;
const REPLY_ADDRESS = 0x90;

export interface ViscaParameterCommand {
  /** Category byte 0x04 (camera) command code */
  code: number;
  /** Number of value nibbles in direct-set commands and inquiry replies */
  nibbles: 1 | 4;
}

export const VISCA_COMMANDS: Record<string, ViscaParameterCommand> = {
  ExposureIris: { code: 0x4b, nibbles: 4 },
  ExposureExposureTime: { code: 0x4a, nibbles: 4 },
  ExposureGain: { code: 0x4c, nibbles: 4 },
  ColorSaturation: { code: 0x49, nibbles: 4 },
  DigitalBrightLevel: { code: 0x3e, nibbles: 1 },
};

export type ViscaErrorReason =
  | "message_length"
  | "syntax"
  | "buffer_full"
  | "cancelled"
  | "no_socket"
  | "not_executable"
  | "unknown";

export type ViscaReply =
  | { kind: "ack"; socket: number }
  | { kind: "completion"; socket: number; data: Buffer }
  | { kind: "error"; socket: number; code: number; reason: ViscaErrorReason }
  | { kind: "unknown"; raw: Buffer };

export interface ViscaIpPacket {
  payloadType: number;
  sequence: number;
  payload: Buffer;
}

const ERROR_REASONS: Record<number, ViscaErrorReason> = {
  0x01: "message_length",
  0x02: "syntax",
  0x03: "buffer_full",
  0x04: "cancelled",
  0x05: "no_socket",
  0x41: "not_executable",
};

// ============================================================================
// Encoding
// ============================================================================

export function encodePacket(
  payloadType: number,
  sequence: number,
  payload: Buffer,
): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(payloadType, 0);
  header.writeUInt16BE(payload.length, 2);
  header.writeUInt32BE(sequence >>> 0, 4);
  return Buffer.concat([header, payload]);
}

export function maxValue(command: ViscaParameterCommand): number {
  return Math.pow(16, command.nibbles) - 1;
}

/**
 * Split a value into `count` nibbles, most significant first (0p 0q 0r 0s)
 */
export function toNibbles(value: number, count: number): number[] {
  const nibbles: number[] = [];
  for (let i = count - 1; i >= 0; i--) {
    nibbles.push((value >> (i * 4)) & 0x0f);
  }
  return nibbles;
}

export function fromNibbles(bytes: Uint8Array): number {
  let value = 0;
  for (const byte of bytes) {
    value = (value << 4) | (byte & 0x0f);
  }
  return value;
}

/**
 * Direct-set payload: 81 01 04 <code> <nibbles> FF
 * Throws RangeError when the value does not fit the command's nibbles.
 */
export function buildSetPayload(command: ViscaParameterCommand, value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > maxValue(command)) {
    throw new RangeError(`value ${value} outside 0..${maxValue(command)}`);
  }
  return Buffer.from([
    CAMERA_ADDRESS,
    0x01,
    0x04,
    command.code,
    ...toNibbles(value, command.nibbles),
    TERMINATOR,
  ]);
}

/**
 * Inquiry payload: 81 09 04 <code> FF
 */
export function buildInquiryPayload(command: ViscaParameterCommand): Buffer {
  return Buffer.from([CAMERA_ADDRESS, 0x09, 0x04, command.code, TERMINATOR]);
}

// ============================================================================
// Decoding
// ============================================================================

export function decodePacket(packet: Buffer): ViscaIpPacket | null {
  if (packet.length <= HEADER_LENGTH) return null;

  const payloadType = packet.readUInt16BE(0);
  const length = packet.readUInt16BE(2);
  const sequence = packet.readUInt32BE(4);
  const payload = packet.subarray(HEADER_LENGTH);

  if (payload.length !== length) return null;
  return { payloadType, sequence, payload };
}

export function decodeReply(payload: Buffer): ViscaReply {
  if (
    payload.length < 3 ||
    payload[0] !== REPLY_ADDRESS ||
    payload[payload.length - 1] !== TERMINATOR
  ) {
    return { kind: "unknown", raw: payload };
  }

  const type = payload[1] & 0xf0;
  const socket = payload[1] & 0x0f;

  switch (type) {
    case 0x40:
      return { kind: "ack", socket };
    case 0x50:
      return { kind: "completion", socket, data: payload.subarray(2, payload.length - 1) };
    case 0x60: {
      const code = payload.length > 3 ? payload[2] : 0;
      return { kind: "error", socket, code, reason: ERROR_REASONS[code] ?? "unknown" };
    }
    default:
      return { kind: "unknown", raw: payload };
  }
}

/**
 * Value carried by an inquiry completion (90 50 0p 0q 0r 0s FF)
 */
export function decodeInquiryValue(
  command: ViscaParameterCommand,
  data: Buffer,
): number | null {
  if (data.length !== command.nibbles) return null;
  return fromNibbles(data);
}

export function isRejection(reason: ViscaErrorReason): boolean {
  return reason === "syntax" || reason === "not_executable" || reason === "message_length";
}

export function isRetryableReason(reason: ViscaErrorReason): boolean {
  return reason === "buffer_full" || reason === "no_socket";
}
