// xArm bus servo controller protocol.
//
// Packet layout: 0x55 0x55 <length> <command> <params...>, where length
// counts itself, the command byte and the params. Multi-byte values are
// little-endian.

export const PACKET_HEADER = 0x55;

export enum XArmCommand {
  ServoMove = 3,
  ServoUnload = 20,
  ServoPositionRead = 21,
}

export interface ServoTarget {
  id: number;
  position: number;
}

export interface XArmPacket {
  command: number;
  params: number[];
}

const MAX_SERVO_ID = 6;
const MAX_DURATION_MS = 0xffff;

function assertServoIds(ids: readonly number[]): void {
  if (ids.length === 0) throw new Error("At least one servo id is required");
  for (const id of ids) {
    if (!Number.isInteger(id) || id < 1 || id > MAX_SERVO_ID) {
      throw new Error(`Invalid servo id: ${id}`);
    }
  }
}

export function encodePacket(command: XArmCommand, params: readonly number[]): Buffer {
  if (params.length + 2 > 0xff) {
    throw new Error(`Too many parameters for one packet: ${params.length}`);
  }
  return Buffer.from([PACKET_HEADER, PACKET_HEADER, params.length + 2, command, ...params]);
}

/** Move several servos to absolute positions over `durationMs`. */
export function encodeMove(targets: readonly ServoTarget[], durationMs: number): Buffer {
  assertServoIds(targets.map((t) => t.id));
  if (!Number.isInteger(durationMs) || durationMs < 0 || durationMs > MAX_DURATION_MS) {
    throw new Error(`Invalid move duration: ${durationMs}`);
  }
  const params = [targets.length, durationMs & 0xff, durationMs >> 8];
  for (const { id, position } of targets) {
    if (!Number.isInteger(position) || position < 0 || position > 1000) {
      throw new Error(`Invalid position for servo ${id}: ${position}`);
    }
    params.push(id, position & 0xff, position >> 8);
  }
  return encodePacket(XArmCommand.ServoMove, params);
}

/** Cut torque to the given servos. */
export function encodeUnload(ids: readonly number[]): Buffer {
  assertServoIds(ids);
  return encodePacket(XArmCommand.ServoUnload, [ids.length, ...ids]);
}

export function encodeReadPositions(ids: readonly number[]): Buffer {
  assertServoIds(ids);
  return encodePacket(XArmCommand.ServoPositionRead, [ids.length, ...ids]);
}

/** Parses the reply to a position read: <count> then (<id> <lo> <hi>) per servo. */
export function decodePositions(packet: XArmPacket): ServoTarget[] {
  if (packet.command !== XArmCommand.ServoPositionRead) {
    throw new Error(`Expected a position reply, got command ${packet.command}`);
  }
  const [count = 0, ...rest] = packet.params;
  if (rest.length < count * 3) {
    throw new Error(`Position reply truncated: ${count} servos, ${rest.length} bytes`);
  }
  const positions: ServoTarget[] = [];
  for (let i = 0; i < count; i++) {
    const offset = i * 3;
    positions.push({ id: rest[offset], position: rest[offset + 1] | (rest[offset + 2] << 8) });
  }
  return positions;
}

/**
 * Splits a serial byte stream into packets. Bytes before a header are
 * discarded; a partial packet is held until the rest arrives.
 */
export class PacketParser {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): XArmPacket[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const packets: XArmPacket[] = [];

    for (;;) {
      const start = this.findHeader();
      if (start === -1) {
        // Keep a trailing 0x55 that may begin the next header.
        this.buffer = this.buffer.length > 0 && this.buffer[this.buffer.length - 1] === PACKET_HEADER
          ? this.buffer.subarray(this.buffer.length - 1)
          : Buffer.alloc(0);
        break;
      }
      this.buffer = this.buffer.subarray(start);
      if (this.buffer.length < 4) break;

      const length = this.buffer[2];
      if (length < 2) {
        // Not a valid length; resync past this header.
        this.buffer = this.buffer.subarray(2);
        continue;
      }
      const total = length + 2;
      if (this.buffer.length < total) break;

      packets.push({ command: this.buffer[3], params: [...this.buffer.subarray(4, total)] });
      this.buffer = this.buffer.subarray(total);
    }
    return packets;
  }

  private findHeader(): number {
    for (let i = 0; i + 1 < this.buffer.length; i++) {
      if (this.buffer[i] === PACKET_HEADER && this.buffer[i + 1] === PACKET_HEADER) return i;
    }
    return -1;
  }
}
