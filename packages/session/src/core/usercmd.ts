/**
 * Movement commands and their keyed delta encoding.
 *
 * Each command is encoded against the previous one in its batch. Changed
 * fields are XOR-ed with a per-packet key so that a forged packet built
 * without knowledge of the key decodes to garbage. The key is not a secret
 * in any cryptographic sense.
 *
 * @module core/usercmd
 */

import type { BitReader, BitWriter } from "./bitstream.js";

/**
 * A single movement/action sample from a client.
 */
export interface UserCommand {
  /** Server time the client believes this command belongs to */
  serverTime: number;
  /** View angles as 16-bit fixed point */
  angles: [number, number, number];
  buttons: number;
  weapon: number;
  /** Signed 8-bit movement axes */
  forwardmove: number;
  rightmove: number;
  upmove: number;
}

export function createNullUserCommand(): UserCommand {
  return {
    serverTime: 0,
    angles: [0, 0, 0],
    buttons: 0,
    weapon: 0,
    forwardmove: 0,
    rightmove: 0,
    upmove: 0,
  };
}

export function cloneUserCommand(cmd: UserCommand): UserCommand {
  return { ...cmd, angles: [cmd.angles[0], cmd.angles[1], cmd.angles[2]] };
}

function bitMask(bits: number): number {
  return bits >= 32 ? -1 : (1 << bits) - 1;
}

function toSigned8(value: number): number {
  return (value << 24) >> 24;
}

/**
 * Signed movement axis; -128 has no positive mirror, so it reads as -127.
 */
function toMoveAxis(value: number): number {
  const signed = toSigned8(value);
  return signed === -128 ? -127 : signed;
}

/**
 * String hash folded into the movement key. Only the first `maxLength`
 * characters count; `%` and non-ASCII characters hash as `.`.
 */
export function hashKey(text: string, maxLength: number = 32): number {
  let hash = 0;
  for (let i = 0; i < maxLength && i < text.length; i++) {
    let c = text.charCodeAt(i);
    if (c === 0) {
      break;
    }
    if (c > 127 || c === 0x25) {
      c = 0x2e;
    }
    hash = (hash + c * (119 + i)) | 0;
  }
  return hash ^ (hash >> 10) ^ (hash >> 20);
}

/**
 * Key for one packet's movement batch.
 */
export function userCommandKey(
  checksumFeed: number,
  messageAcknowledge: number,
  lastAcknowledgedCommand: string,
): number {
  return checksumFeed ^ messageAcknowledge ^ hashKey(lastAcknowledgedCommand, 32);
}

function writeDeltaKey(writer: BitWriter, key: number, from: number, to: number, bits: number): void {
  if (from === to) {
    writer.writeBits(0, 1);
    return;
  }
  writer.writeBits(1, 1);
  writer.writeBits((to ^ key) & bitMask(bits), bits);
}

function readDeltaKey(reader: BitReader, key: number, from: number, bits: number): number {
  if (reader.readBits(1)) {
    return (reader.readBits(bits) ^ (key & bitMask(bits))) & bitMask(bits);
  }
  return from;
}

function sameFields(a: UserCommand, b: UserCommand): boolean {
  return (
    a.angles[0] === b.angles[0] &&
    a.angles[1] === b.angles[1] &&
    a.angles[2] === b.angles[2] &&
    a.forwardmove === b.forwardmove &&
    a.rightmove === b.rightmove &&
    a.upmove === b.upmove &&
    a.buttons === b.buttons &&
    a.weapon === b.weapon
  );
}

/**
 * Encode `to` as a delta against `from`.
 */
export function writeDeltaUserCommand(
  writer: BitWriter,
  key: number,
  from: UserCommand,
  to: UserCommand,
): void {
  const timeDelta = to.serverTime - from.serverTime;
  if (timeDelta >= 0 && timeDelta < 256) {
    writer.writeBits(1, 1);
    writer.writeBits(timeDelta, 8);
  } else {
    writer.writeBits(0, 1);
    writer.writeBits(to.serverTime, 32);
  }

  if (sameFields(from, to)) {
    writer.writeBits(0, 1);
    return;
  }

  const fieldKey = key ^ to.serverTime;
  writer.writeBits(1, 1);
  writeDeltaKey(writer, fieldKey, from.angles[0], to.angles[0], 16);
  writeDeltaKey(writer, fieldKey, from.angles[1], to.angles[1], 16);
  writeDeltaKey(writer, fieldKey, from.angles[2], to.angles[2], 16);
  writeDeltaKey(writer, fieldKey, from.forwardmove & 0xff, to.forwardmove & 0xff, 8);
  writeDeltaKey(writer, fieldKey, from.rightmove & 0xff, to.rightmove & 0xff, 8);
  writeDeltaKey(writer, fieldKey, from.upmove & 0xff, to.upmove & 0xff, 8);
  writeDeltaKey(writer, fieldKey, from.buttons, to.buttons, 16);
  writeDeltaKey(writer, fieldKey, from.weapon, to.weapon, 8);
}

/**
 * Decode one command against `from`. Pure: identical key, reader contents and
 * `from` always give an identical command.
 */
export function readDeltaUserCommand(
  reader: BitReader,
  key: number,
  from: UserCommand,
): UserCommand {
  const serverTime = reader.readBits(1)
    ? (from.serverTime + reader.readBits(8)) | 0
    : reader.readBits(32) | 0;

  if (!reader.readBits(1)) {
    return { ...cloneUserCommand(from), serverTime };
  }

  const fieldKey = key ^ serverTime;
  return {
    serverTime,
    angles: [
      readDeltaKey(reader, fieldKey, from.angles[0], 16),
      readDeltaKey(reader, fieldKey, from.angles[1], 16),
      readDeltaKey(reader, fieldKey, from.angles[2], 16),
    ],
    forwardmove: toMoveAxis(readDeltaKey(reader, fieldKey, from.forwardmove & 0xff, 8)),
    rightmove: toMoveAxis(readDeltaKey(reader, fieldKey, from.rightmove & 0xff, 8)),
    upmove: toMoveAxis(readDeltaKey(reader, fieldKey, from.upmove & 0xff, 8)),
    buttons: readDeltaKey(reader, fieldKey, from.buttons, 16),
    weapon: readDeltaKey(reader, fieldKey, from.weapon, 8),
  };
}
