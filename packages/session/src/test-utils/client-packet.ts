/**
 * The client side of the wire format, for driving a server in tests.
 *
 * @module test-utils/client-packet
 */

import { MAX_CLIENTS } from "../constants.js";
import { BitReader, BitWriter } from "../core/bitstream.js";
import { ClientOp, ServerOp } from "../core/protocol.js";
import {
  createNullUserCommand,
  writeDeltaUserCommand,
  type UserCommand,
} from "../core/usercmd.js";

export interface VoipBlock {
  generation: number;
  sequence: number;
  frames: number;
  /** Directly addressed slot indices */
  recipients: number[];
  flags: number;
  data: Uint8Array;
  /** Overrides the written size field */
  size?: number;
}

export interface ClientPacket {
  serverId: number;
  messageAcknowledge: number;
  reliableAcknowledge: number;
  commands?: Array<{ sequence: number; text: string }>;
  voip?: { codec: "speex" | "opus"; block: VoipBlock };
  move?: { delta?: boolean; key: number; commands: UserCommand[]; count?: number };
}

export function writeVoipBlock(writer: BitWriter, block: VoipBlock): void {
  writer.writeByte(block.generation);
  writer.writeLong(block.sequence);
  writer.writeByte(block.frames);
  const mask = new Uint8Array(MAX_CLIENTS / 8);
  for (const index of block.recipients) {
    mask[index >> 3] = (mask[index >> 3] ?? 0) | (1 << (index & 7));
  }
  writer.writeData(mask);
  writer.writeByte(block.flags);
  writer.writeShort(block.size ?? block.data.length);
  writer.writeData(block.data);
}

export function writeUserCommands(writer: BitWriter, key: number, commands: readonly UserCommand[]): void {
  let from = createNullUserCommand();
  for (const command of commands) {
    writeDeltaUserCommand(writer, key, from, command);
    from = command;
  }
}

export function encodeClientPacket(packet: ClientPacket): Uint8Array {
  const writer = new BitWriter();
  writer.writeLong(packet.serverId);
  writer.writeLong(packet.messageAcknowledge);
  writer.writeLong(packet.reliableAcknowledge);

  for (const command of packet.commands ?? []) {
    writer.writeByte(ClientOp.ClientCommand);
    writer.writeLong(command.sequence);
    writer.writeString(command.text);
  }

  if (packet.voip) {
    writer.writeByte(packet.voip.codec === "speex" ? ClientOp.VoipSpeex : ClientOp.VoipOpus);
    writeVoipBlock(writer, packet.voip.block);
  }

  if (packet.move) {
    writer.writeByte(packet.move.delta === false ? ClientOp.MoveNoDelta : ClientOp.Move);
    writer.writeByte(packet.move.count ?? packet.move.commands.length);
    writeUserCommands(writer, packet.move.key, packet.move.commands);
  } else {
    writer.writeByte(ClientOp.Eof);
  }
  return writer.toBytes();
}

export function userCommandAt(serverTime: number, fields: Partial<Omit<UserCommand, "serverTime">> = {}): UserCommand {
  return { ...createNullUserCommand(), ...fields, serverTime };
}

export interface DecodedVoipPacket {
  sender: number;
  generation: number;
  sequence: number;
  frames: number;
  flags: number;
  data: Uint8Array;
}

export interface DecodedGamestate {
  reliableSequence: number;
  payload: Uint8Array;
  clientIndex: number;
  checksumFeed: number;
  serverId: number;
  pureServerId: number;
}

export interface DecodedServerMessage {
  sequence: number;
  lastClientCommand: number;
  serverCommands: Array<{ sequence: number; text: string }>;
  gamestate: DecodedGamestate | null;
  snapshot: { serverTime: number; payload: Uint8Array } | null;
  voip: DecodedVoipPacket[];
}

function readPayload(reader: BitReader): Uint8Array {
  return reader.readData(reader.readLong());
}

export function decodeServerMessage(data: Uint8Array): DecodedServerMessage {
  const reader = new BitReader(data);
  const message: DecodedServerMessage = {
    sequence: reader.readLong(),
    lastClientCommand: reader.readLong(),
    serverCommands: [],
    gamestate: null,
    snapshot: null,
    voip: [],
  };

  for (;;) {
    const op = reader.readByte();
    switch (op) {
      case ServerOp.ServerCommand:
        message.serverCommands.push({ sequence: reader.readLong(), text: reader.readString() });
        break;
      case ServerOp.Gamestate:
        message.gamestate = {
          reliableSequence: reader.readLong(),
          payload: readPayload(reader),
          clientIndex: reader.readLong(),
          checksumFeed: reader.readLong(),
          serverId: reader.readLong(),
          pureServerId: reader.readLong(),
        };
        break;
      case ServerOp.Snapshot:
        message.snapshot = { serverTime: reader.readLong(), payload: readPayload(reader) };
        break;
      case ServerOp.VoipOpus: {
        const sender = reader.readShort();
        const generation = reader.readByte();
        const sequence = reader.readLong();
        const frames = reader.readByte();
        const size = reader.readShort();
        const flags = reader.readByte();
        message.voip.push({ sender, generation, sequence, frames, flags, data: reader.readData(size) });
        break;
      }
      case ServerOp.Eof:
        return message;
      default:
        throw new Error(`Unexpected server op ${op}`);
    }
  }
}
