/**
 * A scripted client that talks to a {@link SessionServer} through a
 * {@link RecordingTransport}. Everything it sends (server id, checksum feed,
 * acknowledgements) is learned from decoded server messages, the way a real
 * client learns it.
 *
 * @module test-utils/test-client
 */

import type { NetAddress } from "../core/address.js";
import { userCommandKey, type UserCommand } from "../core/usercmd.js";
import type { OutOfBandResult, SessionServer } from "../server/session-server.js";
import {
  decodeServerMessage,
  encodeClientPacket,
  userCommandAt,
  type ClientPacket,
  type DecodedServerMessage,
} from "./client-packet.js";
import type { RecordingTransport } from "./fakes.js";

export interface ConnectOptions {
  protocol?: number;
  /** Userinfo appended after the handshake keys */
  userinfo?: string;
  gameName?: string;
}

export class TestClient {
  index = -1;
  messageAcknowledge = 0;
  reliableAcknowledge = 0;
  /** 0 until the first gamestate, which no server uses */
  serverId = 0;
  pureServerId = 0;
  checksumFeed = 0;

  private readonly server: SessionServer;
  private readonly transport: RecordingTransport;
  private readonly serverCommands = new Map<number, string>();
  private nextCommand = 1;
  private executedCommand = 0;
  private receivedCount = 0;

  constructor(
    server: SessionServer,
    transport: RecordingTransport,
    readonly address: NetAddress,
    readonly qport: number = 1,
  ) {
    this.server = server;
    this.transport = transport;
  }

  /**
   * getchallenge followed by connect. Records the slot index on success.
   */
  connect(options: ConnectOptions = {}): OutOfBandResult {
    this.server.handleOutOfBand(this.address, `getchallenge 77 ${options.gameName ?? "arena"}`);
    const reply = this.transport.lastOutOfBand();
    const token = reply.startsWith("challengeResponse ") ? reply.split(" ")[1] ?? "0" : "0";

    const userinfo =
      `\\protocol\\${options.protocol ?? 71}\\challenge\\${token}\\qport\\${this.qport}` +
      (options.userinfo ?? "\\name\\player");
    const result = this.server.handleOutOfBand(this.address, `connect "${userinfo}"`);
    if (result.command === "connect" && result.status === "admitted") {
      this.index = result.index;
    }
    return result;
  }

  send(packet: Partial<ClientPacket> = {}): boolean {
    return this.server.handlePacket(
      this.address,
      encodeClientPacket({
        serverId: this.serverId,
        messageAcknowledge: this.messageAcknowledge,
        reliableAcknowledge: this.reliableAcknowledge,
        ...packet,
      }),
    );
  }

  /**
   * A packet for a server id the server does not know, which is how a
   * freshly connected client asks for the full state.
   */
  requestGameState(): boolean {
    return this.send({ serverId: 0 });
  }

  command(text: string, extra: Partial<ClientPacket> = {}): boolean {
    return this.send({ commands: [{ sequence: this.nextCommand++, text }], ...extra });
  }

  /**
   * Skip a reliable sequence number, as if a packet carrying it was lost.
   */
  loseCommand(): void {
    this.nextCommand++;
  }

  moveKey(): number {
    return userCommandKey(
      this.checksumFeed,
      this.messageAcknowledge,
      this.serverCommands.get(this.reliableAcknowledge) ?? "",
    );
  }

  move(commands: Array<number | UserCommand>, extra: Partial<ClientPacket> = {}): boolean {
    return this.send({
      move: {
        key: this.moveKey(),
        commands: commands.map((command) => (typeof command === "number" ? userCommandAt(command) : command)),
      },
      ...extra,
    });
  }

  /**
   * Decode everything transmitted to this client since the last call.
   */
  receive(): DecodedServerMessage[] {
    const all = this.transport.messagesFor(this.index);
    const fresh = all.slice(this.receivedCount).map(decodeServerMessage);
    this.receivedCount = all.length;
    for (const message of fresh) {
      for (const command of message.serverCommands) {
        this.serverCommands.set(command.sequence, command.text);
        if (command.sequence > this.executedCommand) {
          this.executedCommand = command.sequence;
          this.execute(command.text);
        }
      }
      if (message.gamestate) {
        this.executedCommand = Math.max(this.executedCommand, message.gamestate.reliableSequence);
        this.serverId = message.gamestate.serverId;
        this.pureServerId = message.gamestate.pureServerId;
        this.checksumFeed = message.gamestate.checksumFeed;
      }
      this.messageAcknowledge = message.sequence;
    }
    return fresh;
  }

  private execute(text: string): void {
    const restarted = /^serverid (-?\d+)$/.exec(text);
    if (restarted?.[1] !== undefined) {
      this.serverId = Number.parseInt(restarted[1], 10);
    }
  }

  /**
   * Acknowledge every server command received so far.
   */
  acknowledgeAll(): void {
    for (const sequence of this.serverCommands.keys()) {
      this.reliableAcknowledge = Math.max(this.reliableAcknowledge, sequence);
    }
  }
}
