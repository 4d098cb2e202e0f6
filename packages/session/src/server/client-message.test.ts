import { beforeEach, describe, expect, test, vi } from "vitest";
import { VOIP_SPATIAL } from "../constants.js";
import { BitWriter } from "../core/bitstream.js";
import { SessionState } from "../core/types.js";
import { userCommandKey, type UserCommand } from "../core/usercmd.js";
import {
  encodeClientPacket,
  silentLogger,
  userCommandAt,
  type ClientPacket,
} from "../test-utils/index.js";
import { executeClientMessage, type ClientMessageHost } from "./client-message.js";
import { ClientSession } from "./client-session.js";
import { ReliableCommandChannel } from "./reliable-channel.js";
import { VoipRelay } from "./voip-relay.js";

const SERVER_ID = 500;
const FEED = 0x77;

function markZombie(session: ClientSession, _reason: string): void {
  session.state = SessionState.Zombie;
}

function createHost(sessions: ClientSession[], overrides: { strictAcknowledge?: boolean } = {}) {
  const logger = { log: vi.fn(), debug: vi.fn(), warn: vi.fn() };
  const commands = {
    dropClient: vi.fn(markZombie),
    applyUserinfo: vi.fn<(session: ClientSession, userinfo: string) => void>(),
    verifyPure: vi.fn<(session: ClientSession, args: readonly string[]) => void>(),
    sendGameState: vi.fn<(session: ClientSession) => void>(),
    sendServerCommand: vi.fn<(session: ClientSession, text: string) => void>(),
    forwardCommand: vi.fn<(session: ClientSession, args: readonly string[]) => void>(),
    forceTeam: vi.fn<(session: ClientSession, team: string) => boolean>(),
  };
  const channel = new ReliableCommandChannel(commands, {
    floodProtect: 0,
    maxChatLength: 150,
    maxRadioLength: 100,
    maxDollarVars: 6,
    dollarVarWeight: 8,
    teamSwitch: false,
    logger: silentLogger,
    now: () => 0,
  });
  const host = {
    serverId: SERVER_ID,
    restartedServerId: 400,
    strictAcknowledge: overrides.strictAcknowledge ?? false,
    channel,
    voip: new VoipRelay(sessions, { enabled: true, logger: silentLogger }),
    pure: false,
    checksumFeed: FEED,
    logger,
    sendGameState: vi.fn<(session: ClientSession) => void>(),
    enterWorld: vi.fn<(session: ClientSession, command: UserCommand) => void>(),
    dropClient: vi.fn(markZombie),
    think: vi.fn<(session: ClientSession, command: UserCommand) => void>(),
  } satisfies ClientMessageHost;
  return { host, commands, logger };
}

function packet(overrides: Partial<ClientPacket> = {}): Uint8Array {
  return encodeClientPacket({ serverId: SERVER_ID, messageAcknowledge: 1, reliableAcknowledge: 0, ...overrides });
}

function move(commands: UserCommand[]): ClientPacket["move"] {
  // reliableAcknowledge 0 makes the acknowledged command text empty
  return { key: userCommandKey(FEED, 1, ""), commands };
}

describe("executeClientMessage", () => {
  let session: ClientSession;
  let listener: ClientSession;
  let harness: ReturnType<typeof createHost>;

  beforeEach(() => {
    session = new ClientSession(0);
    session.state = SessionState.Active;
    listener = new ClientSession(1);
    listener.state = SessionState.Active;
    listener.hasVoip = true;
    harness = createHost([session, listener]);
  });

  describe("header checks", () => {
    test("should ignore a negative message acknowledge", () => {
      executeClientMessage(session, packet({ messageAcknowledge: -1, move: move([userCommandAt(100)]) }), harness.host);

      expect(harness.host.dropClient).not.toHaveBeenCalled();
      expect(harness.host.think).not.toHaveBeenCalled();
    });

    test("should drop on a negative message acknowledge when strict", () => {
      const strict = createHost([session], { strictAcknowledge: true });
      executeClientMessage(session, packet({ messageAcknowledge: -1 }), strict.host);

      expect(strict.host.dropClient).toHaveBeenCalledWith(session, "illegible client message");
    });

    test("should drop a reliable acknowledge more than a ring behind", () => {
      session.reliableSequence = 100;
      executeClientMessage(session, packet({ reliableAcknowledge: 30 }), harness.host);

      expect(harness.host.dropClient).toHaveBeenCalledWith(session, "illegible client message");
      expect(session.reliableAcknowledge).toBe(100);
    });

    test("should record both acknowledges", () => {
      session.reliableSequence = 4;
      executeClientMessage(session, packet({ messageAcknowledge: 9, reliableAcknowledge: 3 }), harness.host);

      expect(session.messageAcknowledge).toBe(9);
      expect(session.reliableAcknowledge).toBe(3);
    });
  });

  describe("server id", () => {
    test("should ignore packets from the restarted generation", () => {
      session.state = SessionState.Connected;
      executeClientMessage(session, packet({ serverId: 450, commands: [{ sequence: 1, text: "say hi" }] }), harness.host);

      expect(harness.host.sendGameState).not.toHaveBeenCalled();
      expect(session.lastClientCommand).toBe(0);
    });

    test("should resend the full state to a client on an unknown generation", () => {
      session.state = SessionState.Connected;
      executeClientMessage(session, packet({ serverId: 0, commands: [{ sequence: 1, text: "say hi" }] }), harness.host);

      expect(harness.host.sendGameState).toHaveBeenCalledWith(session);
      expect(session.lastClientCommand).toBe(0);
    });

    test("should not resend before the last full state could have arrived", () => {
      session.state = SessionState.Primed;
      session.gamestateMessageNum = 1;
      executeClientMessage(session, packet({ serverId: 0, messageAcknowledge: 1 }), harness.host);

      expect(harness.host.sendGameState).not.toHaveBeenCalled();
    });

    test("should not resend to an active client", () => {
      executeClientMessage(session, packet({ serverId: 0 }), harness.host);
      expect(harness.host.sendGameState).not.toHaveBeenCalled();
    });
  });

  describe("body", () => {
    test("should run reliable commands in order", () => {
      executeClientMessage(
        session,
        packet({
          commands: [
            { sequence: 1, text: "say a" },
            { sequence: 2, text: "say b" },
          ],
        }),
        harness.host,
      );

      expect(harness.commands.forwardCommand.mock.calls.map(([, args]) => args)).toEqual([
        ["say", "a"],
        ["say", "b"],
      ]);
    });

    test("should stop after lost commands", () => {
      executeClientMessage(
        session,
        packet({ commands: [{ sequence: 2, text: "say b" }], move: move([userCommandAt(100)]) }),
        harness.host,
      );

      expect(harness.commands.dropClient).toHaveBeenCalledWith(session, "Lost reliable commands");
      expect(harness.host.think).not.toHaveBeenCalled();
    });

    test("should stop once a command disconnected the client", () => {
      executeClientMessage(
        session,
        packet({ commands: [{ sequence: 1, text: "disconnect" }], move: move([userCommandAt(100)]) }),
        harness.host,
      );

      expect(session.state).toBe(SessionState.Zombie);
      expect(harness.host.think).not.toHaveBeenCalled();
    });

    test("should run movement", () => {
      executeClientMessage(session, packet({ move: move([userCommandAt(100), userCommandAt(116)]) }), harness.host);
      expect(harness.host.think.mock.calls.map(([, command]) => command.serverTime)).toEqual([100, 116]);
    });

    test("should relay opus voice before movement", () => {
      session.hasVoip = true;
      executeClientMessage(
        session,
        packet({
          voip: {
            codec: "opus",
            block: { generation: 1, sequence: 5, frames: 1, recipients: [], flags: VOIP_SPATIAL, data: new Uint8Array([9]) },
          },
          move: move([userCommandAt(100)]),
        }),
        harness.host,
      );

      expect(listener.voipQueue).toHaveLength(1);
      expect(harness.host.think).toHaveBeenCalledTimes(1);
    });

    test("should consume but never relay legacy voice", () => {
      session.hasVoip = true;
      executeClientMessage(
        session,
        packet({
          voip: {
            codec: "speex",
            block: { generation: 1, sequence: 5, frames: 1, recipients: [], flags: VOIP_SPATIAL, data: new Uint8Array([9]) },
          },
          move: move([userCommandAt(100)]),
        }),
        harness.host,
      );

      expect(listener.voipQueue).toHaveLength(0);
      expect(harness.host.think).toHaveBeenCalledTimes(1);
    });

    test("should keep what was processed before a truncation", () => {
      const data = packet({ commands: [{ sequence: 1, text: "say a" }], move: move([userCommandAt(100)]) });

      expect(() => executeClientMessage(session, data.slice(0, data.length - 2), harness.host)).not.toThrow();
      expect(harness.commands.forwardCommand).toHaveBeenCalledTimes(1);
      expect(harness.host.think).not.toHaveBeenCalled();
    });

    test("should warn on an unknown op", () => {
      const writer = new BitWriter();
      writer.writeLong(SERVER_ID);
      writer.writeLong(1);
      writer.writeLong(0);
      writer.writeByte(99);
      executeClientMessage(session, writer.toBytes(), harness.host);

      expect(harness.logger.warn).toHaveBeenCalledWith("[ClientMessage] bad command byte 99 for client 0");
    });
  });
});
