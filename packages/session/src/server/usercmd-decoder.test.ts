import { beforeEach, describe, expect, test, vi } from "vitest";
import { BitReader, BitWriter } from "../core/bitstream.js";
import { SessionState } from "../core/types.js";
import { cloneUserCommand, userCommandKey, type UserCommand } from "../core/usercmd.js";
import { silentLogger, userCommandAt, writeUserCommands } from "../test-utils/index.js";
import { ClientSession } from "./client-session.js";
import { decodeBatch, handleMove, type MoveHost } from "./usercmd-decoder.js";

const FEED = 0x55;

function createHost(pure = false) {
  return {
    pure,
    checksumFeed: FEED,
    logger: silentLogger,
    sendGameState: vi.fn<(session: ClientSession) => void>(),
    enterWorld: vi.fn((session: ClientSession, command: UserCommand) => {
      session.state = SessionState.Active;
      session.lastUsercmd = cloneUserCommand(command);
    }),
    dropClient: vi.fn<(session: ClientSession, reason: string) => void>(),
    think: vi.fn<(session: ClientSession, command: UserCommand) => void>(),
  } satisfies MoveHost;
}

function batch(session: ClientSession, commands: UserCommand[], count = commands.length): BitReader {
  const writer = new BitWriter();
  writer.writeByte(count);
  writeUserCommands(writer, userCommandKey(FEED, session.messageAcknowledge, session.acknowledgedServerCommand()), commands);
  return new BitReader(writer.toBytes());
}

function thoughtTimes(host: ReturnType<typeof createHost>): number[] {
  return host.think.mock.calls.map(([, command]) => command.serverTime);
}

describe("decodeBatch", () => {
  test("should decode each command against the previous one", () => {
    const commands = [userCommandAt(100, { forwardmove: 10 }), userCommandAt(116, { forwardmove: 10, buttons: 1 })];
    const writer = new BitWriter();
    writeUserCommands(writer, 9, commands);

    expect(Array.from(decodeBatch(new BitReader(writer.toBytes()), 9, 2))).toEqual(commands);
  });
});

describe("handleMove", () => {
  let session: ClientSession;

  beforeEach(() => {
    session = new ClientSession(2);
    session.state = SessionState.Active;
    session.messageAcknowledge = 3;
    session.lastUsercmd = userCommandAt(100);
  });

  test("should think every command newer than the last one run", () => {
    const host = createHost();
    handleMove(session, batch(session, [userCommandAt(100), userCommandAt(116), userCommandAt(132)]), true, host);

    expect(thoughtTimes(host)).toEqual([116, 132]);
    expect(session.lastUsercmd.serverTime).toBe(132);
    expect(session.deltaMessage).toBe(3);
  });

  test("should skip commands newer than the batch's last", () => {
    const host = createHost();
    handleMove(session, batch(session, [userCommandAt(200), userCommandAt(300), userCommandAt(250)]), true, host);

    expect(thoughtTimes(host)).toEqual([200, 250]);
  });

  test("should request a full snapshot for the no-delta variant", () => {
    handleMove(session, batch(session, [userCommandAt(116)]), false, createHost());
    expect(session.deltaMessage).toBe(-1);
  });

  test("should ignore batches with a bad count", () => {
    const host = createHost();
    handleMove(session, batch(session, [], 0), true, host);
    handleMove(session, batch(session, [], 33), true, host);

    expect(host.think).not.toHaveBeenCalled();
  });

  test("should enter the world from primed with the first command", () => {
    const host = createHost();
    session.state = SessionState.Primed;
    const first = userCommandAt(500, { angles: [0, 90, 0] });
    handleMove(session, batch(session, [first, userCommandAt(516)]), true, host);

    expect(host.enterWorld).toHaveBeenCalledWith(session, first);
    expect(thoughtTimes(host)).toEqual([516]);
  });

  test("should not think for a session that is only connected", () => {
    const host = createHost();
    session.state = SessionState.Connected;
    handleMove(session, batch(session, [userCommandAt(116)]), true, host);

    expect(host.think).not.toHaveBeenCalled();
    expect(session.deltaMessage).toBe(-1);
  });

  describe("on a pure server", () => {
    test("should resend the full state to an active client that never answered", () => {
      const host = createHost(true);
      handleMove(session, batch(session, [userCommandAt(116)]), true, host);

      expect(host.sendGameState).toHaveBeenCalledWith(session);
      expect(host.think).not.toHaveBeenCalled();
    });

    test("should hold a primed client until it answers", () => {
      const host = createHost(true);
      session.state = SessionState.Primed;
      handleMove(session, batch(session, [userCommandAt(116)]), true, host);

      expect(host.enterWorld).not.toHaveBeenCalled();
      expect(host.sendGameState).not.toHaveBeenCalled();
    });

    test("should drop a client whose answer failed", () => {
      const host = createHost(true);
      session.state = SessionState.Primed;
      session.gotCP = true;
      handleMove(session, batch(session, [userCommandAt(116)]), true, host);

      expect(host.enterWorld).toHaveBeenCalledTimes(1);
      expect(host.dropClient).toHaveBeenCalledWith(session, "Cannot validate pure client!");
      expect(host.think).not.toHaveBeenCalled();
    });

    test("should run an authenticated client normally", () => {
      const host = createHost(true);
      session.gotCP = true;
      session.pureAuthentic = true;
      handleMove(session, batch(session, [userCommandAt(116)]), true, host);

      expect(thoughtTimes(host)).toEqual([116]);
    });
  });
});
