/**
 * Movement batch decoding and application.
 *
 * @module server/usercmd-decoder
 */

import { MAX_PACKET_USERCMDS } from "../constants.js";
import type { BitReader } from "../core/bitstream.js";
import { SessionState, type SessionLogger } from "../core/types.js";
import {
  cloneUserCommand,
  createNullUserCommand,
  readDeltaUserCommand,
  userCommandKey,
  type UserCommand,
} from "../core/usercmd.js";
import { getAt } from "../core/utils.js";
import type { ClientSession } from "./client-session.js";

/**
 * Lazily decode `count` commands, each against the one before it. The
 * first is decoded against the null command.
 */
export function* decodeBatch(reader: BitReader, key: number, count: number): Generator<UserCommand, void, undefined> {
  let from = createNullUserCommand();
  for (let i = 0; i < count; i++) {
    const command = readDeltaUserCommand(reader, key, from);
    yield command;
    from = command;
  }
}

export interface MoveHost {
  readonly pure: boolean;
  readonly checksumFeed: number;
  readonly logger: SessionLogger;
  sendGameState(session: ClientSession): void;
  enterWorld(session: ClientSession, command: UserCommand): void;
  dropClient(session: ClientSession, reason: string): void;
  think(session: ClientSession, command: UserCommand): void;
}

/**
 * Read one move op's batch and run it through the session.
 * `delta` is false for the no-delta variant, which asks for a full snapshot.
 */
export function handleMove(session: ClientSession, reader: BitReader, delta: boolean, host: MoveHost): void {
  session.deltaMessage = delta ? session.messageAcknowledge : -1;

  const count = reader.readByte();
  if (count < 1 || count > MAX_PACKET_USERCMDS) {
    host.logger.debug(`[UserCommandDecoder] bad command count ${count} from ${session.name}`);
    return;
  }

  const key = userCommandKey(
    host.checksumFeed,
    session.messageAcknowledge,
    session.acknowledgedServerCommand(),
  );
  const commands = Array.from(decodeBatch(reader, key, count));

  if (host.pure && !session.pureAuthentic && !session.gotCP) {
    // an active client that never answered the pure check missed the full state
    if (session.state === SessionState.Active) {
      host.sendGameState(session);
    }
    return;
  }

  if (session.state === SessionState.Primed) {
    host.enterWorld(session, getAt(commands, 0, "command batch"));
  }

  if (host.pure && !session.pureAuthentic) {
    host.dropClient(session, "Cannot validate pure client!");
    return;
  }

  if (session.state !== SessionState.Active) {
    session.deltaMessage = -1;
    return;
  }

  const newest = getAt(commands, commands.length - 1, "command batch").serverTime;
  for (const command of commands) {
    if (command.serverTime > newest) {
      continue;
    }
    if (command.serverTime <= session.lastUsercmd.serverTime) {
      continue;
    }
    clientThink(session, command, host);
  }
}

function clientThink(session: ClientSession, command: UserCommand, host: MoveHost): void {
  session.lastUsercmd = cloneUserCommand(command);
  if (session.state !== SessionState.Active) {
    return;
  }
  host.think(session, command);
}
