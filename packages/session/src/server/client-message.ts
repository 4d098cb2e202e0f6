/**
 * In-session packet dispatch.
 *
 * @module server/client-message
 */

import { MAX_RELIABLE_COMMANDS } from "../constants.js";
import { BitReader, MessageOverflowError } from "../core/bitstream.js";
import { ClientOp } from "../core/protocol.js";
import { SessionState } from "../core/types.js";
import type { ClientSession } from "./client-session.js";
import type { ReliableCommandChannel } from "./reliable-channel.js";
import { handleMove, type MoveHost } from "./usercmd-decoder.js";
import { readVoipFrame, type VoipRelay } from "./voip-relay.js";

export interface ClientMessageHost extends MoveHost {
  readonly serverId: number;
  /** Oldest world generation whose packets are still expected in flight */
  readonly restartedServerId: number;
  readonly strictAcknowledge: boolean;
  readonly channel: ReliableCommandChannel;
  readonly voip: VoipRelay;
}

/**
 * Process one packet from an admitted session. Truncated packets are
 * discarded at the point the data runs out.
 */
export function executeClientMessage(session: ClientSession, data: Uint8Array, host: ClientMessageHost): void {
  try {
    dispatch(session, new BitReader(data), host);
  } catch (error) {
    if (error instanceof MessageOverflowError) {
      host.logger.debug(`[ClientMessage] truncated packet from ${session.name}: ${error.message}`);
      return;
    }
    throw error;
  }
}

function dispatch(session: ClientSession, reader: BitReader, host: ClientMessageHost): void {
  const serverId = reader.readLong();

  session.messageAcknowledge = reader.readLong();
  if (session.messageAcknowledge < 0) {
    if (host.strictAcknowledge) {
      host.dropClient(session, "illegible client message");
    }
    return;
  }

  session.reliableAcknowledge = reader.readLong();
  // an acknowledge this far back would make every queued command look unacknowledged
  if (session.reliableAcknowledge < session.reliableSequence - MAX_RELIABLE_COMMANDS) {
    session.reliableAcknowledge = session.reliableSequence;
    host.dropClient(session, "illegible client message");
    return;
  }

  if (serverId !== host.serverId) {
    if (serverId >= host.restartedServerId && serverId < host.serverId) {
      host.logger.debug(`[ClientMessage] ${session.name}: ignoring outdated client message`);
      return;
    }
    if (session.state !== SessionState.Active && session.messageAcknowledge > session.gamestateMessageNum) {
      host.logger.debug(`[ClientMessage] ${session.name}: dropped gamestate, resending`);
      host.sendGameState(session);
    }
    return;
  }

  let op = reader.readByte();
  while (op === ClientOp.ClientCommand) {
    const sequence = reader.readLong();
    const text = reader.readString();
    if (host.channel.submit(session, sequence, text) === "lost") {
      return;
    }
    if (session.state === SessionState.Zombie || session.state === SessionState.Free) {
      return;
    }
    op = reader.readByte();
  }

  if (op === ClientOp.VoipSpeex) {
    // legacy codec: consumed, never relayed
    readVoipFrame(reader);
    op = reader.readByte();
  }

  if (op === ClientOp.VoipOpus) {
    host.voip.relay(session, readVoipFrame(reader));
    op = reader.readByte();
  }

  switch (op) {
    case ClientOp.Move:
      handleMove(session, reader, true, host);
      break;
    case ClientOp.MoveNoDelta:
      handleMove(session, reader, false, host);
      break;
    case ClientOp.Eof:
      break;
    default:
      host.logger.warn(`[ClientMessage] bad command byte ${op} for client ${session.index}`);
  }
}
