/**
 * Outbound message framing and rate pacing.
 *
 * Messages are framed when queued and transmitted later by
 * {@link sendQueuedMessages}, at most one per session per pass, spaced by the
 * session's byte rate.
 *
 * @module server/outbound
 */

import { BitWriter } from "../core/bitstream.js";
import { ServerOp } from "../core/protocol.js";
import { SessionState, type Transport } from "../core/types.js";
import { ClientSession } from "./client-session.js";

/** Per-packet transport overhead charged against the rate */
export const HEADER_RATE_BYTES = 48;

/**
 * Frame a message for `session` and append it to its outbound queue.
 * Every message acknowledges the client's reliable commands and repeats
 * all server commands the client has not acknowledged yet.
 *
 * Returns the message's sequence number, or -1 for bots, which have no
 * remote end.
 */
export function queueMessage(session: ClientSession, writeBody: (writer: BitWriter) => void): number {
  if (session.isBot) {
    return -1;
  }

  const sequence = session.outgoingSequence;
  const writer = new BitWriter();
  writer.writeLong(sequence);
  writer.writeLong(session.lastClientCommand);
  writeServerCommands(session, writer);
  writeBody(writer);
  writer.writeByte(ServerOp.Eof);

  session.outbound.push(writer.toBytes());
  session.outgoingSequence++;
  return sequence;
}

function writeServerCommands(session: ClientSession, writer: BitWriter): void {
  for (let i = session.reliableAcknowledge + 1; i <= session.reliableSequence; i++) {
    writer.writeByte(ServerOp.ServerCommand);
    writer.writeLong(i);
    writer.writeString(session.reliableCommands[ClientSession.ringIndex(i)] ?? "");
  }
}

/**
 * Milliseconds a message of `size` bytes occupies at `rate` bytes/sec.
 */
export function rateMsec(size: number, rate: number): number {
  if (rate <= 0) {
    return 0;
  }
  return Math.floor(((size + HEADER_RATE_BYTES) * 1000) / rate);
}

function sendDelay(session: ClientSession, now: number): number {
  if (session.lastSentSize === 0) {
    return 0;
  }
  return session.lastSentTime + rateMsec(session.lastSentSize, session.rate) - now;
}

/**
 * One pacing pass over all sessions. Returns the shortest wait until some
 * session may send again, or -1 when nothing is queued.
 */
export function sendQueuedMessages(
  sessions: Iterable<ClientSession>,
  transport: Transport,
  now: number,
): number {
  let next = -1;

  for (const session of sessions) {
    if (session.state === SessionState.Free || session.outbound.length === 0) {
      continue;
    }

    let delay = sendDelay(session, now);
    if (delay <= 0) {
      const message = session.outbound.shift();
      if (message) {
        transport.sendToSession(session.index, session.address, message);
        session.lastSentTime = now;
        session.lastSentSize = message.length;
      }
      if (session.outbound.length === 0) {
        continue;
      }
      delay = sendDelay(session, now);
    }

    if (next < 0 || delay < next) {
      next = delay;
    }
  }

  return next;
}
