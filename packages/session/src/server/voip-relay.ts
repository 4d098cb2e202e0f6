/**
 * Best-effort voice relay.
 *
 * Voice frames are fanned out to per-recipient queues that the outbound
 * pass drains into the next message for each recipient. A full queue loses
 * the frame for that recipient only.
 *
 * @module server/voip-relay
 */

import { MAX_CLIENTS, MAX_VOIP_PACKETS, MAX_VOIP_PAYLOAD, VOIP_DIRECT, VOIP_SPATIAL } from "../constants.js";
import type { BitReader } from "../core/bitstream.js";
import { SessionState, type SessionLogger } from "../core/types.js";
import type { ClientSession, VoipPacket } from "./client-session.js";

const RECIPIENT_MASK_BYTES = Math.ceil(MAX_CLIENTS / 8);

/**
 * A voice block as read off a client packet.
 */
export interface VoipFrame {
  generation: number;
  sequence: number;
  frames: number;
  /** Bitmask of directly addressed client indices */
  recipients: Uint8Array;
  flags: number;
  /** Null when the payload was oversized and skipped */
  data: Uint8Array | null;
}

export interface VoipRelayConfig {
  enabled: boolean;
  logger: SessionLogger;
}

export function isVoipTarget(recipients: Uint8Array, index: number): boolean {
  const byte = recipients[index >> 3];
  return byte !== undefined && (byte & (1 << (index & 7))) !== 0;
}

/**
 * Read a voice block. The payload is always consumed so the rest of the
 * packet stays aligned.
 */
export function readVoipFrame(reader: BitReader): VoipFrame {
  const generation = reader.readByte();
  const sequence = reader.readLong();
  const frames = reader.readByte();
  const recipients = reader.readData(RECIPIENT_MASK_BYTES);
  const flags = reader.readByte();
  const size = reader.readShort();

  if (size < 0) {
    return { generation, sequence, frames, recipients, flags, data: null };
  }
  const data = reader.readData(size);
  return {
    generation,
    sequence,
    frames,
    recipients,
    flags,
    data: size > MAX_VOIP_PAYLOAD ? null : data,
  };
}

export class VoipRelay {
  private readonly sessions: Iterable<ClientSession>;
  private readonly config: VoipRelayConfig;

  constructor(sessions: Iterable<ClientSession>, config: VoipRelayConfig) {
    this.sessions = sessions;
    this.config = config;
  }

  shouldIgnoreSender(sender: ClientSession): boolean {
    return !this.config.enabled || !sender.hasVoip;
  }

  /**
   * Fan a frame out to every eligible recipient. Returns how many queues
   * received it.
   */
  relay(sender: ClientSession, frame: VoipFrame): number {
    if (frame.data === null || this.shouldIgnoreSender(sender)) {
      return 0;
    }

    let delivered = 0;
    for (const recipient of this.sessions) {
      if (
        recipient.state !== SessionState.Active ||
        recipient.index === sender.index ||
        !recipient.hasVoip ||
        recipient.muteAllVoip ||
        recipient.ignoreVoipFrom[sender.index] !== 0
      ) {
        continue;
      }

      const flags = isVoipTarget(frame.recipients, recipient.index)
        ? frame.flags | VOIP_DIRECT
        : frame.flags & ~VOIP_DIRECT;
      if ((flags & (VOIP_SPATIAL | VOIP_DIRECT)) === 0) {
        continue;
      }

      if (recipient.voipQueue.length >= MAX_VOIP_PACKETS) {
        this.config.logger.debug(`[VoipRelay] queue full for ${recipient.name}, dropping frame`);
        continue;
      }

      const packet: VoipPacket = {
        sender: sender.index,
        generation: frame.generation,
        sequence: frame.sequence,
        frames: frame.frames,
        flags,
        data: frame.data,
      };
      recipient.voipQueue.push(packet);
      delivered++;
    }
    return delivered;
  }

  /**
   * Take everything queued for `session`.
   */
  drain(session: ClientSession): VoipPacket[] {
    const packets = session.voipQueue;
    session.voipQueue = [];
    return packets;
  }
}
