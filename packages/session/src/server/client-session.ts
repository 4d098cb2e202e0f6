/**
 * Per-slot client state.
 *
 * @module server/client-session
 */

import {
  DEFAULT_RATE,
  MAX_CLIENTS,
  MAX_INFO_STRING,
  MAX_RATE,
  MAX_RELIABLE_COMMANDS,
  MIN_RATE,
} from "../constants.js";
import {
  BOT_ADDRESS,
  formatAddress,
  isLanAddress,
  isLocalAddress,
  type NetAddress,
} from "../core/address.js";
import { infoValueForKey, setInfoValueForKey } from "../core/info-string.js";
import { SessionState, type SessionView } from "../core/types.js";
import { createNullUserCommand, type UserCommand } from "../core/usercmd.js";
import { clamp, parseIntLoose } from "../core/utils.js";

/**
 * A relayed voice packet waiting in a recipient's queue.
 */
export interface VoipPacket {
  sender: number;
  generation: number;
  sequence: number;
  frames: number;
  flags: number;
  data: Uint8Array;
}

/**
 * Inputs to {@link ClientSession.userinfoChanged} that come from server config.
 */
export interface UserinfoPolicy {
  lanForceRate: boolean;
  dedicated: 0 | 1 | 2;
  fps: number;
}

/**
 * One connection slot. Instances are never carried across connections:
 * the session table swaps in a fresh instance when a slot is (re)assigned,
 * so only the index survives.
 */
export class ClientSession implements SessionView {
  readonly index: number;
  state: SessionState = SessionState.Free;

  address: NetAddress = BOT_ADDRESS;
  /** Client-chosen port id; survives NAT port remapping */
  qport = 0;
  challenge = 0;
  /** Connected with the legacy protocol */
  compat = false;

  userinfo = "";
  /** Userinfo received while updates were debounced, applied later */
  userinfoBuffer = "";
  name = "";
  rate = 0;
  snapshotMsec = 0;
  hasVoip = false;

  // client -> server reliable commands
  lastClientCommand = 0;
  lastClientCommandString = "";
  numcmds = 0;
  nextReliableTime = 0;
  nextReliableUserTime = 0;

  // server -> client reliable commands
  reliableSequence = 0;
  reliableAcknowledge = 0;
  readonly reliableCommands: string[] = new Array<string>(MAX_RELIABLE_COMMANDS).fill("");

  // message sequencing
  messageAcknowledge = 0;
  outgoingSequence = 1;
  /** Sequence of the last full-state message, -1 forces a resend */
  gamestateMessageNum = -1;
  deltaMessage = -1;
  lastUsercmd: UserCommand = createNullUserCommand();

  pureAuthentic = false;
  /** A pure-check response arrived for the current full state */
  gotCP = false;

  muteAllVoip = false;
  readonly ignoreVoipFrom = new Uint8Array(MAX_CLIENTS);
  voipQueue: VoipPacket[] = [];

  demoRecording = false;

  lastConnectTime = 0;
  lastPacketTime = 0;
  lastSnapshotTime = 0;
  /** When the session became a zombie */
  zombieSince = 0;

  /** Encoded messages awaiting the pacing pass */
  outbound: Uint8Array[] = [];
  lastSentTime = 0;
  lastSentSize = 0;

  constructor(index: number) {
    this.index = index;
  }

  get isBot(): boolean {
    return this.address.type === "bot";
  }

  /**
   * Index into the reliable command ring for a sequence number.
   */
  static ringIndex(sequence: number): number {
    return sequence & (MAX_RELIABLE_COMMANDS - 1);
  }

  /**
   * Queue a server-to-client reliable command. Returns false when the
   * client has fallen a full ring behind; the caller drops the session.
   * `force` skips the overflow check for the final disconnect notice.
   */
  addServerCommand(text: string, force = false): boolean {
    if (!force && this.reliableSequence - this.reliableAcknowledge >= MAX_RELIABLE_COMMANDS) {
      return false;
    }
    this.reliableSequence++;
    this.reliableCommands[ClientSession.ringIndex(this.reliableSequence)] = text;
    return true;
  }

  /**
   * Text of the reliable command the client last acknowledged.
   */
  acknowledgedServerCommand(): string {
    return this.reliableCommands[ClientSession.ringIndex(this.reliableAcknowledge)] ?? "";
  }

  /**
   * Derive name, rate, snapshot interval and VoIP capability from the
   * userinfo string, and keep its "ip" key current. Returns false when the
   * "ip" key would push the userinfo past its length limit.
   */
  userinfoChanged(policy: UserinfoPolicy): boolean {
    this.name = infoValueForKey(this.userinfo, "name");

    if (isLanAddress(this.address) && policy.dedicated !== 2 && policy.lanForceRate) {
      this.rate = MAX_RATE;
    } else {
      const value = infoValueForKey(this.userinfo, "rate");
      this.rate = value !== "" ? clamp(parseIntLoose(value), MIN_RATE, MAX_RATE) : DEFAULT_RATE;
    }

    const handicap = infoValueForKey(this.userinfo, "handicap");
    if (handicap !== "") {
      const value = parseIntLoose(handicap);
      if (value <= 0 || value > 100 || handicap.length > 4) {
        this.userinfo = setInfoValueForKey(this.userinfo, "handicap", "100");
      }
    }

    const snaps = infoValueForKey(this.userinfo, "snaps");
    const snapsPerSecond = clamp(snaps !== "" ? parseIntLoose(snaps) : policy.fps, 1, policy.fps);
    const snapshotMsec = Math.floor(1000 / snapsPerSecond);
    if (snapshotMsec !== this.snapshotMsec) {
      this.lastSnapshotTime = 0;
      this.snapshotMsec = snapshotMsec;
    }

    this.hasVoip = !this.compat && infoValueForKey(this.userinfo, "cl_voipProtocol").toLowerCase() === "opus";

    const ip = isLocalAddress(this.address) ? "localhost" : formatAddress(this.address);
    const current = infoValueForKey(this.userinfo, "ip");
    const length = current !== ""
      ? ip.length - current.length + this.userinfo.length
      : ip.length + 4 + this.userinfo.length;
    if (length >= MAX_INFO_STRING) {
      return false;
    }
    this.userinfo = setInfoValueForKey(this.userinfo, "ip", ip);
    return true;
  }
}
