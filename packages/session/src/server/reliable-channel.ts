/**
 * Client-to-server reliable command channel.
 *
 * Every client packet repeats its unacknowledged text commands, each with a
 * sequence number. A command runs exactly once: repeats are ignored, and a
 * gap means commands were lost for good, which drops the session.
 *
 * @module server/reliable-channel
 */

import { FLOOD_WINDOW_MS, USERINFO_DEBOUNCE_MS } from "../constants.js";
import { formatAddress } from "../core/address.js";
import { sanitizeArgs, tokenizeCommand } from "../core/command-tokenizer.js";
import { SessionState, type SessionLogger } from "../core/types.js";
import type { ClientSession } from "./client-session.js";

export type ReliableCommandResult = "accepted" | "duplicate" | "lost";

/**
 * Session-management commands handled by the engine itself. Everything
 * else is game traffic for the simulation.
 */
export type ManagementCommand = "userinfo" | "disconnect" | "cp" | "vdr" | "donedl" | "voip";

/**
 * Server operations the channel's management commands need.
 */
export interface ReliableCommandHost {
  dropClient(session: ClientSession, reason: string): void;
  /** Replace the userinfo and re-derive everything from it */
  applyUserinfo(session: ClientSession, userinfo: string): void;
  verifyPure(session: ClientSession, args: readonly string[]): void;
  sendGameState(session: ClientSession): void;
  sendServerCommand(session: ClientSession, text: string): void;
  forwardCommand(session: ClientSession, args: readonly string[]): void;
  /** Move the session to `team` past the game's switch delay; false when the game cannot */
  forceTeam(session: ClientSession, team: string): boolean;
}

export interface ReliableChannelConfig {
  /** Commands per window before forwarding stops, 0 disables */
  floodProtect: number;
  maxChatLength: number;
  maxRadioLength: number;
  maxDollarVars: number;
  dollarVarWeight: number;
  /** Route `team` through {@link ReliableCommandHost.forceTeam} */
  teamSwitch: boolean;
  logger: SessionLogger;
  now: () => number;
}

type ManagementHandler = (channel: ReliableCommandChannel, session: ClientSession, args: readonly string[]) => void;

function setVoipIgnore(session: ClientSession, idText: string | undefined, ignore: boolean): void {
  if (!idText || !/^[0-9]/.test(idText)) {
    return;
  }
  const id = Number.parseInt(idText, 10);
  if (id >= 0 && id < session.ignoreVoipFrom.length) {
    session.ignoreVoipFrom[id] = ignore ? 1 : 0;
  }
}

const MANAGEMENT_HANDLERS: { readonly [K in ManagementCommand]: ManagementHandler } = {
  userinfo: (channel, session, args) => channel.updateUserinfo(session, args[1] ?? ""),
  disconnect: (channel, session) => channel.host.dropClient(session, "disconnected"),
  cp: (channel, session, args) => channel.host.verifyPure(session, args),
  vdr: (_channel, session) => {
    session.pureAuthentic = false;
    session.gotCP = false;
  },
  donedl: (channel, session) => {
    if (session.state === SessionState.Active) {
      return;
    }
    // resend so anything that changed during the download is picked up
    channel.host.sendGameState(session);
  },
  voip: (_channel, session, args) => {
    switch (args[1]) {
      case "ignore":
        setVoipIgnore(session, args[2], true);
        break;
      case "unignore":
        setVoipIgnore(session, args[2], false);
        break;
      case "muteall":
        session.muteAllVoip = true;
        break;
      case "unmuteall":
        session.muteAllVoip = false;
        break;
    }
  },
};

export function isManagementCommand(name: string): name is ManagementCommand {
  return Object.prototype.hasOwnProperty.call(MANAGEMENT_HANDLERS, name);
}

export class ReliableCommandChannel {
  readonly host: ReliableCommandHost;
  private readonly config: ReliableChannelConfig;

  constructor(host: ReliableCommandHost, config: ReliableChannelConfig) {
    this.host = host;
    this.config = config;
  }

  /**
   * Accept one sequenced command from a client packet.
   */
  submit(session: ClientSession, sequence: number, text: string): ReliableCommandResult {
    if (session.lastClientCommand >= sequence) {
      return "duplicate";
    }

    this.config.logger.debug(`[ReliableChannel] clientCommand: ${session.name} : ${sequence} : ${text}`);

    if (sequence > session.lastClientCommand + 1) {
      this.config.logger.log(
        `[ReliableChannel] Client ${session.name} lost ${sequence - session.lastClientCommand - 1} clientCommands`,
      );
      this.host.dropClient(session, "Lost reliable commands");
      return "lost";
    }

    const now = this.config.now();
    let forwardAllowed = true;
    // downloading clients legitimately burst commands, so only active ones are limited
    if (session.state >= SessionState.Active && this.config.floodProtect > 0) {
      if (now < session.nextReliableTime) {
        session.numcmds++;
        if (session.numcmds > this.config.floodProtect) {
          forwardAllowed = false;
        }
      } else {
        session.numcmds = 1;
      }
    }
    session.nextReliableTime = now + FLOOD_WINDOW_MS;

    this.execute(session, text, forwardAllowed);

    session.lastClientCommand = sequence;
    session.lastClientCommandString = text;
    return "accepted";
  }

  /**
   * Run a command: management commands always, game commands only when
   * `forwardAllowed` and the session is in the world.
   */
  execute(session: ClientSession, text: string, forwardAllowed: boolean): void {
    const args = tokenizeCommand(text);
    const name = args[0] ?? "";

    if (isManagementCommand(name)) {
      MANAGEMENT_HANDLERS[name](this, session, args);
      return;
    }

    if (!forwardAllowed) {
      this.config.logger.debug(`[ReliableChannel] client text ignored for ${session.name}: ${name}`);
      return;
    }

    if (session.state !== SessionState.Active && session.state !== SessionState.Primed) {
      return;
    }

    const sanitized = sanitizeArgs(args);
    if (this.config.teamSwitch && name.toLowerCase() === "team" && this.host.forceTeam(session, sanitized[1] ?? "")) {
      return;
    }

    if (this.exceedsChatBound(sanitized)) {
      this.config.logger.log(
        `[ReliableChannel] Buffer overflow exploit radio/say, possible attempt from ${formatAddress(session.address)}`,
      );
      this.host.sendServerCommand(session, 'print "Chat dropped due to message length constraints.\n"');
      return;
    }

    this.host.forwardCommand(session, sanitized);
  }

  /**
   * Apply a userinfo update, or park it when an active client updates
   * faster than once per debounce window.
   */
  updateUserinfo(session: ClientSession, userinfo: string): void {
    const now = this.config.now();
    if (
      this.config.floodProtect > 0 &&
      session.state >= SessionState.Active &&
      now < session.nextReliableUserTime
    ) {
      session.userinfoBuffer = userinfo;
      this.host.sendServerCommand(session, 'print "^7Command ^1delayed^7 due to sv_floodprotect."');
      return;
    }

    session.userinfoBuffer = "";
    session.nextReliableUserTime = now + USERINFO_DEBOUNCE_MS;
    this.host.applyUserinfo(session, userinfo);
  }

  /**
   * Weighted length check for chat and radio commands. Every character
   * counts one, the separating spaces count one each, and every `$`
   * substitution token costs `dollarVarWeight` extra; more than
   * `maxDollarVars` tokens fails outright.
   */
  exceedsChatBound(args: readonly string[]): boolean {
    const limit = this.boundFor(args[0] ?? "");
    if (limit < 0) {
      return false;
    }

    let charCount = 0;
    let dollarCount = 0;
    for (let i = args.length - 1; i >= 1; i--) {
      for (const ch of args[i] ?? "") {
        if (++charCount > limit) {
          return true;
        }
        if (ch === "$") {
          if (++dollarCount > this.config.maxDollarVars) {
            return true;
          }
          charCount += this.config.dollarVarWeight;
          if (charCount > limit) {
            return true;
          }
        }
      }
      if (i !== 1 && ++charCount > limit) {
        return true;
      }
    }
    return false;
  }

  private boundFor(name: string): number {
    switch (name.toLowerCase()) {
      case "say":
      case "say_team":
      case "tell":
        return this.config.maxChatLength;
      case "ut_radio":
        // "ut_radio 1 1 affirmative": the two single-digit args and their spaces
        return this.config.maxRadioLength + 4;
      default:
        return -1;
    }
  }
}
