/**
 * Connectionless handshake: challenge requests and connect requests.
 *
 * Rejections are answered out-of-band with a `print` message, except where
 * an answer would only help a flagged peer (reconnect flooding, refused
 * challenges), which get silence.
 *
 * @module server/admission
 */

import { MAX_INFO_STRING } from "../constants.js";
import {
  BOT_ADDRESS,
  formatAddress,
  isLanAddress,
  isLocalAddress,
  type NetAddress,
} from "../core/address.js";
import { FatalServerError } from "../core/errors.js";
import { infoValueForKey, setInfoValueForKey } from "../core/info-string.js";
import { SessionState, type Heartbeat, type Simulation, type Transport } from "../core/types.js";
import { parseIntLoose } from "../core/utils.js";
import type { BanTable } from "./ban-table.js";
import type { ChallengeRegistry } from "./challenge-registry.js";
import type { ClientSession } from "./client-session.js";
import type { ResolvedSessionConfig } from "./config.js";
import { AddressRateLimiter, createBucket, rateLimit, type LeakyBucket } from "./rate-limit.js";
import type { SessionTable } from "./session-table.js";

export type AdmissionResult =
  | { status: "admitted"; index: number; reconnect: boolean }
  | { status: "rejected"; reason: string; silent: boolean };

export type ChallengeResult =
  | { status: "issued"; challenge: number }
  | { status: "dropped"; reason: string };

export interface AdmissionContext {
  config: ResolvedSessionConfig;
  sessions: SessionTable;
  challenges: ChallengeRegistry;
  bans: BanTable;
  transport: Transport;
  simulation: Simulation;
  heartbeat: Heartbeat;
  dropClient(session: ClientSession, reason: string): void;
  /** Re-derive session fields from userinfo; false when the session was dropped */
  applyUserinfo(session: ClientSession): boolean;
}

const CHALLENGE_BURST = 10;
const CHALLENGE_PERIOD_MS = 1000;
const OUTBOUND_BURST = 10;
const OUTBOUND_PERIOD_MS = 100;

export class ConnectionAdmission {
  private readonly context: AdmissionContext;
  private readonly limiter = new AddressRateLimiter();
  private readonly outboundBucket: LeakyBucket = createBucket();

  constructor(context: AdmissionContext) {
    this.context = context;
  }

  /**
   * `getchallenge <clientNonce> <gameName>`.
   */
  handleChallengeRequest(address: NetAddress, args: readonly string[]): ChallengeResult {
    const { config, challenges, transport } = this.context;
    const now = config.now();

    if (this.limiter.limit(address, CHALLENGE_BURST, CHALLENGE_PERIOD_MS, now)) {
      config.logger.debug(`[Admission] getchallenge rate limit from ${formatAddress(address)} exceeded`);
      return { status: "dropped", reason: "address rate limit" };
    }
    // caps outbound challenge responses across all addresses
    if (rateLimit(this.outboundBucket, OUTBOUND_BURST, OUTBOUND_PERIOD_MS, now)) {
      config.logger.debug("[Admission] getchallenge global rate limit exceeded");
      return { status: "dropped", reason: "global rate limit" };
    }

    const gameName = args[2] ?? "";
    const mismatch = gameName === "" ? config.legacyProtocol === 0 : gameName !== config.gameName;
    if (mismatch) {
      transport.sendOutOfBand(address, `print\nGame mismatch: This is a ${config.gameName} server\n`);
      return { status: "dropped", reason: "game mismatch" };
    }

    const clientChallenge = parseIntLoose(args[1] ?? "");
    const { challenge } = challenges.issueOrRefresh(address, clientChallenge, now);
    transport.sendOutOfBand(address, `challengeResponse ${challenge} ${clientChallenge} ${config.protocol}`);
    return { status: "issued", challenge };
  }

  /**
   * `connect "<userinfo>"`. Runs every admission check in order and, on
   * success, leaves the session Connected.
   */
  handleConnectRequest(address: NetAddress, rawUserinfo: string): AdmissionResult {
    const { config, sessions, challenges, bans } = this.context;
    const now = config.now();

    if (bans.isBanned(address)) {
      return this.reject(address, "You are banned from this server.");
    }

    let userinfo = rawUserinfo.slice(0, MAX_INFO_STRING - 1);
    const version = parseIntLoose(infoValueForKey(userinfo, "protocol"));
    const compat = version > 0 && config.legacyProtocol === version;
    if (!compat && version !== config.protocol) {
      config.logger.debug(`[Admission] rejected connect from version ${version}`);
      return this.reject(address, `Server uses protocol version ${config.protocol} (yours is ${version}).`);
    }

    const challenge = parseIntLoose(infoValueForKey(userinfo, "challenge"));
    const qport = parseIntLoose(infoValueForKey(userinfo, "qport"));

    const existing = sessions.findByPeer(address, qport);
    if (existing && now - existing.lastConnectTime < config.reconnectLimitSec * 1000) {
      config.logger.debug(`[Admission] ${formatAddress(address)}: reconnect rejected, too soon`);
      return this.silent("reconnect too soon");
    }

    const ip = isLocalAddress(address) ? "localhost" : formatAddress(address);
    if (ip.length + userinfo.length + 4 >= MAX_INFO_STRING) {
      return this.reject(address, "Userinfo string length exceeded.  Try removing setu cvars from your config.");
    }
    userinfo = setInfoValueForKey(userinfo, "ip", ip);

    if (!isLocalAddress(address)) {
      const slot = challenges.validate(address, challenge);
      if (slot === null) {
        return this.reject(address, "No or bad challenge for your address.");
      }
      const entry = challenges.get(slot);
      if (entry.wasRefused) {
        return this.silent("challenge refused");
      }

      const ping = now - entry.pingTime;
      if (!isLanAddress(address)) {
        if (config.clientsPerIp > 0 && sessions.countFromHost(address) >= config.clientsPerIp) {
          return this.reject(address, "Too many connections from the same IP");
        }
        if (config.minPing > 0 && ping < config.minPing) {
          challenges.markRefused(slot);
          return this.reject(address, "Server is for high pings only");
        }
        if (config.maxPing > 0 && ping > config.maxPing) {
          challenges.markRefused(slot);
          return this.reject(address, "Server is for low pings only");
        }
      }

      config.logger.log(`[Admission] ${formatAddress(address)} connecting with ${ping} challenge ping`);
      challenges.markConnected(slot);
    }

    let target: ClientSession | null = existing;
    if (target) {
      config.logger.log(`[Admission] ${formatAddress(address)}: reconnect`);
    } else {
      const allocated = this.allocateSlot(address, userinfo);
      if (allocated.status === "rejected") {
        return allocated;
      }
      target = allocated.session;
    }

    // slots are reinitialized by value: the reconnect path keeps only the index
    const session = sessions.recycle(target.index);
    session.challenge = challenge;
    session.address = address;
    session.qport = qport;
    session.compat = compat;
    session.userinfo = userinfo;

    const denied = this.context.simulation.onClientConnect(session.index, true, false);
    if (denied !== null) {
      sessions.recycle(session.index);
      config.logger.debug(`[Admission] game rejected a connection: ${denied}`);
      return this.reject(address, denied);
    }

    if (!this.context.applyUserinfo(session)) {
      return { status: "rejected", reason: "userinfo string length exceeded", silent: true };
    }

    this.context.transport.sendOutOfBand(address, `connectResponse ${challenge}`);
    config.logger.debug(`[Admission] going from Free to Connected for ${session.name}`);

    session.state = SessionState.Connected;
    session.lastSnapshotTime = 0;
    session.lastPacketTime = now;
    session.lastConnectTime = now;
    session.numcmds = 0;
    session.gamestateMessageNum = -1;

    this.announceIfThreshold();
    return { status: "admitted", index: session.index, reconnect: existing !== null };
  }

  /**
   * Seat a server-side bot. Returns the slot index, or null when no slot is
   * free or the simulation refuses it.
   */
  connectBot(name: string): number | null {
    const { config, sessions, simulation } = this.context;
    const free = sessions.findFree(config.privateClients);
    if (!free) {
      return null;
    }

    const session = sessions.recycle(free.index);
    session.address = BOT_ADDRESS;
    session.userinfo = setInfoValueForKey("", "name", name);

    const denied = simulation.onClientConnect(session.index, true, true);
    if (denied !== null) {
      sessions.recycle(session.index);
      config.logger.debug(`[Admission] game rejected bot ${name}: ${denied}`);
      return null;
    }

    if (!this.context.applyUserinfo(session)) {
      return null;
    }
    session.state = SessionState.Active;
    session.lastPacketTime = config.now();
    simulation.onClientBegin(session.index);
    this.announceIfThreshold();
    return session.index;
  }

  private allocateSlot(
    address: NetAddress,
    userinfo: string,
  ): { status: "allocated"; session: ClientSession } | Extract<AdmissionResult, { status: "rejected" }> {
    const { config, sessions } = this.context;

    const password = infoValueForKey(userinfo, "password");
    const startIndex = password !== "" && password === config.privatePassword ? 0 : config.privateClients;

    const free = sessions.findFree(startIndex);
    if (free) {
      return { status: "allocated", session: free };
    }

    const zombie = sessions.findZombie(startIndex);
    if (zombie) {
      config.logger.debug(`[Admission] Going from Zombie to Free for client ${zombie.index}`);
      return { status: "allocated", session: zombie };
    }

    if (!isLocalAddress(address)) {
      config.logger.debug("[Admission] rejected a connection, server is full");
      return this.reject(address, "Server is full.");
    }

    let bots = 0;
    for (let i = startIndex; i < sessions.capacity; i++) {
      if (sessions.get(i).isBot) {
        bots++;
      }
    }
    if (bots < sessions.capacity - startIndex) {
      throw FatalServerError.serverFullOnLocalConnect(sessions.capacity);
    }

    const last = sessions.get(sessions.capacity - 1);
    this.context.dropClient(last, "only bots on server");
    return { status: "allocated", session: sessions.get(last.index) };
  }

  private announceIfThreshold(): void {
    const count = this.context.sessions.countAtLeast(SessionState.Connected);
    if (count === 1 || count === this.context.config.maxClients) {
      this.context.heartbeat.heartbeat();
    }
  }

  private reject(address: NetAddress, reason: string): Extract<AdmissionResult, { status: "rejected" }> {
    this.context.transport.sendOutOfBand(address, `print\n${reason}\n`);
    return { status: "rejected", reason, silent: false };
  }

  private silent(reason: string): Extract<AdmissionResult, { status: "rejected" }> {
    return { status: "rejected", reason, silent: true };
  }
}
