/**
 * Server configuration and its defaults.
 *
 * @module server/config
 */

import {
  DEFAULT_CLIENTS_PER_IP,
  DEFAULT_DOLLAR_VAR_WEIGHT,
  DEFAULT_FLOOD_PROTECT,
  DEFAULT_FPS,
  DEFAULT_GAME_NAME,
  DEFAULT_LEGACY_PROTOCOL,
  DEFAULT_MAX_CHAT_LENGTH,
  DEFAULT_MAX_CLIENTS,
  DEFAULT_MAX_DOLLAR_VARS,
  DEFAULT_MAX_RADIO_LENGTH,
  DEFAULT_PROTOCOL,
  DEFAULT_RECONNECT_LIMIT_SEC,
  MAX_CLIENTS,
  ZOMBIE_TIMEOUT_MS,
} from "../constants.js";
import type { SessionLogger } from "../core/types.js";

/**
 * Tunables for a {@link SessionServer}. Every field is optional.
 */
export interface SessionServerConfig {
  /** Connection slots (default: DEFAULT_MAX_CLIENTS, at most MAX_CLIENTS) */
  maxClients?: number;
  /** Leading slots reserved for clients that know `privatePassword` */
  privateClients?: number;
  privatePassword?: string;
  /** Protocol version clients must speak */
  protocol?: number;
  /** Additional accepted protocol, 0 to disable */
  legacyProtocol?: number;
  /** Game name a challenge request must carry */
  gameName?: string;
  /** Seconds before the same address/port may connect again */
  reconnectLimitSec?: number;
  /** Connections per non-LAN IP, 0 for unlimited */
  clientsPerIp?: number;
  /** Challenge round-trip bounds in ms, 0 disables a bound */
  minPing?: number;
  maxPing?: number;
  /** Reliable commands per second before forwarding is suppressed, 0 disables */
  floodProtect?: number;
  /** Enforce pure (content checksum) validation */
  pure?: boolean;
  /** Relay voice packets */
  voip?: boolean;
  /** LAN clients skip rate limiting unless the server is public */
  lanForceRate?: boolean;
  /** 0 listen server, 1 LAN dedicated, 2 internet dedicated */
  dedicated?: 0 | 1 | 2;
  /** Server frame rate; upper bound for client "snaps" */
  fps?: number;
  /** Record a demo for every human client that enters the world */
  autoRecordDemo?: boolean;
  /** Let `team` skip the game's team-switch delay */
  teamSwitch?: boolean;
  /** Chat exploit guard bounds */
  maxChatLength?: number;
  maxRadioLength?: number;
  maxDollarVars?: number;
  dollarVarWeight?: number;
  /** Drop clients that send a negative message acknowledge instead of ignoring the packet */
  strictAcknowledge?: boolean;
  /** How long dropped sessions stay zombies */
  zombieTimeoutMs?: number;
  logger?: SessionLogger;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
  /** Uniform [0, 1) source for challenge tokens (default: Math.random) */
  random?: () => number;
}

export type ResolvedSessionConfig = Required<SessionServerConfig>;

function requireInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`[SessionServer] ${name} must be an integer in [${min}, ${max}]. Got: ${value}`);
  }
  return value;
}

/**
 * Apply defaults and validate. Throws on values that cannot work.
 */
export function resolveConfig(config: SessionServerConfig = {}): ResolvedSessionConfig {
  const maxClients = requireInteger("maxClients", config.maxClients ?? DEFAULT_MAX_CLIENTS, 1, MAX_CLIENTS);
  const privateClients = requireInteger("privateClients", config.privateClients ?? 0, 0, maxClients);

  return {
    maxClients,
    privateClients,
    privatePassword: config.privatePassword ?? "",
    protocol: requireInteger("protocol", config.protocol ?? DEFAULT_PROTOCOL, 1),
    legacyProtocol: requireInteger("legacyProtocol", config.legacyProtocol ?? DEFAULT_LEGACY_PROTOCOL, 0),
    gameName: config.gameName ?? DEFAULT_GAME_NAME,
    reconnectLimitSec: requireInteger(
      "reconnectLimitSec",
      config.reconnectLimitSec ?? DEFAULT_RECONNECT_LIMIT_SEC,
      0,
    ),
    clientsPerIp: requireInteger("clientsPerIp", config.clientsPerIp ?? DEFAULT_CLIENTS_PER_IP, 0),
    minPing: requireInteger("minPing", config.minPing ?? 0, 0),
    maxPing: requireInteger("maxPing", config.maxPing ?? 0, 0),
    floodProtect: requireInteger("floodProtect", config.floodProtect ?? DEFAULT_FLOOD_PROTECT, 0),
    pure: config.pure ?? false,
    voip: config.voip ?? false,
    lanForceRate: config.lanForceRate ?? true,
    dedicated: config.dedicated ?? 0,
    fps: requireInteger("fps", config.fps ?? DEFAULT_FPS, 1, 1000),
    autoRecordDemo: config.autoRecordDemo ?? false,
    teamSwitch: config.teamSwitch ?? false,
    maxChatLength: requireInteger("maxChatLength", config.maxChatLength ?? DEFAULT_MAX_CHAT_LENGTH, 0),
    maxRadioLength: requireInteger("maxRadioLength", config.maxRadioLength ?? DEFAULT_MAX_RADIO_LENGTH, 0),
    maxDollarVars: requireInteger("maxDollarVars", config.maxDollarVars ?? DEFAULT_MAX_DOLLAR_VARS, 0),
    dollarVarWeight: requireInteger("dollarVarWeight", config.dollarVarWeight ?? DEFAULT_DOLLAR_VAR_WEIGHT, 0),
    strictAcknowledge: config.strictAcknowledge ?? false,
    zombieTimeoutMs: requireInteger("zombieTimeoutMs", config.zombieTimeoutMs ?? ZOMBIE_TIMEOUT_MS, 0),
    logger: config.logger ?? console,
    now: config.now ?? Date.now,
    random: config.random ?? Math.random,
  };
}
