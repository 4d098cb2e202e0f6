/**
 * Deathmatch game type definitions
 */

export interface Vector2 {
  x: number;
  y: number;
}

export interface SpawnPoint extends Vector2 {
  /** Facing in degrees */
  yaw: number;
}

export interface ArenaBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface ArenaConfig {
  id: string;
  name: string;
  bounds: ArenaBounds;
  spawnPoints: SpawnPoint[];
}

export interface ContentArchive {
  name: string;
  checksum: number;
}

export interface ContentManifest {
  references: [number, number];
  archives: ContentArchive[];
}

export type Team = "free" | "red" | "blue" | "spectator";

export interface DeathmatchPlayer {
  index: number;
  name: string;
  team: Team;
  isBot: boolean;
  position: Vector2;
  /** Facing in degrees */
  yaw: number;
  health: number;
  score: number;
  /** serverTime of the last applied movement command */
  lastThinkTime: number;
  /** Whether the attack button was held on the last command */
  attackHeld: boolean;
  /** When the player last changed team, null if never */
  teamChangedAt: number | null;
}

export interface ChatLine {
  from: number;
  channel: "all" | "team" | "private";
  to: number | null;
  text: string;
}

export interface DeathmatchWorld {
  arena: ArenaConfig;
  players: Map<number, DeathmatchPlayer>;
  chat: ChatLine[];
  nextSpawn: number;
}

// =============================================================================
// Combat & Movement Constants
// =============================================================================

export const DEFAULT_MAX_HEALTH = 100;

/** World units per second at full forward input */
export const MOVE_SPEED = 320;

/** Largest movement input magnitude a command can carry */
export const MAX_MOVE_INPUT = 127;

export const ATTACK_RANGE = 256;

export const ATTACK_DAMAGE = 25;

/** Button bit for the primary attack */
export const BUTTON_ATTACK = 1;

/** Chat lines kept in the world log */
export const CHAT_HISTORY = 32;

/** Longest movement step accepted from one command, in ms */
export const MAX_THINK_MSEC = 200;

/** Minimum time between requested team changes */
export const TEAM_SWITCH_DELAY_MS = 5000;
