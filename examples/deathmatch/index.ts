/**
 * Deathmatch game example implementation
 */

// Types
export type {
  Vector2,
  SpawnPoint,
  ArenaBounds,
  ArenaConfig,
  ContentArchive,
  ContentManifest,
  Team,
  DeathmatchPlayer,
  ChatLine,
  DeathmatchWorld,
} from "./types.js";

export {
  DEFAULT_MAX_HEALTH,
  MOVE_SPEED,
  MAX_MOVE_INPUT,
  ATTACK_RANGE,
  ATTACK_DAMAGE,
  BUTTON_ATTACK,
  CHAT_HISTORY,
  MAX_THINK_MSEC,
  TEAM_SWITCH_DELAY_MS,
} from "./types.js";

// Simulation
export { DeathmatchSimulation, createDeathmatchWorld, angleToDegrees } from "./simulation.js";
export type { SessionDirectory, DeathmatchOptions } from "./simulation.js";

// World payloads
export { DeathmatchWorldWriter, readSnapshot } from "./world-writer.js";
export type { SnapshotEntity } from "./world-writer.js";

// Arena and content data
export {
  parseArenaFromJson,
  parseContentManifest,
  loadArena,
  loadContentManifest,
  manifestIntegrity,
} from "./arena.js";
