/**
 * Core type definitions for the session engine.
 *
 * The engine owns connection slots and the client protocol. Everything else
 * (sockets, game rules, content checksums, master-server heartbeats, demo
 * files) is reached through the narrow collaborator interfaces below.
 *
 * @module core/types
 */

import type { NetAddress } from "./address.js";
import type { UserCommand } from "./usercmd.js";

/**
 * Lifecycle of a connection slot. The numeric order matters:
 * `state >= SessionState.Connected` means "occupied by a live peer".
 */
export enum SessionState {
  /** Unoccupied slot */
  Free = 0,
  /** Dropped; kept briefly so late messages still resolve to a name */
  Zombie = 1,
  /** Admitted, waiting for the first packet to trigger the full state */
  Connected = 2,
  /** Full state sent, waiting for the first movement command */
  Primed = 3,
  /** In the world, movement commands drive simulation ticks */
  Active = 4,
}

/**
 * Logging sink. Components log operator-facing events with `log`,
 * protocol traces with `debug`.
 */
export type SessionLogger = Pick<Console, "log" | "debug" | "warn">;

/**
 * Outbound side of the datagram layer.
 */
export interface Transport {
  /** Connectionless text message (challenge responses, rejections) */
  sendOutOfBand(address: NetAddress, text: string): void;
  /** Sequenced message for an admitted session */
  sendToSession(sessionIndex: number, address: NetAddress, message: Uint8Array): void;
}

/**
 * Game logic hooks invoked at lifecycle transitions.
 */
export interface Simulation {
  /**
   * Accept or veto a connecting client. Returning a string denies the
   * connection and the string is shown to the client.
   */
  onClientConnect(sessionIndex: number, firstTime: boolean, isBot: boolean): string | null;
  onClientBegin(sessionIndex: number): void;
  /** A forwarded (non-management) reliable command; `args[0]` is the name */
  onClientCommand(sessionIndex: number, args: readonly string[]): void;
  onClientThink(sessionIndex: number, command: Readonly<UserCommand>): void;
  onClientDisconnect(sessionIndex: number): void;
  onClientUserinfoChanged(sessionIndex: number): void;
  /**
   * Immediate team change requested with `team`, bypassing whatever delay
   * the game puts on switching. Only called when the server enables
   * `teamSwitch`; games without it get the plain `team` command instead.
   */
  onClientForceTeam?(sessionIndex: number, team: string): void;
}

/**
 * Content checksums used by pure validation.
 */
export interface ContentIntegrity {
  /**
   * The two reference checksums a client must report first, or null when
   * the server cannot determine them (every check then fails).
   */
  referenceChecksums(): readonly [number, number] | null;
  /** Checksums of every content archive the server has loaded */
  loadedChecksums(): readonly number[];
}

/**
 * Directory-service notifier.
 */
export interface Heartbeat {
  heartbeat(): void;
}

/**
 * Server-side per-client demo recording.
 */
export interface DemoRecorder {
  startRecording(sessionIndex: number): void;
  stopRecording(sessionIndex: number): void;
}

/**
 * Produces the opaque world payloads carried by outbound messages.
 * Snapshot encoding itself is not part of this engine.
 */
export interface WorldStateWriter {
  /** Configstrings and entity baselines for a full-state message */
  gameState(sessionIndex: number): Uint8Array;
  /** One frame of world state for an active session */
  snapshot(sessionIndex: number): Uint8Array;
}

/**
 * A userinfo lookup for collaborators that need names or keys.
 */
export interface SessionView {
  readonly index: number;
  readonly state: SessionState;
  readonly name: string;
  readonly userinfo: string;
  readonly address: NetAddress;
}
