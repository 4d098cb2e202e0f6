/**
 * Fixed-capacity arena of client sessions.
 *
 * Slot indices are the only session reference that leaves the engine; the
 * index of an occupied slot never changes.
 *
 * @module server/session-table
 */

import { compareBaseAddress, type NetAddress } from "../core/address.js";
import { SessionState } from "../core/types.js";
import { getAt } from "../core/utils.js";
import { ClientSession } from "./client-session.js";

export class SessionTable {
  private readonly slots: ClientSession[];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`[SessionTable] capacity must be a positive integer. Got: ${capacity}`);
    }
    this.slots = Array.from({ length: capacity }, (_, index) => new ClientSession(index));
  }

  get capacity(): number {
    return this.slots.length;
  }

  get(index: number): ClientSession {
    return getAt(this.slots, index, "session table");
  }

  /**
   * Replace a slot with a fresh session. Nothing from the previous occupant
   * is carried over except the index.
   */
  recycle(index: number): ClientSession {
    getAt(this.slots, index, "session table");
    const session = new ClientSession(index);
    this.slots[index] = session;
    return session;
  }

  *[Symbol.iterator](): IterableIterator<ClientSession> {
    yield* this.slots;
  }

  /**
   * Sessions in any state other than Free.
   */
  occupied(): ClientSession[] {
    return this.slots.filter((session) => session.state !== SessionState.Free);
  }

  /**
   * Number of sessions at or above `state` in lifecycle order.
   */
  countAtLeast(state: SessionState): number {
    return this.slots.filter((session) => session.state >= state).length;
  }

  /**
   * First Free slot at or after `start`, or null.
   */
  findFree(start = 0): ClientSession | null {
    for (let i = start; i < this.slots.length; i++) {
      const session = getAt(this.slots, i, "session table");
      if (session.state === SessionState.Free) {
        return session;
      }
    }
    return null;
  }

  /**
   * The longest-dropped Zombie at or after `start`, or null.
   */
  findZombie(start = 0): ClientSession | null {
    let oldest: ClientSession | null = null;
    for (let i = start; i < this.slots.length; i++) {
      const session = getAt(this.slots, i, "session table");
      if (session.state === SessionState.Zombie && (!oldest || session.zombieSince < oldest.zombieSince)) {
        oldest = session;
      }
    }
    return oldest;
  }

  /**
   * The non-free session that owns this peer: same host, and either the same
   * qport or the same source port.
   */
  findByPeer(address: NetAddress, qport: number): ClientSession | null {
    for (const session of this.slots) {
      if (session.state === SessionState.Free) {
        continue;
      }
      if (
        compareBaseAddress(address, session.address) &&
        (session.qport === qport || session.address.port === address.port)
      ) {
        return session;
      }
    }
    return null;
  }

  /**
   * Non-free sessions connected from the same host.
   */
  countFromHost(address: NetAddress): number {
    return this.slots.filter(
      (session) => session.state !== SessionState.Free && compareBaseAddress(address, session.address),
    ).length;
  }
}
