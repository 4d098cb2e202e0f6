/**
 * Anti-spoofing handshake tokens.
 *
 * A peer asks for a challenge, the server answers out-of-band with a random
 * token, and the peer must echo it back in its connect request. Receiving
 * the answer proves the peer can receive at the address it claims.
 *
 * @module server/challenge-registry
 */

import { MAX_CHALLENGES } from "../constants.js";
import { compareAddress, type NetAddress } from "../core/address.js";
import { getAt, random15 } from "../core/utils.js";

export interface Challenge {
  /** Requesting peer, null for an unused entry */
  address: NetAddress | null;
  /** Token the peer must echo */
  challenge: number;
  /** Nonce the peer sent with its request, echoed in the response */
  clientChallenge: number;
  /** When the entry was issued or last refreshed */
  time: number;
  /** Start of the round trip measured at connect time */
  pingTime: number;
  /** The token has been consumed by an admitted session */
  connected: boolean;
  /** The peer was refused on ping grounds; later attempts fail silently */
  wasRefused: boolean;
}

export interface IssuedChallenge {
  slot: number;
  challenge: number;
}

function emptyChallenge(): Challenge {
  return {
    address: null,
    challenge: 0,
    clientChallenge: 0,
    time: 0,
    pingTime: 0,
    connected: false,
    wasRefused: false,
  };
}

/**
 * Fixed-size challenge table. Never grows, never blocks: when no entry can
 * be reused the oldest one is overwritten.
 */
export class ChallengeRegistry {
  private readonly entries: Challenge[];
  private readonly random: () => number;

  constructor(capacity: number = MAX_CHALLENGES, random: () => number = Math.random) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`[ChallengeRegistry] capacity must be a positive integer. Got: ${capacity}`);
    }
    this.entries = Array.from({ length: capacity }, emptyChallenge);
    this.random = random;
  }

  get capacity(): number {
    return this.entries.length;
  }

  /**
   * Issue a token for `address`. A pending (unconnected) entry for the same
   * address keeps its slot; otherwise the oldest entry is evicted. The token
   * always changes and the ping clock restarts.
   */
  issueOrRefresh(address: NetAddress, clientChallenge: number, now: number): IssuedChallenge {
    let slot = -1;
    let oldest = 0;
    let oldestTime = Number.POSITIVE_INFINITY;

    for (let i = 0; i < this.entries.length; i++) {
      const entry = getAt(this.entries, i, "challenge table");
      if (slot < 0 && entry.address && !entry.connected && compareAddress(address, entry.address)) {
        slot = i;
      }
      const age = entry.address ? entry.time : Number.NEGATIVE_INFINITY;
      if (age < oldestTime) {
        oldestTime = age;
        oldest = i;
      }
    }

    let entry: Challenge;
    if (slot >= 0) {
      entry = getAt(this.entries, slot, "challenge table");
    } else {
      slot = oldest;
      entry = emptyChallenge();
      entry.address = address;
      this.entries[slot] = entry;
    }

    let token = (((random15(this.random) << 16) ^ random15(this.random)) ^ now) | 0;
    if (token === entry.challenge) {
      token = (token ^ 1) | 0;
    }

    entry.clientChallenge = clientChallenge;
    entry.challenge = token;
    entry.wasRefused = false;
    entry.time = now;
    entry.pingTime = now;

    return { slot, challenge: token };
  }

  /**
   * Find the entry holding `token` for exactly this address (host and port).
   */
  validate(address: NetAddress, token: number): number | null {
    for (let i = 0; i < this.entries.length; i++) {
      const entry = getAt(this.entries, i, "challenge table");
      if (entry.address && compareAddress(address, entry.address) && entry.challenge === token) {
        return i;
      }
    }
    return null;
  }

  get(slot: number): Readonly<Challenge> {
    return getAt(this.entries, slot, "challenge table");
  }

  markRefused(slot: number): void {
    getAt(this.entries, slot, "challenge table").wasRefused = true;
  }

  markConnected(slot: number): void {
    getAt(this.entries, slot, "challenge table").connected = true;
  }

  /**
   * Forget every entry for `address`; called when its session is dropped.
   */
  clearFor(address: NetAddress): void {
    for (let i = 0; i < this.entries.length; i++) {
      const entry = getAt(this.entries, i, "challenge table");
      if (entry.address && compareAddress(address, entry.address)) {
        this.entries[i] = emptyChallenge();
      }
    }
  }
}
