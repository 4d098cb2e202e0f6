/**
 * Leaky-bucket rate limiting for connectionless requests.
 *
 * @module server/rate-limit
 */

import { MAX_BUCKETS } from "../constants.js";
import { formatBaseAddress, type NetAddress } from "../core/address.js";

export interface LeakyBucket {
  lastTime: number;
  burst: number;
}

export function createBucket(): LeakyBucket {
  return { lastTime: 0, burst: 0 };
}

/**
 * Returns true when the request should be dropped. Each call adds one unit;
 * one unit drains every `period` ms and at most `burst` units may be held.
 */
export function rateLimit(bucket: LeakyBucket, burst: number, period: number, now: number): boolean {
  const interval = now - bucket.lastTime;
  const expired = Math.floor(interval / period);
  const remainder = interval % period;

  if (expired > bucket.burst || interval < 0) {
    bucket.burst = 0;
    bucket.lastTime = now;
  } else {
    bucket.burst -= expired;
    bucket.lastTime = now - remainder;
  }

  if (bucket.burst < burst) {
    bucket.burst++;
    return false;
  }
  return true;
}

/**
 * Per-address buckets keyed by host only; the source port does not count.
 * When the table is full an idle bucket (quiet for a
 * second or more) is recycled; if none is idle the request is limited.
 */
export class AddressRateLimiter {
  private readonly buckets = new Map<string, LeakyBucket>();
  private readonly capacity: number;

  constructor(capacity: number = MAX_BUCKETS) {
    this.capacity = capacity;
  }

  limit(address: NetAddress, burst: number, period: number, now: number): boolean {
    const bucket = this.bucketFor(address, now);
    if (!bucket) {
      return true;
    }
    return rateLimit(bucket, burst, period, now);
  }

  get size(): number {
    return this.buckets.size;
  }

  private bucketFor(address: NetAddress, now: number): LeakyBucket | null {
    const key = `${address.type}:${formatBaseAddress(address)}`;
    const existing = this.buckets.get(key);
    if (existing) {
      return existing;
    }

    if (this.buckets.size >= this.capacity) {
      let idleKey: string | null = null;
      for (const [candidateKey, candidate] of this.buckets) {
        if (now - candidate.lastTime >= 1000) {
          idleKey = candidateKey;
          break;
        }
      }
      if (idleKey === null) {
        return null;
      }
      this.buckets.delete(idleKey);
    }

    const bucket: LeakyBucket = { lastTime: now, burst: 0 };
    this.buckets.set(key, bucket);
    return bucket;
  }
}
