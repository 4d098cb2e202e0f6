/**
 * Subnet bans with exception entries.
 *
 * @module server/ban-table
 */

import {
  compareBaseAddressMask,
  formatBaseAddress,
  type NetAddress,
} from "../core/address.js";

export interface BannedRange {
  address: NetAddress;
  /** Prefix length; values past the family width mean "whole address" */
  subnetBits: number;
  /** Exceptions whitelist addresses inside a banned range */
  isException: boolean;
}

/**
 * Process-wide ban list. Read on every admission attempt, written only by
 * administrative commands.
 */
export class BanTable {
  private readonly ranges: BannedRange[] = [];

  add(address: NetAddress, subnetBits: number, isException = false): void {
    const duplicate = this.ranges.some(
      (range) =>
        range.isException === isException &&
        range.subnetBits === subnetBits &&
        compareBaseAddressMask(range.address, address, subnetBits),
    );
    if (!duplicate) {
      this.ranges.push({ address, subnetBits, isException });
    }
  }

  /**
   * Remove the entry at `index` of {@link list}. Returns false if out of range.
   */
  remove(index: number): boolean {
    if (index < 0 || index >= this.ranges.length) {
      return false;
    }
    this.ranges.splice(index, 1);
    return true;
  }

  list(): readonly BannedRange[] {
    return this.ranges;
  }

  clear(): void {
    this.ranges.length = 0;
  }

  /**
   * An address is banned when a ban entry covers it and no exception does.
   */
  isBanned(address: NetAddress): boolean {
    if (this.matches(address, true)) {
      return false;
    }
    return this.matches(address, false);
  }

  describe(range: BannedRange): string {
    const kind = range.isException ? "except" : "ban";
    return `${kind} ${formatBaseAddress(range.address)}/${range.subnetBits}`;
  }

  private matches(address: NetAddress, isException: boolean): boolean {
    return this.ranges.some(
      (range) =>
        range.isException === isException &&
        compareBaseAddressMask(range.address, address, range.subnetBits),
    );
  }
}
