import { beforeEach, describe, expect, test } from "vitest";
import { SessionState } from "../core/types.js";
import { testAddress } from "../test-utils/index.js";
import { SessionTable } from "./session-table.js";

describe("SessionTable", () => {
  let table: SessionTable;

  beforeEach(() => {
    table = new SessionTable(4);
  });

  function occupy(index: number, address: string, qport: number, state = SessionState.Connected): void {
    const session = table.get(index);
    session.address = testAddress(address);
    session.qport = qport;
    session.state = state;
  }

  test("should reject a non-positive capacity", () => {
    expect(() => new SessionTable(0)).toThrow("capacity must be a positive integer");
  });

  test("should start with every slot free", () => {
    expect(table.capacity).toBe(4);
    expect(table.occupied()).toHaveLength(0);
    expect(Array.from(table, (session) => session.index)).toEqual([0, 1, 2, 3]);
  });

  test("should find the first free slot from a start index", () => {
    occupy(2, "203.0.113.5:1", 1);

    expect(table.findFree()?.index).toBe(0);
    expect(table.findFree(2)?.index).toBe(3);
  });

  test("should return null when no slot is free", () => {
    for (let i = 0; i < 4; i++) {
      occupy(i, `203.0.113.${i + 1}:1`, 1);
    }
    expect(table.findFree()).toBeNull();
  });

  test("should pick the longest-dropped zombie", () => {
    occupy(0, "203.0.113.1:1", 1, SessionState.Zombie);
    occupy(1, "203.0.113.2:1", 1, SessionState.Active);
    occupy(2, "203.0.113.3:1", 1, SessionState.Zombie);
    occupy(3, "203.0.113.4:1", 1, SessionState.Zombie);
    table.get(0).zombieSince = 900;
    table.get(2).zombieSince = 300;
    table.get(3).zombieSince = 600;

    expect(table.findZombie()?.index).toBe(2);
    expect(table.findZombie(3)?.index).toBe(3);
  });

  test("should return null when there is no zombie", () => {
    occupy(0, "203.0.113.1:1", 1, SessionState.Active);
    expect(table.findZombie()).toBeNull();
  });

  test("should swap in a fresh session on recycle", () => {
    occupy(1, "203.0.113.5:1", 9, SessionState.Active);
    const before = table.get(1);

    const after = table.recycle(1);
    expect(after).not.toBe(before);
    expect(after.index).toBe(1);
    expect(after.state).toBe(SessionState.Free);
    expect(table.get(1)).toBe(after);
  });

  test("should match a peer by qport or by source port", () => {
    occupy(1, "203.0.113.5:27005", 77);

    expect(table.findByPeer(testAddress("203.0.113.5:40000"), 77)?.index).toBe(1);
    expect(table.findByPeer(testAddress("203.0.113.5:27005"), 1)?.index).toBe(1);
    expect(table.findByPeer(testAddress("203.0.113.5:40000"), 1)).toBeNull();
    expect(table.findByPeer(testAddress("203.0.113.6:27005"), 77)).toBeNull();
  });

  test("should count sessions by host and by state", () => {
    occupy(0, "203.0.113.5:1", 1, SessionState.Active);
    occupy(1, "203.0.113.5:2", 2, SessionState.Zombie);
    occupy(2, "203.0.113.6:1", 1, SessionState.Primed);

    expect(table.countFromHost(testAddress("203.0.113.5"))).toBe(2);
    expect(table.countAtLeast(SessionState.Connected)).toBe(2);
    expect(table.countAtLeast(SessionState.Active)).toBe(1);
    expect(table.occupied()).toHaveLength(3);
  });
});
