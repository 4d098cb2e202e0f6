import { beforeEach, describe, expect, test } from "vitest";
import {
  BOT_ADDRESS,
  createNullUserCommand,
  parseAddress,
  SessionState,
  type NetAddress,
  type SessionLogger,
  type SessionView,
  type UserCommand,
} from "@arena/session";
import { parseArenaFromJson } from "./arena.js";
import { angleToDegrees, DeathmatchSimulation, type SessionDirectory } from "./simulation.js";
import { ATTACK_DAMAGE, BUTTON_ATTACK, CHAT_HISTORY, DEFAULT_MAX_HEALTH } from "./types.js";

const quiet: SessionLogger = { log: () => undefined, debug: () => undefined, warn: () => undefined };

const arena = parseArenaFromJson({
  id: "test",
  name: "Test Box",
  bounds: { minX: -100, maxX: 100, minY: -100, maxY: 100 },
  spawnPoints: [
    { x: 0, y: 0, yaw: 0 },
    { x: 50, y: 0, yaw: 180 },
  ],
});

function humanAddress(): NetAddress {
  const address = parseAddress("203.0.113.5:27005");
  if (!address) {
    throw new Error("bad test address");
  }
  return address;
}

interface SentCommand {
  index: number | null;
  text: string;
}

class FakeDirectory implements SessionDirectory {
  readonly sent: SentCommand[] = [];
  private readonly sessions = new Map<number, SessionView>();

  add(index: number, name: string, isBot = false): void {
    this.sessions.set(index, {
      index,
      state: SessionState.Active,
      name,
      userinfo: `\\name\\${name}`,
      address: isBot ? BOT_ADDRESS : humanAddress(),
    });
  }

  getSession(index: number): SessionView {
    const session = this.sessions.get(index);
    if (!session) {
      throw new Error(`no session ${index}`);
    }
    return session;
  }

  sendServerCommand(index: number | null, text: string): void {
    this.sent.push({ index, text });
  }
}

function command(serverTime: number, fields: Partial<UserCommand> = {}): UserCommand {
  return { ...createNullUserCommand(), ...fields, serverTime };
}

describe("DeathmatchSimulation", () => {
  let directory: FakeDirectory;
  let simulation: DeathmatchSimulation;
  let time: number;

  /** Seat a player and put them in the world */
  function join(index: number, name: string, isBot = false): void {
    directory.add(index, name, isBot);
    expect(simulation.onClientConnect(index, true, isBot)).toBeNull();
    simulation.onClientBegin(index);
  }

  function player(index: number) {
    const found = simulation.getPlayer(index);
    if (!found) {
      throw new Error(`player ${index} missing`);
    }
    return found;
  }

  beforeEach(() => {
    directory = new FakeDirectory();
    time = 10_000;
    simulation = new DeathmatchSimulation(arena, { reservedNames: ["Admin"], logger: quiet, now: () => time });
    simulation.attach(directory);
  });

  describe("connection", () => {
    test("should refuse a client without a name", () => {
      directory.add(0, "  ");
      expect(simulation.onClientConnect(0, true, false)).toBe("Please set a player name.");
    });

    test("should reserve names for bots", () => {
      directory.add(0, "admin");
      directory.add(1, "Admin", true);

      expect(simulation.onClientConnect(0, true, false)).toBe("The name admin is reserved.");
      expect(simulation.onClientConnect(1, true, true)).toBeNull();
    });

    test("should require attach before clients connect", () => {
      const detached = new DeathmatchSimulation(arena, { logger: quiet });
      expect(() => detached.onClientConnect(0, true, false)).toThrow("attach() must be called");
    });
  });

  describe("entering the world", () => {
    test("should spawn a new player and announce them", () => {
      join(0, "alice");

      expect(player(0)).toMatchObject({ position: { x: 0, y: 0 }, yaw: 0, health: DEFAULT_MAX_HEALTH, isBot: false });
      expect(directory.sent).toEqual([{ index: null, text: 'print "alice entered the game\n"' }]);
    });

    test("should respawn without announcing on a second begin", () => {
      join(0, "alice");
      simulation.onClientBegin(0);

      expect(player(0).position).toEqual({ x: 50, y: 0 });
      expect(directory.sent).toHaveLength(1);
    });

    test("should mark bots", () => {
      join(3, "alpha", true);
      expect(player(3).isBot).toBe(true);
    });

    test("should forget a player on disconnect", () => {
      join(0, "alice");
      simulation.onClientDisconnect(0);
      expect(simulation.getPlayer(0)).toBeUndefined();
    });
  });

  describe("movement", () => {
    test("should convert fixed-point angles to degrees", () => {
      expect(angleToDegrees(16384)).toBe(90);
      expect(angleToDegrees(65536 + 32768)).toBe(180);
    });

    test("should not move on the first command", () => {
      join(0, "alice");
      simulation.onClientThink(0, command(1000, { forwardmove: 127 }));
      expect(player(0).position).toEqual({ x: 0, y: 0 });
    });

    test("should move forward by elapsed time", () => {
      join(0, "alice");
      simulation.onClientThink(0, command(1000, { forwardmove: 127 }));
      simulation.onClientThink(0, command(1100, { forwardmove: 127 }));

      // 320 units/s for 100ms at full input
      expect(player(0).position.x).toBeCloseTo(32);
      expect(player(0).position.y).toBeCloseTo(0);
    });

    test("should cap a single step and clamp to the arena", () => {
      join(0, "alice");
      simulation.onClientThink(0, command(1000, { forwardmove: 127 }));
      simulation.onClientThink(0, command(5000, { forwardmove: 127 }));
      expect(player(0).position.x).toBeCloseTo(64);

      simulation.onClientThink(0, command(9000, { forwardmove: 127 }));
      expect(player(0).position.x).toBe(100);
    });

    test("should face the command's yaw", () => {
      join(0, "alice");
      simulation.onClientThink(0, command(1000, { angles: [0, 16384, 0] }));
      expect(player(0).yaw).toBe(90);
    });

    test("should leave spectators in place", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["team", "spectator"]);
      const before = { ...player(0).position };
      simulation.onClientThink(0, command(1000, { forwardmove: 127 }));
      simulation.onClientThink(0, command(1100, { forwardmove: 127 }));

      expect(player(0).position).toEqual(before);
    });
  });

  describe("combat", () => {
    test("should damage once per button press", () => {
      join(0, "alice");
      join(1, "bob");
      simulation.onClientThink(0, command(1000, { buttons: BUTTON_ATTACK }));
      simulation.onClientThink(0, command(1050, { buttons: BUTTON_ATTACK }));

      expect(player(1).health).toBe(DEFAULT_MAX_HEALTH - ATTACK_DAMAGE);
    });

    test("should frag and respawn a player at zero health", () => {
      join(0, "alice");
      join(1, "bob");
      for (let press = 0; press < 4; press++) {
        simulation.onClientThink(0, command(1000 + press * 100, { buttons: BUTTON_ATTACK }));
        simulation.onClientThink(0, command(1050 + press * 100));
      }

      expect(player(0).score).toBe(1);
      expect(player(1)).toMatchObject({ health: DEFAULT_MAX_HEALTH, position: { x: 0, y: 0 } });
      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: null, text: 'print "alice fragged bob\n"' });
    });

    test("should not hit targets behind the attacker", () => {
      join(0, "alice");
      join(1, "bob");
      simulation.onClientThink(0, command(1000, { angles: [0, 32768, 0], buttons: BUTTON_ATTACK }));

      expect(player(1).health).toBe(DEFAULT_MAX_HEALTH);
    });
  });

  describe("commands", () => {
    test("should broadcast public chat", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["say", "hi", "there"]);

      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: null, text: 'chat "alice: hi there"' });
      expect(simulation.world.chat).toEqual([{ from: 0, channel: "all", to: null, text: "hi there" }]);
    });

    test("should deliver team chat to human teammates only", () => {
      join(0, "alice");
      join(1, "bob");
      join(2, "carol");
      join(3, "alpha", true);
      simulation.onClientCommand(0, ["team", "red"]);
      simulation.onClientCommand(1, ["team", "blue"]);
      simulation.onClientCommand(2, ["team", "red"]);
      simulation.onClientCommand(3, ["team", "red"]);
      directory.sent.length = 0;

      simulation.onClientCommand(0, ["say_team", "push"]);

      expect(directory.sent).toEqual([
        { index: 0, text: 'chat "alice: push"' },
        { index: 2, text: 'chat "alice: push"' },
      ]);
    });

    test("should deliver private messages to both ends", () => {
      join(0, "alice");
      join(1, "bob");
      join(2, "carol");
      directory.sent.length = 0;

      simulation.onClientCommand(0, ["tell", "1", "psst"]);

      expect(directory.sent).toEqual([
        { index: 0, text: 'chat "alice: psst"' },
        { index: 1, text: 'chat "alice: psst"' },
      ]);
    });

    test("should reject private messages to nobody", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["tell", "7", "hello"]);
      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: 0, text: 'print "No such player\n"' });
    });

    test("should keep a bounded chat log", () => {
      join(0, "alice");
      for (let i = 0; i < CHAT_HISTORY + 5; i++) {
        simulation.onClientCommand(0, ["say", `line${i}`]);
      }

      expect(simulation.world.chat).toHaveLength(CHAT_HISTORY);
      expect(simulation.world.chat[0]?.text).toBe("line5");
    });

    test("should reject unknown teams", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["team", "purple"]);
      expect(player(0).team).toBe("free");
      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: 0, text: 'print "Unknown team purple\n"' });
    });

    test("should make players wait between team changes", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["team", "red"]);
      time += 3500;
      simulation.onClientCommand(0, ["team", "blue"]);

      expect(player(0).team).toBe("red");
      expect(directory.sent[directory.sent.length - 1]).toEqual({
        index: 0,
        text: 'print "Wait 2s before switching teams\n"',
      });

      time += 1500;
      simulation.onClientCommand(0, ["team", "blue"]);
      expect(player(0).team).toBe("blue");
    });

    test("should let a forced team change skip the wait", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["team", "red"]);
      simulation.onClientForceTeam(0, "Blue");

      expect(player(0).team).toBe("blue");
      expect(directory.sent[directory.sent.length - 1]).toEqual({
        index: null,
        text: 'print "alice joined the blue team\n"',
      });
    });

    test("should cost a point to self-kill", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["kill"]);
      expect(player(0).score).toBe(-1);
    });

    test("should report unknown commands to the sender", () => {
      join(0, "alice");
      simulation.onClientCommand(0, ["Dance"]);
      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: 0, text: 'print "unknown command dance\n"' });
    });

    test("should announce renames", () => {
      join(0, "alice");
      directory.add(0, "alicia");
      simulation.onClientUserinfoChanged(0);

      expect(player(0).name).toBe("alicia");
      expect(directory.sent[directory.sent.length - 1]).toEqual({ index: null, text: 'print "alice renamed to alicia\n"' });
    });
  });
});
