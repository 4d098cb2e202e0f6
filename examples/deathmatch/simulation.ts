/**
 * Free-for-all deathmatch simulation
 *
 * Coordinate System: top-down, Y-UP
 * - yaw 0 faces +X, 90 faces +Y
 * - View angles arrive as 16-bit fixed point (65536 = full turn)
 */

import {
  infoValueForKey,
  type SessionLogger,
  type SessionView,
  type Simulation,
  type UserCommand,
} from "@arena/session";
import type { ArenaConfig, ChatLine, DeathmatchPlayer, DeathmatchWorld, Team, Vector2 } from "./types.js";
import {
  ATTACK_DAMAGE,
  ATTACK_RANGE,
  BUTTON_ATTACK,
  CHAT_HISTORY,
  DEFAULT_MAX_HEALTH,
  MAX_MOVE_INPUT,
  MAX_THINK_MSEC,
  MOVE_SPEED,
  TEAM_SWITCH_DELAY_MS,
} from "./types.js";

/**
 * The part of the session server the game talks back to.
 */
export interface SessionDirectory {
  getSession(index: number): SessionView;
  sendServerCommand(index: number | null, text: string): void;
}

export interface DeathmatchOptions {
  /** Names (case-insensitive) only bots may use */
  reservedNames?: readonly string[];
  logger?: SessionLogger;
  /** Clock for the team-switch delay (default: Date.now) */
  now?: () => number;
}

const TEAMS: readonly Team[] = ["free", "red", "blue", "spectator"];

function isTeam(value: string): value is Team {
  return TEAMS.some((team) => team === value);
}

export function angleToDegrees(angle: number): number {
  return ((angle & 0xffff) * 360) / 65536;
}

function clampToBounds(position: Vector2, arena: ArenaConfig): Vector2 {
  const { minX, maxX, minY, maxY } = arena.bounds;
  return {
    x: Math.min(maxX, Math.max(minX, position.x)),
    y: Math.min(maxY, Math.max(minY, position.y)),
  };
}

export function createDeathmatchWorld(arena: ArenaConfig): DeathmatchWorld {
  return { arena, players: new Map(), chat: [], nextSpawn: 0 };
}

export class DeathmatchSimulation implements Simulation {
  readonly world: DeathmatchWorld;
  private readonly reservedNames: Set<string>;
  private readonly logger: SessionLogger;
  private readonly now: () => number;
  private directory: SessionDirectory | null = null;

  constructor(arena: ArenaConfig, options: DeathmatchOptions = {}) {
    this.world = createDeathmatchWorld(arena);
    this.reservedNames = new Set((options.reservedNames ?? []).map((name) => name.toLowerCase()));
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  /**
   * Connect the game to the server it runs in. Must happen before the first
   * client connects.
   */
  attach(directory: SessionDirectory): void {
    this.directory = directory;
  }

  getPlayer(index: number): DeathmatchPlayer | undefined {
    return this.world.players.get(index);
  }

  onClientConnect(sessionIndex: number, firstTime: boolean, isBot: boolean): string | null {
    const session = this.sessions().getSession(sessionIndex);
    const name = infoValueForKey(session.userinfo, "name").trim();
    if (name === "") {
      return "Please set a player name.";
    }
    if (!isBot && this.reservedNames.has(name.toLowerCase())) {
      return `The name ${name} is reserved.`;
    }
    if (firstTime) {
      this.logger.log(`[Deathmatch] ${name} connecting to slot ${sessionIndex}`);
    }
    return null;
  }

  onClientBegin(sessionIndex: number): void {
    const session = this.sessions().getSession(sessionIndex);
    const existing = this.world.players.get(sessionIndex);
    const player: DeathmatchPlayer = existing ?? {
      index: sessionIndex,
      name: session.name,
      team: "free",
      isBot: session.address.type === "bot",
      position: { x: 0, y: 0 },
      yaw: 0,
      health: DEFAULT_MAX_HEALTH,
      score: 0,
      lastThinkTime: 0,
      attackHeld: false,
      teamChangedAt: null,
    };
    this.world.players.set(sessionIndex, player);
    this.respawn(player);
    if (!existing) {
      this.sessions().sendServerCommand(null, `print "${player.name} entered the game\n"`);
    }
  }

  onClientCommand(sessionIndex: number, args: readonly string[]): void {
    const player = this.world.players.get(sessionIndex);
    const name = (args[0] ?? "").toLowerCase();
    if (!player) {
      return;
    }

    switch (name) {
      case "say":
        this.chat(player, "all", null, args.slice(1).join(" "));
        break;
      case "say_team":
        this.chat(player, "team", null, args.slice(1).join(" "));
        break;
      case "tell": {
        const target = Number.parseInt(args[1] ?? "", 10);
        if (!this.world.players.has(target)) {
          this.sessions().sendServerCommand(sessionIndex, `print "No such player\n"`);
          return;
        }
        this.chat(player, "private", target, args.slice(2).join(" "));
        break;
      }
      case "team":
        this.changeTeam(player, args[1] ?? "", false);
        break;
      case "kill":
        player.score--;
        this.respawn(player);
        break;
      default:
        this.sessions().sendServerCommand(sessionIndex, `print "unknown command ${name}\n"`);
    }
  }

  onClientThink(sessionIndex: number, command: Readonly<UserCommand>): void {
    const player = this.world.players.get(sessionIndex);
    if (!player || player.team === "spectator") {
      return;
    }

    const elapsed = player.lastThinkTime === 0 ? 0 : command.serverTime - player.lastThinkTime;
    const msec = Math.min(MAX_THINK_MSEC, Math.max(0, elapsed));
    player.lastThinkTime = command.serverTime;
    player.yaw = angleToDegrees(command.angles[1]);

    const radians = (player.yaw * Math.PI) / 180;
    const step = (MOVE_SPEED * msec) / 1000 / MAX_MOVE_INPUT;
    const forward = { x: Math.cos(radians), y: Math.sin(radians) };
    const right = { x: Math.sin(radians), y: -Math.cos(radians) };
    player.position = clampToBounds(
      {
        x: player.position.x + (forward.x * command.forwardmove + right.x * command.rightmove) * step,
        y: player.position.y + (forward.y * command.forwardmove + right.y * command.rightmove) * step,
      },
      this.world.arena,
    );

    const attacking = (command.buttons & BUTTON_ATTACK) !== 0;
    if (attacking && !player.attackHeld) {
      this.attack(player, forward);
    }
    player.attackHeld = attacking;
  }

  onClientDisconnect(sessionIndex: number): void {
    const player = this.world.players.get(sessionIndex);
    if (player) {
      this.logger.log(`[Deathmatch] ${player.name} left with ${player.score} frags`);
    }
    this.world.players.delete(sessionIndex);
  }

  onClientForceTeam(sessionIndex: number, team: string): void {
    const player = this.world.players.get(sessionIndex);
    if (player) {
      this.changeTeam(player, team, true);
    }
  }

  onClientUserinfoChanged(sessionIndex: number): void {
    const player = this.world.players.get(sessionIndex);
    if (!player) {
      return;
    }
    const name = this.sessions().getSession(sessionIndex).name;
    if (name !== player.name) {
      this.sessions().sendServerCommand(null, `print "${player.name} renamed to ${name}\n"`);
      player.name = name;
    }
  }

  private sessions(): SessionDirectory {
    if (!this.directory) {
      throw new Error("[Deathmatch] attach() must be called before clients connect");
    }
    return this.directory;
  }

  private changeTeam(player: DeathmatchPlayer, requested: string, force: boolean): void {
    const team = requested.toLowerCase();
    if (!isTeam(team)) {
      this.sessions().sendServerCommand(player.index, `print "Unknown team ${team}\n"`);
      return;
    }

    const now = this.now();
    if (!force && player.teamChangedAt !== null && now - player.teamChangedAt < TEAM_SWITCH_DELAY_MS) {
      const seconds = Math.ceil((TEAM_SWITCH_DELAY_MS - (now - player.teamChangedAt)) / 1000);
      this.sessions().sendServerCommand(player.index, `print "Wait ${seconds}s before switching teams\n"`);
      return;
    }

    player.team = team;
    player.teamChangedAt = now;
    this.respawn(player);
    this.sessions().sendServerCommand(null, `print "${player.name} joined the ${team} team\n"`);
  }

  private respawn(player: DeathmatchPlayer): void {
    const spawns = this.world.arena.spawnPoints;
    const spawn = spawns[this.world.nextSpawn % spawns.length];
    this.world.nextSpawn++;
    if (spawn) {
      player.position = { x: spawn.x, y: spawn.y };
      player.yaw = spawn.yaw;
    }
    player.health = DEFAULT_MAX_HEALTH;
  }

  private chat(player: DeathmatchPlayer, channel: ChatLine["channel"], to: number | null, text: string): void {
    const line: ChatLine = { from: player.index, channel, to, text };
    this.world.chat.push(line);
    if (this.world.chat.length > CHAT_HISTORY) {
      this.world.chat.shift();
    }

    const message = `chat "${player.name}: ${text}"`;
    if (channel === "all") {
      this.sessions().sendServerCommand(null, message);
      return;
    }
    for (const other of this.world.players.values()) {
      const receives = channel === "team" ? other.team === player.team : other.index === to || other === player;
      if (receives && !other.isBot) {
        this.sessions().sendServerCommand(other.index, message);
      }
    }
  }

  private attack(attacker: DeathmatchPlayer, facing: Vector2): void {
    let target: DeathmatchPlayer | null = null;
    let best = ATTACK_RANGE;
    for (const other of this.world.players.values()) {
      if (other === attacker || other.team === "spectator") {
        continue;
      }
      if (attacker.team !== "free" && other.team === attacker.team) {
        continue;
      }
      const dx = other.position.x - attacker.position.x;
      const dy = other.position.y - attacker.position.y;
      const distance = Math.hypot(dx, dy);
      if (distance <= best && dx * facing.x + dy * facing.y > 0) {
        best = distance;
        target = other;
      }
    }
    if (!target) {
      return;
    }

    target.health -= ATTACK_DAMAGE;
    if (target.health <= 0) {
      attacker.score++;
      this.sessions().sendServerCommand(null, `print "${attacker.name} fragged ${target.name}\n"`);
      this.respawn(target);
    }
  }
}
