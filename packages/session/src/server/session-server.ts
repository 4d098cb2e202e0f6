import { formatAddress, compareAddress, type NetAddress } from "../core/address.js";
import type { BitWriter } from "../core/bitstream.js";
import { tokenizeCommand } from "../core/command-tokenizer.js";
import { ServerOp } from "../core/protocol.js";
import {
  SessionState,
  type ContentIntegrity,
  type DemoRecorder,
  type Heartbeat,
  type SessionView,
  type Simulation,
  type Transport,
  type WorldStateWriter,
} from "../core/types.js";
import { cloneUserCommand, createNullUserCommand, type UserCommand } from "../core/usercmd.js";
import { random15 } from "../core/utils.js";
import { ConnectionAdmission, type AdmissionResult, type ChallengeResult } from "./admission.js";
import { BanTable } from "./ban-table.js";
import { ChallengeRegistry } from "./challenge-registry.js";
import { executeClientMessage, type ClientMessageHost } from "./client-message.js";
import type { ClientSession } from "./client-session.js";
import { resolveConfig, type ResolvedSessionConfig, type SessionServerConfig } from "./config.js";
import { queueMessage, sendQueuedMessages } from "./outbound.js";
import { verifyPureChecksums } from "./pure-validation.js";
import { ReliableCommandChannel, type ReliableCommandHost } from "./reliable-channel.js";
import { SessionTable } from "./session-table.js";
import { VoipRelay } from "./voip-relay.js";

/**
 * Collaborators the server drives. Only the transport and the simulation
 * are required.
 */
export interface SessionServerDeps {
  transport: Transport;
  simulation: Simulation;
  content?: ContentIntegrity;
  heartbeat?: Heartbeat;
  demos?: DemoRecorder;
  world?: WorldStateWriter;
}

export type OutOfBandResult =
  | ({ command: "getchallenge" } & ChallengeResult)
  | ({ command: "connect" } & AdmissionResult)
  | { command: "unknown"; name: string };

export interface SessionStatus {
  index: number;
  name: string;
  state: SessionState;
  address: string;
  rate: number;
  isBot: boolean;
}

export interface ServerStatus {
  serverId: number;
  maxClients: number;
  clients: Map<number, SessionStatus>;
}

export interface RestartOptions {
  /** A new world rather than a restart of the current one */
  newWorld?: boolean;
}

const EMPTY_PAYLOAD = new Uint8Array(0);

const NO_CONTENT: ContentIntegrity = {
  referenceChecksums: () => null,
  loadedChecksums: () => [],
};

const NO_WORLD: WorldStateWriter = {
  gameState: () => EMPTY_PAYLOAD,
  snapshot: () => EMPTY_PAYLOAD,
};

function writePayload(writer: BitWriter, payload: Uint8Array): void {
  writer.writeLong(payload.length);
  writer.writeData(payload);
}

/**
 * High-level server class that owns every connection slot and drives the
 * session protocol: handshake, reliable commands, movement, pure checks and
 * voice relay. All entry points are synchronous and run to completion.
 */
export class SessionServer {
  private readonly config: ResolvedSessionConfig;
  private readonly sessions: SessionTable;
  private readonly challenges: ChallengeRegistry;
  private readonly bans = new BanTable();
  private readonly admission: ConnectionAdmission;
  private readonly channel: ReliableCommandChannel;
  private readonly voip: VoipRelay;
  private readonly messageHost: ClientMessageHost;

  private readonly transport: Transport;
  private readonly simulation: Simulation;
  private readonly content: ContentIntegrity;
  private readonly heartbeat: Heartbeat;
  private readonly demos: DemoRecorder | null;
  private readonly world: WorldStateWriter;

  private serverId: number;
  private restartedServerId: number;
  /** World generation the checksum feed was issued for */
  private checksumFeedServerId: number;
  private checksumFeed: number;

  constructor(deps: SessionServerDeps, config: SessionServerConfig = {}) {
    this.config = resolveConfig(config);
    this.transport = deps.transport;
    this.simulation = deps.simulation;
    this.content = deps.content ?? NO_CONTENT;
    this.heartbeat = deps.heartbeat ?? { heartbeat: () => undefined };
    this.demos = deps.demos ?? null;
    this.world = deps.world ?? NO_WORLD;

    this.sessions = new SessionTable(this.config.maxClients);
    this.challenges = new ChallengeRegistry(undefined, this.config.random);

    this.serverId = this.config.now() | 0;
    this.restartedServerId = this.serverId;
    this.checksumFeedServerId = this.serverId;
    this.checksumFeed = this.rollChecksumFeed();

    this.admission = new ConnectionAdmission({
      config: this.config,
      sessions: this.sessions,
      challenges: this.challenges,
      bans: this.bans,
      transport: this.transport,
      simulation: this.simulation,
      heartbeat: this.heartbeat,
      dropClient: (session, reason) => this.drop(session, reason),
      applyUserinfo: (session) => this.deriveUserinfo(session),
    });

    this.channel = new ReliableCommandChannel(this.createCommandHost(), this.config);
    this.voip = new VoipRelay(this.sessions, { enabled: this.config.voip, logger: this.config.logger });
    this.messageHost = this.createMessageHost();
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  /**
   * Handle a connectionless text message.
   */
  handleOutOfBand(address: NetAddress, text: string): OutOfBandResult {
    const args = tokenizeCommand(text);
    const name = (args[0] ?? "").toLowerCase();

    switch (name) {
      case "getchallenge":
        return { command: "getchallenge", ...this.admission.handleChallengeRequest(address, args) };
      case "connect": {
        const result = this.admission.handleConnectRequest(address, args[1] ?? "");
        if (result.status === "admitted") {
          this.config.logger.log(`[SessionServer] Client ${result.index} connected from ${formatAddress(address)}`);
        }
        return { command: "connect", ...result };
      }
      default:
        this.config.logger.debug(`[SessionServer] bad connectionless packet from ${formatAddress(address)}: ${name}`);
        return { command: "unknown", name };
    }
  }

  /**
   * Handle an in-session packet. Returns false when no live session owns
   * the address.
   */
  handlePacket(address: NetAddress, data: Uint8Array): boolean {
    const session = this.findSession(address);
    if (!session) {
      return false;
    }
    session.lastPacketTime = this.config.now();
    executeClientMessage(session, data, this.messageHost);
    return true;
  }

  /**
   * The transport lost the peer behind `address`.
   */
  handleTransportClosed(address: NetAddress): void {
    const session = this.findSession(address);
    if (session) {
      this.drop(session, "disconnected");
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Send the full world state. Always safe to repeat.
   */
  sendGameState(index: number): void {
    this.writeGameState(this.sessions.get(index));
  }

  /**
   * Put a primed session into the world.
   */
  enterWorld(index: number, command: UserCommand | null = null): void {
    this.clientEnterWorld(this.sessions.get(index), command);
  }

  /**
   * Disconnect a session. Dropping a zombie does nothing.
   */
  dropClient(index: number, reason: string): void {
    this.drop(this.sessions.get(index), reason);
  }

  /**
   * Queue a reliable command for one session, or for every session that
   * has received the full state when `index` is null.
   */
  sendServerCommand(index: number | null, text: string): void {
    if (index !== null) {
      this.addServerCommand(this.sessions.get(index), text);
      return;
    }
    for (const session of this.sessions) {
      if (session.state >= SessionState.Primed) {
        this.addServerCommand(session, text);
      }
    }
  }

  kick(index: number, reason = "was kicked"): void {
    this.dropClient(index, reason);
  }

  /**
   * Add a ban (or an exception) and drop every session it now covers.
   */
  ban(address: NetAddress, subnetBits: number, isException = false): void {
    this.bans.add(address, subnetBits, isException);
    this.config.logger.log(
      `[SessionServer] Added ${isException ? "exception" : "ban"} for ${formatAddress(address)}/${subnetBits}`,
    );
    if (isException) {
      return;
    }
    for (const session of this.sessions) {
      if (session.state >= SessionState.Connected && !session.isBot && this.bans.isBanned(session.address)) {
        this.drop(session, "was banned");
      }
    }
  }

  getBanTable(): BanTable {
    return this.bans;
  }

  /**
   * Seat a bot; see {@link ConnectionAdmission.connectBot}.
   */
  connectBot(name: string): number | null {
    return this.admission.connectBot(name);
  }

  /**
   * Start a new world generation. A restart keeps the checksum feed,
   * tolerates packets from the previous generation and announces the new id
   * with `map_restart` and `serverid <id>`; a new world replaces both and
   * sends every client back through the full state.
   */
  restartWorld(options: RestartOptions = {}): void {
    const previous = this.serverId;
    this.serverId = Math.max(previous + 1, this.config.now() | 0);

    if (options.newWorld) {
      this.restartedServerId = this.serverId;
      this.checksumFeedServerId = this.serverId;
      this.checksumFeed = this.rollChecksumFeed();
    } else {
      this.restartedServerId = previous;
    }
    this.config.logger.log(`[SessionServer] World restarted, serverId ${this.serverId}`);

    for (const session of this.sessions) {
      if (session.state < SessionState.Connected) {
        continue;
      }
      if (!options.newWorld) {
        this.addServerCommand(session, "map_restart\n");
        this.addServerCommand(session, `serverid ${this.serverId}`);
        if (session.state === SessionState.Zombie) {
          continue;
        }
      }

      const denied = this.simulation.onClientConnect(session.index, false, session.isBot);
      if (denied !== null) {
        this.drop(session, denied);
        continue;
      }

      if (session.isBot) {
        session.state = SessionState.Active;
        this.simulation.onClientBegin(session.index);
      } else if (options.newWorld) {
        session.state = SessionState.Connected;
        session.gamestateMessageNum = -1;
      } else if (session.state === SessionState.Active) {
        this.clientEnterWorld(session, session.lastUsercmd);
      }
    }
  }

  // ===========================================================================
  // Frame
  // ===========================================================================

  /**
   * Periodic work: recycle expired zombies, apply debounced userinfo and
   * queue snapshots for sessions that are due one.
   */
  frame(now: number = this.config.now()): void {
    for (const session of this.sessions) {
      if (session.state === SessionState.Zombie && now - session.zombieSince >= this.config.zombieTimeoutMs) {
        this.config.logger.debug(`[SessionServer] Going from Zombie to Free for client ${session.index}`);
        this.sessions.recycle(session.index);
        continue;
      }

      if (session.state < SessionState.Connected) {
        continue;
      }

      if (session.userinfoBuffer !== "" && now >= session.nextReliableUserTime) {
        this.channel.updateUserinfo(session, session.userinfoBuffer);
      }

      if (
        session.state >= SessionState.Primed &&
        !session.isBot &&
        now - session.lastSnapshotTime >= session.snapshotMsec
      ) {
        this.writeSnapshot(session, now);
      }
    }
  }

  /**
   * One rate-paced transmit pass; see {@link sendQueuedMessages}.
   */
  sendQueuedMessages(now: number = this.config.now()): number {
    return sendQueuedMessages(this.sessions, this.transport, now);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getSession(index: number): SessionView {
    return this.sessions.get(index);
  }

  getServerId(): number {
    return this.serverId;
  }

  getChecksumFeed(): number {
    return this.checksumFeed;
  }

  getMaxClients(): number {
    return this.config.maxClients;
  }

  status(): ServerStatus {
    const clients = new Map<number, SessionStatus>();
    for (const session of this.sessions.occupied()) {
      clients.set(session.index, {
        index: session.index,
        name: session.name,
        state: session.state,
        address: formatAddress(session.address),
        rate: session.rate,
        isBot: session.isBot,
      });
    }
    return { serverId: this.serverId, maxClients: this.config.maxClients, clients };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private findSession(address: NetAddress): ClientSession | null {
    for (const session of this.sessions) {
      if (session.state !== SessionState.Free && compareAddress(address, session.address)) {
        return session.state === SessionState.Zombie ? null : session;
      }
    }
    return null;
  }

  private rollChecksumFeed(): number {
    return ((random15(this.config.random) << 16) ^ random15(this.config.random) ^ this.config.now()) | 0;
  }

  private drop(session: ClientSession, reason: string): void {
    if (session.state === SessionState.Zombie || session.state === SessionState.Free) {
      return;
    }

    if (session.demoRecording) {
      this.demos?.stopRecording(session.index);
      session.demoRecording = false;
    }

    const isBot = session.isBot;
    if (!isBot) {
      this.challenges.clearFor(session.address);
    }
    session.voipQueue = [];

    this.config.logger.log(`[SessionServer] Client ${session.index} (${session.name}) dropped: ${reason}`);

    // the dropped session is still >= Primed here and must see the notice too
    const notice = `print "${session.name}^7 ${reason}\n"`;
    for (const other of this.sessions) {
      if (other === session) {
        if (other.state >= SessionState.Primed) {
          other.addServerCommand(notice, true);
        }
      } else if (other.state >= SessionState.Primed) {
        this.addServerCommand(other, notice);
      }
    }

    this.simulation.onClientDisconnect(session.index);

    session.addServerCommand(`disconnect "${reason}"`, true);
    queueMessage(session, () => undefined);

    session.userinfo = "";
    if (isBot) {
      this.sessions.recycle(session.index);
    } else {
      session.state = SessionState.Zombie;
      session.zombieSince = this.config.now();
    }

    if (this.sessions.countAtLeast(SessionState.Connected) === 0) {
      this.heartbeat.heartbeat();
    }
  }

  /**
   * Queue a reliable command, dropping the session when it has fallen a
   * full ring behind.
   */
  private addServerCommand(session: ClientSession, text: string): void {
    if (!session.addServerCommand(text)) {
      this.config.logger.log(`[SessionServer] Server command overflow for ${session.name}`);
      this.drop(session, "Server command overflow");
      return;
    }
    if (session.isBot) {
      session.reliableAcknowledge = session.reliableSequence;
    }
  }

  private deriveUserinfo(session: ClientSession): boolean {
    if (session.userinfoChanged(this.config)) {
      return true;
    }
    this.drop(session, "userinfo string length exceeded");
    return false;
  }

  private writeGameState(session: ClientSession): void {
    this.config.logger.debug(`[SessionServer] Going from Connected to Primed for ${session.name}`);
    session.state = SessionState.Primed;
    session.pureAuthentic = false;
    session.gotCP = false;

    const payload = this.world.gameState(session.index);
    session.gamestateMessageNum = queueMessage(session, (writer) => {
      writer.writeByte(ServerOp.Gamestate);
      writer.writeLong(session.reliableSequence);
      writePayload(writer, payload);
      writer.writeLong(session.index);
      writer.writeLong(this.checksumFeed);
      writer.writeLong(this.serverId);
      writer.writeLong(this.checksumFeedServerId);
    });
  }

  private writeSnapshot(session: ClientSession, now: number): void {
    const payload = this.world.snapshot(session.index);
    const voice = this.voip.drain(session);
    queueMessage(session, (writer) => {
      writer.writeByte(ServerOp.Snapshot);
      writer.writeLong(now);
      writePayload(writer, payload);
      for (const packet of voice) {
        writer.writeByte(ServerOp.VoipOpus);
        writer.writeShort(packet.sender);
        writer.writeByte(packet.generation);
        writer.writeLong(packet.sequence);
        writer.writeByte(packet.frames);
        writer.writeShort(packet.data.length);
        writer.writeByte(packet.flags);
        writer.writeData(packet.data);
      }
    });
    session.lastSnapshotTime = now;
  }

  private clientEnterWorld(session: ClientSession, command: UserCommand | null): void {
    this.config.logger.debug(`[SessionServer] Going from Primed to Active for ${session.name}`);
    session.state = SessionState.Active;

    if (this.config.autoRecordDemo && !session.isBot && this.demos && !session.demoRecording) {
      this.demos.startRecording(session.index);
      session.demoRecording = true;
    }

    session.deltaMessage = -1;
    session.lastSnapshotTime = 0;
    session.lastUsercmd = command ? cloneUserCommand(command) : createNullUserCommand();

    this.simulation.onClientBegin(session.index);
  }

  private verifyPure(session: ClientSession, args: readonly string[]): void {
    if (!this.config.pure) {
      return;
    }

    const result = verifyPureChecksums(args, {
      serverIdTag: this.checksumFeedServerId,
      checksumFeed: this.checksumFeed,
      references: this.content.referenceChecksums(),
      loaded: this.content.loadedChecksums(),
    });

    if (result.status === "stale") {
      this.config.logger.debug(`[SessionServer] ignoring outdated cp command from ${session.name}`);
      return;
    }

    session.gotCP = true;
    if (result.status === "authentic") {
      session.pureAuthentic = true;
      return;
    }

    this.config.logger.log(`[SessionServer] Pure check failed for ${session.name}: ${result.reason}`);
    session.pureAuthentic = false;
    // one coherent final frame before the drop
    session.state = SessionState.Active;
    session.lastSnapshotTime = 0;
    this.writeSnapshot(session, this.config.now());
    this.drop(session, "Unpure client detected. Invalid .PK3 files referenced!");
  }

  private createCommandHost(): ReliableCommandHost {
    return {
      dropClient: (session, reason) => this.drop(session, reason),
      applyUserinfo: (session, userinfo) => {
        session.userinfo = userinfo;
        if (this.deriveUserinfo(session)) {
          this.simulation.onClientUserinfoChanged(session.index);
        }
      },
      verifyPure: (session, args) => this.verifyPure(session, args),
      sendGameState: (session) => this.writeGameState(session),
      sendServerCommand: (session, text) => this.addServerCommand(session, text),
      forwardCommand: (session, args) => this.simulation.onClientCommand(session.index, args),
      forceTeam: (session, team) => {
        if (!this.simulation.onClientForceTeam) {
          return false;
        }
        this.simulation.onClientForceTeam(session.index, team);
        return true;
      },
    };
  }

  private createMessageHost(): ClientMessageHost {
    // getters: serverId and the feed change on restart
    const server = this;
    return {
      get serverId() {
        return server.serverId;
      },
      get restartedServerId() {
        return server.restartedServerId;
      },
      get checksumFeed() {
        return server.checksumFeed;
      },
      pure: this.config.pure,
      strictAcknowledge: this.config.strictAcknowledge,
      logger: this.config.logger,
      channel: this.channel,
      voip: this.voip,
      sendGameState: (session) => this.writeGameState(session),
      enterWorld: (session, command) => this.clientEnterWorld(session, command),
      dropClient: (session, reason) => this.drop(session, reason),
      think: (session, command) => this.simulation.onClientThink(session.index, command),
    };
  }
}
