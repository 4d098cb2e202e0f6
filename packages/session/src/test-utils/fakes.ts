/**
 * In-process stand-ins for the collaborators a session server drives.
 *
 * @module test-utils/fakes
 */

import { parseAddress, type NetAddress } from "../core/address.js";
import type { SessionLogger, Simulation, Transport } from "../core/types.js";
import { cloneUserCommand, type UserCommand } from "../core/usercmd.js";

export const silentLogger: SessionLogger = {
  log: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Parse an address literal, throwing on typos in test data.
 */
export function testAddress(text: string): NetAddress {
  const address = parseAddress(text);
  if (!address) {
    throw new Error(`Invalid test address: ${text}`);
  }
  return address;
}

export class ManualClock {
  time: number;

  constructor(start: number = 1000) {
    this.time = start;
  }

  readonly now = (): number => this.time;

  advance(ms: number): number {
    this.time += ms;
    return this.time;
  }
}

export interface SentOutOfBand {
  address: NetAddress;
  text: string;
}

export interface SentMessage {
  sessionIndex: number;
  address: NetAddress;
  message: Uint8Array;
}

/**
 * Records everything the server transmits.
 */
export class RecordingTransport implements Transport {
  readonly outOfBand: SentOutOfBand[] = [];
  readonly messages: SentMessage[] = [];

  sendOutOfBand(address: NetAddress, text: string): void {
    this.outOfBand.push({ address, text });
  }

  sendToSession(sessionIndex: number, address: NetAddress, message: Uint8Array): void {
    this.messages.push({ sessionIndex, address, message });
  }

  lastOutOfBand(): string {
    return this.outOfBand[this.outOfBand.length - 1]?.text ?? "";
  }

  messagesFor(sessionIndex: number): Uint8Array[] {
    return this.messages.filter((sent) => sent.sessionIndex === sessionIndex).map((sent) => sent.message);
  }

  clear(): void {
    this.outOfBand.length = 0;
    this.messages.length = 0;
  }
}

export type SimulationEvent =
  | { type: "connect"; index: number; firstTime: boolean; isBot: boolean }
  | { type: "begin"; index: number }
  | { type: "command"; index: number; args: string[] }
  | { type: "think"; index: number; command: UserCommand }
  | { type: "disconnect"; index: number }
  | { type: "userinfo"; index: number }
  | { type: "forceTeam"; index: number; team: string };

/**
 * Records every hook call in order. `connectVeto` is returned from
 * `onClientConnect`.
 */
export class RecordingSimulation implements Simulation {
  readonly events: SimulationEvent[] = [];
  connectVeto: string | null = null;

  onClientConnect(index: number, firstTime: boolean, isBot: boolean): string | null {
    this.events.push({ type: "connect", index, firstTime, isBot });
    return this.connectVeto;
  }

  onClientBegin(index: number): void {
    this.events.push({ type: "begin", index });
  }

  onClientCommand(index: number, args: readonly string[]): void {
    this.events.push({ type: "command", index, args: [...args] });
  }

  onClientThink(index: number, command: Readonly<UserCommand>): void {
    this.events.push({ type: "think", index, command: cloneUserCommand(command) });
  }

  onClientDisconnect(index: number): void {
    this.events.push({ type: "disconnect", index });
  }

  onClientUserinfoChanged(index: number): void {
    this.events.push({ type: "userinfo", index });
  }

  onClientForceTeam(index: number, team: string): void {
    this.events.push({ type: "forceTeam", index, team });
  }

  ofType<T extends SimulationEvent["type"]>(type: T): Array<Extract<SimulationEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<SimulationEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}
