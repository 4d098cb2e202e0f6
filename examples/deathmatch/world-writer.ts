/**
 * Payloads for full-state and snapshot messages.
 *
 * Full state: arena id, arena name, then `count:short` player names as
 * `(index:byte name:string)`.
 * Snapshot: `count:short`, then per player `index:byte x:long y:long
 * yaw:short health:byte score:short`.
 */

import { BitReader, BitWriter, type WorldStateWriter } from "@arena/session";
import type { DeathmatchWorld } from "./types.js";

export interface SnapshotEntity {
  index: number;
  x: number;
  y: number;
  yaw: number;
  health: number;
  score: number;
}

export class DeathmatchWorldWriter implements WorldStateWriter {
  private readonly world: DeathmatchWorld;

  constructor(world: DeathmatchWorld) {
    this.world = world;
  }

  gameState(_sessionIndex: number): Uint8Array {
    const writer = new BitWriter();
    writer.writeString(this.world.arena.id);
    writer.writeString(this.world.arena.name);
    writer.writeShort(this.world.players.size);
    for (const player of this.world.players.values()) {
      writer.writeByte(player.index);
      writer.writeString(player.name);
    }
    return writer.toBytes();
  }

  snapshot(_sessionIndex: number): Uint8Array {
    const writer = new BitWriter();
    writer.writeShort(this.world.players.size);
    for (const player of this.world.players.values()) {
      writer.writeByte(player.index);
      writer.writeLong(Math.round(player.position.x));
      writer.writeLong(Math.round(player.position.y));
      writer.writeShort(Math.round(player.yaw) % 360);
      writer.writeByte(Math.max(0, Math.min(255, player.health)));
      writer.writeShort(player.score);
    }
    return writer.toBytes();
  }
}

/**
 * Client-side decode of a snapshot payload.
 */
export function readSnapshot(payload: Uint8Array): SnapshotEntity[] {
  const reader = new BitReader(payload);
  const count = reader.readShort();
  const entities: SnapshotEntity[] = [];
  for (let i = 0; i < count; i++) {
    entities.push({
      index: reader.readByte(),
      x: reader.readLong(),
      y: reader.readLong(),
      yaw: reader.readShort(),
      health: reader.readByte(),
      score: reader.readShort(),
    });
  }
  return entities;
}
