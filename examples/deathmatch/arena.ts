/**
 * Arena and content manifests.
 *
 * Both ship as JSON under `data/` and are validated on load.
 *
 * @module examples/deathmatch/arena
 */

import { readFileSync } from "node:fs";
import type { ContentIntegrity } from "@arena/session";
import type { ArenaBounds, ArenaConfig, ContentArchive, ContentManifest, SpawnPoint } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireNumber(record: Record<string, unknown>, key: string, context: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${context} must have a numeric '${key}' field`);
  }
  return value;
}

function requireString(record: Record<string, unknown>, key: string, context: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new Error(`${context} must have a string '${key}' field`);
  }
  return value;
}

function parseJson(json: string | object): unknown {
  if (typeof json !== "string") {
    return json;
  }
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new Error("Invalid JSON format", { cause: error });
  }
}

/**
 * Validate an arena definition.
 */
export function parseArenaFromJson(json: string | object): ArenaConfig {
  const data = parseJson(json);
  if (!isRecord(data)) {
    throw new Error("Arena must be an object");
  }

  const id = requireString(data, "id", "Arena");
  const name = requireString(data, "name", "Arena");

  if (!isRecord(data.bounds)) {
    throw new Error("Arena must have a 'bounds' object");
  }
  const bounds: ArenaBounds = {
    minX: requireNumber(data.bounds, "minX", "Arena bounds"),
    maxX: requireNumber(data.bounds, "maxX", "Arena bounds"),
    minY: requireNumber(data.bounds, "minY", "Arena bounds"),
    maxY: requireNumber(data.bounds, "maxY", "Arena bounds"),
  };
  if (bounds.minX >= bounds.maxX || bounds.minY >= bounds.maxY) {
    throw new Error("Arena bounds must have min < max");
  }

  if (!Array.isArray(data.spawnPoints) || data.spawnPoints.length === 0) {
    throw new Error("Arena must have at least one spawn point");
  }
  const spawnPoints: SpawnPoint[] = data.spawnPoints.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new Error(`Spawn point ${i} must be an object`);
    }
    const spawn: SpawnPoint = {
      x: requireNumber(entry, "x", `Spawn point ${i}`),
      y: requireNumber(entry, "y", `Spawn point ${i}`),
      yaw: typeof entry.yaw === "number" ? entry.yaw : 0,
    };
    if (spawn.x < bounds.minX || spawn.x > bounds.maxX || spawn.y < bounds.minY || spawn.y > bounds.maxY) {
      throw new Error(`Spawn point ${i} is outside the arena bounds`);
    }
    return spawn;
  });

  return { id, name, bounds, spawnPoints };
}

/**
 * Validate a content manifest. The two reference checksums must belong to
 * listed archives.
 */
export function parseContentManifest(json: string | object): ContentManifest {
  const data = parseJson(json);
  if (!isRecord(data)) {
    throw new Error("Content manifest must be an object");
  }

  const refs = data.references;
  if (!Array.isArray(refs) || refs.length !== 2 || !refs.every((r: unknown) => Number.isInteger(r))) {
    throw new Error("Content manifest must list exactly two integer 'references'");
  }
  const references: [number, number] = [Number(refs[0]), Number(refs[1])];

  if (!Array.isArray(data.archives)) {
    throw new Error("Content manifest must have an 'archives' array");
  }
  const archives: ContentArchive[] = data.archives.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new Error(`Archive ${i} must be an object`);
    }
    const checksum = requireNumber(entry, "checksum", `Archive ${i}`);
    if (!Number.isInteger(checksum)) {
      throw new Error(`Archive ${i} checksum must be an integer`);
    }
    return { name: requireString(entry, "name", `Archive ${i}`), checksum: checksum | 0 };
  });

  for (const reference of references) {
    if (!archives.some((archive) => archive.checksum === reference)) {
      throw new Error(`Reference checksum ${reference} does not belong to any archive`);
    }
  }

  return { references, archives };
}

function readData(file: string): string {
  return readFileSync(new URL(`./data/${file}`, import.meta.url), "utf8");
}

export function loadArena(file = "arena.json"): ArenaConfig {
  return parseArenaFromJson(readData(file));
}

export function loadContentManifest(file = "content.json"): ContentManifest {
  return parseContentManifest(readData(file));
}

/**
 * Expose a manifest as the server's content checksums.
 */
export function manifestIntegrity(manifest: ContentManifest): ContentIntegrity {
  const loaded = manifest.archives.map((archive) => archive.checksum);
  return {
    referenceChecksums: () => manifest.references,
    loadedChecksums: () => loaded,
  };
}
