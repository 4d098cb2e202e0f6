import { describe, expect, it } from "vitest";
import {
  loadArena,
  loadContentManifest,
  manifestIntegrity,
  parseArenaFromJson,
  parseContentManifest,
} from "./arena.js";

const validArena = {
  id: "box",
  name: "Box",
  bounds: { minX: -100, maxX: 100, minY: -100, maxY: 100 },
  spawnPoints: [{ x: 0, y: 0, yaw: 90 }, { x: 10, y: 10 }],
};

describe("parseArenaFromJson", () => {
  it("should parse a JSON string", () => {
    expect(parseArenaFromJson(JSON.stringify(validArena))).toEqual({
      ...validArena,
      spawnPoints: [
        { x: 0, y: 0, yaw: 90 },
        { x: 10, y: 10, yaw: 0 },
      ],
    });
  });

  it("should reject malformed JSON", () => {
    expect(() => parseArenaFromJson("{ not json")).toThrow("Invalid JSON format");
  });

  it("should reject inverted bounds", () => {
    expect(() => parseArenaFromJson({ ...validArena, bounds: { minX: 5, maxX: 5, minY: 0, maxY: 1 } })).toThrow(
      "Arena bounds must have min < max",
    );
  });

  it("should require a spawn point", () => {
    expect(() => parseArenaFromJson({ ...validArena, spawnPoints: [] })).toThrow(
      "Arena must have at least one spawn point",
    );
  });

  it("should reject spawn points outside the bounds", () => {
    expect(() => parseArenaFromJson({ ...validArena, spawnPoints: [{ x: 0, y: 0 }, { x: 101, y: 0 }] })).toThrow(
      "Spawn point 1 is outside the arena bounds",
    );
  });

  it("should name missing fields", () => {
    expect(() => parseArenaFromJson({ ...validArena, name: 7 })).toThrow("Arena must have a string 'name' field");
  });
});

describe("parseContentManifest", () => {
  const manifest = {
    references: [11, -22],
    archives: [
      { name: "base/a", checksum: 11 },
      { name: "base/b", checksum: -22 },
      { name: "extra/c", checksum: 33 },
    ],
  };

  it("should parse a valid manifest", () => {
    expect(parseContentManifest(manifest)).toEqual(manifest);
  });

  it("should require exactly two references", () => {
    expect(() => parseContentManifest({ ...manifest, references: [11] })).toThrow(
      "Content manifest must list exactly two integer 'references'",
    );
  });

  it("should require references to belong to an archive", () => {
    expect(() => parseContentManifest({ ...manifest, references: [11, 44] })).toThrow(
      "Reference checksum 44 does not belong to any archive",
    );
  });

  it("should reject fractional checksums", () => {
    expect(() =>
      parseContentManifest({ references: [1, 2], archives: [{ name: "x", checksum: 1.5 }] }),
    ).toThrow("Archive 0 checksum must be an integer");
  });

  it("should expose the manifest as content checksums", () => {
    const integrity = manifestIntegrity(parseContentManifest(manifest));
    expect(integrity.referenceChecksums()).toEqual([11, -22]);
    expect(integrity.loadedChecksums()).toEqual([11, -22, 33]);
  });
});

describe("bundled data", () => {
  it("should load the bundled arena", () => {
    const arena = loadArena();
    expect(arena.id).toBe("arena");
    expect(arena.spawnPoints).toHaveLength(8);
  });

  it("should load the bundled content manifest", () => {
    expect(loadContentManifest().references).toEqual([1948373201, -733912006]);
  });
});
