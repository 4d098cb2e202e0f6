/**
 * Content-integrity ("pure") check.
 *
 * A client on a pure server reports what it loaded as
 *
 *   cp <serverId> <ref1> <ref2> @ <c1> ... <cn> <digest>
 *
 * where ref1/ref2 are the checksums of the two reference modules, c1..cn the
 * checksums of every other archive it references, and
 * digest = feed ^ c1 ^ ... ^ cn ^ n.
 *
 * @module server/pure-validation
 */

import { parseIntLoose } from "../core/utils.js";

export interface PureCheckContext {
  /** World generation the current checksum feed belongs to */
  serverIdTag: number;
  /** Per-generation seed mixed into the digest */
  checksumFeed: number;
  /** The two reference checksums, null when unknown */
  references: readonly [number, number] | null;
  /** Every checksum the server has loaded */
  loaded: readonly number[];
}

export type PureCheckResult =
  | { status: "stale" }
  | { status: "authentic" }
  | { status: "inauthentic"; reason: string };

const MIN_ARGS = 6;

/**
 * Evaluate a tokenized `cp` command. `args[0]` is the command name.
 */
export function verifyPureChecksums(args: readonly string[], context: PureCheckContext): PureCheckResult {
  const serverIdArg = args[1];
  if (serverIdArg === undefined) {
    return { status: "inauthentic", reason: "missing server id" };
  }
  // responses to an earlier world generation may still be in flight
  if (parseIntLoose(serverIdArg) < context.serverIdTag) {
    return { status: "stale" };
  }

  if (!context.references) {
    return { status: "inauthentic", reason: "server reference checksums unavailable" };
  }
  if (args.length < MIN_ARGS) {
    return { status: "inauthentic", reason: "too few checksums" };
  }

  const [ref1, ref2] = context.references;
  const first = args[2] ?? "";
  const second = args[3] ?? "";
  if (first.startsWith("@") || parseIntLoose(first) !== ref1) {
    return { status: "inauthentic", reason: "first reference checksum mismatch" };
  }
  if (second.startsWith("@") || parseIntLoose(second) !== ref2) {
    return { status: "inauthentic", reason: "second reference checksum mismatch" };
  }
  if (!(args[4] ?? "").startsWith("@")) {
    return { status: "inauthentic", reason: "missing delimiter" };
  }

  const reported = args.slice(5).map(parseIntLoose);
  const digest = reported.pop() ?? 0;
  const count = reported.length;

  if (new Set(reported).size !== count) {
    return { status: "inauthentic", reason: "duplicate checksums" };
  }

  const loaded = new Set(context.loaded);
  if (reported.some((checksum) => !loaded.has(checksum))) {
    return { status: "inauthentic", reason: "checksum not loaded by server" };
  }

  let expected = context.checksumFeed;
  for (const checksum of reported) {
    expected ^= checksum;
  }
  expected ^= count;
  if ((expected | 0) !== digest) {
    return { status: "inauthentic", reason: "checksum digest mismatch" };
  }

  return { status: "authentic" };
}

/**
 * Build the `cp` command a client holding `checksums` would send.
 */
export function buildPureResponse(
  serverIdTag: number,
  references: readonly [number, number],
  checksums: readonly number[],
  checksumFeed: number,
): string {
  let digest = checksumFeed;
  for (const checksum of checksums) {
    digest ^= checksum;
  }
  digest ^= checksums.length;
  return ["cp", serverIdTag, references[0], references[1], "@", ...checksums, digest | 0].join(" ");
}
