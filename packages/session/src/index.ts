/**
 * @arena/session - Client session protocol engine for real-time game servers
 *
 * Owns connection slots and everything between a raw datagram and the
 * simulation:
 * - Challenge handshake, bans and connection admission
 * - Ordered, exactly-once reliable commands with flood and exploit guards
 * - Keyed delta-encoded movement batches
 * - Content-integrity ("pure") checks and best-effort voice relay
 */

// =============================================================================
// High-Level API (Recommended)
// =============================================================================
export { SessionServer } from "./server/session-server.js";
export type {
  SessionServerDeps,
  OutOfBandResult,
  SessionStatus,
  ServerStatus,
  RestartOptions,
} from "./server/session-server.js";
export { resolveConfig } from "./server/config.js";
export type { SessionServerConfig, ResolvedSessionConfig } from "./server/config.js";

// Socket.IO transport and parser
export {
  SocketIoTransport,
  socketAddress,
  toBytes,
  OUT_OF_BAND_EVENT,
  PACKET_EVENT,
} from "./transport/socket-io-transport.js";
export type {
  TransportEvent,
  TransportHandler,
  PeerSink,
  PeerHandle,
} from "./transport/socket-io-transport.js";
export { superjsonParser } from "./transport/parser.js";

// =============================================================================
// Core Types
// =============================================================================
export { SessionState } from "./core/types.js";
export type {
  SessionLogger,
  Transport,
  Simulation,
  ContentIntegrity,
  Heartbeat,
  DemoRecorder,
  WorldStateWriter,
  SessionView,
} from "./core/types.js";
export { FatalServerError } from "./core/errors.js";
export type { FatalServerErrorCode } from "./core/errors.js";
export { ClientOp, ServerOp } from "./core/protocol.js";

// =============================================================================
// Wire Codecs
// =============================================================================
export {
  BOT_ADDRESS,
  loopbackAddress,
  parseAddress,
  formatAddress,
  formatBaseAddress,
  compareAddress,
  compareBaseAddress,
  compareBaseAddressMask,
  isLocalAddress,
  isLanAddress,
} from "./core/address.js";
export type { AddressType, NetAddress } from "./core/address.js";
export { BitReader, BitWriter, MessageOverflowError } from "./core/bitstream.js";
export {
  createNullUserCommand,
  cloneUserCommand,
  hashKey,
  userCommandKey,
  readDeltaUserCommand,
  writeDeltaUserCommand,
} from "./core/usercmd.js";
export type { UserCommand } from "./core/usercmd.js";
export { infoValueForKey, setInfoValueForKey, removeInfoKey, parseInfoString } from "./core/info-string.js";
export { tokenizeCommand, sanitizeArgs } from "./core/command-tokenizer.js";

// =============================================================================
// Server Primitives
// =============================================================================
export { ChallengeRegistry } from "./server/challenge-registry.js";
export type { Challenge, IssuedChallenge } from "./server/challenge-registry.js";
export { BanTable } from "./server/ban-table.js";
export type { BannedRange } from "./server/ban-table.js";
export { AddressRateLimiter, createBucket, rateLimit } from "./server/rate-limit.js";
export type { LeakyBucket } from "./server/rate-limit.js";
export { ConnectionAdmission } from "./server/admission.js";
export type { AdmissionResult, ChallengeResult, AdmissionContext } from "./server/admission.js";
export { ClientSession } from "./server/client-session.js";
export type { VoipPacket, UserinfoPolicy } from "./server/client-session.js";
export { SessionTable } from "./server/session-table.js";
export { ReliableCommandChannel, isManagementCommand } from "./server/reliable-channel.js";
export type {
  ReliableCommandResult,
  ManagementCommand,
  ReliableCommandHost,
  ReliableChannelConfig,
} from "./server/reliable-channel.js";
export { verifyPureChecksums, buildPureResponse } from "./server/pure-validation.js";
export type { PureCheckContext, PureCheckResult } from "./server/pure-validation.js";
export { decodeBatch, handleMove } from "./server/usercmd-decoder.js";
export type { MoveHost } from "./server/usercmd-decoder.js";
export { VoipRelay, readVoipFrame, isVoipTarget } from "./server/voip-relay.js";
export type { VoipFrame, VoipRelayConfig } from "./server/voip-relay.js";
export { executeClientMessage } from "./server/client-message.js";
export type { ClientMessageHost } from "./server/client-message.js";
export { queueMessage, rateMsec, sendQueuedMessages, HEADER_RATE_BYTES } from "./server/outbound.js";

export * from "./constants.js";
