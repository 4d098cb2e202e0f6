/**
 * Test utilities for session engine tests.
 *
 * @module test-utils
 */

export { SeededRandom } from "./seeded-random.js";
export {
  silentLogger,
  testAddress,
  ManualClock,
  RecordingTransport,
  RecordingSimulation,
  type SentOutOfBand,
  type SentMessage,
  type SimulationEvent,
} from "./fakes.js";
export {
  encodeClientPacket,
  decodeServerMessage,
  writeVoipBlock,
  writeUserCommands,
  userCommandAt,
  type ClientPacket,
  type VoipBlock,
  type DecodedServerMessage,
  type DecodedGamestate,
  type DecodedVoipPacket,
} from "./client-packet.js";
export { TestClient, type ConnectOptions } from "./test-client.js";
