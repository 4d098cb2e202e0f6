import { beforeEach, describe, expect, test } from "vitest";
import { BOT_ADDRESS } from "../core/address.js";
import { SessionState } from "../core/types.js";
import { decodeServerMessage, RecordingTransport, testAddress } from "../test-utils/index.js";
import { ClientSession } from "./client-session.js";
import { HEADER_RATE_BYTES, queueMessage, rateMsec, sendQueuedMessages } from "./outbound.js";

function liveSession(index: number, rate = 1000): ClientSession {
  const session = new ClientSession(index);
  session.address = testAddress(`203.0.113.${index + 1}:27005`);
  session.state = SessionState.Connected;
  session.rate = rate;
  return session;
}

describe("queueMessage", () => {
  test("should not queue anything for bots", () => {
    const bot = new ClientSession(0);
    bot.address = BOT_ADDRESS;

    expect(queueMessage(bot, () => undefined)).toBe(-1);
    expect(bot.outbound).toHaveLength(0);
  });

  test("should number messages consecutively", () => {
    const session = liveSession(0);
    expect(queueMessage(session, () => undefined)).toBe(1);
    expect(queueMessage(session, () => undefined)).toBe(2);
    expect(session.outgoingSequence).toBe(3);
  });

  test("should frame acknowledgement and unacknowledged server commands", () => {
    const session = liveSession(0);
    session.lastClientCommand = 7;
    session.addServerCommand("print \"a\"");
    session.addServerCommand("print \"b\"");
    session.reliableAcknowledge = 1;

    queueMessage(session, () => undefined);
    const message = decodeServerMessage(session.outbound[0] ?? new Uint8Array(0));

    expect(message.sequence).toBe(1);
    expect(message.lastClientCommand).toBe(7);
    expect(message.serverCommands).toEqual([{ sequence: 2, text: "print \"b\"" }]);
  });
});

describe("rateMsec", () => {
  test("should charge the header overhead", () => {
    expect(rateMsec(1000 - HEADER_RATE_BYTES, 1000)).toBe(1000);
    expect(rateMsec(52, 1000)).toBe(100);
  });

  test("should be zero without a rate", () => {
    expect(rateMsec(5000, 0)).toBe(0);
  });
});

describe("sendQueuedMessages", () => {
  let transport: RecordingTransport;

  beforeEach(() => {
    transport = new RecordingTransport();
  });

  test("should report nothing pending when queues are empty", () => {
    expect(sendQueuedMessages([liveSession(0)], transport, 0)).toBe(-1);
  });

  test("should send one message per pass and pace the rest by rate", () => {
    const session = liveSession(0);
    queueMessage(session, () => undefined);
    queueMessage(session, () => undefined);
    // an empty message is 9 bytes: (9 + 48) * 1000 / 1000
    expect(sendQueuedMessages([session], transport, 0)).toBe(57);
    expect(transport.messages).toHaveLength(1);

    expect(sendQueuedMessages([session], transport, 56)).toBe(1);
    expect(transport.messages).toHaveLength(1);

    expect(sendQueuedMessages([session], transport, 57)).toBe(-1);
    expect(transport.messages.map((sent) => decodeServerMessage(sent.message).sequence)).toEqual([1, 2]);
  });

  test("should skip free slots", () => {
    const session = liveSession(0);
    queueMessage(session, () => undefined);
    session.state = SessionState.Free;

    expect(sendQueuedMessages([session], transport, 0)).toBe(-1);
    expect(transport.messages).toHaveLength(0);
  });

  test("should return the shortest wait across sessions", () => {
    const slow = liveSession(0, 1000);
    const fast = liveSession(1, 9000);
    for (const session of [slow, fast]) {
      queueMessage(session, () => undefined);
      queueMessage(session, () => undefined);
    }

    // 57000 / 9000 rounds down to 6
    expect(sendQueuedMessages([slow, fast], transport, 0)).toBe(6);
    expect(transport.messagesFor(0)).toHaveLength(1);
    expect(transport.messagesFor(1)).toHaveLength(1);
  });
});
