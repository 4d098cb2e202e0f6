/**
 * Socket.IO parser built on superjson.
 *
 * Session packets travel as `Uint8Array`s and status payloads carry `Map`s;
 * both survive the wire unchanged with this parser installed on both ends:
 *
 *   const io = new Server(httpServer, { parser: superjsonParser });
 */

import { Emitter } from "@socket.io/component-emitter";
import SuperJSON from "superjson";

interface DecoderEvents {
  decoded: (packet: unknown) => void;
}

const serializer = new SuperJSON();

serializer.registerCustom<Uint8Array, number[]>(
  {
    isApplicable: (value): value is Uint8Array => value instanceof Uint8Array,
    serialize: (value) => Array.from(value),
    deserialize: (value) => Uint8Array.from(value),
  },
  "bytes",
);

class Encoder {
  encode(packet: unknown): string[] {
    return [serializer.stringify(packet)];
  }
}

class Decoder extends Emitter<DecoderEvents, DecoderEvents> {
  add(chunk: string): void {
    this.emit("decoded", serializer.parse(chunk));
  }

  destroy(): void {
    // stateless
  }
}

export const superjsonParser = {
  Encoder,
  Decoder,
};
