/**
 * Socket.IO adapter for the session engine.
 *
 * Each Socket.IO connection stands in for one datagram peer, identified by
 * its remote `ip:port`. Connectionless text travels on `sv:oob`, sequenced
 * session messages on `sv:packet`.
 *
 * @module transport/socket-io-transport
 */

import type { Server, Socket } from "socket.io";
import { formatAddress, parseAddress, type NetAddress } from "../core/address.js";
import type { SessionLogger, Transport } from "../core/types.js";

export const OUT_OF_BAND_EVENT = "sv:oob";
export const PACKET_EVENT = "sv:packet";

export type TransportEvent = typeof OUT_OF_BAND_EVENT | typeof PACKET_EVENT;

/**
 * Where inbound traffic goes; implemented by the session server.
 */
export interface TransportHandler {
  handleOutOfBand(address: NetAddress, text: string): unknown;
  handlePacket(address: NetAddress, data: Uint8Array): boolean;
  handleTransportClosed(address: NetAddress): void;
}

/**
 * Outbound side of one peer.
 */
export interface PeerSink {
  emit(event: TransportEvent, payload: string | Uint8Array): void;
}

/**
 * Inbound side of one peer, fed by whatever owns the connection.
 */
export interface PeerHandle {
  readonly address: NetAddress;
  receiveOutOfBand(payload: unknown): void;
  receivePacket(payload: unknown): void;
  close(): void;
}

/**
 * Map a socket's remote host and port to a peer address. IPv4-mapped IPv6
 * hosts are reported as plain IPv4.
 */
export function socketAddress(host: string, port: number | undefined): NetAddress | null {
  const plain = host.startsWith("::ffff:") && host.includes(".") ? host.slice("::ffff:".length) : host;
  const text = plain.includes(":") ? `[${plain}]:${port ?? 0}` : `${plain}:${port ?? 0}`;
  return parseAddress(text);
}

/**
 * Accept the byte payload shapes the parsers produce.
 */
export function toBytes(payload: unknown): Uint8Array | null {
  if (payload instanceof Uint8Array) {
    return payload;
  }
  if (payload instanceof ArrayBuffer) {
    return new Uint8Array(payload);
  }
  if (Array.isArray(payload) && payload.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) {
    return Uint8Array.from(payload);
  }
  return null;
}

export class SocketIoTransport implements Transport {
  private readonly peers = new Map<string, PeerSink>();
  private readonly logger: SessionLogger;
  private handler: TransportHandler | null = null;

  constructor(logger: SessionLogger = console) {
    this.logger = logger;
  }

  /**
   * Route inbound traffic to `handler`. Must be called before peers connect.
   */
  bind(handler: TransportHandler): void {
    this.handler = handler;
  }

  /**
   * Accept peers from a Socket.IO server.
   */
  listen(io: Server): void {
    io.on("connection", (socket: Socket) => this.acceptSocket(socket));
  }

  /**
   * Register a peer. Socket.IO connections come through {@link listen};
   * other hosts and tests may call this directly.
   */
  connectPeer(address: NetAddress, sink: PeerSink): PeerHandle {
    const key = formatAddress(address);
    this.peers.set(key, sink);
    this.logger.log(`[SocketIoTransport] Peer connected: ${key}`);

    const handler = this.requireHandler();
    let open = true;
    return {
      address,
      receiveOutOfBand: (payload) => {
        if (!open || typeof payload !== "string") {
          return;
        }
        handler.handleOutOfBand(address, payload);
      },
      receivePacket: (payload) => {
        const data = open ? toBytes(payload) : null;
        if (!data) {
          return;
        }
        handler.handlePacket(address, data);
      },
      close: () => {
        if (!open) {
          return;
        }
        open = false;
        this.peers.delete(key);
        this.logger.log(`[SocketIoTransport] Peer disconnected: ${key}`);
        handler.handleTransportClosed(address);
      },
    };
  }

  sendOutOfBand(address: NetAddress, text: string): void {
    this.peers.get(formatAddress(address))?.emit(OUT_OF_BAND_EVENT, text);
  }

  sendToSession(_sessionIndex: number, address: NetAddress, message: Uint8Array): void {
    this.peers.get(formatAddress(address))?.emit(PACKET_EVENT, message);
  }

  get peerCount(): number {
    return this.peers.size;
  }

  private acceptSocket(socket: Socket): void {
    const address = socketAddress(socket.handshake.address, socket.request.socket.remotePort);
    if (!address) {
      this.logger.warn(`[SocketIoTransport] Unusable peer address ${socket.handshake.address}, closing ${socket.id}`);
      socket.disconnect(true);
      return;
    }

    const peer = this.connectPeer(address, {
      emit: (event, payload) => {
        socket.emit(event, payload);
      },
    });
    socket.on(OUT_OF_BAND_EVENT, (payload: unknown) => peer.receiveOutOfBand(payload));
    socket.on(PACKET_EVENT, (payload: unknown) => peer.receivePacket(payload));
    socket.on("disconnect", () => peer.close());
  }

  private requireHandler(): TransportHandler {
    if (!this.handler) {
      throw new Error("[SocketIoTransport] bind() must be called before peers connect");
    }
    return this.handler;
  }
}
