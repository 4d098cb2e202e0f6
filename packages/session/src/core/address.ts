/**
 * Peer addresses and the comparisons the admission layer relies on.
 *
 * @module core/address
 */

export type AddressType = "bot" | "loopback" | "ip" | "ip6";

/**
 * A transport-level peer address. `ip` holds 4 bytes for IPv4, 16 for IPv6
 * and is empty for bots and the loopback peer.
 */
export interface NetAddress {
  readonly type: AddressType;
  readonly ip: Uint8Array;
  readonly port: number;
}

export const BOT_ADDRESS: NetAddress = { type: "bot", ip: new Uint8Array(0), port: 0 };

export function loopbackAddress(port = 0): NetAddress {
  return { type: "loopback", ip: new Uint8Array(0), port };
}

function parseIp4(text: string): Uint8Array | null {
  const parts = text.split(".");
  if (parts.length !== 4) {
    return null;
  }
  const bytes = new Uint8Array(4);
  for (let i = 0; i < 4; i++) {
    const part = parts[i] ?? "";
    if (!/^\d{1,3}$/.test(part)) {
      return null;
    }
    const value = Number(part);
    if (value > 255) {
      return null;
    }
    bytes[i] = value;
  }
  return bytes;
}

function parseIp6(text: string): Uint8Array | null {
  const halves = text.split("::");
  if (halves.length > 2) {
    return null;
  }
  const parseGroups = (chunk: string): number[] | null => {
    if (chunk === "") {
      return [];
    }
    const groups: number[] = [];
    for (const group of chunk.split(":")) {
      if (!/^[0-9a-fA-F]{1,4}$/.test(group)) {
        return null;
      }
      groups.push(Number.parseInt(group, 16));
    }
    return groups;
  };
  const head = parseGroups(halves[0] ?? "");
  const tail = halves.length === 2 ? parseGroups(halves[1] ?? "") : [];
  if (!head || !tail) {
    return null;
  }
  const missing = 8 - head.length - tail.length;
  if ((halves.length === 1 && missing !== 0) || missing < 0) {
    return null;
  }
  const groups = [...head, ...new Array<number>(missing).fill(0), ...tail];
  const bytes = new Uint8Array(16);
  groups.forEach((group, i) => {
    bytes[i * 2] = group >> 8;
    bytes[i * 2 + 1] = group & 0xff;
  });
  return bytes;
}

/**
 * Parse `bot`, `loopback[:port]`, `a.b.c.d[:port]` or `[v6][:port]`.
 * Returns null for anything else.
 */
export function parseAddress(text: string): NetAddress | null {
  const trimmed = text.trim();
  if (trimmed === "bot") {
    return BOT_ADDRESS;
  }

  let host = trimmed;
  let port = 0;
  if (trimmed.startsWith("[")) {
    const close = trimmed.indexOf("]");
    if (close < 0) {
      return null;
    }
    host = trimmed.slice(1, close);
    const rest = trimmed.slice(close + 1);
    if (rest !== "") {
      if (!/^:\d{1,5}$/.test(rest)) {
        return null;
      }
      port = Number(rest.slice(1));
    }
  } else if (trimmed.split(":").length === 2) {
    const [h, p] = trimmed.split(":");
    if (!p || !/^\d{1,5}$/.test(p)) {
      return null;
    }
    host = h ?? "";
    port = Number(p);
  }
  if (port > 0xffff) {
    return null;
  }

  if (host === "loopback" || host === "localhost") {
    return loopbackAddress(port);
  }
  const ip4 = parseIp4(host);
  if (ip4) {
    return { type: "ip", ip: ip4, port };
  }
  const ip6 = parseIp6(host);
  if (ip6) {
    return { type: "ip6", ip: ip6, port };
  }
  return null;
}

export function formatBaseAddress(address: NetAddress): string {
  switch (address.type) {
    case "bot":
      return "bot";
    case "loopback":
      return "loopback";
    case "ip":
      return Array.from(address.ip).join(".");
    case "ip6": {
      const groups: string[] = [];
      for (let i = 0; i < 16; i += 2) {
        groups.push((((address.ip[i] ?? 0) << 8) | (address.ip[i + 1] ?? 0)).toString(16));
      }
      return groups.join(":");
    }
  }
}

export function formatAddress(address: NetAddress): string {
  switch (address.type) {
    case "bot":
    case "loopback":
      return formatBaseAddress(address);
    case "ip":
      return `${formatBaseAddress(address)}:${address.port}`;
    case "ip6":
      return `[${formatBaseAddress(address)}]:${address.port}`;
  }
}

/**
 * Compare the first `bits` bits of two addresses of the same family.
 * Bots and loopback match any address of their own type.
 */
export function compareBaseAddressMask(a: NetAddress, b: NetAddress, bits: number): boolean {
  if (a.type !== b.type) {
    return false;
  }
  if (a.type === "bot" || a.type === "loopback") {
    return true;
  }

  const maxBits = a.ip.length * 8;
  const maskBits = bits < 0 || bits > maxBits ? maxBits : bits;
  const wholeBytes = maskBits >> 3;
  for (let i = 0; i < wholeBytes; i++) {
    if (a.ip[i] !== b.ip[i]) {
      return false;
    }
  }

  const remaining = maskBits & 7;
  if (remaining === 0) {
    return true;
  }
  const mask = (0xff << (8 - remaining)) & 0xff;
  return (((a.ip[wholeBytes] ?? 0) ^ (b.ip[wholeBytes] ?? 0)) & mask) === 0;
}

/**
 * Same host, port ignored.
 */
export function compareBaseAddress(a: NetAddress, b: NetAddress): boolean {
  return compareBaseAddressMask(a, b, -1);
}

/**
 * Same host and port.
 */
export function compareAddress(a: NetAddress, b: NetAddress): boolean {
  if (!compareBaseAddress(a, b)) {
    return false;
  }
  return a.type === "bot" || a.port === b.port;
}

export function isLocalAddress(address: NetAddress): boolean {
  return address.type === "loopback";
}

/**
 * Loopback, private IPv4 ranges, IPv6 link-local and unique-local ranges.
 */
export function isLanAddress(address: NetAddress): boolean {
  switch (address.type) {
    case "loopback":
      return true;
    case "bot":
      return false;
    case "ip": {
      const [a = 0, b = 0] = address.ip;
      return a === 10 || a === 127 || (a === 172 && (b & 0xf0) === 16) || (a === 192 && b === 168);
    }
    case "ip6": {
      const first = address.ip[0] ?? 0;
      const second = address.ip[1] ?? 0;
      if ((first & 0xfe) === 0xfc) {
        return true;
      }
      if (first === 0xfe && (second & 0xc0) === 0x80) {
        return true;
      }
      return address.ip.every((byte, i) => (i === 15 ? byte === 1 : byte === 0));
    }
  }
}
