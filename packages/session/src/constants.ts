/**
 * Default configuration constants for the session engine
 */

/**
 * Hard upper bound on connection slots.
 * VoIP recipient masks and ignore lists are sized from this.
 */
export const MAX_CLIENTS = 64;

/**
 * Default number of connection slots when the server config omits it.
 */
export const DEFAULT_MAX_CLIENTS = 16;

/**
 * Protocol version spoken by current clients.
 */
export const DEFAULT_PROTOCOL = 71;

/**
 * Protocol accepted in compatibility mode (0 disables it).
 * Compat sessions never get VoIP.
 */
export const DEFAULT_LEGACY_PROTOCOL = 68;

export const DEFAULT_GAME_NAME = "arena";

/**
 * Size of the challenge table. Once full, the oldest entry is recycled.
 */
export const MAX_CHALLENGES = 2048;

/**
 * Ring size of the server-to-client reliable command buffer.
 * Must be a power of two.
 */
export const MAX_RELIABLE_COMMANDS = 64;

/**
 * Upper bound on movement commands in a single packet.
 */
export const MAX_PACKET_USERCMDS = 32;

/**
 * Userinfo strings (including the server-added "ip" key) must stay under this.
 */
export const MAX_INFO_STRING = 1024;

export const MAX_STRING_CHARS = 1024;

/**
 * Rate limits applied to userinfo "rate" values (bytes per second).
 */
export const MIN_RATE = 1000;
export const MAX_RATE = 100000;
export const DEFAULT_RATE = 5000;

/**
 * Default snapshot rate and upper bound for the userinfo "snaps" key.
 */
export const DEFAULT_FPS = 20;

/**
 * Seconds a returning address must wait before connecting again.
 */
export const DEFAULT_RECONNECT_LIMIT_SEC = 3;

/**
 * Simultaneous connections allowed from one non-LAN IP.
 */
export const DEFAULT_CLIENTS_PER_IP = 3;

/**
 * Reliable commands allowed per flood window before forwarding is suppressed.
 */
export const DEFAULT_FLOOD_PROTECT = 10;

/**
 * Flood window length.
 */
export const FLOOD_WINDOW_MS = 1000;

/**
 * Minimum delay between two applied userinfo updates of an active session.
 */
export const USERINFO_DEBOUNCE_MS = 5000;

/**
 * How long a dropped session lingers as a zombie before its slot is recycled.
 */
export const ZOMBIE_TIMEOUT_MS = 2000;

/**
 * Chat exploit guard defaults: bounds on the combined argument length
 * of chat and radio commands, and the extra weight of each `$` token.
 */
export const DEFAULT_MAX_CHAT_LENGTH = 150;
export const DEFAULT_MAX_RADIO_LENGTH = 100;
export const DEFAULT_MAX_DOLLAR_VARS = 6;
export const DEFAULT_DOLLAR_VAR_WEIGHT = 8;

/**
 * Per-recipient queue depth for relayed voice packets.
 */
export const MAX_VOIP_PACKETS = 64;

/**
 * Largest accepted voice payload, in bytes.
 */
export const MAX_VOIP_PAYLOAD = 1024;

export const VOIP_SPATIAL = 0x01;
export const VOIP_DIRECT = 0x02;

/**
 * Number of per-address leaky buckets kept for out-of-band rate limiting.
 */
export const MAX_BUCKETS = 16384;
