import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// NODE IDENTITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Canonical node key: `!` followed by 8 lower-case hex digits.
 * The only identifier ever used to key mailbox slots or session state.
 */
export type NodeKey = string;

export const NODE_KEY_PATTERN = /^![0-9a-fA-F]{8}$/;

/**
 * True if the token is written as a hex node id (`!a1b2c3d4`), any case.
 */
export function isNodeKeyToken(token: string): boolean {
  return NODE_KEY_PATTERN.test(token);
}

const DECIMAL_NODE_NUMBER = /^\d+$/;

/**
 * Normalize a node number or hex id into its canonical key.
 * Integers, their decimal string and their `!xxxxxxxx` spelling produce the
 * same key. Returns null for values that carry no usable address.
 */
export function toNodeKey(value: number | string | undefined | null): NodeKey | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      return null;
    }
    return `!${(value >>> 0).toString(16).padStart(8, '0')}`;
  }
  const token = value.trim();
  if (isNodeKeyToken(token)) {
    return token.toLowerCase();
  }
  if (DECIMAL_NODE_NUMBER.test(token)) {
    const num = Number(token);
    return num <= 0xffffffff ? toNodeKey(num) : null;
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// NODE DIRECTORY ENTRIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Device metrics for a node, already normalized by the transport adapter.
 * Utilization values are percentages.
 */
export const NodeMetricsSchema = z.object({
  airUtilTx: z.number().optional(),
  airUtilRx: z.number().optional(),
  channelUtilization: z.number().optional(),
  batteryLevel: z.number().optional(),
  voltage: z.number().optional(),
});
export type NodeMetrics = z.infer<typeof NodeMetricsSchema>;

/**
 * A node known to the mesh. Names are neither unique nor stable.
 */
export const NodeEntrySchema = z.object({
  /** Canonical node key */
  key: z.string().regex(NODE_KEY_PATTERN),
  /** Short display name (usually up to 4 characters) */
  shortName: z.string().optional(),
  /** Long display name */
  longName: z.string().optional(),
  /** True for the radio the bot is attached to */
  isLocal: z.boolean().optional(),
  /** Last time the radio heard this node (epoch ms) */
  lastHeard: z.number().optional(),
  metrics: NodeMetricsSchema.optional(),
});
export type NodeEntry = z.infer<typeof NodeEntrySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// MESH PACKET
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Inbound packet as delivered by the transport adapter.
 * `from` is either the node number or its pre-formatted hex id.
 */
export const MeshPacketSchema = z.object({
  /** Channel index the packet was received on */
  channel: z.number().int().nonnegative(),
  /** Sender address */
  from: z.union([z.number().int(), z.string()]),
  /** Decoded text payload, if the packet carried one */
  text: z.string().optional(),
  /** Signal-to-noise ratio (dB) */
  rxSnr: z.number().optional(),
  /** Received signal strength (dBm) */
  rxRssi: z.number().optional(),
  /** Hops travelled so far */
  hopsAway: z.number().int().nonnegative().optional(),
  /** Remaining hop budget */
  hopLimit: z.number().int().nonnegative().optional(),
  /** Receive time (epoch ms) */
  rxTime: z.number().optional(),
});
export type MeshPacket = z.infer<typeof MeshPacketSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// BOT CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const MeshSectionSchema = z.object({
  /** Radio device path, passed through to the transport adapter */
  device: z.string().default('/dev/ttyUSB0'),
  /** The only channel the bot listens and replies on */
  channelIndex: z.number().int().nonnegative().default(1),
});

export const BotSectionSchema = z.object({
  commandPrefix: z.string().min(1).default('!'),
  /** Outbound payload limit, including the truncation marker */
  maxReplyLength: z.number().int().min(1).default(220),
  /** Upper bound on stored mailbox message text */
  messageMaxLength: z.number().int().min(1).default(400),
  /** Per-invocation handler budget */
  handlerTimeoutMs: z.number().int().positive().default(15000),
  /** Bundled plugin sets to load, in registration order */
  plugins: z.array(z.string()).default(['diagnostics', 'fun', 'radio']),
});

export const MailboxSectionSchema = z.object({
  ttlSeconds: z.number().int().positive().default(7 * 24 * 3600),
  maxPerNode: z.number().int().positive().default(20),
  maxTotal: z.number().int().positive().default(500),
});

export const WeatherSectionSchema = z.object({
  units: z.enum(['metric', 'imperial']).default('metric'),
  lang: z.string().default('en'),
  defaultPlace: z.string().min(1).default('Prague'),
  timeoutMs: z.number().int().positive().default(10000),
});

export const BotConfigSchema = z.object({
  mesh: MeshSectionSchema.default({}),
  bot: BotSectionSchema.default({}),
  mailbox: MailboxSectionSchema.default({}),
  weather: WeatherSectionSchema.default({}),
});
export type BotConfig = z.infer<typeof BotConfigSchema>;
export type BotConfigInput = z.input<typeof BotConfigSchema>;
export type WeatherUnits = BotConfig['weather']['units'];

/**
 * Build a full config from partial input, applying defaults.
 */
export function createBotConfig(input: BotConfigInput = {}): BotConfig {
  return BotConfigSchema.parse(input);
}

// ═══════════════════════════════════════════════════════════════════════════
// TEXT UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export const TRUNCATION_MARKER = '…';

/**
 * Truncate text to at most `max` code points. When truncated, the last
 * character is the truncation marker. Surrogate pairs are never split.
 */
export function clamp(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  return chars.slice(0, Math.max(0, max - 1)).join('') + TRUNCATION_MARKER;
}

/**
 * Full duration, e.g. `1d 2h 3m 4s`. Seconds are always present.
 */
export function formatDuration(seconds: number): string {
  let rest = Math.max(0, Math.floor(seconds));
  const days = Math.floor(rest / 86400);
  rest %= 86400;
  const hours = Math.floor(rest / 3600);
  rest %= 3600;
  const minutes = Math.floor(rest / 60);
  rest %= 60;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  parts.push(`${rest}s`);
  return parts.join(' ');
}

/**
 * Compact age with at most two units, e.g. `45s`, `12m`, `3h 5m`, `2d 4h`.
 */
export function formatAge(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) {
    return `${total}s`;
  }
  const minutes = Math.floor(total / 60);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours}h ${minutes % 60}m`;
  }
  return `${Math.floor(hours / 24)}d ${hours % 24}h`;
}

/**
 * Percentage with one decimal, dropping it for whole numbers. `?` when unknown.
 */
export function formatPercent(value: number | undefined | null): string {
  if (value === undefined || value === null || !Number.isFinite(value)) {
    return '?';
  }
  if (Math.abs(value - Math.round(value)) < 1e-9) {
    return `${Math.round(value)}%`;
  }
  return `${value.toFixed(1)}%`;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a prefix tag.
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}
