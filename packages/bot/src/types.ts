/**
 * Command contract shared by built-in and plugin command sets.
 */

import type { BotConfig, Logger, MeshPacket, NodeKey } from '@relaybot/types';
import type { Mailbox } from '@relaybot/mailbox';
import type { NodeDirectory, NodeResolver } from '@relaybot/directory';
import type { SessionState } from './session-state.js';
import type { CommandRegistry } from './registry.js';
import type { WeatherService } from './weather.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * What a handler can reach. Mailbox and state are the only things a handler
 * may mutate.
 */
export interface BotContext {
  readonly config: BotConfig;
  readonly mailbox: Mailbox;
  readonly state: SessionState;
  readonly directory: NodeDirectory;
  readonly resolver: NodeResolver;
  readonly registry: CommandRegistry;
  readonly weather: WeatherService;
  readonly logger: Logger;
  /** Bot start time (epoch ms) */
  readonly startedAt: number;
  /** Clock (epoch ms) */
  now(): number;
  /** Uniform random number in [0, 1) */
  random(): number;
  /** Host uptime, or null where the platform does not expose it */
  systemUptimeSeconds(): number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A reply string, or nothing to send.
 */
export type CommandReply = string | null | undefined;

export type CommandHandler = (
  ctx: BotContext,
  packet: MeshPacket,
  senderKey: NodeKey,
  args: string[],
) => CommandReply | Promise<CommandReply>;

export interface CommandSpec {
  /** Lower-case command name, unique in the merged registry */
  name: string;
  /** Extra names resolving to the same command */
  aliases?: string[];
  /** One-line description */
  help: string;
  /** Usage without the command prefix, e.g. `roll [sides]` */
  usage: string;
  handler: CommandHandler;
}

/**
 * The unit a plugin contributes to the registry.
 */
export interface CommandSet {
  name: string;
  commands: CommandSpec[];
}
