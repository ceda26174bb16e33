/**
 * CommandDispatcher - Turns command text into a reply
 *
 * Parses the command line, looks the command up, runs its handler under a
 * time budget and contains any failure to the single invocation.
 */

import { createLogger } from '@relaybot/types';
import type { Logger, MeshPacket, NodeKey } from '@relaybot/types';
import { HandlerTimeoutError, describeFailure, toError } from './errors.js';
import { COUNTERS } from './session-state.js';
import type { CommandRegistry } from './registry.js';
import type { BotContext, CommandReply, CommandSpec } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

export interface ParsedCommand {
  /** Case-folded command name */
  name: string;
  args: string[];
}

/**
 * Split prefixed text into command and arguments.
 * Returns null if the text is not a command or the command line is empty.
 */
export function parseCommandLine(text: string, prefix: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(prefix)) {
    return null;
  }
  const line = trimmed.slice(prefix.length).trim();
  if (!line) {
    return null;
  }
  const [name, ...args] = line.split(/\s+/);
  return { name: name.toLowerCase(), args };
}

// ═══════════════════════════════════════════════════════════════════════════
// DISPATCHER
// ═══════════════════════════════════════════════════════════════════════════

export type DispatchStatus = 'ok' | 'unknown' | 'failed';

export interface DispatchOutcome {
  command: string;
  status: DispatchStatus;
  /** Text to send, or null for no reply */
  reply: string | null;
  error?: Error;
}

export interface CommandDispatcherConfig {
  registry: CommandRegistry;
  context: BotContext;
  prefix: string;
  timeoutMs: number;
  logger?: Logger;
}

export class CommandDispatcher {
  private readonly registry: CommandRegistry;
  private readonly context: BotContext;
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(config: CommandDispatcherConfig) {
    this.registry = config.registry;
    this.context = config.context;
    this.prefix = config.prefix;
    this.timeoutMs = config.timeoutMs;
    this.log = config.logger ?? createLogger('CommandDispatcher');
  }

  /**
   * Returns null when the text is not a command at all.
   */
  async dispatch(
    text: string,
    packet: MeshPacket,
    senderKey: NodeKey,
  ): Promise<DispatchOutcome | null> {
    const parsed = parseCommandLine(text, this.prefix);
    if (!parsed) {
      return null;
    }

    const spec = this.registry.lookup(parsed.name);
    if (!spec) {
      return {
        command: parsed.name,
        status: 'unknown',
        reply: `❓ Unknown command '${parsed.name}'. Try ${this.prefix}help`,
      };
    }

    this.context.state.increment(COUNTERS.COMMANDS_EXECUTED);

    try {
      const reply = await this.runHandler(spec, packet, senderKey, parsed.args);
      return { command: spec.name, status: 'ok', reply: reply || null };
    } catch (e) {
      const error = toError(e);
      this.log.error(`Command '${spec.name}' from ${senderKey} failed: ${error.message}`);
      return { command: spec.name, status: 'failed', reply: describeFailure(error), error };
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async runHandler(
    spec: CommandSpec,
    packet: MeshPacket,
    senderKey: NodeKey,
    args: string[],
  ): Promise<CommandReply> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new HandlerTimeoutError(spec.name, this.timeoutMs)),
        this.timeoutMs,
      );
    });

    try {
      const invocation = Promise.resolve().then(() =>
        spec.handler(this.context, packet, senderKey, args),
      );
      return await Promise.race([invocation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
