/**
 * ConsoleSession - Drives a bot from typed lines, standing in for the radio
 *
 * Plain lines are sent on the bot's channel as the current simulated node.
 * Lines starting with `/` control the session.
 */

import { isNodeKeyToken } from '@relaybot/types';
import type { NodeKey } from '@relaybot/types';
import type { MeshBot, MemoryTransport } from '@relaybot/bot';

// ═══════════════════════════════════════════════════════════════════════════
// LINE PARSING
// ═══════════════════════════════════════════════════════════════════════════

export type ConsoleInput =
  | { type: 'say'; text: string }
  | { type: 'as'; token: string }
  | { type: 'node'; key: NodeKey; shortName: string; longName?: string }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

export const CONSOLE_HELP = [
  '/as <node>                     speak as another node',
  '/node <!hexid> <short> [long]  add or rename a node',
  '/help                          this list',
  '/quit                          leave',
];

export function parseConsoleLine(line: string): ConsoleInput {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) {
    return { type: 'say', text: line };
  }

  const [command, ...args] = trimmed.slice(1).split(/\s+/);
  switch (command.toLowerCase()) {
    case 'as':
      if (args.length === 0) {
        return { type: 'invalid', message: 'Usage: /as <node>' };
      }
      return { type: 'as', token: args.join(' ') };

    case 'node': {
      const [key, shortName, ...longName] = args;
      if (!key || !shortName || !isNodeKeyToken(key)) {
        return { type: 'invalid', message: 'Usage: /node <!hexid> <short> [long]' };
      }
      return {
        type: 'node',
        key: key.toLowerCase(),
        shortName,
        longName: longName.length > 0 ? longName.join(' ') : undefined,
      };
    }

    case 'help':
      return { type: 'help' };

    case 'quit':
    case 'exit':
      return { type: 'quit' };

    default:
      return { type: 'invalid', message: `Unknown console command '/${command}'. Try /help` };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════

export interface ConsoleResult {
  /** Lines to show, bot transmissions first */
  output: string[];
  quit: boolean;
}

export interface ConsoleSessionConfig {
  bot: MeshBot;
  transport: MemoryTransport;
  senderKey: NodeKey;
}

export class ConsoleSession {
  private readonly bot: MeshBot;
  private readonly transport: MemoryTransport;
  private sender: NodeKey;

  constructor(config: ConsoleSessionConfig) {
    this.bot = config.bot;
    this.transport = config.transport;
    this.sender = config.senderKey;
  }

  get senderKey(): NodeKey {
    return this.sender;
  }

  /** Label for the prompt: display name, or the key. */
  get senderLabel(): string {
    return this.bot.getContext().resolver.displayLabel(this.sender);
  }

  async handleLine(line: string): Promise<ConsoleResult> {
    const input = parseConsoleLine(line);

    switch (input.type) {
      case 'say':
        return { output: await this.say(input.text), quit: false };

      case 'as': {
        const resolved = this.bot.getContext().resolver.resolve(input.token);
        if (!resolved.key) {
          return { output: [`Unknown node '${input.token}'. Add it with /node first.`], quit: false };
        }
        this.sender = resolved.key;
        return { output: [`Now speaking as ${this.senderLabel}`], quit: false };
      }

      case 'node': {
        this.transport.directory.upsert({
          key: input.key,
          shortName: input.shortName,
          ...(input.longName ? { longName: input.longName } : {}),
        });
        return { output: [`Node ${input.key} is ${input.shortName}`], quit: false };
      }

      case 'help':
        return { output: [...CONSOLE_HELP], quit: false };

      case 'quit':
        return { output: [], quit: true };

      case 'invalid':
        return { output: [input.message], quit: false };
    }
  }

  private async say(text: string): Promise<string[]> {
    const before = this.transport.sent.length;
    await this.bot.handlePacket({
      channel: this.bot.getContext().config.mesh.channelIndex,
      from: this.sender,
      text,
    });
    return this.transport.sent.slice(before).map((s) => s.text);
  }
}
