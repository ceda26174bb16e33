import { vi } from 'vitest';
import { InMemoryNodeDirectory } from '@relaybot/directory';
import { createBotConfig } from '@relaybot/types';
import type { BotConfigInput, MeshPacket } from '@relaybot/types';
import { MeshBot, MemoryTransport } from '../index.js';
import type { CommandSet, CommandSpec } from '../index.js';

// Quiet logger for tests
export const quietLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export const LOCAL = '!0000cafe';
export const ALICE = '!a1b2c3d4';
export const BOB = '!11223344';

export const START_TIME = 1_700_000_000_000;

export interface HarnessOptions {
  config?: BotConfigInput;
  commandSets?: CommandSet[];
  weather?: (place: string) => Promise<string>;
  random?: () => number;
}

/**
 * A bot on an in-memory transport with a fixed clock and a small directory:
 * the local radio, Alice and Bob.
 */
export function createHarness(options: HarnessOptions = {}) {
  const clock = { now: START_TIME };

  const directory = new InMemoryNodeDirectory(
    [
      { key: LOCAL, shortName: 'BOT', longName: 'Relay Bot', isLocal: true },
      { key: ALICE, shortName: 'ALC', longName: 'Alice Base' },
      { key: BOB, shortName: 'BOB', longName: 'Bob Mobile' },
    ],
    quietLogger,
  );
  const transport = new MemoryTransport(directory);
  const weather = {
    describe: vi.fn(options.weather ?? (async (place: string) => `sunny in ${place}`)),
  };
  const config = createBotConfig(options.config);

  const bot = new MeshBot({
    config,
    transport,
    commandSets: options.commandSets,
    weather,
    now: () => clock.now,
    random: options.random ?? (() => 0),
    systemUptimeSeconds: () => 3600,
    logger: quietLogger,
  });

  return {
    bot,
    transport,
    directory,
    weather,
    config,
    send(from: number | string, text?: string, extra: Record<string, unknown> = {}) {
      return bot.handlePacket({ channel: config.mesh.channelIndex, from, text, ...extra });
    },
    advance(ms: number) {
      clock.now += ms;
    },
    /** Call a registered handler directly, bypassing the router. */
    invoke(name: string, sender: string, args: string[] = [], packet: Partial<MeshPacket> = {}) {
      const spec = bot.getRegistry().lookup(name);
      if (!spec) {
        throw new Error(`No such command: ${name}`);
      }
      return spec.handler(
        bot.getContext(),
        { channel: config.mesh.channelIndex, from: sender, ...packet },
        sender,
        args,
      );
    },
  };
}

export function commandSet(name: string, commands: Array<Pick<CommandSpec, 'name' | 'handler'>>): CommandSet {
  return {
    name,
    commands: commands.map((c) => ({ ...c, help: `${name} ${c.name}`, usage: c.name })),
  };
}
