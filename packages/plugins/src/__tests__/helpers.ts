import { MeshBot, MemoryTransport } from '@relaybot/bot';
import type { CommandSet } from '@relaybot/bot';
import { createBotConfig } from '@relaybot/types';
import type { BotConfigInput, MeshPacket } from '@relaybot/types';
import { defaultPlugins } from '../index.js';

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

export function createPluginHarness(
  options: { config?: BotConfigInput; random?: () => number; plugins?: readonly CommandSet[] } = {},
) {
  const clock = { now: START_TIME };
  const transport = new MemoryTransport(undefined, quietLogger);
  transport.directory.upsert({ key: LOCAL, shortName: 'BOT', isLocal: true });
  transport.directory.upsert({ key: ALICE, shortName: 'ALC', longName: 'Alice Base' });
  transport.directory.upsert({ key: BOB, shortName: 'BOB', longName: 'Bob Mobile' });

  const config = createBotConfig(options.config);
  const bot = new MeshBot({
    config,
    transport,
    commandSets: [...(options.plugins ?? defaultPlugins)],
    weather: { describe: async (place) => place },
    now: () => clock.now,
    random: options.random ?? (() => 0),
    systemUptimeSeconds: () => null,
    logger: quietLogger,
  });

  return {
    bot,
    transport,
    directory: transport.directory,
    advance(ms: number) {
      clock.now += ms;
    },
    send(from: string, text?: string, extra: Partial<MeshPacket> = {}) {
      return bot.handlePacket({ channel: config.mesh.channelIndex, from, text, ...extra });
    },
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
