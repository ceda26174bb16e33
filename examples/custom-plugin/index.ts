/**
 * Custom Plugin Example - Add your own commands
 *
 * Registers an `echo` and a `countdown` command next to the bundled
 * plugins, then replays a short scripted conversation against the
 * in-memory transport.
 *
 * Usage:
 *   npx tsx examples/custom-plugin/index.ts
 */

import { MemoryTransport, createBotConfig, createMeshBot, defaultPlugins } from 'relaybot';
import type { CommandSet } from 'relaybot';

const shouting: CommandSet = {
  name: 'shouting',
  commands: [
    {
      name: 'echo',
      aliases: ['say'],
      help: 'Repeat your words back, loudly.',
      usage: 'echo <text>',
      handler: (_ctx, _packet, _sender, args) => (args.length ? args.join(' ').toUpperCase() : null),
    },
    {
      name: 'countdown',
      help: 'Count down from a number (max 10).',
      usage: 'countdown [n]',
      handler: (_ctx, _packet, _sender, args) => {
        const n = Math.min(10, Math.max(1, Number.parseInt(args[0] ?? '3', 10) || 3));
        return Array.from({ length: n }, (_, i) => String(n - i)).join('… ') + '… 🚀';
      },
    },
  ],
};

const transport = new MemoryTransport();
transport.directory.upsert({ key: '!00000001', shortName: 'BOT', isLocal: true });
transport.directory.upsert({ key: '!0000beef', shortName: 'EVE', longName: 'Eve Portable' });

const bot = createMeshBot({
  config: createBotConfig({ bot: { commandPrefix: '!' } }),
  transport,
  commandSets: [...defaultPlugins, shouting],
});

transport.on('sent', (text: string) => {
  console.log(`BOT  | ${text}`);
});

bot.start();

for (const text of ['!help', '!echo hello mesh', '!say quiet please', '!countdown 5', '!roll 20']) {
  console.log(`EVE  | ${text}`);
  await bot.handlePacket({ channel: 1, from: '!0000beef', text });
}

await bot.stop();
