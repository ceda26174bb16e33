import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createInterface } from 'node:readline/promises';
import { createMeshBot, MemoryTransport } from '@relaybot/bot';
import { selectPlugins } from '@relaybot/plugins';
import { ConsoleSession, CONSOLE_HELP } from '../console-session.js';
import { createCliLogger } from '../logger.js';
import { resolveConfig } from './shared.js';

const LOCAL_KEY = '!00000001';
const OPERATOR_KEY = '!00000002';

export const consoleCommand = defineCommand({
  meta: {
    name: 'console',
    description: 'Chat with the bot from the terminal, as a simulated node',
  },
  args: {
    config: {
      type: 'string',
      description: 'Path to the config file',
    },
    name: {
      type: 'string',
      description: 'Short name of the simulated node',
      default: 'ME',
    },
    verbose: {
      type: 'boolean',
      description: 'Show debug logs',
      default: false,
    },
  },
  async run({ args }) {
    if (args.verbose) {
      consola.level = 4;
    }
    const config = await resolveConfig(args.config);
    const logger = createCliLogger('bot');

    const transport = new MemoryTransport(undefined, logger);
    transport.directory.upsert({ key: LOCAL_KEY, shortName: 'BOT', longName: 'Console Bot', isLocal: true });
    transport.directory.upsert({ key: OPERATOR_KEY, shortName: args.name, longName: 'Console Operator' });

    const bot = createMeshBot({
      config,
      transport,
      commandSets: selectPlugins(config.bot.plugins),
      logger,
    });

    bot.on('commandFailed', (command: string, error: Error) => {
      consola.warn(`Command '${command}' failed: ${error.message}`);
    });

    const session = new ConsoleSession({ bot, transport, senderKey: OPERATOR_KEY });
    bot.start();

    consola.success(`Bot listening on channel ${config.mesh.channelIndex}`);
    consola.info(`Type ${config.bot.commandPrefix}help, or one of:`);
    for (const line of CONSOLE_HELP) {
      consola.log(`  ${line}`);
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      for (;;) {
        const line = await rl.question(`${session.senderLabel}> `);
        const result = await session.handleLine(line);
        for (const text of result.output) {
          consola.log(text);
        }
        if (result.quit) break;
      }
    } finally {
      rl.close();
      await bot.stop();
    }
  },
});
