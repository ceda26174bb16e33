import { defineCommand } from 'citty';
import { consola } from 'consola';
import { CommandRegistry, builtinCommands } from '@relaybot/bot';
import { selectPlugins } from '@relaybot/plugins';
import { createCliLogger } from '../logger.js';
import { resolveConfig } from './shared.js';

export const commandsCommand = defineCommand({
  meta: {
    name: 'commands',
    description: 'List the commands the bot will answer to',
  },
  args: {
    config: {
      type: 'string',
      description: 'Path to the config file',
    },
  },
  async run({ args }) {
    const config = await resolveConfig(args.config);
    const prefix = config.bot.commandPrefix;
    const registry = new CommandRegistry([builtinCommands, ...selectPlugins(config.bot.plugins)], {
      logger: createCliLogger('registry'),
    });

    consola.info(`Commands (${registry.size}):`);
    for (const spec of registry.list()) {
      const aliases = spec.aliases?.length ? ` (${spec.aliases.map((a) => prefix + a).join(', ')})` : '';
      consola.log(`  ${prefix}${spec.usage}${aliases} - ${spec.help}`);
    }
  },
});
