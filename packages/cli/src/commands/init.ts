import { defineCommand } from 'citty';
import { consola } from 'consola';
import { writeFile, mkdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { CONFIG_FILE, configTemplate } from '../config.js';

export const initCommand = defineCommand({
  meta: {
    name: 'init',
    description: `Write a ${CONFIG_FILE} with default settings`,
  },
  args: {
    dir: {
      type: 'positional',
      description: 'Project directory',
      default: '.',
    },
    force: {
      type: 'boolean',
      description: 'Overwrite an existing config file',
      default: false,
    },
  },
  async run({ args }) {
    const configPath = join(args.dir, CONFIG_FILE);

    if (!args.force && (await exists(configPath))) {
      consola.warn(`Config file already exists: ${configPath}`);
      return;
    }

    await mkdir(args.dir, { recursive: true });
    await writeFile(configPath, configTemplate(), 'utf-8');
    consola.success(`Created ${configPath}`);

    consola.info('');
    consola.info('Next steps:');
    consola.info(`  1. Edit ${CONFIG_FILE}: channel index, command prefix, weather place`);
    consola.info('  2. Run: relaybot console');
  },
});

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
