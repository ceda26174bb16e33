import { consola } from 'consola';
import { access } from 'node:fs/promises';
import { createBotConfig } from '@relaybot/types';
import type { BotConfig } from '@relaybot/types';
import { CONFIG_FILE, loadConfig } from '../config.js';

/**
 * Load the given config file, or `relaybot.config.json` when present,
 * falling back to defaults.
 */
export async function resolveConfig(path: string | undefined): Promise<BotConfig> {
  if (path) {
    return loadConfig(path);
  }
  try {
    await access(CONFIG_FILE);
  } catch {
    consola.info(`No ${CONFIG_FILE} found, using defaults`);
    return createBotConfig();
  }
  return loadConfig(CONFIG_FILE);
}
