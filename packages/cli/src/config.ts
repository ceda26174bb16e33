/**
 * Config file loading for the CLI.
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '@relaybot/bot';
import { BotConfigSchema, createBotConfig } from '@relaybot/types';
import type { BotConfig } from '@relaybot/types';

export const CONFIG_FILE = 'relaybot.config.json';

/** Pretty-printed defaults, written by `init`. */
export function configTemplate(): string {
  return `${JSON.stringify(createBotConfig(), null, 2)}\n`;
}

/**
 * Parse and validate config text. Missing sections and fields take their
 * defaults.
 */
export function parseConfig(text: string, source = CONFIG_FILE): BotConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${source}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }

  const result = BotConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${source}: ${issues}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<BotConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    throw e;
  }
  return parseConfig(text, path);
}
