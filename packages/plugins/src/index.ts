import { ConfigError } from '@relaybot/bot';
import type { CommandSet } from '@relaybot/bot';
import { diagnosticsPlugin } from './diagnostics.js';
import { funPlugin } from './fun.js';
import { radioPlugin } from './radio.js';

export { diagnosticsPlugin, channelLoadLabel } from './diagnostics.js';
export { funPlugin, EIGHT_BALL_ANSWERS } from './fun.js';
export { radioPlugin } from './radio.js';

/** Every bundled plugin, in registration order. */
export const defaultPlugins: readonly CommandSet[] = [diagnosticsPlugin, funPlugin, radioPlugin];

/**
 * Select bundled plugins by name, keeping the requested order.
 * Throws on a name that is not bundled.
 */
export function selectPlugins(names: readonly string[]): CommandSet[] {
  return names.map((name) => {
    const plugin = defaultPlugins.find((p) => p.name === name);
    if (!plugin) {
      throw new ConfigError(
        `Unknown plugin '${name}'. Available: ${defaultPlugins.map((p) => p.name).join(', ')}`,
      );
    }
    return plugin;
  });
}
