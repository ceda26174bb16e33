/**
 * Radio plugin.
 */

import type { CommandSet, CommandSpec } from '@relaybot/bot';

const noise: CommandSpec = {
  name: 'noise',
  help: 'Estimate the noise floor as RSSI minus SNR of your packet.',
  usage: 'noise',
  handler: (_ctx, packet) => {
    const { rxRssi, rxSnr } = packet;
    if (rxRssi === undefined || rxSnr === undefined) {
      return '📡 Noise floor: unavailable (rxSnr/rxRssi missing in this packet)';
    }
    const floor = rxRssi - rxSnr;
    return `📡 Noise floor (est.): ${floor.toFixed(1)} dBm | RSSI ${rxRssi} dBm | SNR ${rxSnr} dB`;
  },
};

export const radioPlugin: CommandSet = {
  name: 'radio',
  commands: [noise],
};
