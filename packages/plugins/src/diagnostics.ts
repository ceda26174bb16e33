/**
 * Diagnostics plugin - link quality, hops, last-seen and channel load.
 */

import { formatAge } from '@relaybot/types';
import type { CommandSet, CommandSpec } from '@relaybot/bot';

// Channel utilization thresholds (percent), checked in order
const LOAD_LEVELS: ReadonlyArray<[limit: number, label: string]> = [
  [1, 'IDLE'],
  [5, 'OK'],
  [15, 'BUSY'],
];

export function channelLoadLabel(utilization: number): string {
  for (const [limit, label] of LOAD_LEVELS) {
    if (utilization < limit) return label;
  }
  return 'CONGESTED';
}

const snr: CommandSpec = {
  name: 'snr',
  help: 'Signal quality of your packet.',
  usage: 'snr',
  handler: (_ctx, packet) => `📶 SNR: ${packet.rxSnr ?? '?'} | RSSI: ${packet.rxRssi ?? '?'}`,
};

const route: CommandSpec = {
  name: 'route',
  help: 'Hop information carried by your packet.',
  usage: 'route',
  handler: (_ctx, packet) => {
    if (packet.hopsAway !== undefined) {
      return `🧭 Route: ${packet.hopsAway} hops`;
    }
    if (packet.hopLimit !== undefined) {
      return `🧭 Hop limit: ${packet.hopLimit}`;
    }
    return '🧭 Route: (no hop info in packet)';
  },
};

const seen: CommandSpec = {
  name: 'seen',
  help: 'When a node was last heard in this session.',
  usage: 'seen [node]',
  handler: (ctx, _packet, sender, args) => {
    let target = sender;
    const token = args.join(' ').trim();
    if (token) {
      target = ctx.resolver.resolve(token).key ?? token;
    }

    const at = ctx.state.lastSeen(target);
    if (at === undefined) {
      return `👀 Seen: ${target} — never (in this bot session)`;
    }
    return `👀 Seen: ${target} — ${formatAge((ctx.now() - at) / 1000)} ago`;
  },
};

const load: CommandSpec = {
  name: 'load',
  help: 'Channel utilization of the local radio, as a label.',
  usage: 'load',
  handler: (ctx) => {
    const utilization = ctx.directory.getLocalNode()?.metrics?.channelUtilization;
    if (utilization === undefined || !Number.isFinite(utilization)) {
      return '📡 Channel load: unknown';
    }
    return `📡 Channel load: ${channelLoadLabel(utilization)} (CH ${utilization.toFixed(1)}%)`;
  },
};

export const diagnosticsPlugin: CommandSet = {
  name: 'diagnostics',
  commands: [snr, route, seen, load],
};
