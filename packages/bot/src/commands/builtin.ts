/**
 * Built-in command set.
 */

import { clamp, formatDuration, formatPercent } from '@relaybot/types';
import { createPendingMessage } from '@relaybot/mailbox';
import { displayNameOf } from '@relaybot/directory';
import type { BotContext, CommandSet, CommandSpec } from '../types.js';

const NODES_LISTED = 8;
const INBOX_LISTED = 3;
const INBOX_PREVIEW_LENGTH = 80;

function prefixOf(ctx: BotContext): string {
  return ctx.config.bot.commandPrefix;
}

function ageSeconds(ctx: BotContext, createdAt: number): number {
  return (ctx.now() - createdAt) / 1000;
}

const help: CommandSpec = {
  name: 'help',
  aliases: ['?'],
  help: 'List commands, or show usage for one.',
  usage: 'help [command]',
  handler: (ctx, _packet, _sender, args) => {
    const prefix = prefixOf(ctx);
    const wanted = args[0];
    if (wanted) {
      const name = wanted.startsWith(prefix) ? wanted.slice(prefix.length) : wanted;
      const spec = ctx.registry.lookup(name);
      if (!spec) {
        return `❓ Unknown command '${name.toLowerCase()}'.`;
      }
      return `${prefix}${spec.usage} - ${spec.help}`;
    }
    const names = ctx.registry.list().map((spec) => `${prefix}${spec.name}`);
    return `🤖 Commands: ${names.join(', ')}`;
  },
};

const ping: CommandSpec = {
  name: 'ping',
  help: 'Reply with pong and the signal quality of your packet.',
  usage: 'ping',
  handler: (_ctx, packet) => {
    const extras: string[] = [];
    if (packet.rxSnr !== undefined) extras.push(`SNR ${packet.rxSnr}`);
    if (packet.rxRssi !== undefined) extras.push(`RSSI ${packet.rxRssi}`);
    return `pong 🏓${extras.length > 0 ? ` (${extras.join(', ')})` : ''}`;
  },
};

const whoami: CommandSpec = {
  name: 'whoami',
  help: 'Show how the bot sees you.',
  usage: 'whoami',
  handler: (ctx, _packet, sender) => {
    const name = ctx.resolver.lookupDisplayName(sender);
    return `You are: ${name ? `${name} (${sender})` : sender}`;
  },
};

const nodes: CommandSpec = {
  name: 'nodes',
  help: 'Count known nodes and name the first few.',
  usage: 'nodes',
  handler: (ctx) => {
    const all = ctx.directory.getNodes();
    const names = all.slice(0, NODES_LISTED).map((node) => displayNameOf(node) ?? node.key);
    return `📡 Nodes: ${all.length}${names.length > 0 ? ` | ${names.join(', ')}` : ''}`;
  },
};

const uptime: CommandSpec = {
  name: 'uptime',
  help: 'Bot and system uptime.',
  usage: 'uptime',
  handler: (ctx) => {
    const bot = formatDuration(ageSeconds(ctx, ctx.startedAt));
    const system = ctx.systemUptimeSeconds();
    if (system === null) {
      return `⏱️ Uptime: bot ${bot}`;
    }
    return `⏱️ Uptime: bot ${bot}, system ${formatDuration(system)}`;
  },
};

const weather: CommandSpec = {
  name: 'weather',
  help: 'Current weather; defaults to the configured place.',
  usage: 'weather [place]',
  handler: async (ctx, _packet, _sender, args) => {
    const place = args.join(' ').trim() || ctx.config.weather.defaultPlace;
    return ctx.weather.describe(place);
  },
};

const air: CommandSpec = {
  name: 'air',
  help: 'Airtime utilization of the local radio.',
  usage: 'air',
  handler: (ctx) => {
    const metrics = ctx.directory.getLocalNode()?.metrics;
    const tx = metrics?.airUtilTx;
    const rx = metrics?.airUtilRx;
    const ch = metrics?.channelUtilization;
    if (tx === undefined && rx === undefined && ch === undefined) {
      return '📡 Airtime: metrics not available (enable telemetry on the node, or wait for an update).';
    }
    return `📡 Airtime: TX ${formatPercent(tx)} | RX ${formatPercent(rx)} | CH ${formatPercent(ch)}`;
  },
};

const msg: CommandSpec = {
  name: 'msg',
  help: 'Leave a message, delivered when the target is next active.',
  usage: 'msg <node|!hexid|shortName|longName> <text>',
  handler: (ctx, _packet, sender, args) => {
    const prefix = prefixOf(ctx);
    if (args.length < 2) {
      return `Usage: ${prefix}msg <node|!hexid|shortName|longName> <text>`;
    }

    const [token, ...words] = args;
    const text = words.join(' ').trim();
    if (!text) {
      return '❌ Missing message text.';
    }

    const target = ctx.resolver.resolve(token);
    if (!target.key) {
      return `❌ Cannot find node '${token}'. Try ${prefix}nodes for a list.`;
    }

    ctx.mailbox.add(
      target.key,
      createPendingMessage(
        ctx.resolver.attribution(sender),
        clamp(text, ctx.config.bot.messageMaxLength),
        ctx.now(),
      ),
    );

    return (
      `✅ Saved to mailbox for ${target.displayName ?? target.key}. ` +
      `Will deliver when active on channel ${ctx.config.mesh.channelIndex}.`
    );
  },
};

const inbox: CommandSpec = {
  name: 'inbox',
  help: 'Peek at messages waiting for you.',
  usage: 'inbox',
  handler: (ctx, _packet, sender) => {
    const pending = ctx.mailbox.getFor(sender);
    if (pending.length === 0) {
      return '📭 Inbox: empty.';
    }
    const lines = pending
      .slice(0, INBOX_LISTED)
      .map(
        (m) =>
          `- from ${m.fromDisplay} (${formatDuration(ageSeconds(ctx, m.createdAt))}): ` +
          clamp(m.text, INBOX_PREVIEW_LENGTH),
      );
    const more = pending.length > INBOX_LISTED ? ` (+${pending.length - INBOX_LISTED} more)` : '';
    return `📬 Inbox:\n${lines.join('\n')}${more}`;
  },
};

export const builtinCommands: CommandSet = {
  name: 'builtin',
  commands: [help, ping, whoami, nodes, uptime, weather, air, msg, inbox],
};
