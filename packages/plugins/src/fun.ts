/**
 * Fun plugin - dice, a magic 8-ball and session stats.
 */

import { COUNTERS } from '@relaybot/bot';
import type { CommandSet, CommandSpec } from '@relaybot/bot';

const MIN_SIDES = 2;
const MAX_SIDES = 1000;
const DEFAULT_SIDES = 6;

export const EIGHT_BALL_ANSWERS: readonly string[] = [
  'It is certain.',
  'Without a doubt.',
  'Yes, definitely.',
  'Most likely.',
  'Ask again later.',
  'Cannot predict now.',
  "Don't count on it.",
  'My reply is no.',
  'Very doubtful.',
];

/** Pick from a list with a [0, 1) random source. */
function pick<T>(items: readonly T[], random: () => number): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

const roll: CommandSpec = {
  name: 'roll',
  help: 'Roll a die (default d6).',
  usage: 'roll [sides]',
  handler: (ctx, _packet, _sender, args) => {
    const prefix = ctx.config.bot.commandPrefix;
    let sides = DEFAULT_SIDES;
    if (args.length > 0) {
      if (!/^[+-]?\d+$/.test(args[0])) {
        return `Usage: ${prefix}roll [sides]`;
      }
      sides = Number(args[0]);
    }
    if (sides < MIN_SIDES || sides > MAX_SIDES) {
      return `Usage: ${prefix}roll [${MIN_SIDES}..${MAX_SIDES}]`;
    }
    const value = 1 + Math.min(sides - 1, Math.floor(ctx.random() * sides));
    return `🎲 d${sides}: ${value}`;
  },
};

const eightBall: CommandSpec = {
  name: '8ball',
  help: 'Ask the magic 8-ball.',
  usage: '8ball',
  handler: (ctx) => `🎱 ${pick(EIGHT_BALL_ANSWERS, () => ctx.random())}`,
};

const stats: CommandSpec = {
  name: 'stats',
  help: 'Usage counters for this session.',
  usage: 'stats',
  handler: (ctx) => {
    const { state } = ctx;
    return (
      `📊 Stats: messages=${state.counter(COUNTERS.MESSAGES_SEEN)}, ` +
      `commands=${state.counter(COUNTERS.COMMANDS_EXECUTED)}, ` +
      `unique_nodes=${state.seenCount}`
    );
  },
};

export const funPlugin: CommandSet = {
  name: 'fun',
  commands: [roll, eightBall, stats],
};
