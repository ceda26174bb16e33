#!/usr/bin/env node
import { defineCommand, runMain } from 'citty';
import { initCommand } from './commands/init.js';
import { consoleCommand } from './commands/console.js';
import { commandsCommand } from './commands/commands.js';

const main = defineCommand({
  meta: {
    name: 'relaybot',
    version: '0.1.0',
    description: 'Command bot for a mesh radio channel',
  },
  subCommands: {
    init: initCommand,
    console: consoleCommand,
    commands: commandsCommand,
  },
});

runMain(main);
