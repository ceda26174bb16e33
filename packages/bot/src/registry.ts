/**
 * CommandRegistry - Merged, immutable lookup of command names
 *
 * Built once from the built-in set and any plugin sets. Names and aliases
 * share one case-insensitive namespace. On collision the later set wins
 * (`override`), or construction fails (`error`).
 */

import { createLogger } from '@relaybot/types';
import type { Logger } from '@relaybot/types';
import { CommandCollisionError, InvalidCommandError } from './errors.js';
import type { CommandSet, CommandSpec } from './types.js';

export type CollisionPolicy = 'override' | 'error';

export interface CommandRegistryOptions {
  onCollision?: CollisionPolicy;
  logger?: Logger;
}

interface RegisteredCommand {
  spec: CommandSpec;
  source: string;
}

export function normalizeCommandName(name: string): string {
  const normalized = name.trim().toLowerCase();
  if (!normalized || /\s/.test(normalized)) {
    throw new InvalidCommandError(`Invalid command name: '${name}'`);
  }
  return normalized;
}

export class CommandRegistry {
  private readonly entries: ReadonlyMap<string, RegisteredCommand>;
  private readonly primaryNames: readonly string[];

  constructor(sets: CommandSet[], options: CommandRegistryOptions = {}) {
    const policy = options.onCollision ?? 'override';
    const log = options.logger ?? createLogger('CommandRegistry');
    const entries = new Map<string, RegisteredCommand>();
    const primaryNames: string[] = [];

    for (const set of sets) {
      for (const command of set.commands) {
        const spec: CommandSpec = Object.freeze({
          ...command,
          name: normalizeCommandName(command.name),
          aliases: (command.aliases ?? []).map(normalizeCommandName),
        });

        for (const name of [spec.name, ...(spec.aliases ?? [])]) {
          const existing = entries.get(name);
          if (existing) {
            if (policy === 'error') {
              throw new CommandCollisionError(name, existing.source, set.name);
            }
            log.debug(`Command '${name}' from '${set.name}' overrides '${existing.source}'`);
          }
          entries.set(name, { spec, source: set.name });
        }

        if (!primaryNames.includes(spec.name)) {
          primaryNames.push(spec.name);
        }
      }
    }

    this.entries = entries;
    this.primaryNames = Object.freeze(primaryNames);
  }

  /**
   * Case-insensitive exact match on a name or alias.
   */
  lookup(name: string): CommandSpec | undefined {
    return this.entries.get(name.trim().toLowerCase())?.spec;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Name of the command set that currently owns a name. */
  sourceOf(name: string): string | undefined {
    return this.entries.get(name.trim().toLowerCase())?.source;
  }

  /**
   * Reachable commands in first-registration order.
   */
  list(): CommandSpec[] {
    const result: CommandSpec[] = [];
    for (const name of this.primaryNames) {
      const spec = this.entries.get(name)?.spec;
      if (spec && spec.name === name && !result.includes(spec)) {
        result.push(spec);
      }
    }
    return result;
  }

  get size(): number {
    return this.list().length;
  }
}
