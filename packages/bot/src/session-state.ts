/**
 * SessionState - Process-lifetime key/value state shared by handlers
 *
 * Nothing here survives a restart.
 */

import type { NodeKey } from '@relaybot/types';

export type StateValue = string | number | boolean;

export const COUNTERS = {
  MESSAGES_SEEN: 'messagesSeen',
  COMMANDS_EXECUTED: 'commandsExecuted',
} as const;

export type CounterName = (typeof COUNTERS)[keyof typeof COUNTERS];

export interface SessionSnapshot {
  values: Record<string, StateValue>;
  seen: Record<NodeKey, number>;
  counters: Record<string, number>;
}

export class SessionState {
  private values = new Map<string, StateValue>();
  private seen = new Map<NodeKey, number>();
  private counters = new Map<string, number>();

  // ─────────────────────────────────────────────────────────────────────────
  // GENERIC VALUES
  // ─────────────────────────────────────────────────────────────────────────

  get(key: string): StateValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: StateValue): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LAST SEEN
  // ─────────────────────────────────────────────────────────────────────────

  markSeen(key: NodeKey, at: number): void {
    this.seen.set(key, at);
  }

  lastSeen(key: NodeKey): number | undefined {
    return this.seen.get(key);
  }

  seenNodes(): NodeKey[] {
    return Array.from(this.seen.keys());
  }

  get seenCount(): number {
    return this.seen.size;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // COUNTERS
  // ─────────────────────────────────────────────────────────────────────────

  increment(name: string, by = 1): number {
    const next = (this.counters.get(name) ?? 0) + by;
    this.counters.set(name, next);
    return next;
  }

  counter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): SessionSnapshot {
    return {
      values: Object.fromEntries(this.values),
      seen: Object.fromEntries(this.seen),
      counters: Object.fromEntries(this.counters),
    };
  }

  clear(): void {
    this.values.clear();
    this.seen.clear();
    this.counters.clear();
  }
}
