/**
 * Mailbox - Store-and-forward queue for nodes that are not currently active
 *
 * Messages are held per destination node and handed over the next time the
 * destination is heard from. Expiry is lazy: every operation purges first,
 * there is no background timer.
 */

import { TypedEventEmitter, createLogger } from '@relaybot/types';
import type { Logger, NodeKey } from '@relaybot/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A message waiting for its recipient. Never mutated after creation.
 */
export interface PendingMessage {
  /** Creation time (epoch ms) */
  readonly createdAt: number;
  /** Sender label rendered when the message was stored */
  readonly fromDisplay: string;
  readonly text: string;
}

export type EvictionReason = 'expired' | 'overflow';

export interface MailboxEvents {
  added: (destKey: NodeKey, message: PendingMessage) => void;
  evicted: (destKey: NodeKey, message: PendingMessage, reason: EvictionReason) => void;
}

export interface MailboxConfig {
  ttlSeconds: number;
  /** Oldest message for the same destination is dropped beyond this */
  maxPerNode?: number;
  /** Oldest message overall is dropped beyond this */
  maxTotal?: number;
  /** Clock (epoch ms) */
  now?: () => number;
  logger?: Logger;
}

export function createPendingMessage(
  fromDisplay: string,
  text: string,
  createdAt: number = Date.now(),
): PendingMessage {
  return Object.freeze({ createdAt, fromDisplay, text });
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class Mailbox extends TypedEventEmitter<MailboxEvents> {
  private readonly ttlMs: number;
  private readonly maxPerNode: number;
  private readonly maxTotal: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private store = new Map<NodeKey, PendingMessage[]>();
  private total = 0;

  constructor(config: MailboxConfig) {
    super();
    this.ttlMs = config.ttlSeconds * 1000;
    this.maxPerNode = config.maxPerNode ?? Number.POSITIVE_INFINITY;
    this.maxTotal = config.maxTotal ?? Number.POSITIVE_INFINITY;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createLogger('Mailbox');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────

  add(destKey: NodeKey, message: PendingMessage): void {
    this.purge();

    let queue = this.store.get(destKey);
    if (!queue) {
      queue = [];
      this.store.set(destKey, queue);
    }
    queue.push(message);
    this.total++;
    this.emit('added', destKey, message);

    while (queue.length > this.maxPerNode) {
      this.evictHead(destKey);
    }
    while (this.total > this.maxTotal) {
      const oldestKey = this.findOldestKey();
      if (oldestKey === undefined) break;
      this.evictHead(oldestKey);
    }
  }

  /**
   * Pending messages for a destination, oldest first. Does not remove them.
   */
  getFor(destKey: NodeKey): PendingMessage[] {
    this.purge();
    return [...(this.store.get(destKey) ?? [])];
  }

  /**
   * Remove and return everything pending for a destination, oldest first.
   */
  popFor(destKey: NodeKey): PendingMessage[] {
    this.purge();
    const queue = this.store.get(destKey);
    if (!queue) {
      return [];
    }
    this.store.delete(destKey);
    this.total -= queue.length;
    return queue;
  }

  has(destKey: NodeKey): boolean {
    this.purge();
    return this.store.has(destKey);
  }

  keys(): NodeKey[] {
    this.purge();
    return Array.from(this.store.keys());
  }

  get size(): number {
    this.purge();
    return this.total;
  }

  /**
   * Drop expired messages and empty slots. Returns how many were dropped.
   */
  purge(): number {
    const now = this.now();
    let dropped = 0;

    for (const [key, queue] of this.store) {
      const alive = queue.filter((m) => now - m.createdAt < this.ttlMs);
      if (alive.length === queue.length) continue;

      for (const message of queue) {
        if (!alive.includes(message)) {
          this.emit('evicted', key, message, 'expired');
        }
      }
      dropped += queue.length - alive.length;

      if (alive.length > 0) {
        this.store.set(key, alive);
      } else {
        this.store.delete(key);
      }
    }

    if (dropped > 0) {
      this.total -= dropped;
      this.log.debug(`Expired ${dropped} message(s)`);
    }
    return dropped;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private evictHead(destKey: NodeKey): void {
    const queue = this.store.get(destKey);
    const message = queue?.shift();
    if (!queue || !message) return;

    this.total--;
    if (queue.length === 0) {
      this.store.delete(destKey);
    }
    this.log.warn(`Mailbox full, dropped oldest message for ${destKey}`);
    this.emit('evicted', destKey, message, 'overflow');
  }

  private findOldestKey(): NodeKey | undefined {
    let oldestKey: NodeKey | undefined;
    let oldestAt = Number.POSITIVE_INFINITY;
    for (const [key, queue] of this.store) {
      const head = queue[0];
      if (head && head.createdAt < oldestAt) {
        oldestAt = head.createdAt;
        oldestKey = key;
      }
    }
    return oldestKey;
  }
}
