/**
 * NodeDirectory - Read-only view over the mesh's known-node table
 *
 * The transport adapter owns the live table; the bot only reads it.
 * InMemoryNodeDirectory is the table used by the console transport and tests.
 */

import { TypedEventEmitter, NodeEntrySchema, createLogger } from '@relaybot/types';
import type { Logger, NodeEntry, NodeKey, NodeMetrics } from '@relaybot/types';

// ═══════════════════════════════════════════════════════════════════════════
// INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

export interface NodeDirectory {
  /** All known nodes in directory iteration order */
  getNodes(): NodeEntry[];
  getNode(key: NodeKey): NodeEntry | undefined;
  /** The radio the bot is attached to, if the directory knows it */
  getLocalNode(): NodeEntry | undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export interface InMemoryNodeDirectoryEvents {
  nodeAdded: (node: NodeEntry) => void;
  nodeUpdated: (node: NodeEntry) => void;
  nodeRemoved: (key: NodeKey) => void;
}

export class InMemoryNodeDirectory
  extends TypedEventEmitter<InMemoryNodeDirectoryEvents>
  implements NodeDirectory
{
  private nodes = new Map<NodeKey, NodeEntry>();
  private localKey: NodeKey | null = null;
  private readonly log: Logger;

  constructor(nodes: NodeEntry[] = [], logger?: Logger) {
    super();
    this.log = logger ?? createLogger('NodeDirectory');
    for (const node of nodes) {
      this.upsert(node);
    }
  }

  getNodes(): NodeEntry[] {
    return Array.from(this.nodes.values());
  }

  getNode(key: NodeKey): NodeEntry | undefined {
    return this.nodes.get(key.toLowerCase());
  }

  getLocalNode(): NodeEntry | undefined {
    if (!this.localKey) return undefined;
    return this.nodes.get(this.localKey);
  }

  /**
   * Insert or merge a node. Existing fields survive unless overwritten.
   */
  upsert(entry: NodeEntry): NodeEntry {
    const parsed = NodeEntrySchema.parse(entry);
    const key = parsed.key.toLowerCase();
    const existing = this.nodes.get(key);

    const merged: NodeEntry = existing
      ? {
          ...existing,
          ...parsed,
          key,
          metrics: parsed.metrics ? { ...existing.metrics, ...parsed.metrics } : existing.metrics,
        }
      : { ...parsed, key };

    this.nodes.set(key, merged);
    if (merged.isLocal) {
      this.localKey = key;
    }

    if (existing) {
      this.emit('nodeUpdated', merged);
    } else {
      this.log.debug(`Node added: ${key}`);
      this.emit('nodeAdded', merged);
    }
    return merged;
  }

  updateMetrics(key: NodeKey, metrics: NodeMetrics): void {
    const existing = this.getNode(key);
    if (!existing) return;
    this.upsert({ key: existing.key, metrics });
  }

  remove(key: NodeKey): void {
    const normalized = key.toLowerCase();
    if (!this.nodes.delete(normalized)) return;
    if (this.localKey === normalized) {
      this.localKey = null;
    }
    this.emit('nodeRemoved', normalized);
  }
}
