/**
 * NodeResolver - Maps user-typed tokens onto canonical node keys
 *
 * Hex ids resolve without consulting the directory. Names are matched
 * case-insensitively in directory order and the first match wins; duplicate
 * names are not disambiguated.
 */

import { isNodeKeyToken } from '@relaybot/types';
import type { NodeEntry, NodeKey } from '@relaybot/types';
import type { NodeDirectory } from './node-directory.js';

export interface ResolvedNode {
  key: NodeKey | null;
  displayName: string | null;
}

const UNRESOLVED: ResolvedNode = { key: null, displayName: null };

export class NodeResolver {
  private readonly directory: NodeDirectory;

  constructor(directory: NodeDirectory) {
    this.directory = directory;
  }

  resolve(token: string): ResolvedNode {
    const trimmed = token.trim();
    if (!trimmed) {
      return { ...UNRESOLVED };
    }

    if (isNodeKeyToken(trimmed)) {
      const key = trimmed.toLowerCase();
      return { key, displayName: this.lookupDisplayName(key) };
    }

    const wanted = trimmed.toLowerCase();
    for (const node of this.directory.getNodes()) {
      const longName = (node.longName ?? '').trim();
      const shortName = (node.shortName ?? '').trim();
      if (longName.toLowerCase() === wanted || shortName.toLowerCase() === wanted) {
        return { key: node.key.toLowerCase(), displayName: shortName || longName || null };
      }
    }

    return { ...UNRESOLVED };
  }

  /**
   * Short name, falling back to long name. Null when the node has neither.
   */
  lookupDisplayName(key: NodeKey): string | null {
    const node = this.directory.getNode(key);
    if (!node) return null;
    return displayNameOf(node);
  }

  /** Display name, or the raw key. */
  displayLabel(key: NodeKey): string {
    return this.lookupDisplayName(key) ?? key;
  }

  /** Sender attribution frozen into stored messages: `name(!key)` or `!key`. */
  attribution(key: NodeKey): string {
    const name = this.lookupDisplayName(key);
    return name ? `${name}(${key})` : key;
  }
}

export function displayNameOf(node: NodeEntry): string | null {
  return node.shortName?.trim() || node.longName?.trim() || null;
}
