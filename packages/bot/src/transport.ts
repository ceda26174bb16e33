/**
 * MeshTransport - Narrow contract the bot needs from the radio side
 *
 * The adapter decodes radio packets into `MeshPacket` shape, keeps the node
 * directory current and sends channel text. MemoryTransport implements it
 * in-process for the console and for tests.
 */

import { EventEmitter } from 'events';
import { InMemoryNodeDirectory } from '@relaybot/directory';
import type { NodeDirectory } from '@relaybot/directory';
import type { Logger } from '@relaybot/types';

// ═══════════════════════════════════════════════════════════════════════════
// INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

export interface MeshTransportEvents {
  /** Raw inbound packet; validated by the router */
  packet: (packet: unknown) => void;
}

export interface MeshTransport extends EventEmitter {
  readonly directory: NodeDirectory;

  /** Send text on a channel. The caller has already clamped it. */
  sendText(text: string, channelIndex: number): Promise<void>;

  on<K extends keyof MeshTransportEvents>(event: K, listener: MeshTransportEvents[K]): this;
  off<K extends keyof MeshTransportEvents>(event: K, listener: MeshTransportEvents[K]): this;
  emit<K extends keyof MeshTransportEvents>(
    event: K,
    ...args: Parameters<MeshTransportEvents[K]>
  ): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export interface SentText {
  text: string;
  channelIndex: number;
}

export class MemoryTransport extends EventEmitter implements MeshTransport {
  readonly directory: InMemoryNodeDirectory;
  readonly sent: SentText[] = [];
  private failNextSend: Error | null = null;

  constructor(directory?: InMemoryNodeDirectory, logger?: Logger) {
    super();
    this.directory = directory ?? new InMemoryNodeDirectory([], logger);
  }

  async sendText(text: string, channelIndex: number): Promise<void> {
    if (this.failNextSend) {
      const error = this.failNextSend;
      this.failNextSend = null;
      throw error;
    }
    this.sent.push({ text, channelIndex });
    this.emit('sent', text, channelIndex);
  }

  /** Simulate a packet arriving from the radio. */
  receive(packet: unknown): void {
    this.emit('packet', packet);
  }

  /** Make the next send fail with the given error. */
  failNext(error: Error): void {
    this.failNextSend = error;
  }

  sentTexts(): string[] {
    return this.sent.map((s) => s.text);
  }

  clearSent(): void {
    this.sent.length = 0;
  }
}
