/**
 * EventRouter - Per-packet pipeline
 *
 *   validate → channel filter → session state → mailbox delivery → dispatch
 *
 * Packets on other channels are dropped before anything else happens.
 * Every outbound text is clamped to the configured reply length.
 */

import {
  MeshPacketSchema,
  TypedEventEmitter,
  clamp,
  createLogger,
  formatDuration,
  toNodeKey,
} from '@relaybot/types';
import type { BotConfig, Logger, MeshPacket, NodeKey } from '@relaybot/types';
import type { Mailbox, PendingMessage } from '@relaybot/mailbox';
import type { NodeResolver } from '@relaybot/directory';
import { toError } from './errors.js';
import { COUNTERS, type SessionState } from './session-state.js';
import type { CommandDispatcher, DispatchOutcome } from './dispatcher.js';
import type { MeshTransport } from './transport.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type RejectReason = 'invalid' | 'channel' | 'sender';

export type RouteResult =
  | { accepted: false; reason: RejectReason }
  | {
      accepted: true;
      senderKey: NodeKey;
      delivered: number;
      command: DispatchOutcome | null;
    };

export interface EventRouterEvents {
  reply: (text: string) => void;
  delivered: (destKey: NodeKey, messages: PendingMessage[]) => void;
  commandFailed: (command: string, error: Error) => void;
  sendFailed: (error: Error, text: string) => void;
}

export interface EventRouterConfig {
  config: BotConfig;
  transport: MeshTransport;
  mailbox: Mailbox;
  state: SessionState;
  resolver: NodeResolver;
  dispatcher: CommandDispatcher;
  now?: () => number;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class EventRouter extends TypedEventEmitter<EventRouterEvents> {
  private readonly channelIndex: number;
  private readonly maxReplyLength: number;
  private readonly transport: MeshTransport;
  private readonly mailbox: Mailbox;
  private readonly state: SessionState;
  private readonly resolver: NodeResolver;
  private readonly dispatcher: CommandDispatcher;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(config: EventRouterConfig) {
    super();
    this.channelIndex = config.config.mesh.channelIndex;
    this.maxReplyLength = config.config.bot.maxReplyLength;
    this.transport = config.transport;
    this.mailbox = config.mailbox;
    this.state = config.state;
    this.resolver = config.resolver;
    this.dispatcher = config.dispatcher;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createLogger('EventRouter');
  }

  async handlePacket(raw: unknown): Promise<RouteResult> {
    const parsed = MeshPacketSchema.safeParse(raw);
    if (!parsed.success) {
      return { accepted: false, reason: 'invalid' };
    }
    const packet = parsed.data;

    if (packet.channel !== this.channelIndex) {
      return { accepted: false, reason: 'channel' };
    }

    const senderKey = toNodeKey(packet.from);
    if (!senderKey) {
      return { accepted: false, reason: 'sender' };
    }

    this.state.markSeen(senderKey, this.now());
    this.state.increment(COUNTERS.MESSAGES_SEEN);

    const delivered = await this.deliverMailbox(senderKey);
    const command = await this.dispatchText(packet, senderKey);

    return { accepted: true, senderKey, delivered, command };
  }

  /**
   * Clamp and send on the monitored channel. Send failures are reported,
   * not thrown.
   */
  async send(text: string): Promise<boolean> {
    const clamped = clamp(text, this.maxReplyLength);
    try {
      await this.transport.sendText(clamped, this.channelIndex);
    } catch (e) {
      const error = toError(e);
      this.log.error(`Send failed: ${error.message}`);
      this.emit('sendFailed', error, clamped);
      return false;
    }
    this.emit('reply', clamped);
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async deliverMailbox(senderKey: NodeKey): Promise<number> {
    const pending = this.mailbox.popFor(senderKey);
    if (pending.length === 0) {
      return 0;
    }

    const destination = this.resolver.displayLabel(senderKey);
    this.log.info(`Delivering ${pending.length} message(s) to ${senderKey}`);
    for (const message of pending) {
      const age = formatDuration((this.now() - message.createdAt) / 1000);
      await this.send(`📮 For ${destination}: from ${message.fromDisplay} (${age}): ${message.text}`);
    }
    this.emit('delivered', senderKey, pending);
    return pending.length;
  }

  private async dispatchText(packet: MeshPacket, senderKey: NodeKey): Promise<DispatchOutcome | null> {
    const text = packet.text?.trim();
    if (!text) {
      return null;
    }

    const outcome = await this.dispatcher.dispatch(text, packet, senderKey);
    if (!outcome) {
      return null;
    }
    if (outcome.error) {
      this.emit('commandFailed', outcome.command, outcome.error);
    }
    if (outcome.reply !== null) {
      await this.send(outcome.reply);
    }
    return outcome;
  }
}
