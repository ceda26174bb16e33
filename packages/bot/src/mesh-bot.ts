/**
 * MeshBot - Main entry point for the channel bot
 *
 * Wires transport → serial queue → event router → dispatcher, and owns the
 * in-memory mailbox and session state. All config injected via MeshBotConfig.
 */

import { uptime } from 'node:os';
import { TypedEventEmitter, createLogger } from '@relaybot/types';
import type { BotConfig, Logger, NodeKey } from '@relaybot/types';
import { Mailbox } from '@relaybot/mailbox';
import type { PendingMessage } from '@relaybot/mailbox';
import { NodeResolver } from '@relaybot/directory';
import { builtinCommands } from './commands/builtin.js';
import { CommandDispatcher } from './dispatcher.js';
import { EventRouter, type RouteResult } from './event-router.js';
import { CommandRegistry, type CollisionPolicy } from './registry.js';
import { SerialQueue } from './serial-queue.js';
import { SessionState } from './session-state.js';
import { OpenMeteoWeatherClient, type WeatherService } from './weather.js';
import type { MeshTransport } from './transport.js';
import type { BotContext, CommandSet } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface MeshBotConfig {
  config: BotConfig;
  transport: MeshTransport;
  /** Plugin command sets, merged after the built-in set in this order */
  commandSets?: CommandSet[];
  onCollision?: CollisionPolicy;
  weather?: WeatherService;
  now?: () => number;
  random?: () => number;
  systemUptimeSeconds?: () => number | null;
  logger?: Logger;
}

export interface MeshBotEvents {
  started: () => void;
  stopped: () => void;
  reply: (text: string) => void;
  delivered: (destKey: NodeKey, count: number) => void;
  commandFailed: (command: string, error: Error) => void;
  sendFailed: (error: Error, text: string) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class MeshBot extends TypedEventEmitter<MeshBotEvents> {
  private readonly config: BotConfig;
  private readonly transport: MeshTransport;
  private readonly mailbox: Mailbox;
  private readonly state: SessionState;
  private readonly registry: CommandRegistry;
  private readonly router: EventRouter;
  private readonly queue = new SerialQueue();
  private readonly context: BotContext;
  private readonly log: Logger;

  private running = false;
  private packetHandler: ((packet: unknown) => void) | null = null;

  constructor(config: MeshBotConfig) {
    super();
    this.config = config.config;
    this.transport = config.transport;
    this.log = config.logger ?? createLogger('MeshBot');

    const now = config.now ?? Date.now;

    this.mailbox = new Mailbox({
      ttlSeconds: this.config.mailbox.ttlSeconds,
      maxPerNode: this.config.mailbox.maxPerNode,
      maxTotal: this.config.mailbox.maxTotal,
      now,
      logger: config.logger,
    });
    this.state = new SessionState();
    this.registry = new CommandRegistry([builtinCommands, ...(config.commandSets ?? [])], {
      onCollision: config.onCollision,
      logger: config.logger,
    });

    const resolver = new NodeResolver(this.transport.directory);

    this.context = {
      config: this.config,
      mailbox: this.mailbox,
      state: this.state,
      directory: this.transport.directory,
      resolver,
      registry: this.registry,
      weather:
        config.weather ??
        new OpenMeteoWeatherClient({
          units: this.config.weather.units,
          lang: this.config.weather.lang,
          timeoutMs: this.config.weather.timeoutMs,
          logger: config.logger,
        }),
      logger: this.log,
      startedAt: now(),
      now,
      random: config.random ?? Math.random,
      systemUptimeSeconds: config.systemUptimeSeconds ?? (() => uptime()),
    };

    const dispatcher = new CommandDispatcher({
      registry: this.registry,
      context: this.context,
      prefix: this.config.bot.commandPrefix,
      timeoutMs: this.config.bot.handlerTimeoutMs,
      logger: config.logger,
    });

    this.router = new EventRouter({
      config: this.config,
      transport: this.transport,
      mailbox: this.mailbox,
      state: this.state,
      resolver,
      dispatcher,
      now,
      logger: config.logger,
    });

    this.setupRouterListeners();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.running) {
      throw new Error('MeshBot already running');
    }
    this.running = true;

    this.packetHandler = (packet: unknown) => {
      this.handlePacket(packet).catch((e: unknown) => {
        this.log.error('Packet processing failed:', e);
      });
    };
    this.transport.on('packet', this.packetHandler);

    this.log.info(
      `Listening on channel ${this.config.mesh.channelIndex} with ${this.registry.size} commands`,
    );
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.packetHandler) {
      this.transport.off('packet', this.packetHandler);
      this.packetHandler = null;
    }
    await this.queue.onIdle();

    this.log.info('Stopped');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PACKETS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Queue a packet. Packets are processed one at a time in arrival order.
   */
  handlePacket(packet: unknown): Promise<RouteResult> {
    return this.queue.run(() => this.router.handlePacket(packet));
  }

  /** Resolves once every queued packet has been processed. */
  idle(): Promise<void> {
    return this.queue.onIdle();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ACCESSORS
  // ─────────────────────────────────────────────────────────────────────────

  getRegistry(): CommandRegistry {
    return this.registry;
  }

  getMailbox(): Mailbox {
    return this.mailbox;
  }

  getState(): SessionState {
    return this.state;
  }

  getContext(): BotContext {
    return this.context;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private setupRouterListeners(): void {
    this.router.on('reply', (text: string) => this.emit('reply', text));
    this.router.on('delivered', (destKey: NodeKey, messages: PendingMessage[]) =>
      this.emit('delivered', destKey, messages.length),
    );
    this.router.on('commandFailed', (command: string, error: Error) =>
      this.emit('commandFailed', command, error),
    );
    this.router.on('sendFailed', (error: Error, text: string) =>
      this.emit('sendFailed', error, text),
    );
  }
}

/**
 * Create a new MeshBot.
 */
export function createMeshBot(config: MeshBotConfig): MeshBot {
  return new MeshBot(config);
}
