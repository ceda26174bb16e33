// ═══════════════════════════════════════════════════════════════════════════
// relaybot: unified entry point for the mesh channel bot
// ═══════════════════════════════════════════════════════════════════════════

// Bot (primary API)
export { MeshBot, createMeshBot } from '@relaybot/bot';
export type { MeshBotConfig, MeshBotEvents, RouteResult } from '@relaybot/bot';
export { EventRouter, CommandDispatcher, CommandRegistry, parseCommandLine } from '@relaybot/bot';
export type { CollisionPolicy, DispatchOutcome } from '@relaybot/bot';
export { SessionState, COUNTERS } from '@relaybot/bot';
export { MemoryTransport } from '@relaybot/bot';
export type { MeshTransport, MeshTransportEvents } from '@relaybot/bot';
export { OpenMeteoWeatherClient } from '@relaybot/bot';
export type { WeatherService } from '@relaybot/bot';
export { builtinCommands } from '@relaybot/bot';
export type { BotContext, CommandHandler, CommandReply, CommandSet, CommandSpec } from '@relaybot/bot';
export {
  BotError,
  NetworkError,
  HandlerTimeoutError,
  CommandCollisionError,
  InvalidCommandError,
  ConfigError,
} from '@relaybot/bot';

// Plugins
export { defaultPlugins, selectPlugins, diagnosticsPlugin, funPlugin, radioPlugin } from '@relaybot/plugins';

// Mailbox
export { Mailbox, createPendingMessage } from '@relaybot/mailbox';
export type { PendingMessage, MailboxConfig } from '@relaybot/mailbox';

// Nodes
export { InMemoryNodeDirectory, NodeResolver } from '@relaybot/directory';
export type { NodeDirectory, ResolvedNode } from '@relaybot/directory';

// Types & utilities
export {
  createLogger,
  createBotConfig,
  BotConfigSchema,
  MeshPacketSchema,
  toNodeKey,
  clamp,
  formatDuration,
  TypedEventEmitter,
} from '@relaybot/types';
export type { BotConfig, BotConfigInput, Logger, MeshPacket, NodeEntry, NodeKey } from '@relaybot/types';
