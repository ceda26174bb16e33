export { MeshBot, createMeshBot } from './mesh-bot.js';
export type { MeshBotConfig, MeshBotEvents } from './mesh-bot.js';

export { EventRouter } from './event-router.js';
export type { EventRouterConfig, EventRouterEvents, RouteResult, RejectReason } from './event-router.js';

export { CommandDispatcher, parseCommandLine } from './dispatcher.js';
export type {
  CommandDispatcherConfig,
  DispatchOutcome,
  DispatchStatus,
  ParsedCommand,
} from './dispatcher.js';

export { CommandRegistry, normalizeCommandName } from './registry.js';
export type { CollisionPolicy, CommandRegistryOptions } from './registry.js';

export { SessionState, COUNTERS } from './session-state.js';
export type { CounterName, SessionSnapshot, StateValue } from './session-state.js';

export { SerialQueue } from './serial-queue.js';

export { MemoryTransport } from './transport.js';
export type { MeshTransport, MeshTransportEvents, SentText } from './transport.js';

export { OpenMeteoWeatherClient, describeWeatherCode } from './weather.js';
export type { WeatherService, OpenMeteoConfig, FetchLike } from './weather.js';

export { builtinCommands } from './commands/builtin.js';

export {
  BotError,
  NetworkError,
  HandlerTimeoutError,
  CommandCollisionError,
  InvalidCommandError,
  ConfigError,
  describeFailure,
  toError,
} from './errors.js';
export type { NetworkErrorKind } from './errors.js';

export type { BotContext, CommandHandler, CommandReply, CommandSet, CommandSpec } from './types.js';
