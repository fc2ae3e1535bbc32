// Core
export { Logger } from './core/Logger';
export type { RouterLog, LogLevel, LogSubscriber } from './core/Logger';
export { IPAddress, maskFromPrefix, MAX_PREFIX_LENGTH } from './core/types';
export {
  RouterError, ParseError, InvalidPrefixError, InvalidMetricError,
} from './core/errors';
export type { RouterErrorKind } from './core/errors';

// Routing
export { RoutingTable, createRouteEntry, formatRouteEntry } from './routing/RoutingTable';
export type { RouteEntry } from './routing/RoutingTable';
export { decide, createPacket, formatPacket } from './routing/Forwarding';
export type { Packet, ForwardResult } from './routing/Forwarding';

// Activity log
export { MemoryLogSink, FileLogSink, formatActivity } from './log/ActivityLog';
export type { ActivityLogSink, ActivityEvent, ActivityKind } from './log/ActivityLog';

// Devices
export { Router } from './devices/Router';
export type { RouterResult, ForwardOutcome } from './devices/Router';
export { RouterShell, UNKNOWN_COMMAND } from './devices/shells/RouterShell';
export type { RouterShellOptions } from './devices/shells/RouterShell';
export type { IRouterShell } from './devices/shells/IRouterShell';
export { CommandTrie } from './devices/shells/CommandTrie';
