/**
 * alarm-server: named alarms with ordered delivery, liveness watchdogs and
 * an aggregate kill alarm, usable in process or through the gateway.
 */

export { AlarmBus } from './alarms/alarm-bus.js';
export type { AlarmBusOptions, ForceClearOptions, SubscribeOptions } from './alarms/alarm-bus.js';
export { AlarmBroadcaster } from './alarms/broadcaster.js';
export type { AlarmBroadcasterOptions } from './alarms/broadcaster.js';
export { AlarmListener } from './alarms/listener.js';
export type { AlarmListenerOptions, CallbackFilter } from './alarms/listener.js';
export { MetaAlarm } from './alarms/meta-alarm.js';
export type { MetaAlarmOptions } from './alarms/meta-alarm.js';
export { AlarmHistory } from './alarms/alarm-history.js';
export type { AlarmHistoryEntry, AlarmHistoryQuery, AlarmHistoryStats } from './alarms/alarm-history.js';
export { createAlarmRecord, defaultAlarmRecord, describeAlarm, validateSeverity } from './alarms/alarm-record.js';
export type { AlarmCallback, AlarmParameters, AlarmRecord, AlarmSubscription, BroadcastOptions } from './alarms/types.js';

export { HeartbeatWatchdog } from './watchdog/heartbeat-watchdog.js';
export type { HeartbeatWatchdogOptions } from './watchdog/heartbeat-watchdog.js';
export { NetworkLossWatchdog } from './watchdog/network-loss.js';
export type { NetworkLossWatchdogOptions } from './watchdog/network-loss.js';
export { WatchdogRegistry } from './watchdog/registry.js';
export type { WatchdogDefinition } from './watchdog/registry.js';
export type { BootPolicy, WatchdogKind, WatchdogState, WatchdogStatus } from './watchdog/types.js';

export { AlarmGateway } from './gateway/alarm-gateway.js';
export type { AlarmGatewayOptions, SessionInfo, SessionTransport } from './gateway/alarm-gateway.js';
export { AlarmClient } from './gateway/alarm-client.js';
export type { AlarmClientOptions } from './gateway/alarm-client.js';
export type { AlarmEvent, ClientMessage, GatewayResponse, ServerMessage } from './gateway/protocol.js';

export { getDefaultConfig, loadConfig } from './config/loader.js';
export type { KillswitchConfig, MetaAlarmConfig, WatchdogConfig } from './config/schema.js';

export { KillswitchRuntime } from './runtime.js';
export type { RuntimeOptions, RuntimeStartResult } from './runtime.js';
export { createMcpServer, callTool } from './server.js';
export { getAlarmTools, handleAlarmTool } from './tools/alarm-tools.js';
export type { AlarmToolContext, ToolResult } from './tools/alarm-tools.js';

export * from './errors.js';
export * from './constants.js';
export { Logger, logger } from './utils/logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './utils/logger.js';
