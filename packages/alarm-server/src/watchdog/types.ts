export type WatchdogState = 'AWAITING_FIRST' | 'ALIVE' | 'TIMED_OUT';

/**
 * What a watchdog does when no signal arrives within the deadline of its
 * own start: `raise` treats boot-time silence as a fault, `wait` stays in
 * AWAITING_FIRST until the first signal.
 */
export type BootPolicy = 'raise' | 'wait';

export type WatchdogKind = 'heartbeat' | 'network-loss';

export interface WatchdogStatus {
  alarmName: string;
  kind: WatchdogKind;
  state: WatchdogState;
  deadlineMs: number;
  tickIntervalMs: number;
  bootPolicy: BootPolicy;
  startedAt: number;
  lastSeenAt: number | null;
  /** Milliseconds since the last signal, or since start before the first one. */
  silenceMs: number;
  /** Signals taken, after coalescing for message-stream watchdogs. */
  signalCount: number;
  /** Every inbound message, message-stream watchdogs only. */
  messageCount?: number;
  timeoutCount: number;
  disposed: boolean;
}
