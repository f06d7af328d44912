import { DEFAULT_WATCHDOG_DEADLINE_MS, DEFAULT_WATCHDOG_TICK_MS, NETWORK_LOSS_ALARM } from '../constants.js';
import { HeartbeatWatchdog, type HeartbeatWatchdogOptions } from './heartbeat-watchdog.js';
import type { WatchdogKind, WatchdogStatus } from './types.js';

export type NetworkLossWatchdogOptions =
  Partial<Omit<HeartbeatWatchdogOptions, 'bus'>> & Pick<HeartbeatWatchdogOptions, 'bus'>;

/**
 * Watchdog over a message stream: any inbound message, whatever its
 * payload, proves the link is up.
 *
 * While alive, at most one message per tick interval is forwarded as a
 * signal. The newest arrival time is always kept and folded in at the
 * start of each tick, so coalescing never shortens the deadline.
 */
export class NetworkLossWatchdog extends HeartbeatWatchdog {
  private latestMessageAt: number | null = null;
  private lastForwardedAt = Number.NEGATIVE_INFINITY;
  private _messageCount = 0;

  constructor(options: NetworkLossWatchdogOptions) {
    super({
      ...options,
      alarmName: options.alarmName ?? NETWORK_LOSS_ALARM,
      deadlineMs: options.deadlineMs ?? DEFAULT_WATCHDOG_DEADLINE_MS,
      tickIntervalMs: options.tickIntervalMs ?? DEFAULT_WATCHDOG_TICK_MS,
    });
  }

  override get kind(): WatchdogKind {
    return 'network-loss';
  }

  get messageCount(): number {
    return this._messageCount;
  }

  /** Count one inbound message. The payload is not inspected. */
  handleMessage(_payload?: unknown): void {
    if (this.isDisposed) return;

    const at = this.now();
    this._messageCount++;
    this.latestMessageAt = at;

    if (this.state !== 'ALIVE' || at - this.lastForwardedAt >= this.tickIntervalMs) {
      this.lastForwardedAt = at;
      this.onSignal(at);
    }
  }

  override onTick(): void {
    const latest = this.latestMessageAt;
    if (latest !== null && latest > (this.lastSeenAt ?? Number.NEGATIVE_INFINITY)) {
      this.markSeen(latest);
    }
    super.onTick();
  }

  /** `signalCount` counts forwarded signals; `messageCount` every message. */
  override getStatus(): WatchdogStatus {
    return { ...super.getStatus(), messageCount: this._messageCount };
  }
}
