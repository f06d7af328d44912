/**
 * Heartbeat-timeout watchdog.
 *
 * Tracks the most recent liveness signal for one source and drives the
 * bound alarm: raised when the source has been silent for longer than the
 * deadline, cleared when signals resume. A periodic tick, started at
 * construction and stopped by `dispose()`, evaluates the silence, so the
 * detection latency is at most one tick interval past the deadline.
 */

import { RECOMMENDED_TICKS_PER_DEADLINE } from '../constants.js';
import type { AlarmBus } from '../alarms/alarm-bus.js';
import { AlarmBroadcaster } from '../alarms/broadcaster.js';
import { ConfigurationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { PendingTasks } from '../utils/pending-tasks.js';
import type { BootPolicy, WatchdogKind, WatchdogState, WatchdogStatus } from './types.js';

export interface HeartbeatWatchdogOptions {
  alarmName: string;
  deadlineMs: number;
  tickIntervalMs: number;
  bus: AlarmBus;
  /** @default "raise" */
  bootPolicy?: BootPolicy;
  /** Severity of the raised alarm. @default 5 */
  severity?: number;
  /** @default "watchdog:<alarmName>" */
  raisedBy?: string;
  now?: () => number;
  logger?: Logger;
}

function requirePositive(value: number, field: string, alarmName: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `Watchdog "${alarmName}": ${field} must be a positive number of milliseconds, got ${value}`,
      field
    );
  }
  return value;
}

export class HeartbeatWatchdog {
  readonly alarmName: string;
  readonly deadlineMs: number;
  readonly tickIntervalMs: number;
  readonly bootPolicy: BootPolicy;
  readonly startedAt: number;
  protected readonly now: () => number;
  protected readonly logger: Logger;
  private readonly broadcaster: AlarmBroadcaster;
  private readonly pending: PendingTasks;
  private readonly timer: ReturnType<typeof setInterval>;

  private _state: WatchdogState = 'AWAITING_FIRST';
  private _lastSeenAt: number | null = null;
  private _disposed = false;
  private signalCount = 0;
  private timeoutCount = 0;
  private raisesInFlight = 0;

  constructor(options: HeartbeatWatchdogOptions) {
    if (!options.alarmName) {
      throw new ConfigurationError('Watchdog alarm name must not be empty', 'alarmName');
    }
    this.alarmName = options.alarmName;
    this.deadlineMs = requirePositive(options.deadlineMs, 'deadlineMs', options.alarmName);
    this.tickIntervalMs = requirePositive(options.tickIntervalMs, 'tickIntervalMs', options.alarmName);
    this.bootPolicy = options.bootPolicy ?? 'raise';
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? rootLogger).child(`Watchdog:${options.alarmName}`);
    this.broadcaster = new AlarmBroadcaster(options.bus, options.alarmName, {
      raisedBy: options.raisedBy ?? `watchdog:${options.alarmName}`,
      severity: options.severity ?? 5,
    });
    this.pending = new PendingTasks(err => {
      this.logger.error('Alarm broadcast failed', { error: err });
    });

    if (this.tickIntervalMs > this.deadlineMs / RECOMMENDED_TICKS_PER_DEADLINE) {
      this.logger.warn('Tick interval exceeds a quarter of the deadline; detection latency grows with it', {
        deadlineMs: this.deadlineMs,
        tickIntervalMs: this.tickIntervalMs,
      });
    }

    this.startedAt = this.now();
    this.timer = setInterval(() => this.onTick(), this.tickIntervalMs);
  }

  get kind(): WatchdogKind {
    return 'heartbeat';
  }

  get state(): WatchdogState {
    return this._state;
  }

  get lastSeenAt(): number | null {
    return this._lastSeenAt;
  }

  get isDisposed(): boolean {
    return this._disposed;
  }

  /**
   * Record a liveness signal. Clears the alarm on the first signal and on
   * recovery from a timeout; further signals while alive are silent.
   * Never waits for bus delivery.
   */
  onSignal(at: number = this.now()): void {
    if (this._disposed) return;
    this.signalCount++;
    this.markSeen(at);
  }

  /** Take `at` as the latest sign of life without counting another signal. */
  protected markSeen(at: number): void {
    if (this._disposed) return;

    const previousSeenAt = this._lastSeenAt;
    this._lastSeenAt = previousSeenAt === null ? at : Math.max(previousSeenAt, at);
    if (this._state === 'ALIVE') return;

    const previous = this._state;
    this._state = 'ALIVE';
    if (previous === 'TIMED_OUT') {
      this.logger.info('Liveness restored', { silenceMs: at - (previousSeenAt ?? this.startedAt) });
    } else {
      this.logger.info('First signal received');
    }
    this.pending.track(this.broadcaster.clearAlarm({
      parameters: { reason: previous === 'TIMED_OUT' ? 'signal resumed' : 'first signal' },
    }));
  }

  /** Evaluate elapsed silence. Runs every tick interval. */
  onTick(): void {
    if (this._disposed) return;
    const now = this.now();

    switch (this._state) {
      case 'ALIVE': {
        const silence = now - (this._lastSeenAt ?? this.startedAt);
        if (silence > this.deadlineMs) {
          this.timeOut(`no signal for > ${this.deadlineMs}ms`, silence);
        }
        break;
      }
      case 'AWAITING_FIRST': {
        const silence = now - this.startedAt;
        if (this.bootPolicy === 'raise' && silence > this.deadlineMs) {
          this.timeOut(`no signal since start for > ${this.deadlineMs}ms`, silence);
        }
        break;
      }
      case 'TIMED_OUT': {
        // Someone cleared the alarm while the source is still silent.
        if (this.raisesInFlight === 0 && !this.broadcaster.current().raised) {
          const silence = now - (this._lastSeenAt ?? this.startedAt);
          this.logger.warn('Alarm cleared while source is still silent; raising again', { silenceMs: silence });
          this.raise(`no signal for > ${this.deadlineMs}ms`, silence);
        }
        break;
      }
    }
  }

  getStatus(): WatchdogStatus {
    return {
      alarmName: this.alarmName,
      kind: this.kind,
      state: this._state,
      deadlineMs: this.deadlineMs,
      tickIntervalMs: this.tickIntervalMs,
      bootPolicy: this.bootPolicy,
      startedAt: this.startedAt,
      lastSeenAt: this._lastSeenAt,
      silenceMs: this.now() - (this._lastSeenAt ?? this.startedAt),
      signalCount: this.signalCount,
      timeoutCount: this.timeoutCount,
      disposed: this._disposed,
    };
  }

  /** Resolves once every broadcast this watchdog has issued is delivered. */
  flush(): Promise<void> {
    return this.pending.flush();
  }

  /** Broadcasts issued by this watchdog that have not been delivered yet. */
  get pendingBroadcasts(): number {
    return this.pending.size;
  }

  /** Stop the tick timer. Safe to call more than once. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    clearInterval(this.timer);
  }

  private timeOut(reason: string, silenceMs: number): void {
    this._state = 'TIMED_OUT';
    this.timeoutCount++;
    this.logger.warn('Liveness timeout', { reason, silenceMs });
    this.raise(reason, silenceMs);
  }

  private raise(reason: string, silenceMs: number): void {
    this.raisesInFlight++;
    const raised = this.broadcaster.raiseAlarm({
      problemDescription: reason,
      parameters: { reason, deadlineMs: this.deadlineMs, silenceMs },
    });
    this.pending.track(raised.finally(() => { this.raisesInFlight--; }));
  }
}
