import type { AlarmBus } from '../alarms/alarm-bus.js';
import { ConfigurationError, UnknownWatchdogError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { HeartbeatWatchdog } from './heartbeat-watchdog.js';
import { NetworkLossWatchdog } from './network-loss.js';
import type { BootPolicy, WatchdogKind, WatchdogStatus } from './types.js';

export interface WatchdogDefinition {
  alarmName: string;
  kind: WatchdogKind;
  deadlineMs: number;
  tickIntervalMs: number;
  bootPolicy?: BootPolicy;
  severity?: number;
}

/**
 * Owns every watchdog of a process, keyed by alarm name, and routes
 * liveness signals to them by source name.
 */
export class WatchdogRegistry {
  private readonly watchdogs = new Map<string, HeartbeatWatchdog>();
  private readonly bus: AlarmBus;
  private readonly logger: Logger;
  private readonly now?: () => number;

  constructor(bus: AlarmBus, options: { logger?: Logger; now?: () => number } = {}) {
    this.bus = bus;
    this.logger = options.logger ?? rootLogger;
    this.now = options.now;
  }

  create(definition: WatchdogDefinition): HeartbeatWatchdog {
    if (this.watchdogs.has(definition.alarmName)) {
      throw new ConfigurationError(`Duplicate watchdog for alarm "${definition.alarmName}"`, 'alarmName');
    }

    const options = {
      bus: this.bus,
      alarmName: definition.alarmName,
      deadlineMs: definition.deadlineMs,
      tickIntervalMs: definition.tickIntervalMs,
      bootPolicy: definition.bootPolicy,
      severity: definition.severity,
      logger: this.logger,
      now: this.now,
    };
    const watchdog = definition.kind === 'network-loss'
      ? new NetworkLossWatchdog(options)
      : new HeartbeatWatchdog(options);

    this.watchdogs.set(watchdog.alarmName, watchdog);
    this.logger.info(`Watchdog started for "${watchdog.alarmName}"`, {
      kind: watchdog.kind,
      deadlineMs: watchdog.deadlineMs,
      tickIntervalMs: watchdog.tickIntervalMs,
      bootPolicy: watchdog.bootPolicy,
    });
    return watchdog;
  }

  get(alarmName: string): HeartbeatWatchdog | undefined {
    return this.watchdogs.get(alarmName);
  }

  has(alarmName: string): boolean {
    return this.watchdogs.has(alarmName);
  }

  list(): HeartbeatWatchdog[] {
    return [...this.watchdogs.values()];
  }

  /**
   * Deliver one liveness event from `source`. Message-stream watchdogs see
   * it as a message; plain heartbeat watchdogs as a signal.
   */
  signal(source: string, payload?: unknown): HeartbeatWatchdog {
    const watchdog = this.watchdogs.get(source);
    if (!watchdog) throw new UnknownWatchdogError(source);

    if (watchdog instanceof NetworkLossWatchdog) {
      watchdog.handleMessage(payload);
    } else {
      watchdog.onSignal();
    }
    return watchdog;
  }

  status(): WatchdogStatus[] {
    return this.list().map(w => w.getStatus());
  }

  async flush(): Promise<void> {
    await Promise.all(this.list().map(w => w.flush()));
  }

  pendingBroadcasts(): number {
    return this.list().reduce((sum, w) => sum + w.pendingBroadcasts, 0);
  }

  disposeAll(): void {
    for (const watchdog of this.watchdogs.values()) {
      watchdog.dispose();
    }
  }

  get size(): number {
    return this.watchdogs.size;
  }
}
