/**
 * Wires the alarm bus, watchdogs, meta alarms and gateway from one config.
 */

import { AlarmBus } from './alarms/alarm-bus.js';
import { AlarmHistory } from './alarms/alarm-history.js';
import { MetaAlarm } from './alarms/meta-alarm.js';
import type { KillswitchConfig } from './config/schema.js';
import { DEFAULT_SESSION_SEND_TIMEOUT_MS } from './constants.js';
import { AlarmGateway } from './gateway/alarm-gateway.js';
import type { AlarmToolContext } from './tools/alarm-tools.js';
import { Logger } from './utils/logger.js';
import { WatchdogRegistry } from './watchdog/registry.js';

export interface RuntimeOptions {
  /** Defaults to a stderr logger at the configured level and format. */
  logger?: Logger;
  now?: () => number;
}

export interface RuntimeStartResult {
  /** Bound gateway port, or `null` when the gateway is disabled. */
  gatewayPort: number | null;
}

/**
 * One kill-switch process. Watchdog timers start at construction; the
 * gateway only accepts connections after `start()`.
 */
export class KillswitchRuntime implements AlarmToolContext {
  readonly config: KillswitchConfig;
  readonly logger: Logger;
  readonly history: AlarmHistory;
  readonly bus: AlarmBus;
  readonly watchdogs: WatchdogRegistry;
  readonly metaAlarms: MetaAlarm[];
  readonly gateway: AlarmGateway | null;
  private stopped = false;

  constructor(config: KillswitchConfig, options: RuntimeOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? new Logger({ level: config.logging.level, format: config.logging.format });
    this.history = new AlarmHistory(config.history.maxEntries);
    this.bus = new AlarmBus({
      deliveryTimeoutMs: config.delivery.timeoutMs,
      history: this.history,
      logger: this.logger,
      now: options.now,
    });

    // Meta alarms first so they observe the watchdogs' very first transitions.
    this.metaAlarms = config.metaAlarms.map(m => new MetaAlarm(this.bus, {
      name: m.name,
      children: m.children,
      latch: m.latch,
      severity: m.severity,
      logger: this.logger,
    }));

    this.watchdogs = new WatchdogRegistry(this.bus, { logger: this.logger, now: options.now });
    for (const definition of config.watchdogs) {
      this.watchdogs.create(definition);
    }

    this.gateway = config.gateway.enabled
      ? new AlarmGateway({
        bus: this.bus,
        watchdogs: this.watchdogs,
        adminToken: config.gateway.adminToken,
        sendTimeoutMs: config.gateway.sendTimeoutMs
          ?? Math.min(DEFAULT_SESSION_SEND_TIMEOUT_MS, config.delivery.timeoutMs / 2),
        logger: this.logger,
      })
      : null;
  }

  async start(): Promise<RuntimeStartResult> {
    if (!this.gateway) {
      this.logger.info('Gateway disabled');
      return { gatewayPort: null };
    }
    if (!this.config.gateway.adminToken) {
      this.logger.warn('No admin token configured; force_clear over the gateway is disabled');
    }
    const gatewayPort = await this.gateway.listen({
      host: this.config.gateway.host,
      port: this.config.gateway.port,
    });
    return { gatewayPort };
  }

  /**
   * Resolves once every broadcast issued so far, including the ones it
   * triggers in watchdogs and meta alarms, has been delivered.
   */
  async settle(): Promise<void> {
    do {
      await Promise.all([this.watchdogs.flush(), ...this.metaAlarms.map(m => m.flush())]);
      await this.bus.idle();
    } while (this.pendingBroadcasts() > 0);
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.watchdogs.disposeAll();
    await this.gateway?.close();
    await this.settle();
    for (const meta of this.metaAlarms) meta.close();
    this.logger.info('Stopped', { alarms: this.bus.list().length, historyEntries: this.history.size });
  }

  private pendingBroadcasts(): number {
    return this.metaAlarms.reduce((sum, m) => sum + m.pendingBroadcasts, this.watchdogs.pendingBroadcasts());
  }
}
