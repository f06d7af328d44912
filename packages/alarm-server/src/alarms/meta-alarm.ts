/**
 * Aggregate alarm derived from a set of child alarms.
 *
 * The meta alarm is raised whenever a child goes from cleared to raised.
 * With `latch` (the default) it then stays raised until someone clears it;
 * without, it clears itself once every child reads cleared. Clearing it
 * while any child is still raised raises it again straight away.
 */

import { ConfigurationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { PendingTasks } from '../utils/pending-tasks.js';
import type { AlarmBus } from './alarm-bus.js';
import { AlarmBroadcaster } from './broadcaster.js';
import { AlarmListener } from './listener.js';
import type { AlarmRecord } from './types.js';

export interface MetaAlarmOptions {
  name: string;
  children: string[];
  /** @default true */
  latch?: boolean;
  /** @default "meta:<name>" */
  raisedBy?: string;
  severity?: number;
  logger?: Logger;
}

export class MetaAlarm {
  readonly name: string;
  readonly children: readonly string[];
  readonly latch: boolean;
  private readonly broadcaster: AlarmBroadcaster;
  private readonly listeners: AlarmListener[] = [];
  private readonly childRaised = new Map<string, boolean>();
  private readonly pending: PendingTasks;
  private readonly logger: Logger;
  private raisesInFlight = 0;

  constructor(bus: AlarmBus, options: MetaAlarmOptions) {
    if (options.children.length === 0) {
      throw new ConfigurationError(`Meta alarm "${options.name}" needs at least one child`, 'children');
    }
    if (options.children.includes(options.name)) {
      throw new ConfigurationError(`Meta alarm "${options.name}" cannot list itself as a child`, 'children');
    }

    this.name = options.name;
    this.children = [...new Set(options.children)];
    this.latch = options.latch ?? true;
    this.logger = (options.logger ?? rootLogger).child(`MetaAlarm:${options.name}`);
    // Callbacks run inside a bus delivery, so broadcasts are tracked rather than awaited.
    this.pending = new PendingTasks(err => {
      this.logger.error('Meta alarm broadcast failed', { error: err });
    });
    this.broadcaster = new AlarmBroadcaster(bus, options.name, {
      raisedBy: options.raisedBy ?? `meta:${options.name}`,
      severity: options.severity,
    });

    // Own alarm first so its initial snapshot sees no raised children yet.
    this.listeners.push(new AlarmListener(bus, this.name, record => this.onSelf(record)));
    for (const child of this.children) {
      this.childRaised.set(child, false);
      this.listeners.push(new AlarmListener(bus, child, record => this.onChild(record)));
    }
  }

  raisedChildren(): string[] {
    return this.children.filter(c => this.childRaised.get(c) === true);
  }

  /** Resolves once every broadcast this meta alarm has issued is delivered. */
  flush(): Promise<void> {
    return this.pending.flush();
  }

  get pendingBroadcasts(): number {
    return this.pending.size;
  }

  close(): void {
    for (const listener of this.listeners) listener.close();
  }

  private onChild(record: AlarmRecord): void {
    const wasRaised = this.childRaised.get(record.name) === true;
    this.childRaised.set(record.name, record.raised);

    if (record.raised && !wasRaised) {
      this.raise(`${record.name} raised`, { trigger: record.name });
    } else if (!record.raised && wasRaised && !this.latch && this.raisedChildren().length === 0) {
      this.pending.track(this.broadcaster.clearAlarm({ parameters: { trigger: record.name } }));
    }
  }

  private onSelf(record: AlarmRecord): void {
    if (record.raised || this.raisesInFlight > 0) return;
    if (this.raisedChildren().length === 0) return;
    this.logger.warn('Cleared while children are still raised; raising again', {
      raisedChildren: this.raisedChildren(),
      clearedBy: record.raisedBy,
    });
    this.raise('children still raised', { reason: 'children still raised' });
  }

  private raise(problemDescription: string, parameters: Record<string, unknown>): void {
    this.raisesInFlight++;
    const raised = this.broadcaster.raiseAlarm({
      problemDescription,
      parameters: { ...parameters, raisedChildren: this.raisedChildren() },
    });
    this.pending.track(raised.finally(() => { this.raisesInFlight--; }));
  }
}
