/**
 * Named-alarm registry and publish/subscribe hub.
 *
 * Every alarm name owns its current record, its listeners and a promise
 * queue that serialises broadcasts for that name. Broadcasts on different
 * names never wait on each other. A broadcast resolves only after every
 * listener registered at commit time has finished handling the record, so
 * a slow consumer slows the producer (up to `deliveryTimeoutMs`) instead of
 * missing a transition.
 *
 * A listener callback must not await a broadcast on its own alarm name:
 * that broadcast is queued behind the delivery the callback is part of.
 * Fire it and keep the promise instead.
 */

import { DEFAULT_DELIVERY_TIMEOUT_MS, MANUAL_OVERRIDE_RAISED_BY } from '../constants.js';
import { DeliveryError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { createAlarmRecord, defaultAlarmRecord, describeAlarm, validateSeverity } from './alarm-record.js';
import type { AlarmHistory } from './alarm-history.js';
import type { AlarmCallback, AlarmRecord, AlarmSubscription, BroadcastOptions } from './types.js';

export interface AlarmBusOptions {
  /** Upper bound on a single listener delivery. @default 5000 */
  deliveryTimeoutMs?: number;
  history?: AlarmHistory;
  logger?: Logger;
  /** Clock used for `observedAt`. @default Date.now */
  now?: () => number;
}

export interface SubscribeOptions {
  /** Called once if this listener is dropped after a failed delivery. */
  onError?: (error: DeliveryError) => void;
}

export interface ForceClearOptions {
  problemDescription?: string;
  parameters?: Record<string, unknown>;
}

interface Registration {
  readonly id: number;
  readonly name: string | null;
  readonly callback: AlarmCallback;
  readonly onError?: (error: DeliveryError) => void;
  active: boolean;
  /**
   * Per alarm name, settles when this listener's latest delivery of that
   * name has finished. Catch-all listeners keep one chain per name so a
   * slow delivery on one name never holds up another.
   */
  readonly tails: Map<string, Promise<void>>;
}

interface AlarmEntry {
  record: AlarmRecord;
  readonly listeners: Map<number, Registration>;
  /** Settles when the latest broadcast for this name has been delivered. */
  queue: Promise<void>;
}

export class AlarmBus {
  private readonly alarms = new Map<string, AlarmEntry>();
  private readonly globalListeners = new Map<number, Registration>();
  private readonly deliveryTimeoutMs: number;
  private readonly history?: AlarmHistory;
  private readonly logger: Logger;
  private readonly now: () => number;
  private nextId = 1;

  constructor(options: AlarmBusOptions = {}) {
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
    this.history = options.history;
    this.logger = (options.logger ?? rootLogger).child('AlarmBus');
    this.now = options.now ?? Date.now;
  }

  /** Current record for `name`, creating the cleared default on first use. */
  getOrCreate(name: string): AlarmRecord {
    return this.entry(name).record;
  }

  has(name: string): boolean {
    return this.alarms.has(name);
  }

  /** Snapshot of every known alarm, sorted by name. */
  list(): AlarmRecord[] {
    return [...this.alarms.values()]
      .map(e => e.record)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Commit a new record for `name` and deliver it to its listeners.
   * Repeating the current raised state is legal and still advances the
   * sequence number.
   */
  async broadcast(name: string, raised: boolean, options: BroadcastOptions = {}): Promise<AlarmRecord> {
    if (options.severity !== undefined) validateSeverity(options.severity);

    const entry = this.entry(name);
    const committed = entry.queue.then(() => this.commit(entry, name, raised, options));
    // Keep the queue alive whatever happens to this broadcast; the caller
    // still sees the rejection through `committed`.
    entry.queue = committed.then(() => undefined, () => undefined);
    return committed;
  }

  /** Administrative clear, tagged for audit. Watchdogs may raise the alarm again later. */
  async forceClear(name: string, options: ForceClearOptions = {}): Promise<AlarmRecord> {
    this.logger.warn('Force clear requested', { alarm: name });
    return this.broadcast(name, false, { ...options, raisedBy: MANUAL_OVERRIDE_RAISED_BY });
  }

  /**
   * Register `callback` for `name` and hand it the current record before
   * returning. Throws `DeliveryError` if that first synchronous call throws.
   */
  subscribe(name: string, callback: AlarmCallback, options: SubscribeOptions = {}): AlarmSubscription {
    const entry = this.entry(name);
    const reg = this.register(name, callback, options);
    entry.listeners.set(reg.id, reg);

    const snapshot = entry.record;
    let pending: void | Promise<void>;
    try {
      pending = callback(snapshot);
    } catch (err) {
      reg.active = false;
      entry.listeners.delete(reg.id);
      throw new DeliveryError(
        `Listener for "${name}" threw on its initial snapshot: ${errorMessage(err)}`,
        name,
        snapshot.sequence,
        err
      );
    }
    if (pending instanceof Promise) {
      const started = pending;
      reg.tails.set(name, this.guard(reg, snapshot, () => started));
    }
    return { id: reg.id, name };
  }

  /** Receive every broadcast on every alarm name. No initial snapshot is delivered. */
  subscribeAll(callback: AlarmCallback, options: SubscribeOptions = {}): AlarmSubscription {
    const reg = this.register(null, callback, options);
    this.globalListeners.set(reg.id, reg);
    return { id: reg.id, name: null };
  }

  /** Remove a registration. No callback runs for it after this returns. */
  unsubscribe(subscription: AlarmSubscription): void {
    const registry = subscription.name === null
      ? this.globalListeners
      : this.alarms.get(subscription.name)?.listeners;
    const reg = registry?.get(subscription.id);
    if (!reg) return;
    reg.active = false;
    registry?.delete(subscription.id);
  }

  /** Listeners on `name` (excluding catch-all ones), or on the whole bus. */
  listenerCount(name?: string): number {
    if (name !== undefined) {
      return this.alarms.get(name)?.listeners.size ?? 0;
    }
    let total = this.globalListeners.size;
    for (const entry of this.alarms.values()) {
      total += entry.listeners.size;
    }
    return total;
  }

  /** Resolves once every broadcast queued so far has been delivered. */
  async idle(name?: string): Promise<void> {
    if (name !== undefined) {
      await this.alarms.get(name)?.queue;
      return;
    }
    await Promise.all([...this.alarms.values()].map(e => e.queue));
  }

  // ── Internals ───────────────────────────────────────────────────

  private entry(name: string): AlarmEntry {
    let entry = this.alarms.get(name);
    if (!entry) {
      entry = {
        record: defaultAlarmRecord(name, this.now()),
        listeners: new Map(),
        queue: Promise.resolve(),
      };
      this.alarms.set(name, entry);
    }
    return entry;
  }

  private register(name: string | null, callback: AlarmCallback, options: SubscribeOptions): Registration {
    return {
      id: this.nextId++,
      name,
      callback,
      onError: options.onError,
      active: true,
      tails: new Map(),
    };
  }

  private async commit(
    entry: AlarmEntry,
    name: string,
    raised: boolean,
    options: BroadcastOptions
  ): Promise<AlarmRecord> {
    const record = createAlarmRecord({
      name,
      raised,
      sequence: entry.record.sequence + 1,
      raisedBy: options.raisedBy ?? 'unknown',
      observedAt: this.now(),
      problemDescription: options.problemDescription,
      parameters: options.parameters,
      severity: options.severity,
    });
    entry.record = record;
    this.history?.record(record);
    this.logger.debug(`Broadcast ${describeAlarm(record)}`);

    const targets = [...entry.listeners.values(), ...this.globalListeners.values()];
    await Promise.all(targets.map(reg => this.deliver(reg, record)));
    return record;
  }

  private deliver(reg: Registration, record: AlarmRecord): Promise<void> {
    const previous = reg.tails.get(record.name) ?? Promise.resolve();
    const tail = previous.then(() =>
      reg.active ? this.guard(reg, record, () => reg.callback(record)) : undefined
    );
    reg.tails.set(record.name, tail);
    return tail;
  }

  /** Run one delivery under the timeout. Never rejects. */
  private async guard(
    reg: Registration,
    record: AlarmRecord,
    run: () => void | Promise<void>
  ): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`no completion within ${this.deliveryTimeoutMs}ms`)),
        this.deliveryTimeoutMs
      );
    });

    try {
      await Promise.race([Promise.resolve().then(run), deadline]);
    } catch (err) {
      this.drop(reg, record, err);
    } finally {
      clearTimeout(timer);
    }
  }

  private drop(reg: Registration, record: AlarmRecord, cause: unknown): void {
    this.unsubscribe({ id: reg.id, name: reg.name });

    const error = new DeliveryError(
      `Delivery of "${record.name}" seq ${record.sequence} to listener ${reg.id} failed: ${errorMessage(cause)}`,
      record.name,
      record.sequence,
      cause
    );
    this.logger.error('Dropped listener after failed delivery', {
      listener: reg.id,
      alarm: record.name,
      sequence: record.sequence,
      error,
    });

    if (!reg.onError) return;
    try {
      reg.onError(error);
    } catch (hookErr) {
      this.logger.error('Listener error hook threw', { listener: reg.id, error: hookErr });
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
