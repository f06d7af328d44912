import { AlarmTimeoutError, KillswitchError, type DeliveryError } from '../errors.js';
import type { AlarmBus } from './alarm-bus.js';
import type { AlarmCallback, AlarmRecord, AlarmSubscription } from './types.js';

export interface CallbackFilter {
  /** Invoke the callback for raised records. @default true */
  callWhenRaised?: boolean;
  /** Invoke the callback for cleared records. @default true */
  callWhenCleared?: boolean;
}

export interface AlarmListenerOptions extends CallbackFilter {
  onError?: (error: DeliveryError) => void;
}

interface FilteredCallback {
  fn: AlarmCallback;
  callWhenRaised: boolean;
  callWhenCleared: boolean;
}

interface Waiter {
  predicate: (record: AlarmRecord) => boolean;
  resolve: (record: AlarmRecord) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Name-bound consumer handle.
 *
 * Receives the current record on construction and every later broadcast in
 * sequence order. Callbacks run one after another for each record; the bus
 * waits for all of them before the broadcast completes.
 */
export class AlarmListener {
  readonly name: string;
  private readonly bus: AlarmBus;
  private readonly callbacks: FilteredCallback[] = [];
  private readonly waiters = new Set<Waiter>();
  private readonly onError?: (error: DeliveryError) => void;
  private subscription: AlarmSubscription | null = null;
  private last: AlarmRecord;
  private _failure: DeliveryError | null = null;

  constructor(bus: AlarmBus, name: string, callback?: AlarmCallback, options: AlarmListenerOptions = {}) {
    this.bus = bus;
    this.name = name;
    this.onError = options.onError;
    if (callback) this.addCallback(callback, options);

    this.last = bus.getOrCreate(name);
    this.subscription = bus.subscribe(name, record => this.handle(record), {
      onError: error => this.fail(error),
    });
  }

  /** The most recent record this listener has been handed. */
  getAlarm(): AlarmRecord {
    return this.last;
  }

  isRaised(): boolean {
    return this.last.raised;
  }

  isCleared(): boolean {
    return !this.last.raised;
  }

  get isActive(): boolean {
    return this.subscription !== null;
  }

  /** Set when the bus dropped this listener after a failed delivery. */
  get failure(): DeliveryError | null {
    return this._failure;
  }

  /** Add a callback; it first runs on the next broadcast, not on the current record. */
  addCallback(fn: AlarmCallback, filter: CallbackFilter = {}): void {
    this.callbacks.push({
      fn,
      callWhenRaised: filter.callWhenRaised ?? true,
      callWhenCleared: filter.callWhenCleared ?? true,
    });
  }

  /** Resolve with the first record, current one included, that satisfies `predicate`. */
  waitUntil(predicate: (record: AlarmRecord) => boolean, timeoutMs: number): Promise<AlarmRecord> {
    if (predicate(this.last)) return Promise.resolve(this.last);
    if (this._failure) return Promise.reject(this._failure);
    if (!this.subscription) return Promise.reject(this.closedError());

    return new Promise<AlarmRecord>((resolve, reject) => {
      const waiter: Waiter = {
        predicate,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          reject(new AlarmTimeoutError(this.name, timeoutMs));
        }, timeoutMs),
      };
      this.waiters.add(waiter);
    });
  }

  /** Resolve with the next record whose sequence is newer than the current one. */
  waitForUpdate(timeoutMs: number): Promise<AlarmRecord> {
    const after = this.last.sequence;
    return this.waitUntil(r => r.sequence > after, timeoutMs);
  }

  waitForState(raised: boolean, timeoutMs: number): Promise<AlarmRecord> {
    return this.waitUntil(r => r.raised === raised, timeoutMs);
  }

  close(): void {
    if (this.subscription) {
      this.bus.unsubscribe(this.subscription);
      this.subscription = null;
    }
    this.rejectWaiters(this.closedError());
  }

  // ── Internals ───────────────────────────────────────────────────

  private async handle(record: AlarmRecord): Promise<void> {
    this.last = record;

    for (const waiter of [...this.waiters]) {
      if (waiter.predicate(record)) {
        clearTimeout(waiter.timer);
        this.waiters.delete(waiter);
        waiter.resolve(record);
      }
    }

    for (const cb of [...this.callbacks]) {
      const due = record.raised ? cb.callWhenRaised : cb.callWhenCleared;
      if (due) await cb.fn(record);
    }
  }

  private fail(error: DeliveryError): void {
    this._failure = error;
    this.subscription = null;
    this.rejectWaiters(error);
    this.onError?.(error);
  }

  private rejectWaiters(error: Error): void {
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
    this.waiters.clear();
  }

  private closedError(): KillswitchError {
    return new KillswitchError(`Listener for "${this.name}" is closed`, 'LISTENER_CLOSED');
  }
}
