import type { AlarmBus } from './alarm-bus.js';
import { validateSeverity } from './alarm-record.js';
import type { AlarmRecord } from './types.js';

export interface AlarmBroadcasterOptions {
  /** Identifier stamped on every record this handle produces. @default "unknown" */
  raisedBy?: string;
  /** Severity used by `raiseAlarm` when the call does not give one. @default 0 */
  severity?: number;
}

export interface AlarmUpdateOptions {
  problemDescription?: string;
  parameters?: Record<string, unknown>;
  severity?: number;
}

/**
 * Name-bound producer handle. Repeated raises or clears are not skipped:
 * each call is a broadcast with its own sequence number.
 */
export class AlarmBroadcaster {
  readonly name: string;
  readonly raisedBy: string;
  private readonly bus: AlarmBus;
  private readonly defaultSeverity: number;

  constructor(bus: AlarmBus, name: string, options: AlarmBroadcasterOptions = {}) {
    this.bus = bus;
    this.name = name;
    this.raisedBy = options.raisedBy ?? 'unknown';
    this.defaultSeverity = validateSeverity(options.severity ?? 0);
    bus.getOrCreate(name);
  }

  raiseAlarm(options: AlarmUpdateOptions = {}): Promise<AlarmRecord> {
    return this.bus.broadcast(this.name, true, {
      ...options,
      severity: options.severity ?? this.defaultSeverity,
      raisedBy: this.raisedBy,
    });
  }

  clearAlarm(options: AlarmUpdateOptions = {}): Promise<AlarmRecord> {
    return this.bus.broadcast(this.name, false, { ...options, raisedBy: this.raisedBy });
  }

  /** The bus's current record for this alarm. */
  current(): AlarmRecord {
    return this.bus.getOrCreate(this.name);
  }
}
