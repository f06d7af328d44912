/**
 * Alarm data types shared by the bus, its handles and the transports.
 */

export type AlarmParameters = Readonly<Record<string, unknown>>;

/** Immutable snapshot of one alarm at one sequence number. */
export interface AlarmRecord {
  readonly name: string;
  readonly raised: boolean;
  readonly problemDescription?: string;
  readonly parameters: AlarmParameters;
  /** 0 (informational) through 5 (critical). */
  readonly severity: number;
  readonly raisedBy: string;
  /** Strictly increasing per alarm name; 0 is the implicit default record. */
  readonly sequence: number;
  /** Unix epoch milliseconds at which the bus committed this record. */
  readonly observedAt: number;
}

export interface BroadcastOptions {
  problemDescription?: string;
  parameters?: Record<string, unknown>;
  severity?: number;
  raisedBy?: string;
}

/** Callback invoked with each record. May be async; the bus awaits it. */
export type AlarmCallback = (record: AlarmRecord) => void | Promise<void>;

export interface AlarmSubscription {
  readonly id: number;
  /** Alarm name, or `null` for a subscription to every alarm. */
  readonly name: string | null;
}
