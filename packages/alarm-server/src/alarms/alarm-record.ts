import { BUS_RAISED_BY, MAX_SEVERITY, MIN_SEVERITY } from '../constants.js';
import { ValidationError } from '../errors.js';
import type { AlarmRecord } from './types.js';

export interface AlarmRecordInit {
  name: string;
  raised: boolean;
  sequence: number;
  raisedBy: string;
  observedAt: number;
  problemDescription?: string;
  parameters?: Record<string, unknown>;
  severity?: number;
}

export function validateSeverity(severity: number): number {
  if (!Number.isInteger(severity) || severity < MIN_SEVERITY || severity > MAX_SEVERITY) {
    throw new ValidationError(
      `Severity must be an integer from ${MIN_SEVERITY} to ${MAX_SEVERITY}, got ${severity}`,
      'severity'
    );
  }
  return severity;
}

/**
 * Build a frozen record. Parameters are copied before freezing so the
 * caller's object can be reused without affecting published snapshots.
 */
export function createAlarmRecord(init: AlarmRecordInit): AlarmRecord {
  const record: AlarmRecord = {
    name: init.name,
    raised: init.raised,
    ...(init.problemDescription !== undefined ? { problemDescription: init.problemDescription } : {}),
    parameters: Object.freeze({ ...(init.parameters ?? {}) }),
    severity: validateSeverity(init.severity ?? 0),
    raisedBy: init.raisedBy,
    sequence: init.sequence,
    observedAt: init.observedAt,
  };
  return Object.freeze(record);
}

/** The cleared, sequence-0 record an alarm has before anyone broadcasts it. */
export function defaultAlarmRecord(name: string, observedAt = Date.now()): AlarmRecord {
  return createAlarmRecord({
    name,
    raised: false,
    sequence: 0,
    raisedBy: BUS_RAISED_BY,
    observedAt,
  });
}

/** One-line description used in logs and tool output. */
export function describeAlarm(record: AlarmRecord): string {
  const state = record.raised ? 'RAISED' : 'cleared';
  const detail = record.problemDescription ? `: ${record.problemDescription}` : '';
  return `${record.name} ${state} (seq ${record.sequence}, by ${record.raisedBy})${detail}`;
}
