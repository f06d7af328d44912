/**
 * Custom error types for the alarm server.
 */

/** Base error for all alarm server errors */
export class KillswitchError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'KillswitchError';
  }
}

/** Invalid watchdog, gateway or config file settings. Always fatal at startup. */
export class ConfigurationError extends KillswitchError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/** Input validation error */
export class ValidationError extends KillswitchError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** A listener callback threw, rejected or exceeded the delivery timeout */
export class DeliveryError extends KillswitchError {
  constructor(
    message: string,
    public readonly alarmName: string,
    public readonly sequence: number,
    public readonly reason?: unknown
  ) {
    super(message, 'DELIVERY_FAILED');
    this.name = 'DeliveryError';
  }
}

/** A wait on an alarm condition did not complete in time */
export class AlarmTimeoutError extends KillswitchError {
  constructor(public readonly alarmName: string, public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting on alarm "${alarmName}"`, 'ALARM_WAIT_TIMEOUT');
    this.name = 'AlarmTimeoutError';
  }
}

/** Privileged operation attempted without valid credentials */
export class UnauthorizedError extends KillswitchError {
  constructor(message = 'Administrative token required for this operation') {
    super(message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/** Liveness signal for a source that has no watchdog */
export class UnknownWatchdogError extends KillswitchError {
  constructor(public readonly source: string) {
    super(`No watchdog is bound to "${source}"`, 'UNKNOWN_WATCHDOG');
    this.name = 'UnknownWatchdogError';
  }
}
