/**
 * Structured logger for the alarm server.
 *
 * Supports both human-readable and JSON output formats.
 * All output goes to stderr (stdout is reserved for the MCP protocol).
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVEL_NAMES[number];
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

// Errors stringify to {} so flatten them before they reach JSON.stringify.
function normalizeData(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value instanceof Error) {
      const code = 'code' in value ? value.code : undefined;
      out[key] = { name: value.name, message: value.message, ...(code !== undefined ? { code } : {}) };
    } else {
      out[key] = value;
    }
  }
  return out;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private component: string;
  private output: (msg: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.component = options.component ?? 'Killswitch';
    this.output = (msg: string) => process.stderr.write(msg + '\n');
  }

  /** Create a child logger with a specific component name */
  child(component: string): Logger {
    const child = new Logger({ level: this.level, format: this.format, component });
    child.output = this.output;
    return child;
  }

  /** Set the output function (useful for testing) */
  setOutput(fn: (msg: string) => void): void {
    this.output = fn;
  }

  getLevelName(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const payload = data && Object.keys(data).length > 0 ? normalizeData(data) : undefined;

    if (this.format === 'json') {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        component: this.component,
        message,
        ...(payload ? { data: payload } : {}),
      };
      this.output(JSON.stringify(entry));
      return;
    }

    const levelTag = level.toUpperCase().padEnd(5);
    const dataStr = payload ? ' ' + JSON.stringify(payload) : '';
    this.output(`[${this.component}] ${levelTag} ${message}${dataStr}`);
  }
}

/** Default global logger instance */
export const logger = new Logger();
