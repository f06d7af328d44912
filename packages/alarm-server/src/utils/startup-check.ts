/**
 * Startup self-test: validates configuration before the server starts.
 */

import { existsSync } from 'fs';
import { loadConfig, type ConfigEnv } from '../config/loader.js';
import type { KillswitchConfig } from '../config/schema.js';
import { MIN_NODE_VERSION, RECOMMENDED_TICKS_PER_DEADLINE } from '../constants.js';
import { logger as rootLogger, type Logger } from './logger.js';

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '::1', 'localhost']);
const MIN_ADMIN_TOKEN_LENGTH = 16;

export interface StartupCheck {
  name: string;
  status: 'ok' | 'warn' | 'fail';
  message: string;
}

export interface StartupCheckResult {
  passed: boolean;
  checks: StartupCheck[];
  /** The loaded configuration, when it loaded. */
  config?: KillswitchConfig;
}

export function runStartupChecks(options: {
  configPath?: string;
  env?: ConfigEnv;
  nodeVersion?: string;
} = {}): StartupCheckResult {
  const env = options.env ?? process.env;
  const checks: StartupCheck[] = [];

  // 1. Config file exists (if specified)
  const path = options.configPath ?? env.KILLSWITCH_CONFIG;
  if (path !== undefined && !existsSync(path)) {
    checks.push({ name: 'config-file', status: 'fail', message: `Config file not found: ${path}` });
  }

  // 2. Config parses and validates
  let config: KillswitchConfig | undefined;
  if (checks.length === 0) {
    try {
      config = loadConfig(options.configPath, env);
      checks.push({
        name: 'config-file',
        status: 'ok',
        message: path ? `Config loaded: ${config.name} (${path})` : 'Using default config',
      });
    } catch (err) {
      checks.push({
        name: 'config-file',
        status: 'fail',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  if (config) {
    // 3. Watchdog tick intervals
    for (const w of config.watchdogs) {
      if (w.tickIntervalMs > w.deadlineMs / RECOMMENDED_TICKS_PER_DEADLINE) {
        checks.push({
          name: `watchdog:${w.alarmName}`,
          status: 'warn',
          message: `tickIntervalMs ${w.tickIntervalMs} is more than a quarter of deadlineMs ${w.deadlineMs}`,
        });
      } else {
        checks.push({
          name: `watchdog:${w.alarmName}`,
          status: 'ok',
          message: `${w.kind} watchdog, deadline ${w.deadlineMs}ms, tick ${w.tickIntervalMs}ms, boot ${w.bootPolicy}`,
        });
      }
    }

    // 4. Gateway exposure and admin token
    if (config.gateway.enabled) {
      if (LOOPBACK_HOSTS.has(config.gateway.host)) {
        checks.push({ name: 'gateway-host', status: 'ok', message: `Gateway on ${config.gateway.host}:${config.gateway.port}` });
      } else {
        checks.push({
          name: 'gateway-host',
          status: 'warn',
          message: `Gateway listens on non-loopback host ${config.gateway.host}; anyone who can reach it can raise alarms`,
        });
      }

      const token = config.gateway.adminToken;
      if (token === undefined) {
        checks.push({ name: 'admin-token', status: 'warn', message: 'No admin token; gateway force_clear is disabled' });
      } else if (token.length < MIN_ADMIN_TOKEN_LENGTH) {
        checks.push({
          name: 'admin-token',
          status: 'warn',
          message: `Admin token is shorter than ${MIN_ADMIN_TOKEN_LENGTH} characters`,
        });
      } else {
        checks.push({ name: 'admin-token', status: 'ok', message: 'Admin token configured' });
      }
    } else {
      checks.push({ name: 'gateway-host', status: 'ok', message: 'Gateway disabled' });
    }
  }

  // 5. Check Node.js version
  const version = options.nodeVersion ?? process.version;
  const major = parseInt(version.replace(/^v/, ''), 10);
  if (isNaN(major) || major < MIN_NODE_VERSION) {
    checks.push({ name: 'node-version', status: 'fail', message: `Node.js >= ${MIN_NODE_VERSION} required, got: ${version}` });
  } else {
    checks.push({ name: 'node-version', status: 'ok', message: `Node.js ${version}` });
  }

  const passed = checks.every(c => c.status !== 'fail');
  return config ? { passed, checks, config } : { passed, checks };
}

export function printStartupChecks(result: StartupCheckResult, logger: Logger = rootLogger): void {
  const log = logger.child('StartupCheck');
  for (const check of result.checks) {
    const line = `${check.name}: ${check.message}`;
    if (check.status === 'ok') log.info(`[OK] ${line}`);
    else if (check.status === 'warn') log.warn(`[WARN] ${line}`);
    else log.error(`[FAIL] ${line}`);
  }
  if (!result.passed) {
    log.error('Startup checks FAILED. Fix the issues above and try again.');
  }
}
