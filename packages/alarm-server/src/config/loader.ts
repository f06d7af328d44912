/**
 * Load the server configuration from a YAML file.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import {
  DEFAULT_WATCHDOG_DEADLINE_MS,
  DEFAULT_WATCHDOG_TICK_MS,
  HW_KILL_ALARM,
  KILL_ALARM,
  NETWORK_LOSS_ALARM,
} from '../constants.js';
import { ConfigurationError } from '../errors.js';
import { isLogLevel } from '../utils/logger.js';
import { KillswitchConfigSchema, type KillswitchConfig } from './schema.js';

const DEFAULT_CONFIG = {
  name: 'default',
  watchdogs: [
    {
      alarmName: NETWORK_LOSS_ALARM,
      kind: 'network-loss',
      deadlineMs: DEFAULT_WATCHDOG_DEADLINE_MS,
      tickIntervalMs: DEFAULT_WATCHDOG_TICK_MS,
      bootPolicy: 'raise',
    },
  ],
  metaAlarms: [
    { name: KILL_ALARM, children: [HW_KILL_ALARM, NETWORK_LOSS_ALARM], latch: true },
  ],
};

export type ConfigEnv = Record<string, string | undefined>;

export function getDefaultConfig(): KillswitchConfig {
  return KillswitchConfigSchema.parse(structuredClone(DEFAULT_CONFIG));
}

/**
 * Read, override from the environment and validate. With no path (and no
 * `KILLSWITCH_CONFIG`) the built-in defaults are used. Any problem with a
 * named file is a `ConfigurationError`: a kill switch must not start on a
 * configuration other than the one it was given.
 */
export function loadConfig(filePath?: string, env: ConfigEnv = process.env): KillswitchConfig {
  const path = filePath ?? env.KILLSWITCH_CONFIG;
  const raw = path ? readConfigFile(path) : structuredClone(DEFAULT_CONFIG);
  const data: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};

  applyEnvOverrides(data, env);

  const result = KillswitchConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration${path ? ` in ${path}` : ''}: ${formatIssues(result.error)}`);
  }
  checkConsistency(result.data);
  return result.data;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : err}`);
  }
  try {
    return parseYaml(text) ?? {};
  } catch (err) {
    throw new ConfigurationError(`Cannot parse config file ${path}: ${err instanceof Error ? err.message : err}`);
  }
}

function applyEnvOverrides(data: Record<string, unknown>, env: ConfigEnv): void {
  const gateway: Record<string, unknown> = isRecord(data.gateway) ? { ...data.gateway } : {};
  const logging: Record<string, unknown> = isRecord(data.logging) ? { ...data.logging } : {};

  if (env.KILLSWITCH_GATEWAY_PORT !== undefined) {
    const port = Number(env.KILLSWITCH_GATEWAY_PORT);
    if (!Number.isInteger(port)) {
      throw new ConfigurationError(
        `KILLSWITCH_GATEWAY_PORT must be an integer, got "${env.KILLSWITCH_GATEWAY_PORT}"`,
        'gateway.port'
      );
    }
    gateway.port = port;
  }
  if (env.KILLSWITCH_ADMIN_TOKEN) {
    gateway.adminToken = env.KILLSWITCH_ADMIN_TOKEN;
  }
  if (env.KILLSWITCH_LOG_LEVEL !== undefined) {
    if (!isLogLevel(env.KILLSWITCH_LOG_LEVEL)) {
      throw new ConfigurationError(
        `KILLSWITCH_LOG_LEVEL must be one of debug, info, warn, error; got "${env.KILLSWITCH_LOG_LEVEL}"`,
        'logging.level'
      );
    }
    logging.level = env.KILLSWITCH_LOG_LEVEL;
  }

  if (Object.keys(gateway).length > 0) data.gateway = gateway;
  if (Object.keys(logging).length > 0) data.logging = logging;
}

function checkConsistency(config: KillswitchConfig): void {
  const { sendTimeoutMs } = config.gateway;
  if (sendTimeoutMs !== undefined && sendTimeoutMs >= config.delivery.timeoutMs) {
    throw new ConfigurationError(
      `gateway.sendTimeoutMs (${sendTimeoutMs}) must be below delivery.timeoutMs (${config.delivery.timeoutMs})`,
      'gateway.sendTimeoutMs'
    );
  }

  const watched = new Set<string>();
  for (const w of config.watchdogs) {
    if (watched.has(w.alarmName)) {
      throw new ConfigurationError(`Duplicate watchdog for alarm "${w.alarmName}"`, 'watchdogs');
    }
    watched.add(w.alarmName);
  }

  const metas = new Set<string>();
  for (const m of config.metaAlarms) {
    if (metas.has(m.name)) {
      throw new ConfigurationError(`Duplicate meta alarm "${m.name}"`, 'metaAlarms');
    }
    if (watched.has(m.name)) {
      throw new ConfigurationError(`"${m.name}" is both a watchdog alarm and a meta alarm`, 'metaAlarms');
    }
    if (m.children.includes(m.name)) {
      throw new ConfigurationError(`Meta alarm "${m.name}" lists itself as a child`, 'metaAlarms');
    }
    metas.add(m.name);
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
