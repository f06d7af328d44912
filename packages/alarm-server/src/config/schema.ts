import { z } from 'zod';
import {
  DEFAULT_DELIVERY_TIMEOUT_MS,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_HISTORY_MAX_ENTRIES,
  MAX_SEVERITY,
  MIN_SEVERITY,
} from '../constants.js';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';

const alarmName = z.string().min(1).max(128);

export const WatchdogConfigSchema = z.object({
  alarmName,
  kind: z.enum(['heartbeat', 'network-loss']).default('heartbeat'),
  deadlineMs: z.number().positive().finite(),
  tickIntervalMs: z.number().positive().finite(),
  bootPolicy: z.enum(['raise', 'wait']).default('raise'),
  severity: z.number().int().min(MIN_SEVERITY).max(MAX_SEVERITY).default(5),
});

export const MetaAlarmConfigSchema = z.object({
  name: alarmName,
  children: z.array(alarmName).min(1),
  latch: z.boolean().default(true),
  severity: z.number().int().min(MIN_SEVERITY).max(MAX_SEVERITY).default(5),
});

export const KillswitchConfigSchema = z.object({
  name: z.string().default('default'),
  logging: z.object({
    level: z.enum(LOG_LEVEL_NAMES).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  }).default({}),
  delivery: z.object({
    timeoutMs: z.number().positive().finite().default(DEFAULT_DELIVERY_TIMEOUT_MS),
  }).default({}),
  history: z.object({
    maxEntries: z.number().int().positive().default(DEFAULT_HISTORY_MAX_ENTRIES),
  }).default({}),
  gateway: z.object({
    enabled: z.boolean().default(true),
    host: z.string().min(1).default(DEFAULT_GATEWAY_HOST),
    port: z.number().int().min(0).max(65535).default(DEFAULT_GATEWAY_PORT),
    adminToken: z.string().min(1).optional(),
    /** Must stay below `delivery.timeoutMs`; defaults to the smaller of 2500 and half of it. */
    sendTimeoutMs: z.number().positive().finite().optional(),
  }).default({}),
  watchdogs: z.array(WatchdogConfigSchema).default([]),
  metaAlarms: z.array(MetaAlarmConfigSchema).default([]),
});

export type WatchdogConfig = z.infer<typeof WatchdogConfigSchema>;
export type MetaAlarmConfig = z.infer<typeof MetaAlarmConfigSchema>;
export type KillswitchConfig = z.infer<typeof KillswitchConfigSchema>;
