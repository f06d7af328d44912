/**
 * Shared constants for the alarm server.
 *
 * Centralizes defaults and well-known alarm names used across the codebase.
 */

// --- Alarm Bus ---
export const DEFAULT_DELIVERY_TIMEOUT_MS = 5000;
export const DEFAULT_HISTORY_MAX_ENTRIES = 10000;
export const BUS_RAISED_BY = 'alarm-bus';
export const MANUAL_OVERRIDE_RAISED_BY = 'manual-override';
export const MIN_SEVERITY = 0;
export const MAX_SEVERITY = 5;

// --- Well-known alarms ---
export const KILL_ALARM = 'kill';
export const HW_KILL_ALARM = 'hw-kill';
export const NETWORK_LOSS_ALARM = 'network-loss';

// --- Watchdog ---
export const DEFAULT_WATCHDOG_DEADLINE_MS = 8000;
export const DEFAULT_WATCHDOG_TICK_MS = 500;
export const RECOMMENDED_TICKS_PER_DEADLINE = 4;

// --- Gateway ---
export const DEFAULT_GATEWAY_HOST = '127.0.0.1';
export const DEFAULT_GATEWAY_PORT = 9095;
export const MAX_FRAME_SIZE_BYTES = 65_536;
export const DEFAULT_SESSION_SEND_TIMEOUT_MS = 2500;

// --- MCP ---
export const FORCE_CLEAR_CONFIRMATION = 'CONFIRM_CLEAR';
export const DEFAULT_WAIT_TIMEOUT_MS = 10000;

// --- Node ---
export const MIN_NODE_VERSION = 20;

// --- Package ---
export const PACKAGE_NAME = 'alarm-server';
export const VERSION = '0.1.0';
