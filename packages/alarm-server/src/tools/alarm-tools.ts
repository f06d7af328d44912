/**
 * Alarm MCP tools: snapshots, raise/clear, force clear, history, waits and
 * watchdog liveness.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AlarmBus } from '../alarms/alarm-bus.js';
import type { AlarmHistory } from '../alarms/alarm-history.js';
import { describeAlarm } from '../alarms/alarm-record.js';
import { AlarmListener } from '../alarms/listener.js';
import {
  DEFAULT_WAIT_TIMEOUT_MS,
  FORCE_CLEAR_CONFIRMATION,
  MAX_SEVERITY,
  MIN_SEVERITY,
} from '../constants.js';
import { AlarmTimeoutError, UnknownWatchdogError, ValidationError } from '../errors.js';
import type { WatchdogRegistry } from '../watchdog/registry.js';

export const MCP_RAISED_BY = 'mcp';

export interface AlarmToolContext {
  bus: AlarmBus;
  watchdogs: WatchdogRegistry;
  history: AlarmHistory;
}

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

const alarmName = z.string().min(1).max(128);

const ListArgs = z.object({
  raisedOnly: z.boolean().default(false).describe('Show only raised alarms'),
});

const GetArgs = z.object({
  name: alarmName.describe('Alarm name'),
});

const RaiseArgs = z.object({
  name: alarmName.describe('Alarm name'),
  problemDescription: z.string().max(1024).optional().describe('Human-readable reason'),
  severity: z.number().int().min(MIN_SEVERITY).max(MAX_SEVERITY).optional()
    .describe('0 (informational) to 5 (critical)'),
  parameters: z.record(z.unknown()).optional().describe('Free-form diagnostic key/value data'),
});

const ClearArgs = z.object({
  name: alarmName.describe('Alarm name'),
  parameters: z.record(z.unknown()).optional(),
});

const ForceClearArgs = z.object({
  name: alarmName.describe('Alarm name'),
  confirmation: z.string().describe(`Must be "${FORCE_CLEAR_CONFIRMATION}" to proceed`),
  reason: z.string().max(1024).optional().describe('Why the alarm is being overridden'),
});

const HistoryArgs = z.object({
  limit: z.number().int().positive().default(20).describe('Number of entries to return'),
  name: alarmName.optional().describe('Filter by alarm name'),
  raisedOnly: z.boolean().default(false).describe('Show only raise transitions'),
  raisedBy: z.string().optional().describe('Filter by originator'),
});

const WaitArgs = z.object({
  name: alarmName.describe('Alarm name'),
  raised: z.boolean().describe('State to wait for'),
  timeoutMs: z.number().int().positive().max(300000).default(DEFAULT_WAIT_TIMEOUT_MS)
    .describe('Give up after this many milliseconds'),
});

const WatchdogStatusArgs = z.object({
  alarmName: alarmName.optional().describe('Limit to one watchdog'),
});

const HeartbeatArgs = z.object({
  source: alarmName.describe('Alarm name of the watchdog to signal'),
});

function toInputSchema(schema: z.ZodType): Tool['inputSchema'] {
  return zodToJsonSchema(schema) as unknown as Tool['inputSchema'];
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: Record<string, unknown>): z.output<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid argument${field ? ` "${field}"` : ''}: ${issue.message}`, field || undefined);
  }
  return result.data;
}

function text(value: string, isError?: boolean): ToolResult {
  return isError ? { content: [{ type: 'text', text: value }], isError } : { content: [{ type: 'text', text: value }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

export function getAlarmTools(): Tool[] {
  return [
    {
      name: 'alarm_list',
      description: 'List every known alarm with its current state, sorted by name',
      inputSchema: toInputSchema(ListArgs),
    },
    {
      name: 'alarm_get',
      description: 'Get the current record of one alarm. Unknown names read as cleared.',
      inputSchema: toInputSchema(GetArgs),
    },
    {
      name: 'alarm_raise',
      description: 'Raise an alarm. Every listener sees the record before this returns.',
      inputSchema: toInputSchema(RaiseArgs),
    },
    {
      name: 'alarm_clear',
      description: 'Clear an alarm. A watchdog or meta alarm may raise it again if its condition persists.',
      inputSchema: toInputSchema(ClearArgs),
    },
    {
      name: 'alarm_force_clear',
      description: 'Administrative override: clear an alarm tagged as manual-override. Does not disable watchdogs.',
      inputSchema: toInputSchema(ForceClearArgs),
    },
    {
      name: 'alarm_history',
      description: 'View the alarm transition history, newest first',
      inputSchema: toInputSchema(HistoryArgs),
    },
    {
      name: 'alarm_wait',
      description: 'Wait until an alarm reaches the given state, or the timeout elapses',
      inputSchema: toInputSchema(WaitArgs),
    },
    {
      name: 'watchdog_status',
      description: 'Get the state, deadline and silence of each liveness watchdog',
      inputSchema: toInputSchema(WatchdogStatusArgs),
    },
    {
      name: 'watchdog_heartbeat',
      description: 'Send one liveness signal to the watchdog bound to an alarm name',
      inputSchema: toInputSchema(HeartbeatArgs),
    },
  ];
}

export async function handleAlarmTool(
  name: string,
  args: Record<string, unknown>,
  ctx: AlarmToolContext
): Promise<ToolResult> {
  switch (name) {
    case 'alarm_list': {
      const { raisedOnly } = parseArgs(ListArgs, args);
      const alarms = ctx.bus.list().filter(a => !raisedOnly || a.raised);
      return json(alarms);
    }

    case 'alarm_get': {
      const { name: alarm } = parseArgs(GetArgs, args);
      return json(ctx.bus.getOrCreate(alarm));
    }

    case 'alarm_raise': {
      const a = parseArgs(RaiseArgs, args);
      const record = await ctx.bus.broadcast(a.name, true, {
        problemDescription: a.problemDescription,
        severity: a.severity,
        parameters: a.parameters,
        raisedBy: MCP_RAISED_BY,
      });
      return text(`Alarm raised: ${describeAlarm(record)}`);
    }

    case 'alarm_clear': {
      const a = parseArgs(ClearArgs, args);
      const record = await ctx.bus.broadcast(a.name, false, {
        parameters: a.parameters,
        raisedBy: MCP_RAISED_BY,
      });
      return text(`Alarm cleared: ${describeAlarm(record)}`);
    }

    case 'alarm_force_clear': {
      const a = parseArgs(ForceClearArgs, args);
      if (a.confirmation !== FORCE_CLEAR_CONFIRMATION) {
        return text(`Force clear requires confirmation="${FORCE_CLEAR_CONFIRMATION}"`, true);
      }
      const record = await ctx.bus.forceClear(a.name, {
        problemDescription: a.reason,
        parameters: { via: MCP_RAISED_BY },
      });
      return text(
        `Alarm force-cleared: ${describeAlarm(record)}\n\n` +
        'Watchdogs and meta alarms stay active and will raise it again if the fault persists.'
      );
    }

    case 'alarm_history': {
      const a = parseArgs(HistoryArgs, args);
      const entries = ctx.history.getEntries({
        limit: a.limit,
        name: a.name,
        raisedOnly: a.raisedOnly,
        raisedBy: a.raisedBy,
      });
      const stats = ctx.history.getStats();
      return text(
        `Alarm History (${stats.total} total, ${stats.raises} raises, ${stats.clears} clears, ` +
        `${stats.overrides} overrides)\n\n${JSON.stringify(entries, null, 2)}`
      );
    }

    case 'alarm_wait': {
      const a = parseArgs(WaitArgs, args);
      const listener = new AlarmListener(ctx.bus, a.name);
      try {
        const record = await listener.waitForState(a.raised, a.timeoutMs);
        return text(`Alarm reached state: ${describeAlarm(record)}`);
      } catch (err) {
        if (err instanceof AlarmTimeoutError) {
          return text(`${err.message}; current: ${describeAlarm(listener.getAlarm())}`, true);
        }
        throw err;
      } finally {
        listener.close();
      }
    }

    case 'watchdog_status': {
      const { alarmName: target } = parseArgs(WatchdogStatusArgs, args);
      if (target === undefined) return json(ctx.watchdogs.status());
      const watchdog = ctx.watchdogs.get(target);
      if (!watchdog) throw new UnknownWatchdogError(target);
      return json(watchdog.getStatus());
    }

    case 'watchdog_heartbeat': {
      const { source } = parseArgs(HeartbeatArgs, args);
      const watchdog = ctx.watchdogs.signal(source);
      return text(`Heartbeat accepted for "${source}" (state: ${watchdog.state})`);
    }

    default:
      return text(`Unknown alarm tool: ${name}`, true);
  }
}
