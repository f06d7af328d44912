/**
 * Gateway wire protocol: JSON text frames validated with zod.
 *
 * Responses and alarm events share one connection, so a client may see an
 * alarm event before the response that carried an older snapshot of the
 * same alarm. Compare `sequence` numbers and keep the higher one.
 */

import { z } from 'zod';
import { MAX_SEVERITY, MIN_SEVERITY } from '../constants.js';
import { KillswitchError, ValidationError } from '../errors.js';
import type { AlarmRecord } from '../alarms/types.js';

const alarmName = z.string().min(1).max(128);
const requestId = z.string().max(128).optional();
const parameters = z.record(z.unknown()).optional();

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('heartbeat'), id: requestId, source: alarmName }),
  z.object({ type: z.literal('query'), id: requestId, name: alarmName }),
  z.object({ type: z.literal('list'), id: requestId }),
  z.object({
    type: z.literal('subscribe'),
    id: requestId,
    /** Alarm names to receive; omit for every alarm. */
    names: z.array(alarmName).optional(),
    /** Watchdog sources for which every frame on this session counts as liveness. */
    monitor: z.array(alarmName).optional(),
  }),
  z.object({ type: z.literal('unsubscribe'), id: requestId }),
  z.object({
    type: z.literal('raise'),
    id: requestId,
    name: alarmName,
    problemDescription: z.string().max(1024).optional(),
    parameters,
    severity: z.number().int().min(MIN_SEVERITY).max(MAX_SEVERITY).optional(),
  }),
  z.object({ type: z.literal('clear'), id: requestId, name: alarmName, parameters }),
  z.object({
    type: z.literal('force_clear'),
    id: requestId,
    name: alarmName,
    token: z.string().optional(),
    parameters,
  }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage['type'];

export const AlarmRecordSchema = z.object({
  name: z.string(),
  raised: z.boolean(),
  problemDescription: z.string().optional(),
  parameters: z.record(z.unknown()),
  severity: z.number(),
  raisedBy: z.string(),
  sequence: z.number(),
  observedAt: z.number(),
});

export const GatewayResponseSchema = z.object({
  type: z.literal('response'),
  id: z.string().nullable(),
  status: z.enum(['ok', 'error']),
  data: z.unknown(),
  timestamp: z.number(),
});

export const AlarmEventSchema = z.object({
  type: z.literal('alarm'),
  record: AlarmRecordSchema,
});

export const ServerMessageSchema = z.discriminatedUnion('type', [GatewayResponseSchema, AlarmEventSchema]);

export type GatewayResponse = z.infer<typeof GatewayResponseSchema>;
export type AlarmEvent = z.infer<typeof AlarmEventSchema>;
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

/** Parse one inbound text frame. Throws `ValidationError`. */
export function parseClientMessage(raw: string): ClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError('Frame is not valid JSON');
  }

  const result = ClientMessageSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid message${field ? ` (${field})` : ''}: ${issue.message}`, field || undefined);
  }
  return result.data;
}

export function okResponse(id: string | null, data: unknown, timestamp = Date.now()): GatewayResponse {
  return { type: 'response', id, status: 'ok', data, timestamp };
}

export function errorResponse(id: string | null, error: unknown, timestamp = Date.now()): GatewayResponse {
  const code = error instanceof KillswitchError ? error.code : 'INTERNAL_ERROR';
  const message = error instanceof Error ? error.message : String(error);
  return { type: 'response', id, status: 'error', data: { code, message }, timestamp };
}

export function alarmEvent(record: AlarmRecord): AlarmEvent {
  return { type: 'alarm', record: { ...record, parameters: { ...record.parameters } } };
}
