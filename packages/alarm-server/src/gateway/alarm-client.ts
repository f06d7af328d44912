/**
 * WebSocket client for the alarm gateway.
 */

import WebSocket from 'ws';
import { randomUUID } from 'crypto';
import type { AlarmRecord } from '../alarms/types.js';
import { KillswitchError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { ServerMessageSchema, type ClientMessage, type GatewayResponse } from './protocol.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type ClientRequest = DistributiveOmit<ClientMessage, 'id'>;

export interface AlarmClientOptions {
  /** @default 10000 */
  requestTimeoutMs?: number;
  onAlarm?: (record: AlarmRecord) => void;
  logger?: Logger;
}

/**
 * Out-of-process producer/consumer of the alarm gateway.
 *
 * Correlates requests and responses by id; each request returns a promise
 * that resolves with the response data or rejects on an error response,
 * a timeout or a closed connection. Alarm events go to `onAlarm`.
 */
export class AlarmClient {
  private ws: WebSocket | null = null;
  private readonly pendingRequests = new Map<string, {
    resolve: (data: unknown) => void;
    reject: (reason: Error) => void;
    timer: ReturnType<typeof setTimeout>;
  }>();
  private readonly url: string;
  private readonly requestTimeoutMs: number;
  private readonly onAlarm?: (record: AlarmRecord) => void;
  private readonly logger: Logger;

  constructor(url: string, options: AlarmClientOptions = {}) {
    this.url = url;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.onAlarm = options.onAlarm;
    this.logger = (options.logger ?? rootLogger).child('AlarmClient');
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on('open', () => {
        this.logger.info(`Connected to gateway at ${this.url}`);
        resolve();
      });

      ws.on('message', data => {
        this.handleMessage(data.toString());
      });

      ws.on('error', err => {
        this.logger.error('WebSocket error', { error: err });
        reject(err);
      });

      ws.on('close', (code, reason) => {
        this.logger.warn(`Connection closed: ${code} ${reason.toString()}`);
        this.rejectAllPending(new KillswitchError('Connection closed', 'CONNECTION_CLOSED'));
        if (this.ws === ws) this.ws = null;
      });
    });
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  request(message: ClientRequest): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new KillswitchError('Not connected to gateway', 'NOT_CONNECTED'));
    }

    const id = randomUUID();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new KillswitchError(`Request ${id} timed out after ${this.requestTimeoutMs}ms`, 'REQUEST_TIMEOUT'));
      }, this.requestTimeoutMs);

      this.pendingRequests.set(id, { resolve, reject, timer });
      ws.send(JSON.stringify({ ...message, id }));
    });
  }

  heartbeat(source: string): Promise<unknown> {
    return this.request({ type: 'heartbeat', source });
  }

  query(name: string): Promise<unknown> {
    return this.request({ type: 'query', name });
  }

  subscribe(names?: string[], monitor?: string[]): Promise<unknown> {
    return this.request({ type: 'subscribe', names, monitor });
  }

  forceClear(name: string, token: string): Promise<unknown> {
    return this.request({ type: 'force_clear', name, token });
  }

  disconnect(): void {
    const ws = this.ws;
    this.ws = null;
    this.rejectAllPending(new KillswitchError('Disconnecting', 'CONNECTION_CLOSED'));
    ws?.close();
  }

  private handleMessage(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn('Ignoring non-JSON frame');
      return;
    }

    const parsed = ServerMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('Ignoring malformed frame', { issue: parsed.error.issues[0]?.message });
      return;
    }

    const message = parsed.data;
    if (message.type === 'alarm') {
      this.onAlarm?.(message.record);
      return;
    }
    this.settle(message);
  }

  private settle(response: GatewayResponse): void {
    if (response.id === null) return;
    const pending = this.pendingRequests.get(response.id);
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pendingRequests.delete(response.id);

    if (response.status === 'ok') {
      pending.resolve(response.data);
      return;
    }
    const detail = typeof response.data === 'object' && response.data !== null ? response.data : {};
    const code = 'code' in detail && typeof detail.code === 'string' ? detail.code : 'REMOTE_ERROR';
    const message = 'message' in detail && typeof detail.message === 'string' ? detail.message : 'Request failed';
    pending.reject(new KillswitchError(message, code));
  }

  private rejectAllPending(error: Error): void {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }
}
