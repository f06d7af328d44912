/**
 * WebSocket gateway for out-of-process producers and consumers.
 *
 * Inbound: liveness signals, snapshot queries, raise/clear and the
 * administrative force clear. Outbound: every committed alarm record is
 * pushed to the sessions subscribed to it. Egress waits for each socket
 * write, so a slow remote consumer slows the broadcaster the same way an
 * in-process listener does. A write that fails or outlasts `sendTimeoutMs`
 * closes only that session. If the bus still drops the egress listener,
 * every session is closed so clients reconnect and resubscribe.
 */

import { randomUUID, timingSafeEqual } from 'crypto';
import { WebSocketServer, type WebSocket } from 'ws';
import type { AlarmBus } from '../alarms/alarm-bus.js';
import type { AlarmRecord, AlarmSubscription } from '../alarms/types.js';
import { DEFAULT_SESSION_SEND_TIMEOUT_MS, MAX_FRAME_SIZE_BYTES } from '../constants.js';
import { type DeliveryError, UnauthorizedError, UnknownWatchdogError, ValidationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { WatchdogRegistry } from '../watchdog/registry.js';
import {
  alarmEvent,
  errorResponse,
  okResponse,
  parseClientMessage,
  type ClientMessage,
  type GatewayResponse,
} from './protocol.js';

/** The socket-facing half of a session. */
export interface SessionTransport {
  send(frame: string): Promise<void>;
  close(code: number, reason: string): void;
}

interface Session {
  readonly id: string;
  readonly transport: SessionTransport;
  /** `null` until the client subscribes; `'all'` for every alarm. */
  subscriptions: Set<string> | 'all' | null;
  monitor: Set<string>;
  openedAt: number;
}

export interface AlarmGatewayOptions {
  bus: AlarmBus;
  watchdogs: WatchdogRegistry;
  /** Required for `force_clear`; without it the operation is refused. */
  adminToken?: string;
  /** Upper bound on one socket write; keep it below the bus delivery timeout. @default 2500 */
  sendTimeoutMs?: number;
  logger?: Logger;
}

export interface SessionInfo {
  id: string;
  subscriptions: string[] | 'all' | null;
  monitor: string[];
  openedAt: number;
}

export class AlarmGateway {
  private readonly bus: AlarmBus;
  private readonly watchdogs: WatchdogRegistry;
  private readonly adminToken?: string;
  private readonly sendTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, Session>();
  private busSubscription: AlarmSubscription | null = null;
  private server: WebSocketServer | null = null;
  private closing = false;

  constructor(options: AlarmGatewayOptions) {
    this.bus = options.bus;
    this.watchdogs = options.watchdogs;
    this.adminToken = options.adminToken;
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SESSION_SEND_TIMEOUT_MS;
    this.logger = (options.logger ?? rootLogger).child('Gateway');
    this.attachEgress();
  }

  // ── Sessions ────────────────────────────────────────────────────

  openSession(transport: SessionTransport): string {
    const id = randomUUID();
    this.sessions.set(id, {
      id,
      transport,
      subscriptions: null,
      monitor: new Set(),
      openedAt: Date.now(),
    });
    this.logger.debug('Session opened', { session: id });
    return id;
  }

  closeSession(id: string, code = 1000, reason = 'closing'): void {
    const session = this.sessions.get(id);
    if (!session) return;
    this.sessions.delete(id);
    session.transport.close(code, reason);
    this.logger.debug('Session closed', { session: id, code, reason });
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.values()].map(s => ({
      id: s.id,
      subscriptions: s.subscriptions === 'all' || s.subscriptions === null ? s.subscriptions : [...s.subscriptions],
      monitor: [...s.monitor],
      openedAt: s.openedAt,
    }));
  }

  /**
   * Handle one inbound text frame and return the response to send back.
   * Never rejects: failures become error responses.
   */
  async handleFrame(sessionId: string, raw: string): Promise<GatewayResponse> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return errorResponse(null, new ValidationError(`Unknown session ${sessionId}`));
    }

    // Any frame on a monitored session is liveness, valid or not.
    for (const source of session.monitor) {
      if (this.watchdogs.has(source)) this.watchdogs.signal(source);
    }

    if (Buffer.byteLength(raw, 'utf-8') > MAX_FRAME_SIZE_BYTES) {
      return errorResponse(null, new ValidationError(`Frame exceeds ${MAX_FRAME_SIZE_BYTES} bytes`));
    }

    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (err) {
      return errorResponse(null, err);
    }

    const id = message.id ?? null;
    try {
      return okResponse(id, await this.dispatch(session, message));
    } catch (err) {
      this.logger.warn(`Request "${message.type}" failed`, { session: session.id, error: err });
      return errorResponse(id, err);
    }
  }

  // ── Network ─────────────────────────────────────────────────────

  /** Start accepting WebSocket connections. Resolves once listening. */
  listen(options: { host: string; port: number }): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: options.host, port: options.port, maxPayload: MAX_FRAME_SIZE_BYTES });
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        server.on('error', err => this.logger.error('WebSocket server error', { error: err }));
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : options.port;
        this.logger.info(`Listening on ws://${options.host}:${port}`);
        resolve(port);
      });
      server.on('connection', socket => this.accept(socket));
      this.server = server;
    });
  }

  /** Stop egress, close every session and the listening socket. */
  async close(): Promise<void> {
    this.closing = true;
    if (this.busSubscription) {
      this.bus.unsubscribe(this.busSubscription);
      this.busSubscription = null;
    }
    for (const id of [...this.sessions.keys()]) {
      this.closeSession(id, 1001, 'server shutting down');
    }

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  }

  // ── Internals ───────────────────────────────────────────────────

  private accept(socket: WebSocket): void {
    const id = this.openSession({
      send: frame => new Promise<void>((resolve, reject) => {
        socket.send(frame, err => (err ? reject(err) : resolve()));
      }),
      close: (code, reason) => socket.close(code, reason),
    });

    socket.on('message', data => {
      this.handleFrame(id, data.toString())
        .then(response => this.send(id, JSON.stringify(response)))
        .catch((err: unknown) => this.logger.error('Failed to answer frame', { session: id, error: err }));
    });
    socket.on('close', () => {
      this.sessions.delete(id);
    });
    socket.on('error', err => {
      this.logger.warn('Socket error', { session: id, error: err });
    });
  }

  private async dispatch(session: Session, message: ClientMessage): Promise<unknown> {
    switch (message.type) {
      case 'heartbeat': {
        const watchdog = this.watchdogs.signal(message.source);
        return { source: message.source, state: watchdog.state };
      }

      case 'query':
        return this.bus.getOrCreate(message.name);

      case 'list':
        return this.bus.list();

      case 'subscribe': {
        for (const source of message.monitor ?? []) {
          if (!this.watchdogs.has(source)) throw new UnknownWatchdogError(source);
        }
        session.subscriptions = message.names ? new Set(message.names) : 'all';
        session.monitor = new Set(message.monitor ?? []);
        const snapshot = message.names
          ? message.names.map(name => this.bus.getOrCreate(name))
          : this.bus.list();
        return { subscribed: message.names ?? 'all', monitor: [...session.monitor], snapshot };
      }

      case 'unsubscribe':
        session.subscriptions = null;
        session.monitor = new Set();
        return { subscribed: null };

      case 'raise':
        return this.bus.broadcast(message.name, true, {
          problemDescription: message.problemDescription,
          parameters: message.parameters,
          severity: message.severity,
          raisedBy: `gateway:${session.id}`,
        });

      case 'clear':
        return this.bus.broadcast(message.name, false, {
          parameters: message.parameters,
          raisedBy: `gateway:${session.id}`,
        });

      case 'force_clear':
        this.authorize(message.token);
        return this.bus.forceClear(message.name, {
          parameters: { ...message.parameters, session: session.id },
        });
    }
  }

  private attachEgress(): void {
    this.busSubscription = this.bus.subscribeAll(record => this.fanOut(record), {
      onError: error => this.onEgressDropped(error),
    });
  }

  /** Sessions may have missed records: make them reconnect for a fresh snapshot. */
  private onEgressDropped(error: DeliveryError): void {
    this.busSubscription = null;
    if (this.closing) return;
    this.logger.error('Gateway egress was dropped by the bus; resetting every session', { error });
    for (const id of [...this.sessions.keys()]) {
      this.closeSession(id, 1011, 'alarm egress reset');
    }
    this.attachEgress();
  }

  private authorize(token: string | undefined): void {
    if (!this.adminToken) {
      throw new UnauthorizedError('Force clear over the gateway is disabled: no admin token is configured');
    }
    const expected = Buffer.from(this.adminToken);
    const given = Buffer.from(token ?? '');
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      throw new UnauthorizedError();
    }
  }

  private async fanOut(record: AlarmRecord): Promise<void> {
    const frame = JSON.stringify(alarmEvent(record));
    const targets = [...this.sessions.values()].filter(s =>
      s.subscriptions === 'all' || (s.subscriptions !== null && s.subscriptions.has(record.name))
    );
    await Promise.all(targets.map(s => this.send(s.id, frame)));
  }

  /** Write to one session; a failed or stalled write closes it. Never rejects. */
  private async send(sessionId: string, frame: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const stalled = new Promise<'stalled'>(resolve => {
      timer = setTimeout(() => resolve('stalled'), this.sendTimeoutMs);
    });
    try {
      const outcome = await Promise.race([session.transport.send(frame), stalled]);
      if (outcome === 'stalled') {
        this.logger.warn(`Send stalled for ${this.sendTimeoutMs}ms; closing session`, { session: sessionId });
        this.closeSession(sessionId, 1011, 'send timed out');
      }
    } catch (err) {
      this.logger.warn('Send failed; closing session', { session: sessionId, error: err });
      this.closeSession(sessionId, 1011, 'send failed');
    } finally {
      clearTimeout(timer);
    }
  }
}
