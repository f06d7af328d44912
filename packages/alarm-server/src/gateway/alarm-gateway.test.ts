import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AlarmBus } from '../alarms/alarm-bus.js';
import { WatchdogRegistry } from '../watchdog/registry.js';
import { AlarmGateway, type SessionTransport } from './alarm-gateway.js';
import { Logger } from '../utils/logger.js';
import type { AlarmEvent } from './protocol.js';

class FakeTransport implements SessionTransport {
  frames: string[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  async send(frame: string): Promise<void> {
    if (this.failSends) throw new Error('broken pipe');
    this.frames.push(frame);
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  events(): AlarmEvent[] {
    return this.frames.map(f => JSON.parse(f));
  }
}

/** A peer that stopped reading: writes never complete. */
class StalledTransport implements SessionTransport {
  closed: { code: number; reason: string } | null = null;

  send(): Promise<void> {
    return new Promise(() => {});
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

describe('AlarmGateway', () => {
  let logger: Logger;
  let bus: AlarmBus;
  let watchdogs: WatchdogRegistry;
  let gateway: AlarmGateway;
  let transport: FakeTransport;
  let session: string;

  function createGateway(adminToken?: string): void {
    gateway = new AlarmGateway({ bus, watchdogs, adminToken, logger });
    transport = new FakeTransport();
    session = gateway.openSession(transport);
  }

  function frame(message: Record<string, unknown>): string {
    return JSON.stringify(message);
  }

  beforeEach(() => {
    vi.useFakeTimers();
    logger = new Logger();
    logger.setOutput(() => {});
    bus = new AlarmBus({ logger });
    watchdogs = new WatchdogRegistry(bus, { logger });
    watchdogs.create({ alarmName: 'network-loss', kind: 'network-loss', deadlineMs: 8000, tickIntervalMs: 500 });
    createGateway();
  });

  afterEach(async () => {
    watchdogs.disposeAll();
    await gateway.close();
    vi.useRealTimers();
  });

  // ── Requests ──────────────────────────────────────────────────────

  describe('requests', () => {
    it('routes a heartbeat to the named watchdog', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'heartbeat', id: 'hb-1', source: 'network-loss' }));
      expect(response).toMatchObject({
        type: 'response',
        id: 'hb-1',
        status: 'ok',
        data: { source: 'network-loss', state: 'ALIVE' },
      });
      expect(watchdogs.get('network-loss')?.state).toBe('ALIVE');
    });

    it('answers a heartbeat for an unknown source with UNKNOWN_WATCHDOG', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'heartbeat', id: '2', source: 'lidar' }));
      expect(response).toMatchObject({
        id: '2',
        status: 'error',
        data: { code: 'UNKNOWN_WATCHDOG', message: 'No watchdog is bound to "lidar"' },
      });
    });

    it('returns a snapshot for query, creating unknown alarms', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'query', name: 'hw-kill' }));
      expect(response.status).toBe('ok');
      expect(response.id).toBeNull();
      expect(response.data).toMatchObject({ name: 'hw-kill', raised: false, sequence: 0 });
    });

    it('lists every alarm', async () => {
      await bus.broadcast('hw-kill', true);
      const response = await gateway.handleFrame(session, frame({ type: 'list' }));
      expect(response.data).toEqual(bus.list());
    });

    it('raises and clears on behalf of the session', async () => {
      const raised = await gateway.handleFrame(session, frame({
        type: 'raise', name: 'hw-kill', problemDescription: 'bow button', severity: 5,
      }));
      expect(raised.data).toMatchObject({ raised: true, sequence: 1, raisedBy: `gateway:${session}`, severity: 5 });

      const cleared = await gateway.handleFrame(session, frame({ type: 'clear', name: 'hw-kill' }));
      expect(cleared.data).toMatchObject({ raised: false, sequence: 2, raisedBy: `gateway:${session}` });
    });

    it('answers malformed frames with VALIDATION_ERROR', async () => {
      const response = await gateway.handleFrame(session, '{oops');
      expect(response).toMatchObject({
        id: null,
        status: 'error',
        data: { code: 'VALIDATION_ERROR', message: 'Frame is not valid JSON' },
      });
    });

    it('refuses oversized frames', async () => {
      const response = await gateway.handleFrame(session, 'x'.repeat(65_537));
      expect(response.data).toEqual({ code: 'VALIDATION_ERROR', message: 'Frame exceeds 65536 bytes' });
    });

    it('refuses frames for an unknown session', async () => {
      const response = await gateway.handleFrame('nope', frame({ type: 'list' }));
      expect(response.status).toBe('error');
      expect(response.data).toMatchObject({ message: 'Unknown session nope' });
    });
  });

  // ── Subscriptions ─────────────────────────────────────────────────

  describe('subscriptions', () => {
    it('pushes only the subscribed alarms', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'subscribe', names: ['kill'] }));
      expect(response.data).toMatchObject({ subscribed: ['kill'], monitor: [] });

      await bus.broadcast('kill', true, { raisedBy: 'meta:kill' });
      await bus.broadcast('hw-kill', true);

      const events = transport.events();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'alarm', record: { name: 'kill', raised: true, sequence: 1 } });
    });

    it('includes a snapshot of the subscribed alarms', async () => {
      await bus.broadcast('kill', true);
      const response = await gateway.handleFrame(session, frame({ type: 'subscribe', names: ['kill'] }));
      expect(response.data).toMatchObject({ snapshot: [{ name: 'kill', raised: true, sequence: 1 }] });
    });

    it('pushes everything without a name filter', async () => {
      await gateway.handleFrame(session, frame({ type: 'subscribe' }));
      await bus.broadcast('a', true);
      await bus.broadcast('b', true);
      expect(transport.events().map(e => e.record.name)).toEqual(['a', 'b']);
    });

    it('stops pushing after unsubscribe', async () => {
      await gateway.handleFrame(session, frame({ type: 'subscribe' }));
      await gateway.handleFrame(session, frame({ type: 'unsubscribe' }));
      await bus.broadcast('a', true);
      expect(transport.frames).toEqual([]);
    });

    it('sends nothing before a subscribe', async () => {
      await bus.broadcast('a', true);
      expect(transport.frames).toEqual([]);
    });

    it('closes a session whose send fails without failing the broadcast', async () => {
      await gateway.handleFrame(session, frame({ type: 'subscribe' }));
      transport.failSends = true;

      await expect(bus.broadcast('a', true)).resolves.toMatchObject({ sequence: 1 });
      expect(transport.closed).toEqual({ code: 1011, reason: 'send failed' });
      expect(gateway.listSessions()).toEqual([]);
      expect(bus.listenerCount()).toBe(1);
    });

    it('closes a stalled session and keeps delivering to the others', async () => {
      const stalled = new StalledTransport();
      const stalledSession = gateway.openSession(stalled);
      await gateway.handleFrame(stalledSession, frame({ type: 'subscribe', names: ['hw-kill'] }));
      await gateway.handleFrame(session, frame({ type: 'subscribe', names: ['kill'] }));

      const hwKill = bus.broadcast('hw-kill', true);
      await vi.advanceTimersByTimeAsync(6000);
      await expect(hwKill).resolves.toMatchObject({ sequence: 1 });
      expect(stalled.closed).toEqual({ code: 1011, reason: 'send timed out' });

      await bus.broadcast('kill', true, { raisedBy: 'meta:kill' });
      expect(transport.events().map(e => e.record.name)).toEqual(['kill']);
      expect(bus.listenerCount()).toBe(1);
      expect(gateway.listSessions().map(s => s.id)).toEqual([session]);
    });

    it('does not hold other alarms behind a stalled session', async () => {
      const stalled = new StalledTransport();
      const stalledSession = gateway.openSession(stalled);
      await gateway.handleFrame(stalledSession, frame({ type: 'subscribe', names: ['hw-kill'] }));
      await gateway.handleFrame(session, frame({ type: 'subscribe', names: ['kill'] }));

      const hwKill = bus.broadcast('hw-kill', true);
      await bus.broadcast('kill', true);
      expect(transport.events()).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(2500);
      await hwKill;
    });

    it('resets every session and resubscribes when the bus drops egress', async () => {
      await gateway.close();
      gateway = new AlarmGateway({ bus, watchdogs, sendTimeoutMs: 10_000, logger });
      const stalled = new StalledTransport();
      const stalledSession = gateway.openSession(stalled);
      transport = new FakeTransport();
      session = gateway.openSession(transport);
      await gateway.handleFrame(stalledSession, frame({ type: 'subscribe' }));
      await gateway.handleFrame(session, frame({ type: 'subscribe' }));

      const hwKill = bus.broadcast('hw-kill', true);
      await vi.advanceTimersByTimeAsync(5000);
      await hwKill;

      expect(stalled.closed).toEqual({ code: 1011, reason: 'alarm egress reset' });
      expect(transport.closed).toEqual({ code: 1011, reason: 'alarm egress reset' });
      expect(gateway.listSessions()).toEqual([]);
      expect(bus.listenerCount()).toBe(1);

      const fresh = new FakeTransport();
      const freshSession = gateway.openSession(fresh);
      await gateway.handleFrame(freshSession, frame({ type: 'subscribe', names: ['kill'] }));
      await bus.broadcast('kill', true);
      expect(fresh.events().map(e => e.record.sequence)).toEqual([1]);
    });
  });

  // ── Liveness monitoring ───────────────────────────────────────────

  describe('monitor', () => {
    it('rejects a monitor source without a watchdog', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'subscribe', monitor: ['lidar'] }));
      expect(response.data).toMatchObject({ code: 'UNKNOWN_WATCHDOG' });
    });

    it('counts every later frame as liveness, valid or not', async () => {
      await gateway.handleFrame(session, frame({ type: 'subscribe', names: [], monitor: ['network-loss'] }));
      const link = watchdogs.get('network-loss');
      expect(link?.getStatus().signalCount).toBe(0);

      await gateway.handleFrame(session, 'garbage');
      expect(link?.state).toBe('ALIVE');
      expect(link?.getStatus().signalCount).toBe(1);
    });

    it('reports monitored sources per session', async () => {
      await gateway.handleFrame(session, frame({ type: 'subscribe', names: ['kill'], monitor: ['network-loss'] }));
      expect(gateway.listSessions()).toEqual([{
        id: session,
        subscriptions: ['kill'],
        monitor: ['network-loss'],
        openedAt: expect.any(Number),
      }]);
    });
  });

  // ── Force clear ───────────────────────────────────────────────────

  describe('force_clear', () => {
    it('is disabled without an admin token', async () => {
      const response = await gateway.handleFrame(session, frame({ type: 'force_clear', name: 'kill', token: 'anything' }));
      expect(response.data).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Force clear over the gateway is disabled: no admin token is configured',
      });
    });

    it('rejects a wrong or missing token', async () => {
      await gateway.close();
      createGateway('test-secret');

      const wrong = await gateway.handleFrame(session, frame({ type: 'force_clear', name: 'kill', token: 'test-secreT' }));
      expect(wrong.data).toMatchObject({ code: 'UNAUTHORIZED' });
      const missing = await gateway.handleFrame(session, frame({ type: 'force_clear', name: 'kill' }));
      expect(missing.data).toMatchObject({ code: 'UNAUTHORIZED' });
      expect(bus.getOrCreate('kill').sequence).toBe(0);
    });

    it('clears as manual-override with the right token', async () => {
      await gateway.close();
      createGateway('test-secret');
      await bus.broadcast('kill', true, { raisedBy: 'meta:kill' });

      const response = await gateway.handleFrame(session, frame({
        type: 'force_clear', id: 'fc', name: 'kill', token: 'test-secret',
      }));
      expect(response).toMatchObject({
        id: 'fc',
        status: 'ok',
        data: { name: 'kill', raised: false, raisedBy: 'manual-override', parameters: { session } },
      });
    });
  });

  // ── Shutdown ──────────────────────────────────────────────────────

  it('close ends every session and leaves the bus', async () => {
    const other = new FakeTransport();
    gateway.openSession(other);
    expect(bus.listenerCount()).toBe(1);

    await gateway.close();
    expect(transport.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(other.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(gateway.listSessions()).toEqual([]);
    expect(bus.listenerCount()).toBe(0);
  });
});
