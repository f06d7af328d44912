import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AlarmBus } from '../alarms/alarm-bus.js';
import { HeartbeatWatchdog, type HeartbeatWatchdogOptions } from './heartbeat-watchdog.js';
import { ConfigurationError } from '../errors.js';
import { Logger } from '../utils/logger.js';

describe('HeartbeatWatchdog', () => {
  let bus: AlarmBus;
  let logger: Logger;
  let lines: string[];
  let wd: HeartbeatWatchdog | undefined;
  let t0: number;

  beforeEach(() => {
    vi.useFakeTimers();
    t0 = Date.now();
    lines = [];
    logger = new Logger();
    logger.setOutput(line => lines.push(line));
    bus = new AlarmBus({ logger });
    wd = undefined;
  });

  afterEach(() => {
    wd?.dispose();
    vi.useRealTimers();
  });

  function create(overrides: Partial<HeartbeatWatchdogOptions> = {}): HeartbeatWatchdog {
    wd = new HeartbeatWatchdog({
      alarmName: 'hb',
      deadlineMs: 1000,
      tickIntervalMs: 100,
      bus,
      logger,
      ...overrides,
    });
    return wd;
  }

  async function advance(ms: number): Promise<void> {
    await vi.advanceTimersByTimeAsync(ms);
    await wd?.flush();
  }

  // ── Configuration ─────────────────────────────────────────────────

  describe('configuration', () => {
    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('rejects deadlineMs %s', (deadlineMs) => {
      expect(() => create({ deadlineMs })).toThrow(ConfigurationError);
    });

    it('rejects a non-positive tick interval', () => {
      expect(() => create({ tickIntervalMs: 0 })).toThrow(ConfigurationError);
    });

    it('rejects an empty alarm name', () => {
      expect(() => create({ alarmName: '' })).toThrow(ConfigurationError);
    });

    it('warns when the tick interval exceeds a quarter of the deadline', () => {
      create({ tickIntervalMs: 500 });
      expect(lines).toContain(
        '[Watchdog:hb] WARN  Tick interval exceeds a quarter of the deadline; detection latency grows with it ' +
        '{"deadlineMs":1000,"tickIntervalMs":500}'
      );
    });

    it('starts in AWAITING_FIRST with the raise boot policy', () => {
      const w = create();
      expect(w.state).toBe('AWAITING_FIRST');
      expect(w.bootPolicy).toBe('raise');
      expect(w.kind).toBe('heartbeat');
      expect(w.startedAt).toBe(t0);
    });
  });

  // ── Boot ──────────────────────────────────────────────────────────

  describe('boot', () => {
    it('raises when no signal arrives within the deadline of start', async () => {
      const w = create();
      await advance(1000);
      expect(w.state).toBe('AWAITING_FIRST');
      expect(bus.getOrCreate('hb').sequence).toBe(0);

      await advance(100);
      expect(w.state).toBe('TIMED_OUT');
      expect(bus.getOrCreate('hb')).toMatchObject({
        raised: true,
        sequence: 1,
        raisedBy: 'watchdog:hb',
        severity: 5,
        problemDescription: 'no signal since start for > 1000ms',
        parameters: { reason: 'no signal since start for > 1000ms', deadlineMs: 1000, silenceMs: 1100 },
      });
    });

    it('keeps waiting under the wait boot policy', async () => {
      const w = create({ bootPolicy: 'wait' });
      await advance(5000);
      expect(w.state).toBe('AWAITING_FIRST');
      expect(bus.getOrCreate('hb').sequence).toBe(0);
    });

    it('clears the alarm on the first signal', async () => {
      const w = create();
      w.onSignal();
      await w.flush();
      expect(w.state).toBe('ALIVE');
      expect(bus.getOrCreate('hb')).toMatchObject({
        raised: false,
        sequence: 1,
        raisedBy: 'watchdog:hb',
        parameters: { reason: 'first signal' },
      });
    });
  });

  // ── Timeout and recovery ──────────────────────────────────────────

  describe('timeout and recovery', () => {
    it('raises once the silence exceeds the deadline', async () => {
      const w = create();
      w.onSignal();
      await advance(1000);
      expect(w.state).toBe('ALIVE');

      await advance(100);
      expect(w.state).toBe('TIMED_OUT');
      expect(bus.getOrCreate('hb')).toMatchObject({
        raised: true,
        sequence: 2,
        problemDescription: 'no signal for > 1000ms',
      });
      expect(w.getStatus().timeoutCount).toBe(1);
    });

    it('stays alive while signals keep arriving', async () => {
      const w = create();
      for (let i = 0; i < 50; i++) {
        w.onSignal();
        await advance(100);
      }
      expect(w.state).toBe('ALIVE');
      expect(bus.getOrCreate('hb').sequence).toBe(1);
    });

    it('broadcasts once for a run of signals while alive', async () => {
      const w = create();
      for (let i = 0; i < 5; i++) w.onSignal();
      await w.flush();
      expect(bus.getOrCreate('hb').sequence).toBe(1);
      expect(w.getStatus().signalCount).toBe(5);
    });

    it('clears when signals resume', async () => {
      const w = create();
      w.onSignal();
      await advance(1100);
      expect(w.state).toBe('TIMED_OUT');

      w.onSignal();
      await w.flush();
      expect(w.state).toBe('ALIVE');
      expect(bus.getOrCreate('hb')).toMatchObject({
        raised: false,
        sequence: 3,
        parameters: { reason: 'signal resumed' },
      });
    });

    it('raises again on the next tick after a force clear while still silent', async () => {
      const w = create();
      w.onSignal();
      await advance(1100);
      await bus.forceClear('hb');
      expect(bus.getOrCreate('hb').raisedBy).toBe('manual-override');

      await advance(100);
      expect(bus.getOrCreate('hb')).toMatchObject({
        raised: true,
        sequence: 4,
        raisedBy: 'watchdog:hb',
      });
      expect(w.state).toBe('TIMED_OUT');
      expect(w.getStatus().timeoutCount).toBe(1);
    });

    it('does not move lastSeenAt backwards', () => {
      const w = create();
      w.onSignal(t0 + 50);
      w.onSignal(t0 + 10);
      expect(w.lastSeenAt).toBe(t0 + 50);
    });
  });

  // ── Status and disposal ───────────────────────────────────────────

  describe('status and disposal', () => {
    it('reports silence since the last signal', async () => {
      const w = create();
      w.onSignal();
      await advance(300);
      expect(w.getStatus()).toEqual({
        alarmName: 'hb',
        kind: 'heartbeat',
        state: 'ALIVE',
        deadlineMs: 1000,
        tickIntervalMs: 100,
        bootPolicy: 'raise',
        startedAt: t0,
        lastSeenAt: t0,
        silenceMs: 300,
        signalCount: 1,
        timeoutCount: 0,
        disposed: false,
      });
    });

    it('stops ticking and ignores signals after dispose', async () => {
      const w = create();
      w.dispose();
      w.dispose();
      await advance(5000);
      w.onSignal();
      expect(w.isDisposed).toBe(true);
      expect(w.state).toBe('AWAITING_FIRST');
      expect(bus.getOrCreate('hb').sequence).toBe(0);
      expect(w.getStatus().disposed).toBe(true);
    });

    it('uses the configured severity and raisedBy', async () => {
      create({ severity: 3, raisedBy: 'link-monitor' });
      await advance(1100);
      expect(bus.getOrCreate('hb')).toMatchObject({ severity: 3, raisedBy: 'link-monitor' });
    });
  });
});
