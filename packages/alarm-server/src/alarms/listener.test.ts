import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AlarmBus } from './alarm-bus.js';
import { AlarmListener } from './listener.js';
import { AlarmTimeoutError, DeliveryError, KillswitchError } from '../errors.js';
import { Logger } from '../utils/logger.js';
import type { AlarmRecord } from './types.js';

describe('AlarmListener', () => {
  let bus: AlarmBus;
  let listener: AlarmListener | undefined;

  beforeEach(() => {
    const logger = new Logger();
    logger.setOutput(() => {});
    bus = new AlarmBus({ logger });
    listener = undefined;
  });

  afterEach(() => {
    listener?.close();
    vi.useRealTimers();
  });

  // ── State ─────────────────────────────────────────────────────────

  it('starts from the current record', async () => {
    await bus.broadcast('kill', true);
    listener = new AlarmListener(bus, 'kill');
    expect(listener.getAlarm().sequence).toBe(1);
    expect(listener.isRaised()).toBe(true);
    expect(listener.isCleared()).toBe(false);
    expect(listener.isActive).toBe(true);
  });

  it('follows later broadcasts', async () => {
    listener = new AlarmListener(bus, 'kill');
    expect(listener.isCleared()).toBe(true);
    await bus.broadcast('kill', true);
    expect(listener.isRaised()).toBe(true);
    expect(listener.getAlarm().sequence).toBe(1);
  });

  // ── Callbacks ─────────────────────────────────────────────────────

  it('hands the constructor callback the snapshot and every update', async () => {
    const seen: number[] = [];
    listener = new AlarmListener(bus, 'kill', record => { seen.push(record.sequence); });
    await bus.broadcast('kill', true);
    await bus.broadcast('kill', false);
    expect(seen).toEqual([0, 1, 2]);
  });

  it('honours callWhenRaised and callWhenCleared', async () => {
    const raised: number[] = [];
    const cleared: number[] = [];
    listener = new AlarmListener(bus, 'kill', record => { raised.push(record.sequence); }, { callWhenCleared: false });
    listener.addCallback(record => { cleared.push(record.sequence); }, { callWhenRaised: false });

    await bus.broadcast('kill', true);
    await bus.broadcast('kill', false);
    await bus.broadcast('kill', true);

    expect(raised).toEqual([1, 3]);
    expect(cleared).toEqual([2]);
  });

  it('runs callbacks one after another in registration order', async () => {
    const order: string[] = [];
    listener = new AlarmListener(bus, 'kill');
    listener.addCallback(async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      order.push('first');
    });
    listener.addCallback(() => { order.push('second'); });
    await bus.broadcast('kill', true);
    expect(order).toEqual(['first', 'second']);
  });

  // ── Waiting ───────────────────────────────────────────────────────

  it('waitForState resolves immediately when already in that state', async () => {
    listener = new AlarmListener(bus, 'kill');
    const record = await listener.waitForState(false, 10);
    expect(record.sequence).toBe(0);
  });

  it('waitForState resolves on the matching broadcast', async () => {
    listener = new AlarmListener(bus, 'kill');
    const waiting = listener.waitForState(true, 1000);
    await bus.broadcast('kill', false);
    await bus.broadcast('kill', true, { problemDescription: 'network-loss raised' });
    const record = await waiting;
    expect(record.sequence).toBe(2);
    expect(record.problemDescription).toBe('network-loss raised');
  });

  it('waitForUpdate resolves on the next record even if the state repeats', async () => {
    listener = new AlarmListener(bus, 'kill');
    const waiting = listener.waitForUpdate(1000);
    await bus.broadcast('kill', false);
    expect((await waiting).sequence).toBe(1);
  });

  it('waitUntil rejects with AlarmTimeoutError after the timeout', async () => {
    vi.useFakeTimers();
    listener = new AlarmListener(bus, 'kill');
    const waiting = listener.waitForState(true, 500);
    const assertion = expect(waiting).rejects.toBeInstanceOf(AlarmTimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('close rejects pending waiters and stops updates', async () => {
    listener = new AlarmListener(bus, 'kill');
    const waiting = listener.waitForState(true, 1000);
    listener.close();
    await expect(waiting).rejects.toMatchObject({ code: 'LISTENER_CLOSED' });
    expect(listener.isActive).toBe(false);
    expect(bus.listenerCount('kill')).toBe(0);

    await bus.broadcast('kill', true);
    expect(listener.isCleared()).toBe(true);
    await expect(listener.waitForState(true, 10)).rejects.toBeInstanceOf(KillswitchError);
  });

  // ── Failure ───────────────────────────────────────────────────────

  it('records the failure when the bus drops it', async () => {
    const errors: DeliveryError[] = [];
    listener = new AlarmListener(bus, 'kill', (record: AlarmRecord) => {
      if (record.raised) throw new Error('consumer crashed');
    }, { onError: error => errors.push(error) });

    const waiting = listener.waitForState(false, 1000).then(() => 'resolved');
    expect(await waiting).toBe('resolved');

    const pendingUpdate = listener.waitForUpdate(1000);
    await bus.broadcast('kill', true);

    await expect(pendingUpdate).resolves.toMatchObject({ sequence: 1 });
    expect(listener.failure).toBeInstanceOf(DeliveryError);
    expect(listener.isActive).toBe(false);
    expect(errors).toHaveLength(1);
    await expect(listener.waitForState(false, 10)).rejects.toBeInstanceOf(DeliveryError);
  });
});
