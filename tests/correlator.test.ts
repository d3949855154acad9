import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  EventCorrelator,
  VIDEO_ENDED_EVENT,
  type EventCorrelatorOptions,
  type SessionEndEvent
} from '../src/events/correlator.js';
import type { EventSession, Notification } from '../src/types.js';

const T0 = new Date(2024, 0, 15, 10, 0, 0).getTime();

function notification(
  eventName: string,
  kind: Notification['kind'] = 'assert',
  observedAt = Date.now()
): Notification {
  return { kind, cameraId: 'c1', eventName, observedAt };
}

describe('EventCorrelator', () => {
  let metrics: MetricsRegistry;
  let starts: EventSession[];
  let ends: SessionEndEvent[];
  let correlator: EventCorrelator | null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    metrics = new MetricsRegistry();
    starts = [];
    ends = [];
    correlator = null;
  });

  afterEach(() => {
    correlator?.stop();
    vi.useRealTimers();
  });

  function create(options: Partial<EventCorrelatorOptions> = {}) {
    const instance = new EventCorrelator({
      cameraId: 'c1',
      targetEvents: ['IsPerson'],
      debounceMs: 60_000,
      metrics,
      ...options
    });
    instance.on('session-start', (session: EventSession) => starts.push(session));
    instance.on('session-end', (event: SessionEndEvent) => ends.push(event));
    correlator = instance;
    return instance;
  }

  it('extends the session on repeated assertions and closes it after the debounce window', () => {
    const instance = create();

    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(5_000);
    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(7_000);
    instance.ingest(notification('IsPerson'));

    expect(starts).toHaveLength(1);
    expect(starts[0]).toMatchObject({
      id: 'c1#1',
      eventName: 'IsPerson',
      startedAt: T0,
      state: 'active'
    });

    vi.advanceTimersByTime(59_999);
    expect(ends).toHaveLength(0);
    expect(instance.getActiveSession()?.lastSeenAt).toBe(T0 + 12_000);

    vi.advanceTimersByTime(1);
    expect(ends).toHaveLength(1);
    expect(ends[0].reason).toBe('expired');
    expect(ends[0].at).toBe(T0 + 72_000);
    expect(ends[0].session).toMatchObject({ id: 'c1#1', state: 'closed', lastSeenAt: T0 + 12_000 });
    expect(instance.getActiveSession()).toBeNull();
  });

  it('closes immediately when the tracked event is negated', () => {
    const instance = create();

    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(3_000);
    instance.ingest(notification('IsPerson', 'negate'));

    expect(ends).toHaveLength(1);
    expect(ends[0]).toMatchObject({ reason: 'negated', at: T0 + 3_000 });

    vi.advanceTimersByTime(1_000);
    instance.ingest(notification('IsPerson'));
    expect(starts.map(session => session.id)).toEqual(['c1#1', 'c1#2']);
    expect(starts[1].startedAt).toBe(T0 + 4_000);
  });

  it('ignores negations under the ignore policy', () => {
    const instance = create({ negationPolicy: 'ignore' });

    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(3_000);
    instance.ingest(notification('IsPerson', 'negate'));
    expect(ends).toHaveLength(0);

    vi.advanceTimersByTime(57_000);
    expect(ends.map(event => event.reason)).toEqual(['expired']);
  });

  it('ignores negation of an event the session is not tracking', () => {
    const instance = create({ targetEvents: ['IsPerson', 'IsCar'] });

    instance.ingest(notification('IsPerson'));
    instance.ingest(notification('IsCar', 'negate'));

    expect(ends).toHaveLength(0);
    expect(instance.getActiveSession()?.eventName).toBe('IsPerson');
  });

  it('neither starts nor extends a session for a different event while one is active', () => {
    const instance = create({ targetEvents: ['IsPeople', 'IsCar'] });

    instance.ingest(notification('IsPeople'));
    vi.advanceTimersByTime(30_000);
    instance.ingest(notification('IsCar'));

    expect(starts).toHaveLength(1);
    expect(instance.getActiveSession()?.lastSeenAt).toBe(T0);

    vi.advanceTimersByTime(30_000);
    expect(ends).toHaveLength(1);
    expect(ends[0].at).toBe(T0 + 60_000);
  });

  it('turns a burst of assertions into a single session', () => {
    const instance = create();

    for (let index = 0; index < 20; index += 1) {
      instance.ingest(notification('IsPerson'));
      vi.advanceTimersByTime(500);
    }
    vi.advanceTimersByTime(60_000);

    expect(starts).toHaveLength(1);
    expect(ends).toHaveLength(1);
    expect(metrics.snapshot().sessions).toMatchObject({ started: 1, ended: 1, active: 0 });
  });

  it('never lets sessions overlap', () => {
    const instance = create({ targetEvents: ['IsPerson', 'IsCar'], debounceMs: 10_000 });
    let open = 0;
    let maxOpen = 0;
    instance.on('session-start', () => {
      open += 1;
      maxOpen = Math.max(maxOpen, open);
    });
    instance.on('session-end', () => {
      open -= 1;
    });

    const script: Array<[number, string, Notification['kind']]> = [
      [0, 'IsPerson', 'assert'],
      [2_000, 'IsCar', 'assert'],
      [4_000, 'IsPerson', 'negate'],
      [4_500, 'IsCar', 'assert'],
      [9_000, 'IsPerson', 'assert'],
      [25_000, 'IsCar', 'assert'],
      [26_000, 'IsCar', 'negate']
    ];
    let elapsed = 0;
    for (const [at, eventName, kind] of script) {
      vi.advanceTimersByTime(at - elapsed);
      elapsed = at;
      instance.ingest(notification(eventName, kind));
    }

    expect(maxOpen).toBe(1);
    expect(starts.map(session => session.eventName)).toEqual(['IsPerson', 'IsCar', 'IsCar']);
    expect(ends.map(event => event.reason)).toEqual(['negated', 'expired', 'negated']);
  });

  it('ignores events that are not targeted', () => {
    const instance = create();

    instance.ingest(notification('IsCar'));
    instance.ingest(notification('IsPerson', 'negate'));

    expect(starts).toHaveLength(0);
    expect(metrics.snapshot().notifications.total).toBe(2);
  });

  it('starts sessions for any event under the wildcard', () => {
    const instance = create({ targetEvents: [], wildcard: true });

    instance.ingest(notification('IsMotion'));

    expect(starts.map(session => session.eventName)).toEqual(['IsMotion']);
  });

  it('routes VideoEnded to the synthetic channel instead of opening a session', () => {
    const instance = create({ targetEvents: [VIDEO_ENDED_EVENT], wildcard: true });
    const synthetic: Notification[] = [];
    instance.on('synthetic', (event: Notification) => synthetic.push(event));

    instance.ingest({ ...notification(VIDEO_ENDED_EVENT), synthetic: true });

    expect(starts).toHaveLength(0);
    expect(synthetic).toHaveLength(1);
    expect(instance.isTargeted(VIDEO_ENDED_EVENT)).toBe(false);
    expect(metrics.snapshot().notifications.synthetic).toBe(1);
  });

  it('opens the session for the first targeted assertion of a batch by default', () => {
    const instance = create({ targetEvents: ['IsPeople', 'IsCar'] });

    instance.ingestBatch([notification('IsCar'), notification('IsPeople')]);

    expect(starts.map(session => session.eventName)).toEqual(['IsCar']);
  });

  it('opens the session for the highest-priority assertion under the priority tie-break', () => {
    const instance = create({ targetEvents: ['IsPeople', 'IsCar'], tieBreak: 'priority' });

    instance.ingestBatch([
      notification('IsMotion'),
      notification('IsCar'),
      notification('IsPeople')
    ]);

    expect(starts.map(session => session.eventName)).toEqual(['IsPeople']);
  });

  it('closes the active session on stop and ignores later notifications', () => {
    const instance = create();

    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(2_000);
    instance.stop();

    expect(ends).toHaveLength(1);
    expect(ends[0]).toMatchObject({ reason: 'shutdown', at: T0 + 2_000 });

    instance.ingest(notification('IsPerson'));
    vi.advanceTimersByTime(120_000);
    expect(starts).toHaveLength(1);
    expect(ends).toHaveLength(1);
  });
});
