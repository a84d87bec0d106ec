import { describe, expect, test } from 'vitest';
import { EventTracker, EventTrackerRegistry } from '../../src/session/event-tracker';

describe('EventTracker', () => {
  test('lastId follows the most recent new id', () => {
    const tracker = new EventTracker(8);
    expect(tracker.lastId()).toBeUndefined();
    expect(tracker.record('1')).toBe(true);
    expect(tracker.record('2')).toBe(true);
    expect(tracker.lastId()).toBe('2');
  });

  test('a duplicate is rejected and leaves lastId unchanged', () => {
    const tracker = new EventTracker(8);
    tracker.record('5');
    tracker.record('6');
    expect(tracker.record('5')).toBe(false);
    expect(tracker.lastId()).toBe('6');
    expect(tracker.size).toBe(2);
  });

  test('evicts the oldest id once capacity is reached', () => {
    const tracker = new EventTracker(2);
    tracker.record('a');
    tracker.record('b');
    tracker.record('c');
    expect(tracker.has('a')).toBe(false);
    expect(tracker.has('b')).toBe(true);
    // Outside the window, so it passes again
    expect(tracker.record('a')).toBe(true);
  });

  test('seeds from an initial marker', () => {
    const tracker = new EventTracker(4, '2');
    expect(tracker.lastId()).toBe('2');
    expect(tracker.record('2')).toBe(false);
  });

  test('reset forgets everything', () => {
    const tracker = new EventTracker(4);
    tracker.record('1');
    tracker.reset();
    expect(tracker.lastId()).toBeUndefined();
    expect(tracker.record('1')).toBe(true);
  });

  test('rejects a non-positive capacity', () => {
    expect(() => new EventTracker(0)).toThrow(RangeError);
  });

  test('rewind forgets the ids recorded after the given one', () => {
    const tracker = new EventTracker(8);
    for (const id of ['1', '2', '3', '4']) tracker.record(id);

    tracker.rewind('2');

    expect(tracker.lastId()).toBe('2');
    expect(tracker.has('1')).toBe(true);
    expect(tracker.has('3')).toBe(false);
    expect(tracker.record('3')).toBe(true);
    expect(tracker.record('2')).toBe(false);
  });

  test('rewind to an id outside the window restarts from it', () => {
    const tracker = new EventTracker(2);
    for (const id of ['1', '2', '3']) tracker.record(id);

    tracker.rewind('1');
    expect(tracker.size).toBe(1);
    expect(tracker.lastId()).toBe('1');

    tracker.rewind(undefined);
    expect(tracker.size).toBe(0);
    expect(tracker.lastId()).toBeUndefined();
  });
});

describe('EventTrackerRegistry', () => {
  test('returns the same tracker per session and seeds only on creation', () => {
    const registry = new EventTrackerRegistry(4);
    const first = registry.get('s1', '3');
    expect(registry.get('s1', '9')).toBe(first);
    expect(first.lastId()).toBe('3');
    expect(registry.peek('s2')).toBeUndefined();
  });

  test('delete drops the tracker', () => {
    const registry = new EventTrackerRegistry();
    registry.get('s1').record('1');
    registry.delete('s1');
    expect(registry.get('s1').lastId()).toBeUndefined();
  });
});
