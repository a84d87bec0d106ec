import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { IdleWatchdog } from '../../src/stream/idle-watchdog';

describe('IdleWatchdog', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('fires once the timeout passes without a touch', () => {
    const onStall = vi.fn();
    const watchdog = new IdleWatchdog(100, onStall);
    watchdog.start();
    vi.advanceTimersByTime(99);
    expect(onStall).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onStall).toHaveBeenCalledTimes(1);
    expect(watchdog.hasStalled).toBe(true);
  });

  test('touch re-arms the timer', () => {
    const onStall = vi.fn();
    const watchdog = new IdleWatchdog(100, onStall);
    watchdog.start();
    vi.advanceTimersByTime(80);
    watchdog.touch();
    vi.advanceTimersByTime(80);
    expect(onStall).not.toHaveBeenCalled();
  });

  test('touch after stop does not re-arm', () => {
    const onStall = vi.fn();
    const watchdog = new IdleWatchdog(100, onStall);
    watchdog.start();
    watchdog.stop();
    watchdog.touch();
    vi.advanceTimersByTime(500);
    expect(onStall).not.toHaveBeenCalled();
  });

  test('a zero timeout disables the watchdog', () => {
    const onStall = vi.fn();
    const watchdog = new IdleWatchdog(0, onStall);
    watchdog.start();
    vi.advanceTimersByTime(10_000);
    expect(onStall).not.toHaveBeenCalled();
  });
});
