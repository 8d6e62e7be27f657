import { describe, it, expect, vi, afterEach } from 'vitest';
import { startTicker } from './ticker';
import type { SessionEvent } from './types';

afterEach(() => {
  vi.useRealTimers();
});

describe('startTicker', () => {
  it('pushes the monotonic delta since the previous tick', () => {
    vi.useFakeTimers();
    const readings = [100, 1100, 3600];
    let i = 0;
    const clock = () => readings[Math.min(i++, readings.length - 1)];
    const events: SessionEvent[] = [];

    const ticker = startTicker(e => events.push(e), 1000, clock);
    vi.advanceTimersByTime(2000);
    ticker.stop();

    expect(events).toEqual([
      { type: 'tick', deltaMs: 1000 },
      { type: 'tick', deltaMs: 2500 },
    ]);
  });

  it('stops producing after stop()', () => {
    vi.useFakeTimers();
    const events: SessionEvent[] = [];
    const ticker = startTicker(e => events.push(e), 1000, () => 0);
    ticker.stop();
    vi.advanceTimersByTime(5000);
    expect(events).toEqual([]);
  });
});
