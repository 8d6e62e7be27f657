/**
 * Periodic tick producer. Each tick carries the monotonic time elapsed since
 * the previous one, so a late timer or a suspended machine never shortens
 * or stretches a phase by wall-clock jumps.
 */

import { performance } from 'perf_hooks';
import type { SessionEvent } from './types';

export const TICK_INTERVAL_MS = 1000;

export interface Ticker {
  stop(): void;
}

export function startTicker(
  push: (event: SessionEvent) => void,
  intervalMs: number = TICK_INTERVAL_MS,
  clock: () => number = () => performance.now(),
): Ticker {
  let last = clock();
  const timer = setInterval(() => {
    const now = clock();
    const deltaMs = now - last;
    last = now;
    push({ type: 'tick', deltaMs });
  }, intervalMs);

  return {
    stop: () => clearInterval(timer),
  };
}
