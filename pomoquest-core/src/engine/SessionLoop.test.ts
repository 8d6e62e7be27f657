import { describe, it, expect, beforeEach } from 'vitest';
import { SessionLoop } from './SessionLoop';
import { SessionEngine } from './SessionEngine';
import { ProgressLedger } from '../ledger/ProgressLedger';
import { createProfile } from '../store/profile';
import { DEFAULT_CONFIG } from '../config';
import type { UserProfile } from '../types/progress';
import type { StatusSink } from '../status/FileStatusSink';
import type { SessionEffect, SessionSnapshot } from './types';

const MIN = 60_000;

class RecordingSink implements StatusSink {
  lines: string[] = [];
  cleared = false;
  publish(text: string): void {
    this.lines.push(text);
  }
  flush(): Promise<void> {
    return Promise.resolve();
  }
  clear(): void {
    this.cleared = true;
  }
}

let profile: UserProfile;
let engine: SessionEngine;
let sink: RecordingSink;

beforeEach(() => {
  profile = createProfile();
  const ledger = new ProgressLedger(profile, { save: () => {} }, DEFAULT_CONFIG.game_balance, { random: () => () => 0 });
  engine = new SessionEngine({
    timings: { workMs: 2 * MIN, shortBreakMs: MIN, longBreakMs: 3 * MIN },
    ledger,
    now: () => new Date(2026, 2, 10, 14, 0),
  });
  sink = new RecordingSink();
});

describe('SessionLoop', () => {
  it('publishes a status line per event and clears on exit', async () => {
    const loop = new SessionLoop({ engine, sink });
    loop.push({ type: 'tick', deltaMs: 1000 });
    loop.push({ type: 'key', key: 'q' });

    const summary = await loop.run();

    expect(sink.lines).toEqual(['WORK 02:00', 'WORK 01:59', '']);
    expect(sink.cleared).toBe(true);
    expect(summary).toEqual({ reason: 'quit', sessionsCompleted: 0, xpEarned: 0, levelUps: 0 });
  });

  it('applies events in arrival order', async () => {
    const phases: string[] = [];
    const loop = new SessionLoop({
      engine,
      onUpdate: (snapshot: SessionSnapshot) => phases.push(snapshot.phase),
    });
    loop.push({ type: 'tick', deltaMs: 2 * MIN });
    loop.push({ type: 'tick', deltaMs: 5 * MIN });
    loop.push({ type: 'key', key: 'b' });
    loop.push({ type: 'interrupt' });

    const summary = await loop.run();

    expect(phases).toEqual(['work', 'flow', 'flow', 'break', 'terminated']);
    expect(summary.reason).toBe('interrupt');
    expect(summary.sessionsCompleted).toBe(1);
    expect(summary.xpEarned).toBe(20 + 100);
  });

  it('accepts events pushed while it is waiting', async () => {
    const loop = new SessionLoop({ engine });
    const done = loop.run();
    await Promise.resolve();
    loop.push({ type: 'key', key: 's' });
    loop.push({ type: 'key', key: 'q' });
    const summary = await done;
    expect(summary.sessionsCompleted).toBe(1);
  });

  it('goes back to work after a skipped break', async () => {
    const effects: SessionEffect[][] = [];
    const loop = new SessionLoop({ engine, onUpdate: (_s, e) => effects.push(e) });
    loop.push({ type: 'key', key: 's' });
    loop.push({ type: 'key', key: 's' });
    loop.push({ type: 'key', key: 'q' });
    await loop.run();

    expect(effects[2].map(e => e.type)).toEqual(['break_skipped', 'phase_changed', 'phase_changed']);
    expect(effects[2][2]).toEqual({ type: 'phase_changed', from: 'terminated', to: 'work', plannedMs: 2 * MIN });
  });

  it('waits for n after a break ends naturally', async () => {
    const phases: string[] = [];
    const loop = new SessionLoop({ engine, onUpdate: s => phases.push(s.phase) });
    loop.push({ type: 'key', key: 's' });
    loop.push({ type: 'tick', deltaMs: MIN });
    loop.push({ type: 'tick', deltaMs: MIN });
    loop.push({ type: 'key', key: 'n' });
    loop.push({ type: 'key', key: 'q' });
    await loop.run();

    expect(phases).toEqual(['work', 'break', 'terminated', 'terminated', 'work', 'terminated']);
  });

  it('drops events pushed after the run ends', async () => {
    const loop = new SessionLoop({ engine, sink });
    loop.push({ type: 'key', key: 'q' });
    await loop.run();
    loop.push({ type: 'key', key: 'n' });
    expect(engine.isFinished).toBe(true);
  });
});
