import { describe, it, expect, beforeEach } from 'vitest';
import { SessionEngine } from './SessionEngine';
import { ProgressLedger } from '../ledger/ProgressLedger';
import { createProfile } from '../store/profile';
import { DEFAULT_CONFIG } from '../config';
import { StoreWriteError } from '../errors';
import type { UserProfile } from '../types/progress';
import type { ProfileWriter } from '../store/ProgressStore';
import type { SessionEffect } from './types';

const MIN = 60_000;
const TIMINGS = { workMs: 25 * MIN, shortBreakMs: 5 * MIN, longBreakMs: 15 * MIN };

class MemoryWriter implements ProfileWriter {
  saves = 0;
  failNext = false;
  save(_profile: UserProfile): void {
    if (this.failNext) {
      this.failNext = false;
      throw new StoreWriteError('disk full');
    }
    this.saves += 1;
  }
}

let clock: Date;
let profile: UserProfile;
let writer: MemoryWriter;
let engine: SessionEngine;

function tick(e: SessionEngine, ms: number): SessionEffect[] {
  return e.handle({ type: 'tick', deltaMs: ms });
}

function press(e: SessionEngine, key: string): SessionEffect[] {
  return e.handle({ type: 'key', key });
}

function types(effects: SessionEffect[]): string[] {
  return effects.map(e => e.type);
}

function completedAward(effects: SessionEffect[]) {
  for (const e of effects) {
    if (e.type === 'session_completed') return e.award;
  }
  throw new Error('no session_completed effect');
}

beforeEach(() => {
  clock = new Date(2026, 2, 10, 14, 0, 0);
  profile = createProfile();
  writer = new MemoryWriter();
  // rng 0 → marathon, deep_dive, early_bird
  const ledger = new ProgressLedger(profile, writer, DEFAULT_CONFIG.game_balance, { random: () => () => 0 });
  engine = new SessionEngine({ timings: TIMINGS, ledger, now: () => clock });
});

describe('SessionEngine start', () => {
  it('starts in work with the configured duration', () => {
    expect(engine.snapshot()).toEqual({
      phase: 'work',
      plannedMs: 25 * MIN,
      elapsedMs: 0,
      remainingMs: 25 * MIN,
      paused: false,
      pausedThisSession: false,
      workPlannedMs: 25 * MIN,
      sessionNumber: 1,
      totals: { workMs: 0, workSessions: 0, breakMs: 0, breaks: 0 },
      reason: undefined,
    });
  });
});

describe('SessionEngine ticks', () => {
  it('counts down while running', () => {
    tick(engine, 1000);
    expect(engine.snapshot().remainingMs).toBe(25 * MIN - 1000);
  });

  it('ignores negative deltas', () => {
    tick(engine, -5000);
    expect(engine.snapshot().elapsedMs).toBe(0);
  });

  it('enters flow when the work countdown expires, without awarding XP', () => {
    tick(engine, 25 * MIN - 1000);
    expect(engine.snapshot().phase).toBe('work');
    const effects = tick(engine, 1000);
    expect(effects).toEqual([{ type: 'phase_changed', from: 'work', to: 'flow', plannedMs: 0 }]);
    expect(engine.snapshot()).toMatchObject({ phase: 'flow', elapsedMs: 0, remainingMs: 0 });
    expect(profile.totalXP).toBe(0);
    expect(writer.saves).toBe(0);
  });

  it('carries time past the work countdown into flow', () => {
    tick(engine, 24 * MIN);
    tick(engine, 2 * MIN);
    expect(engine.snapshot()).toMatchObject({ phase: 'flow', elapsedMs: MIN });
    const award = completedAward(press(engine, 'b'));
    expect(award.overtimeMinutes).toBe(1);
  });

  it('lets flow run open-ended', () => {
    tick(engine, 25 * MIN);
    for (let i = 0; i < 180; i++) tick(engine, MIN);
    expect(engine.snapshot()).toMatchObject({ phase: 'flow', elapsedMs: 180 * MIN });
  });

  it('terminates when a break expires and waits for the next session', () => {
    press(engine, 's');
    const effects = tick(engine, 5 * MIN);
    expect(types(effects)).toEqual(['phase_changed', 'break_finished']);
    expect(engine.snapshot()).toMatchObject({ phase: 'terminated', reason: 'break_complete' });
    expect(engine.isFinished).toBe(false);
  });
});

describe('SessionEngine pause', () => {
  it('freezes elapsed time while paused', () => {
    tick(engine, 1000);
    press(engine, 'p');
    tick(engine, 10 * MIN);
    expect(engine.snapshot().elapsedMs).toBe(1000);
    press(engine, 'p');
    tick(engine, 1000);
    expect(engine.snapshot().elapsedMs).toBe(2000);
  });

  it('keeps pausedThisSession set after resuming', () => {
    expect(press(engine, 'P')).toEqual([{ type: 'pause_toggled', paused: true }]);
    expect(press(engine, 'p')).toEqual([{ type: 'pause_toggled', paused: false }]);
    expect(engine.snapshot()).toMatchObject({ paused: false, pausedThisSession: true });
  });

  it('can pause during flow', () => {
    tick(engine, 25 * MIN);
    press(engine, 'p');
    tick(engine, 5 * MIN);
    expect(engine.snapshot().elapsedMs).toBe(0);
  });
});

describe('SessionEngine work completion', () => {
  it('awards the base block and overtime when breaking flow', () => {
    tick(engine, 25 * MIN);
    tick(engine, 10 * MIN + 30_000);
    const effects = press(engine, 'b');

    const award = completedAward(effects);
    expect(award.baseXP).toBe(250);
    expect(award.overtimeXP).toBe(200);
    expect(profile.totalXP).toBe(450);
    expect(writer.saves).toBe(1);
  });

  it('extends the following break by the overtime', () => {
    tick(engine, 25 * MIN);
    tick(engine, 10 * MIN + 30_000);
    const effects = press(engine, 'b');
    expect(effects[effects.length - 1]).toEqual({
      type: 'phase_changed', from: 'flow', to: 'break', plannedMs: 15 * MIN + 30_000,
    });
  });

  it('treats skip during flow like breaking flow', () => {
    tick(engine, 25 * MIN);
    tick(engine, 3 * MIN);
    const award = completedAward(press(engine, 's'));
    expect(award.overtimeMinutes).toBe(3);
    expect(engine.snapshot().phase).toBe('break');
  });

  it('awards elapsed whole minutes when skipping work', () => {
    tick(engine, 12 * MIN + 59_000);
    const effects = press(engine, 's');
    const award = completedAward(effects);
    expect(award.baseMinutes).toBe(12);
    expect(award.overtimeXP).toBe(0);
    expect(profile.totalXP).toBe(120);
    expect(engine.snapshot()).toMatchObject({ phase: 'break', plannedMs: 5 * MIN });
  });

  it('ignores b outside flow', () => {
    expect(press(engine, 'b')).toEqual([]);
    expect(engine.snapshot().phase).toBe('work');
    press(engine, 's');
    expect(press(engine, 'b')).toEqual([]);
    expect(engine.snapshot().phase).toBe('break');
  });

  it('ignores unknown keys', () => {
    expect(press(engine, 'x')).toEqual([]);
    expect(press(engine, 'n')).toEqual([]);
  });

  it('withholds Iron Will after a pause, even once resumed', () => {
    profile.bountyDate = '2026-03-10';
    profile.bounties = [{ kind: 'iron_will', rewardXP: 60, progress: 0, target: 1, completed: false }];
    press(engine, 'p');
    press(engine, 'p');
    tick(engine, 25 * MIN);
    const award = completedAward(press(engine, 'b'));
    expect(award.bounties).toEqual([]);
    expect(profile.bounties[0].completed).toBe(false);
  });

  it('grants Iron Will for an unpaused session', () => {
    profile.bountyDate = '2026-03-10';
    profile.bounties = [{ kind: 'iron_will', rewardXP: 60, progress: 0, target: 1, completed: false }];
    tick(engine, 25 * MIN);
    const award = completedAward(press(engine, 'b'));
    expect(award.bountyXP).toBe(60);
    expect(profile.totalXP).toBe(310);
  });

  it('reads the wall clock at completion for time-of-day bounties', () => {
    tick(engine, 25 * MIN);
    clock = new Date(2026, 2, 10, 8, 30);
    const award = completedAward(press(engine, 'b'));
    expect(award.bounties.map(b => b.kind)).toEqual(['early_bird']);
  });

  it('reports a failed save and keeps the timer going', () => {
    writer.failNext = true;
    tick(engine, 25 * MIN);
    const effects = press(engine, 'b');
    expect(effects).toContainEqual({ type: 'persist_failed', message: 'disk full' });
    expect(engine.snapshot().phase).toBe('break');
    expect(profile.totalXP).toBe(250);
  });
});

describe('SessionEngine run totals', () => {
  it('sums unpaused work, flow and break time with counts', () => {
    tick(engine, 25 * MIN);
    tick(engine, 3 * MIN);
    press(engine, 'b');
    press(engine, 'p');
    tick(engine, 10 * MIN);
    press(engine, 'p');
    tick(engine, 2 * MIN);
    press(engine, 's');
    expect(engine.snapshot().totals).toEqual({
      workMs: 28 * MIN,
      workSessions: 1,
      breakMs: 2 * MIN,
      breaks: 1,
    });
  });

  it('does not count a quit session', () => {
    tick(engine, 10 * MIN);
    press(engine, 'q');
    expect(engine.snapshot().totals).toEqual({ workMs: 10 * MIN, workSessions: 0, breakMs: 0, breaks: 0 });
  });
});

describe('SessionEngine history label', () => {
  it('records the label current at completion', () => {
    let label = 'Write docs';
    const ledger = new ProgressLedger(profile, writer, DEFAULT_CONFIG.game_balance, { random: () => () => 0 });
    const labelled = new SessionEngine({ timings: TIMINGS, ledger, now: () => clock, label: () => label });
    press(labelled, 's');
    label = 'Review PR';
    press(labelled, 's');
    press(labelled, 'n');
    press(labelled, 's');
    expect(profile.history.map(h => h.task)).toEqual(['Write docs', 'Review PR']);
  });
});

describe('SessionEngine long breaks', () => {
  it('selects the long break after every 4th session', () => {
    const phases: string[] = [];
    for (let i = 0; i < 8; i++) {
      tick(engine, 25 * MIN);
      press(engine, 'b');
      phases.push(engine.snapshot().phase);
      press(engine, 's');
      press(engine, 'n');
    }
    expect(phases).toEqual(['break', 'break', 'break', 'long_break', 'break', 'break', 'break', 'long_break']);
  });

  it('uses the long break duration', () => {
    profile.sessionsToday = 3;
    profile.bountyDate = '2026-03-10';
    profile.bounties = [{ kind: 'night_owl', rewardXP: 50, progress: 0, target: 1, completed: false }];
    tick(engine, 25 * MIN);
    press(engine, 'b');
    expect(engine.snapshot()).toMatchObject({ phase: 'long_break', plannedMs: 15 * MIN });
  });
});

describe('SessionEngine break skip', () => {
  it('pays for the unused break minutes and terminates', () => {
    press(engine, 's');
    const before = profile.totalXP;
    tick(engine, 2 * MIN - 30_000);
    const effects = press(engine, 's');

    expect(types(effects)).toEqual(['break_skipped', 'phase_changed']);
    expect(profile.totalXP - before).toBe(15);
    expect(engine.snapshot()).toMatchObject({ phase: 'terminated', reason: 'break_skipped' });
  });

  it('does not count a skipped break as a session', () => {
    press(engine, 's');
    const sessions = profile.stats.sessionsCompleted;
    press(engine, 's');
    expect(profile.stats.sessionsCompleted).toBe(sessions);
  });

  it('starts a fresh session with n', () => {
    press(engine, 'p');
    press(engine, 's');
    press(engine, 's');
    const effects = press(engine, 'n');
    expect(effects).toEqual([{ type: 'phase_changed', from: 'terminated', to: 'work', plannedMs: 25 * MIN }]);
    expect(engine.snapshot()).toMatchObject({ phase: 'work', pausedThisSession: false, sessionNumber: 2 });
  });
});

describe('SessionEngine quit', () => {
  it('abandons the work phase without XP', () => {
    tick(engine, 20 * MIN);
    const effects = press(engine, 'q');
    expect(effects).toEqual([
      { type: 'phase_changed', from: 'work', to: 'terminated', plannedMs: 0 },
      { type: 'quit', reason: 'quit' },
    ]);
    expect(profile.totalXP).toBe(0);
    expect(writer.saves).toBe(0);
    expect(engine.isFinished).toBe(true);
  });

  it('treats interrupt like quit', () => {
    tick(engine, 25 * MIN);
    tick(engine, 5 * MIN);
    expect(types(engine.handle({ type: 'interrupt' }))).toEqual(['phase_changed', 'quit']);
    expect(profile.totalXP).toBe(0);
    expect(engine.snapshot().reason).toBe('interrupt');
  });

  it('keeps XP already committed before quitting from a break', () => {
    tick(engine, 25 * MIN);
    press(engine, 'b');
    press(engine, 'q');
    expect(profile.totalXP).toBe(250);
  });

  it('quits from the waiting state after a break', () => {
    press(engine, 's');
    tick(engine, 5 * MIN);
    expect(press(engine, 'q')).toEqual([{ type: 'quit', reason: 'quit' }]);
    expect(engine.isFinished).toBe(true);
  });

  it('ignores every event once finished', () => {
    press(engine, 'q');
    expect(press(engine, 'q')).toEqual([]);
    expect(press(engine, 'n')).toEqual([]);
    expect(tick(engine, 1000)).toEqual([]);
    expect(engine.startNext()).toEqual([]);
  });
});
