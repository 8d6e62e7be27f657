/**
 * State machine for one timer run.
 *
 *   work --(countdown expires)--> flow --(b | s)--> break | long_break
 *   work --(s)--> break | long_break
 *   break | long_break --(expires)--> terminated(break_complete)
 *   break | long_break --(s)--> terminated(break_skipped)
 *   terminated(break_*) --(n)--> work
 *   any --(q | interrupt)--> terminated(quit | interrupt)
 *
 * Every (state, event) pair is handled; events that make no sense in the
 * current phase return no effects. XP is committed when a break begins or
 * is skipped, never per tick.
 */

import type { SessionTimings } from '../types/config';
import type { ProgressLedger } from '../ledger/ProgressLedger';
import type {
  SessionPhase,
  SessionEvent,
  SessionEffect,
  SessionSnapshot,
  TerminationReason,
  RunTotals,
} from './types';
import { SESSION_KEYS } from './types';
import { errorMessage } from '../errors';

export interface SessionEngineOptions {
  timings: SessionTimings;
  ledger: ProgressLedger;
  /** Wall clock, read when a session completes (Early Bird / Night Owl). */
  now?: () => Date;
  /** Label recorded in history when a session completes; read at completion. */
  label?: () => string | undefined;
}

export class SessionEngine {
  private readonly timings: SessionTimings;
  private readonly ledger: ProgressLedger;
  private readonly now: () => Date;
  private readonly label: () => string | undefined;

  private phase: SessionPhase = 'work';
  private plannedMs = 0;
  private elapsedMs = 0;
  private paused = false;
  private pausedThisSession = false;
  private sessionNumber = 0;
  private reason: TerminationReason | undefined;
  private totals: RunTotals = { workMs: 0, workSessions: 0, breakMs: 0, breaks: 0 };

  constructor(opts: SessionEngineOptions) {
    this.timings = opts.timings;
    this.ledger = opts.ledger;
    this.now = opts.now ?? (() => new Date());
    this.label = opts.label ?? (() => undefined);
    this.enterWork();
  }

  /** True once the run is over (quit or interrupt); breaks ending do not count. */
  get isFinished(): boolean {
    return this.phase === 'terminated' && (this.reason === 'quit' || this.reason === 'interrupt');
  }

  snapshot(): SessionSnapshot {
    const countdown = this.phase === 'work' || this.phase === 'break' || this.phase === 'long_break';
    return {
      phase: this.phase,
      plannedMs: this.plannedMs,
      elapsedMs: this.elapsedMs,
      remainingMs: countdown ? Math.max(0, this.plannedMs - this.elapsedMs) : 0,
      paused: this.paused,
      pausedThisSession: this.pausedThisSession,
      workPlannedMs: this.timings.workMs,
      sessionNumber: this.sessionNumber,
      totals: { ...this.totals },
      reason: this.reason,
    };
  }

  handle(event: SessionEvent): SessionEffect[] {
    switch (event.type) {
      case 'tick':
        return this.tick(event.deltaMs);
      case 'interrupt':
        return this.terminate('interrupt');
      case 'key':
        return this.key(event.key.toLowerCase());
    }
  }

  /** Starts the next work session after a break. No-op in any other state. */
  startNext(): SessionEffect[] {
    if (this.phase !== 'terminated' || this.isFinished) return [];
    return [this.enterWork()];
  }

  private key(key: string): SessionEffect[] {
    if (key === SESSION_KEYS.quit) return this.terminate('quit');
    if (this.phase === 'terminated') {
      return key === SESSION_KEYS.next ? this.startNext() : [];
    }

    switch (key) {
      case SESSION_KEYS.pause:
        this.paused = !this.paused;
        if (this.paused) this.pausedThisSession = true;
        return [{ type: 'pause_toggled', paused: this.paused }];

      case SESSION_KEYS.skip:
        if (this.phase === 'work') return this.completeWork(this.elapsedMs, 0);
        if (this.phase === 'flow') return this.completeWork(this.timings.workMs, this.elapsedMs);
        return this.skipBreak();

      case SESSION_KEYS.breakFlow:
        if (this.phase !== 'flow') return [];
        return this.completeWork(this.timings.workMs, this.elapsedMs);

      default:
        return [];
    }
  }

  private tick(deltaMs: number): SessionEffect[] {
    if (this.phase === 'terminated' || this.paused) return [];
    const delta = Math.max(0, deltaMs);
    this.elapsedMs += delta;
    if (this.phase === 'work' || this.phase === 'flow') {
      this.totals.workMs += delta;
    } else {
      this.totals.breakMs += delta;
    }

    if (this.elapsedMs < this.plannedMs) return [];

    if (this.phase === 'work') {
      // The planned work length is banked as base; time past it is overtime
      this.phase = 'flow';
      this.elapsedMs -= this.plannedMs;
      this.plannedMs = 0;
      return [{ type: 'phase_changed', from: 'work', to: 'flow', plannedMs: 0 }];
    }

    if (this.phase === 'break' || this.phase === 'long_break') {
      const from = this.phase;
      this.totals.breaks += 1;
      this.setTerminated('break_complete');
      return [
        { type: 'phase_changed', from, to: 'terminated', plannedMs: 0 },
        { type: 'break_finished' },
      ];
    }

    return [];
  }

  private completeWork(baseMs: number, overtimeMs: number): SessionEffect[] {
    const from = this.phase;
    const award = this.ledger.recordSession({
      baseMs,
      overtimeMs,
      completedAt: this.now(),
      pausedThisSession: this.pausedThisSession,
      label: this.label(),
    });
    this.totals.workSessions += 1;
    const effects: SessionEffect[] = [{ type: 'session_completed', award }];
    this.commit(effects);

    const breakPhase: SessionPhase = award.longBreak ? 'long_break' : 'break';
    const baseBreakMs = award.longBreak ? this.timings.longBreakMs : this.timings.shortBreakMs;
    this.phase = breakPhase;
    this.plannedMs = baseBreakMs + overtimeMs;
    this.elapsedMs = 0;
    this.paused = false;
    effects.push({ type: 'phase_changed', from, to: breakPhase, plannedMs: this.plannedMs });
    return effects;
  }

  private skipBreak(): SessionEffect[] {
    const from = this.phase;
    const award = this.ledger.awardBreakSkip(Math.max(0, this.plannedMs - this.elapsedMs));
    const effects: SessionEffect[] = [{ type: 'break_skipped', award }];
    if (award.xp.amount > 0) this.commit(effects);
    this.totals.breaks += 1;
    this.setTerminated('break_skipped');
    effects.push({ type: 'phase_changed', from, to: 'terminated', plannedMs: 0 });
    return effects;
  }

  private terminate(reason: 'quit' | 'interrupt'): SessionEffect[] {
    if (this.isFinished) return [];
    const from = this.phase;
    this.setTerminated(reason);
    const effects: SessionEffect[] = [{ type: 'quit', reason }];
    if (from !== 'terminated') {
      effects.unshift({ type: 'phase_changed', from, to: 'terminated', plannedMs: 0 });
    }
    return effects;
  }

  private enterWork(): SessionEffect {
    const from = this.phase;
    this.phase = 'work';
    this.plannedMs = this.timings.workMs;
    this.elapsedMs = 0;
    this.paused = false;
    this.pausedThisSession = false;
    this.reason = undefined;
    this.sessionNumber += 1;
    return { type: 'phase_changed', from, to: 'work', plannedMs: this.plannedMs };
  }

  private setTerminated(reason: TerminationReason): void {
    this.phase = 'terminated';
    this.reason = reason;
    this.plannedMs = 0;
    this.elapsedMs = 0;
    this.paused = false;
  }

  /** A failed save is reported, never thrown: the timer keeps running. */
  private commit(effects: SessionEffect[]): void {
    try {
      this.ledger.save();
    } catch (err) {
      effects.push({ type: 'persist_failed', message: errorMessage(err) });
    }
  }
}
