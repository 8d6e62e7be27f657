/**
 * Types for the session state machine and its event loop.
 */

import type { SessionAward, BreakSkipAward } from '../ledger/ProgressLedger';

export type SessionPhase = 'work' | 'flow' | 'break' | 'long_break' | 'terminated';

/** Why the engine reached `terminated`. */
export type TerminationReason = 'quit' | 'interrupt' | 'break_complete' | 'break_skipped';

/** Single-key controls accepted while a session runs. */
export const SESSION_KEYS = {
  pause: 'p',
  skip: 's',
  breakFlow: 'b',
  quit: 'q',
  next: 'n',
} as const;

export type SessionEvent =
  | { type: 'tick'; deltaMs: number }
  | { type: 'key'; key: string }
  | { type: 'interrupt' };

/** Running time and counts for the whole run, across sessions. */
export interface RunTotals {
  /** Unpaused time in work and flow. */
  workMs: number;
  workSessions: number;
  /** Unpaused time in breaks. */
  breakMs: number;
  breaks: number;
}

export interface SessionSnapshot {
  phase: SessionPhase;
  /** Length the current phase was started with (0 for flow). */
  plannedMs: number;
  /** Monotonic time spent in the current phase, excluding pauses. */
  elapsedMs: number;
  /** Countdown phases only; 0 otherwise. */
  remainingMs: number;
  paused: boolean;
  pausedThisSession: boolean;
  /** Planned work length of the current session, kept through flow. */
  workPlannedMs: number;
  /** 1-based count of work sessions started in this run. */
  sessionNumber: number;
  totals: RunTotals;
  reason?: TerminationReason;
}

export type SessionEffect =
  | { type: 'phase_changed'; from: SessionPhase; to: SessionPhase; plannedMs: number }
  | { type: 'pause_toggled'; paused: boolean }
  | { type: 'session_completed'; award: SessionAward }
  | { type: 'break_skipped'; award: BreakSkipAward }
  | { type: 'break_finished' }
  | { type: 'quit'; reason: 'quit' | 'interrupt' }
  | { type: 'persist_failed'; message: string };
