/**
 * Single consumer for a running session.
 *
 * Producers (the ticker, the keyboard, process signals) only push onto the
 * queue; this loop is the one place that feeds the engine, so no two events
 * are ever applied concurrently. The only suspension point is waiting for
 * the next event.
 */

import type { SessionEngine } from './SessionEngine';
import type { SessionEvent, SessionEffect, SessionSnapshot } from './types';
import type { StatusSink } from '../status/FileStatusSink';
import { EventQueue } from './EventQueue';
import { formatStatus } from '../status/statusLine';

export interface SessionLoopOptions {
  engine: SessionEngine;
  sink?: StatusSink;
  /** Called after every handled event (and once before the first). */
  onUpdate?: (snapshot: SessionSnapshot, effects: SessionEffect[]) => void;
  /** Go straight back to work after a skipped break. Default true. */
  resumeAfterBreakSkip?: boolean;
}

export interface SessionSummary {
  reason: 'quit' | 'interrupt';
  sessionsCompleted: number;
  xpEarned: number;
  levelUps: number;
}

export class SessionLoop {
  private readonly queue = new EventQueue<SessionEvent>();
  private readonly engine: SessionEngine;
  private readonly sink?: StatusSink;
  private readonly onUpdate?: SessionLoopOptions['onUpdate'];
  private readonly resumeAfterBreakSkip: boolean;

  constructor(opts: SessionLoopOptions) {
    this.engine = opts.engine;
    this.sink = opts.sink;
    this.onUpdate = opts.onUpdate;
    this.resumeAfterBreakSkip = opts.resumeAfterBreakSkip ?? true;
  }

  /** Producer entry point. Safe to call from timers, input handlers and signal handlers. */
  push(event: SessionEvent): void {
    this.queue.push(event);
  }

  async run(): Promise<SessionSummary> {
    const summary: SessionSummary = { reason: 'quit', sessionsCompleted: 0, xpEarned: 0, levelUps: 0 };
    this.publish([]);

    try {
      for await (const event of this.queue) {
        const effects = this.engine.handle(event);
        if (this.resumeAfterBreakSkip && effects.some(e => e.type === 'break_skipped')) {
          effects.push(...this.engine.startNext());
        }
        tally(summary, effects);
        this.publish(effects);
        if (this.engine.isFinished) break;
      }
    } finally {
      this.queue.close();
      if (this.sink) {
        await this.sink.flush();
        this.sink.clear();
      }
    }

    return summary;
  }

  private publish(effects: SessionEffect[]): void {
    const snapshot = this.engine.snapshot();
    this.sink?.publish(formatStatus(snapshot));
    this.onUpdate?.(snapshot, effects);
  }
}

function tally(summary: SessionSummary, effects: SessionEffect[]): void {
  for (const effect of effects) {
    switch (effect.type) {
      case 'session_completed':
        summary.sessionsCompleted += 1;
        summary.xpEarned += effect.award.xp.amount;
        if (effect.award.xp.leveledUp) summary.levelUps += 1;
        break;
      case 'break_skipped':
        summary.xpEarned += effect.award.xp.amount;
        if (effect.award.xp.leveledUp) summary.levelUps += 1;
        break;
      case 'quit':
        summary.reason = effect.reason;
        break;
    }
  }
}
