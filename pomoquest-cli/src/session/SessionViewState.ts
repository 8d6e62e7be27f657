/**
 * View model for the interactive session screen.
 *
 * Folds the loop's (snapshot, effects) updates into what the ink view
 * draws: toasts for awards and failures, the "did you finish" prompt for
 * an attached task, and the key hints for the current phase.
 */

import { SESSION_KEYS, DEFAULT_SESSION_LABEL, getBountyDefinition, errorMessage } from 'pomoquest-core';
import type {
  ProgressLedger,
  SessionEffect,
  SessionEvent,
  SessionPhase,
  SessionSnapshot,
  LevelInfo,
  Task,
} from 'pomoquest-core';

export type ToastSeverity = 'error' | 'warning' | 'info' | 'success';

export interface ToastEntry {
  id: number;
  message: string;
  severity: ToastSeverity;
  expiresAt: number;
}

const TOAST_DURATIONS: Record<ToastSeverity, number> = {
  error: 4000,
  warning: 3000,
  info: 2000,
  success: 3000,
};

export interface KeyHint {
  key: string;
  label: string;
}

export interface BountyLine {
  title: string;
  description: string;
  rewardXP: number;
  progress: number;
  target: number;
  completed: boolean;
}

export interface SessionViewModel {
  snapshot: SessionSnapshot;
  level: LevelInfo;
  sessionsToday: number;
  bounties: BountyLine[];
  task: Task | null;
  /** What the current session is recorded under in history. */
  label: string;
  /** Task awaiting a y/n answer, if any. */
  prompt: Task | null;
  toasts: ToastEntry[];
  hints: KeyHint[];
}

export interface SessionViewStateOptions {
  ledger: ProgressLedger;
  initial: SessionSnapshot;
  /** Pending task attached with `start --task`. */
  task?: Task;
  /** Free-text label from `start --label`. */
  label?: string;
  clock?: () => number;
}

export function keyHints(phase: SessionPhase, prompting = false): KeyHint[] {
  if (prompting) {
    return [{ key: 'y', label: 'finished' }, { key: 'n', label: 'not yet' }, { key: SESSION_KEYS.quit, label: 'quit' }];
  }
  switch (phase) {
    case 'work':
      return [
        { key: SESSION_KEYS.pause, label: 'pause' },
        { key: SESSION_KEYS.skip, label: 'finish now' },
        { key: SESSION_KEYS.quit, label: 'quit' },
      ];
    case 'flow':
      return [
        { key: SESSION_KEYS.breakFlow, label: 'take break' },
        { key: SESSION_KEYS.pause, label: 'pause' },
        { key: SESSION_KEYS.quit, label: 'quit' },
      ];
    case 'break':
    case 'long_break':
      return [
        { key: SESSION_KEYS.pause, label: 'pause' },
        { key: SESSION_KEYS.skip, label: 'skip break' },
        { key: SESSION_KEYS.quit, label: 'quit' },
      ];
    case 'terminated':
      return [
        { key: SESSION_KEYS.next, label: 'next session' },
        { key: SESSION_KEYS.quit, label: 'quit' },
      ];
  }
}

export class SessionViewState {
  private readonly ledger: ProgressLedger;
  private readonly clock: () => number;
  private snapshot: SessionSnapshot;
  private task: Task | null;
  private readonly customLabel: string | undefined;
  private prompt: Task | null = null;
  private toasts: ToastEntry[] = [];
  private nextToastId = 0;

  constructor(opts: SessionViewStateOptions) {
    this.ledger = opts.ledger;
    this.snapshot = opts.initial;
    this.task = opts.task ?? null;
    this.customLabel = opts.label;
    this.clock = opts.clock ?? (() => Date.now());
  }

  get prompting(): boolean {
    return this.prompt !== null;
  }

  /** A --label wins, then the attached task while it is open. */
  get label(): string {
    return this.customLabel ?? this.task?.name ?? DEFAULT_SESSION_LABEL;
  }

  apply(snapshot: SessionSnapshot, effects: readonly SessionEffect[]): void {
    this.snapshot = snapshot;
    for (const effect of effects) {
      this.applyEffect(effect);
    }
    this.prune();
  }

  addToast(message: string, severity: ToastSeverity): void {
    this.toasts.push({
      id: ++this.nextToastId,
      message,
      severity,
      expiresAt: this.clock() + TOAST_DURATIONS[severity],
    });
  }

  /**
   * Maps a keypress to a loop event. Returns null when the key was
   * consumed here (prompt answers) or means nothing.
   */
  handleInput(input: string, ctrl: boolean): SessionEvent | null {
    if (ctrl && input === 'c') return { type: 'interrupt' };
    if (ctrl || !input) return null;

    const key = input.toLowerCase();
    if (this.prompt && (key === 'y' || key === 'n')) {
      this.answerPrompt(key === 'y');
      return null;
    }
    return { type: 'key', key };
  }

  answerPrompt(finished: boolean): void {
    const task = this.prompt;
    if (!task) return;
    this.prompt = null;
    if (!finished) return;

    try {
      this.ledger.completeTask(task.id);
      this.ledger.save();
      this.task = null;
      this.addToast(`Task #${task.id} done: ${task.name}`, 'success');
    } catch (err) {
      this.addToast(errorMessage(err), 'error');
    }
  }

  getModel(): SessionViewModel {
    this.prune();
    return {
      snapshot: this.snapshot,
      level: this.ledger.levelInfo(),
      sessionsToday: this.ledger.sessionsToday,
      bounties: this.ledger.bounties.map(b => {
        const def = getBountyDefinition(b.kind);
        return {
          title: def.title,
          description: def.description,
          rewardXP: b.rewardXP,
          progress: b.progress,
          target: b.target,
          completed: b.completed,
        };
      }),
      task: this.task,
      label: this.label,
      prompt: this.prompt,
      toasts: [...this.toasts],
      hints: keyHints(this.snapshot.phase, this.prompt !== null),
    };
  }

  private applyEffect(effect: SessionEffect): void {
    switch (effect.type) {
      case 'session_completed': {
        const { award } = effect;
        const flow = award.overtimeMinutes > 0 ? `, ${award.overtimeMinutes}m flow` : '';
        this.addToast(`+${award.baseXP + award.overtimeXP} XP (${award.baseMinutes}m focus${flow})`, 'success');
        for (const bounty of award.bounties) {
          this.addToast(`Bounty complete: ${bounty.title} +${bounty.rewardXP} XP`, 'success');
        }
        if (award.xp.leveledUp) this.addToast(`Level up! You reached level ${award.xp.levelAfter}`, 'success');
        if (this.task && this.ledger.findPendingTask(this.task.id)) this.prompt = this.task;
        break;
      }
      case 'break_skipped': {
        const { award } = effect;
        this.addToast(award.xp.amount > 0 ? `Break skipped: +${award.xp.amount} XP` : 'Break skipped', 'info');
        if (award.xp.leveledUp) this.addToast(`Level up! You reached level ${award.xp.levelAfter}`, 'success');
        break;
      }
      case 'break_finished':
        this.addToast(`Break over. Press ${SESSION_KEYS.next} for the next session`, 'info');
        break;
      case 'persist_failed':
        this.addToast(effect.message, 'error');
        break;
      case 'phase_changed':
        // An unanswered question does not outlive the break; it comes back after the next session
        if (effect.from === 'break' || effect.from === 'long_break') this.prompt = null;
        break;
      case 'pause_toggled':
      case 'quit':
        break;
    }
  }

  private prune(): void {
    const now = this.clock();
    this.toasts = this.toasts.filter(t => t.expiresAt > now);
  }
}
