/**
 * The single owned profile object for one process run.
 *
 * Commands and the session engine mutate progress only through this class;
 * `save()` hands the whole profile to the store after each mutation.
 */

import type { UserProfile, Task, BountyInstance, HistoryEntry } from '../types/progress';
import type { GameBalanceConfig } from '../types/config';
import type { ProfileWriter } from '../store/ProgressStore';
import type { CompletedBounty, SessionOutcome } from '../bounties';
import type { XPAward, LevelInfo } from '../xp';
import { generateBounties, evaluateBounties, dateSeededRandom, localDateKey } from '../bounties';
import { applyXP, levelInfo, levelForXP, workXP, overtimeXP, breakSkipXP, wholeMinutes } from '../xp';
import { InvalidCommandError } from '../errors';

export const LONG_BREAK_EVERY = 4;

/** History label for a session with no task or label attached. */
export const DEFAULT_SESSION_LABEL = 'General Focus';

/** What a finished work (+ flow) session is worth. */
export interface WorkSessionResult {
  baseMs: number;
  overtimeMs: number;
  completedAt: Date;
  pausedThisSession: boolean;
  label?: string;
}

export interface SessionAward {
  baseMinutes: number;
  overtimeMinutes: number;
  baseXP: number;
  overtimeXP: number;
  bounties: CompletedBounty[];
  bountyXP: number;
  /** Combined award for work, overtime and bounties. */
  xp: XPAward;
  sessionsToday: number;
  longBreak: boolean;
}

export interface BreakSkipAward {
  remainingMinutes: number;
  xp: XPAward;
}

export interface LedgerOptions {
  random?: (dateKey: string) => () => number;
}

export class ProgressLedger {
  private readonly drawRandom: (dateKey: string) => () => number;

  constructor(
    private readonly profile: UserProfile,
    private readonly writer: ProfileWriter,
    private readonly balance: GameBalanceConfig,
    opts: LedgerOptions = {},
  ) {
    this.drawRandom = opts.random ?? dateSeededRandom;
    this.profile.level = levelForXP(this.profile.totalXP);
  }

  /** Read-only view for rendering. */
  get snapshot(): Readonly<UserProfile> {
    return this.profile;
  }

  get bounties(): readonly BountyInstance[] {
    return this.profile.bounties;
  }

  get sessionsToday(): number {
    return this.profile.sessionsToday;
  }

  levelInfo(): LevelInfo {
    return levelInfo(this.profile.totalXP);
  }

  /** @throws StoreWriteError */
  save(): void {
    this.writer.save(this.profile);
  }

  /**
   * Draws a new bounty set when the local date differs from bountyDate.
   * Resets the day's session counter alongside. Returns true if it rolled over.
   */
  refreshBounties(now: Date): boolean {
    const today = localDateKey(now);
    if (this.profile.bountyDate === today && this.profile.bounties.length > 0) return false;
    this.profile.bounties = generateBounties(this.drawRandom(today));
    this.profile.bountyDate = today;
    this.profile.sessionsToday = 0;
    return true;
  }

  /**
   * Records a completed work session: base and overtime XP, bounty
   * progress, cumulative stats, the day's session counter and a history
   * entry.
   * Does not save; the caller commits.
   */
  recordSession(result: WorkSessionResult): SessionAward {
    this.refreshBounties(result.completedAt);

    const baseMinutes = wholeMinutes(result.baseMs);
    const overtimeMinutes = wholeMinutes(result.overtimeMs);
    const base = workXP(baseMinutes, this.balance);
    const overtime = overtimeXP(overtimeMinutes, this.balance);

    const outcome: SessionOutcome = {
      totalMinutes: baseMinutes + overtimeMinutes,
      completedAt: result.completedAt,
      pausedThisSession: result.pausedThisSession,
    };
    const bounties = evaluateBounties(this.profile.bounties, outcome);
    const bountyXP = bounties.reduce((sum, b) => sum + b.rewardXP, 0);

    const xp = this.addXP(base + overtime + bountyXP);

    this.profile.sessionsToday += 1;
    this.profile.stats.sessionsCompleted += 1;
    this.profile.stats.focusMinutes += outcome.totalMinutes;
    this.profile.history.push({
      date: result.completedAt.toISOString(),
      task: result.label ?? DEFAULT_SESSION_LABEL,
      seconds: Math.floor((result.baseMs + result.overtimeMs) / 1000),
    });

    return {
      baseMinutes,
      overtimeMinutes,
      baseXP: base,
      overtimeXP: overtime,
      bounties,
      bountyXP,
      xp,
      sessionsToday: this.profile.sessionsToday,
      longBreak: this.profile.sessionsToday % LONG_BREAK_EVERY === 0,
    };
  }

  /** Bonus for returning to work early. Does not count as a session. */
  awardBreakSkip(remainingMs: number): BreakSkipAward {
    const remainingMinutes = wholeMinutes(remainingMs);
    return { remainingMinutes, xp: this.addXP(breakSkipXP(remainingMinutes, this.balance)) };
  }

  /** Most recent first. */
  recentHistory(limit: number): HistoryEntry[] {
    return this.profile.history.slice(-limit).reverse();
  }

  pendingTasks(): Task[] {
    return this.profile.tasks.filter(t => !t.done);
  }

  findPendingTask(id: number): Task | undefined {
    return this.profile.tasks.find(t => t.id === id && !t.done);
  }

  /**
   * Appends a task with id max(existing) + 1. Completed tasks are retained,
   * so ids are never reused.
   * @throws InvalidCommandError for a blank name
   */
  addTask(name: string, now: Date = new Date()): Task {
    const trimmed = name.trim();
    if (!trimmed) throw new InvalidCommandError('Task name must not be empty');
    const id = this.profile.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
    const task: Task = { id, name: trimmed, done: false, createdAt: now.toISOString() };
    this.profile.tasks.push(task);
    return task;
  }

  /** @throws InvalidCommandError when no pending task has this id */
  completeTask(id: number, now: Date = new Date()): Task {
    const task = this.profile.tasks.find(t => t.id === id);
    if (!task) throw new InvalidCommandError(`Task ${id} not found`);
    if (task.done) throw new InvalidCommandError(`Task ${id} is already done`);
    task.done = true;
    task.completedAt = now.toISOString();
    return task;
  }

  private addXP(amount: number): XPAward {
    const award = applyXP(this.profile.totalXP, amount);
    this.profile.totalXP = award.totalXP;
    this.profile.level = award.levelAfter;
    return award;
  }
}
