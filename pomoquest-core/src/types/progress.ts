/**
 * On-disk schema types for the player's progress record.
 * Game-balance constants are not stored here; they live in config.json.
 */

export const PROGRESS_SCHEMA_VERSION = 1;

export type BountyKind = 'marathon' | 'deep_dive' | 'early_bird' | 'night_owl' | 'iron_will';

export interface Task {
  id: number;
  name: string;
  done: boolean;
  createdAt: string;
  completedAt?: string;
}

export interface BountyInstance {
  kind: BountyKind;
  rewardXP: number;
  /** Kind-specific counter (sessions today for Marathon, 0/1 for the rest). */
  progress: number;
  target: number;
  completed: boolean;
}

/** One completed work session, appended to the profile's history. */
export interface HistoryEntry {
  /** ISO timestamp of completion. */
  date: string;
  /** Session label: the attached task, a free-text label, or the default. */
  task: string;
  /** Focused seconds, flow included. */
  seconds: number;
}

export interface ProgressStats {
  sessionsCompleted: number;
  focusMinutes: number;
}

export interface UserProfile {
  schemaVersion: number;
  /** Cached; always equal to levelForXP(totalXP). */
  level: number;
  totalXP: number;
  tasks: Task[];
  bounties: BountyInstance[];
  /** Local calendar date (YYYY-MM-DD) the bounty set was drawn for. */
  bountyDate: string;
  /** Completed work sessions on bountyDate. */
  sessionsToday: number;
  stats: ProgressStats;
  history: HistoryEntry[];
  lastSaved: string;
}
