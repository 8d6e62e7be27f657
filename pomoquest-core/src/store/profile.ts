/**
 * Creation and validation of the persisted UserProfile.
 *
 * Validation is strict about types but lenient about missing fields, so a
 * file written by an older release still loads with defaults filled in.
 */

import type { UserProfile, Task, BountyInstance, ProgressStats, HistoryEntry } from '../types/progress';
import { PROGRESS_SCHEMA_VERSION } from '../types/progress';
import { isBountyKind } from '../bounties';
import { levelForXP } from '../xp';

export function createProfile(): UserProfile {
  return {
    schemaVersion: PROGRESS_SCHEMA_VERSION,
    level: 1,
    totalXP: 0,
    tasks: [],
    bounties: [],
    bountyDate: '',
    sessionsToday: 0,
    stats: { sessionsCompleted: 0, focusMinutes: 0 },
    history: [],
    lastSaved: '',
  };
}

/** Thrown by parseProfile; the store wraps it into StoreCorruptionError. */
export class ProfileShapeError extends Error {}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(raw: Raw, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ProfileShapeError(`"${key}" must be a non-negative integer`);
  }
  return value;
}

function text(raw: Raw, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') throw new ProfileShapeError(`"${key}" must be a string`);
  return value;
}

function flag(raw: Raw, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ProfileShapeError(`"${key}" must be a boolean`);
  return value;
}

function list(raw: Raw, key: string): unknown[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ProfileShapeError(`"${key}" must be an array`);
  return value;
}

function parseTask(value: unknown): Task {
  if (!isRecord(value)) throw new ProfileShapeError('task entries must be objects');
  const id = count(value, 'id', 0);
  if (id < 1) throw new ProfileShapeError('task ids must be positive');
  const task: Task = {
    id,
    name: text(value, 'name', ''),
    done: flag(value, 'done', false),
    createdAt: text(value, 'createdAt', ''),
  };
  const completedAt = value.completedAt;
  if (typeof completedAt === 'string') task.completedAt = completedAt;
  return task;
}

function parseBounty(value: unknown): BountyInstance {
  if (!isRecord(value)) throw new ProfileShapeError('bounty entries must be objects');
  if (!isBountyKind(value.kind)) throw new ProfileShapeError(`unknown bounty kind ${JSON.stringify(value.kind)}`);
  return {
    kind: value.kind,
    rewardXP: count(value, 'rewardXP', 0),
    progress: count(value, 'progress', 0),
    target: count(value, 'target', 1),
    completed: flag(value, 'completed', false),
  };
}

function parseHistoryEntry(value: unknown): HistoryEntry {
  if (!isRecord(value)) throw new ProfileShapeError('history entries must be objects');
  return {
    date: text(value, 'date', ''),
    task: text(value, 'task', ''),
    seconds: count(value, 'seconds', 0),
  };
}

function parseStats(value: unknown): ProgressStats {
  if (value === undefined) return { sessionsCompleted: 0, focusMinutes: 0 };
  if (!isRecord(value)) throw new ProfileShapeError('"stats" must be an object');
  return {
    sessionsCompleted: count(value, 'sessionsCompleted', 0),
    focusMinutes: count(value, 'focusMinutes', 0),
  };
}

/**
 * Validates a parsed progress document.
 * The cached level is always re-derived from totalXP.
 */
export function parseProfile(raw: unknown): UserProfile {
  if (!isRecord(raw)) throw new ProfileShapeError('progress document must be an object');

  const totalXP = count(raw, 'totalXP', 0);
  const tasks = list(raw, 'tasks').map(parseTask);
  const ids = new Set<number>();
  for (const task of tasks) {
    if (ids.has(task.id)) throw new ProfileShapeError(`duplicate task id ${task.id}`);
    ids.add(task.id);
  }

  const bounties = list(raw, 'bounties').map(parseBounty);
  if (new Set(bounties.map(b => b.kind)).size !== bounties.length) {
    throw new ProfileShapeError('duplicate bounty kinds');
  }

  return {
    schemaVersion: count(raw, 'schemaVersion', PROGRESS_SCHEMA_VERSION),
    level: levelForXP(totalXP),
    totalXP,
    tasks,
    bounties,
    bountyDate: text(raw, 'bountyDate', ''),
    sessionsToday: count(raw, 'sessionsToday', 0),
    stats: parseStats(raw.stats),
    history: list(raw, 'history').map(parseHistoryEntry),
    lastSaved: text(raw, 'lastSaved', ''),
  };
}

function sameTask(a: Task, b: Task): boolean {
  return a.id === b.id && a.createdAt === b.createdAt && a.name === b.name;
}

/**
 * Folds the tasks currently on disk into an in-memory task list, so a
 * long-running session does not overwrite tasks another process added or
 * completed since it loaded.
 *
 * Disk order wins. A task known to both sides keeps the local object and is
 * done if either side finished it. A local task whose id now belongs to a
 * different task on disk is given the next free id (the object is updated
 * in place, so callers holding it see the new id).
 */
export function mergeTasks(local: readonly Task[], onDisk: readonly Task[]): Task[] {
  const localById = new Map(local.map(t => [t.id, t]));
  const claimed = new Set<Task>();
  let maxId = [...local, ...onDisk].reduce((max, t) => Math.max(max, t.id), 0);

  const merged = onDisk.map(disk => {
    const mine = localById.get(disk.id);
    if (!mine || !sameTask(mine, disk)) return { ...disk };
    claimed.add(mine);
    if (disk.done && !mine.done) {
      mine.done = true;
      if (disk.completedAt !== undefined) mine.completedAt = disk.completedAt;
    }
    return mine;
  });

  const taken = new Set(merged.map(t => t.id));
  for (const task of local) {
    if (claimed.has(task)) continue;
    if (taken.has(task.id)) task.id = ++maxId;
    taken.add(task.id);
    merged.push(task);
  }
  return merged;
}
