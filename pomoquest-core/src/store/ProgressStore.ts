/**
 * Durable progress record: ~/.local/share/pomoquest/progress.json.
 *
 * Read in full at startup, written in full (atomic replace) after every
 * mutation. An unreadable file is moved aside and replaced with a fresh
 * profile rather than stopping the program.
 */

import * as fs from 'fs';
import type { UserProfile, Task } from '../types/progress';
import { getProgressPath, getLockPath } from '../paths';
import { StoreCorruptionError, StoreWriteError, SessionLockedError, errorMessage } from '../errors';
import { createProfile, parseProfile, mergeTasks, ProfileShapeError } from './profile';
import { writeJsonAtomic, readTextIfExists, isErrnoException } from './helpers';

export interface LoadedProgress {
  profile: UserProfile;
  /** Set when the previous file was unreadable and has been backed up. */
  recovered?: StoreCorruptionError;
}

export interface SessionLock {
  readonly path: string;
  release(): void;
}

/** Minimal persistence surface the ledger depends on. */
export interface ProfileWriter {
  save(profile: UserProfile): void;
}

export interface ProgressStoreOptions {
  filePath?: string;
  lockPath?: string;
  now?: () => Date;
}

export class ProgressStore implements ProfileWriter {
  readonly filePath: string;
  readonly lockPath: string;
  private readonly now: () => Date;

  constructor(opts: ProgressStoreOptions = {}) {
    this.filePath = opts.filePath ?? getProgressPath();
    this.lockPath = opts.lockPath ?? getLockPath();
    this.now = opts.now ?? (() => new Date());
  }

  load(): LoadedProgress {
    let content: string | null;
    try {
      content = readTextIfExists(this.filePath);
    } catch (err) {
      return this.recover(`cannot read ${this.filePath}: ${errorMessage(err)}`);
    }
    if (content === null) {
      return { profile: createProfile() };
    }

    try {
      return { profile: parseProfile(JSON.parse(content)) };
    } catch (err) {
      return this.recover(`${this.filePath} is corrupt (${errorMessage(err)})`);
    }
  }

  /**
   * Atomically replaces the progress file. Tasks written by another process
   * since this profile was loaded are merged into `profile.tasks` first.
   * @throws StoreWriteError
   */
  save(profile: UserProfile): void {
    profile.lastSaved = this.now().toISOString();
    try {
      const onDisk = this.readTasksOnDisk();
      if (onDisk) profile.tasks = mergeTasks(profile.tasks, onDisk);
      writeJsonAtomic(this.filePath, profile);
    } catch (err) {
      throw new StoreWriteError(`Failed to save progress to ${this.filePath}: ${errorMessage(err)}`);
    }
  }

  /**
   * Best-effort single-session guard. A lock held by a live pid rejects the
   * caller unless `force` is set; a lock left by a dead process is taken over.
   * @throws SessionLockedError
   */
  acquireLock(force = false): SessionLock {
    const holder = this.readLockPid();
    if (holder !== null && holder !== process.pid && !force && isProcessAlive(holder)) {
      throw new SessionLockedError(holder);
    }

    writeJsonAtomic(this.lockPath, { pid: process.pid, startedAt: this.now().toISOString() });

    const lockPath = this.lockPath;
    let released = false;
    return {
      path: lockPath,
      release: () => {
        if (released) return;
        released = true;
        if (this.readLockPid() !== process.pid) return;
        try {
          fs.unlinkSync(lockPath);
        } catch (err) {
          if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
        }
      },
    };
  }

  /** Null when there is no file, or one too damaged to merge from. */
  private readTasksOnDisk(): Task[] | null {
    const content = readTextIfExists(this.filePath);
    if (content === null) return null;
    try {
      return parseProfile(JSON.parse(content)).tasks;
    } catch (err) {
      if (err instanceof SyntaxError || err instanceof ProfileShapeError) return null;
      throw err;
    }
  }

  /** Null for a missing or garbled lock file, which counts as stale. */
  private readLockPid(): number | null {
    const content = readTextIfExists(this.lockPath);
    if (content === null) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      if (err instanceof SyntaxError) return null;
      throw err;
    }
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
    return null;
  }

  private recover(reason: string): LoadedProgress {
    const backupPath = `${this.filePath}.corrupt-${this.now().getTime()}`;
    let moved = true;
    try {
      fs.renameSync(this.filePath, backupPath);
    } catch (err) {
      if (!isErrnoException(err)) throw err;
      moved = false;
    }
    const message = moved
      ? `${reason}; moved it to ${backupPath} and started fresh`
      : `${reason}; starting fresh`;
    return {
      profile: createProfile(),
      recovered: new StoreCorruptionError(message, moved ? backupPath : undefined),
    };
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }
}
