/**
 * Error taxonomy shared by the core and the CLI.
 *
 * Each class carries a stable `code` so the CLI can decide between
 * warning-and-continue and exit-with-failure without string matching.
 */

export type PomoQuestErrorCode =
  | 'config'
  | 'store_corrupt'
  | 'store_write'
  | 'invalid_command'
  | 'duration_parse'
  | 'session_locked';

export class PomoQuestError extends Error {
  readonly code: PomoQuestErrorCode;

  constructor(code: PomoQuestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed configuration, or the default config could not be written. */
export class ConfigError extends PomoQuestError {
  constructor(message: string) {
    super('config', message);
  }
}

/** The progress file exists but does not parse or fails validation. */
export class StoreCorruptionError extends PomoQuestError {
  constructor(message: string, readonly backupPath?: string) {
    super('store_corrupt', message);
  }
}

/** The atomic replace of the progress file failed. */
export class StoreWriteError extends PomoQuestError {
  constructor(message: string) {
    super('store_write', message);
  }
}

/** Unknown command, bad argument or unknown task id. Nothing is mutated. */
export class InvalidCommandError extends PomoQuestError {
  constructor(message: string) {
    super('invalid_command', message);
  }
}

export class DurationParseError extends PomoQuestError {
  constructor(readonly token: string) {
    super('duration_parse', `Invalid duration "${token}" (expected e.g. 25, 45m, 90s, 1h)`);
  }
}

/** Another live process holds the session lock. */
export class SessionLockedError extends PomoQuestError {
  constructor(readonly pid: number) {
    super('session_locked', `Another pomoquest session is running (pid ${pid})`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
