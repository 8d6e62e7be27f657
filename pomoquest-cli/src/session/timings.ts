import { resolveTimings, InvalidCommandError } from 'pomoquest-core';
import type { SessionTimings, TimesConfig } from 'pomoquest-core';

export const MAX_DURATION_ARGS = 3;

/**
 * Positional `start` durations override the configured times in order:
 * work, short break, long break.
 * @throws DurationParseError for a malformed token
 * @throws InvalidCommandError for more than three tokens
 */
export function resolveStartTimings(tokens: readonly string[], times: TimesConfig): SessionTimings {
  if (tokens.length > MAX_DURATION_ARGS) {
    throw new InvalidCommandError(
      `start takes at most ${MAX_DURATION_ARGS} durations (work, short break, long break)`,
    );
  }
  const [work = times.work, shortBreak = times.short_break, longBreak = times.long_break] = tokens;
  return resolveTimings({ work, short_break: shortBreak, long_break: longBreak });
}

/**
 * `start --label`: free text recorded in history instead of a task name.
 * @throws InvalidCommandError for a blank label
 */
export function resolveStartLabel(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!trimmed) throw new InvalidCommandError('Label must not be empty');
  return trimmed;
}
