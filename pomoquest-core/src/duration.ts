/**
 * Compact duration tokens ("25", "45m", "90s", "1h") and clock formatting.
 */

import { DurationParseError } from './errors';

const TOKEN_RE = /^(\d+)([smh]?)$/;

const UNIT_SECONDS: Record<string, number> = {
  '': 60,
  s: 1,
  m: 60,
  h: 3600,
};

/**
 * Parses a duration token into whole seconds.
 * A bare integer means minutes. Zero and anything unrecognised throw.
 */
export function parseDuration(token: string): number {
  const match = TOKEN_RE.exec(token.trim().toLowerCase());
  if (!match) throw new DurationParseError(token);
  const value = Number(match[1]);
  if (!Number.isSafeInteger(value) || value <= 0) throw new DurationParseError(token);
  return value * UNIT_SECONDS[match[2]];
}

/** Like parseDuration, but returns null instead of throwing. */
export function tryParseDuration(token: string): number | null {
  try {
    return parseDuration(token);
  } catch (err) {
    if (err instanceof DurationParseError) return null;
    throw err;
  }
}

/** Format whole seconds as MM:SS (minutes are not capped at 59). */
export function formatClock(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const m = Math.floor(secs / 60);
  const s = secs % 60;
  return `${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
}
