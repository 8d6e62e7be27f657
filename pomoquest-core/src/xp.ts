/**
 * XP calculator. Pure functions: no state, no I/O.
 *
 * All minute quantities are whole minutes, floored from milliseconds, so
 * that partial minutes never accumulate as fractional XP.
 */

import type { GameBalanceConfig } from './types/config';

export const XP_PER_LEVEL = 500;

export type XPRates = GameBalanceConfig;

export function wholeMinutes(ms: number): number {
  return Math.max(0, Math.floor(ms / 60_000));
}

export function workXP(minutes: number, rates: XPRates): number {
  return Math.floor(minutes * rates.xp_per_minute);
}

export function overtimeXP(minutes: number, rates: XPRates): number {
  return Math.floor(minutes * rates.xp_per_minute * rates.overtime_multiplier);
}

export function breakSkipXP(remainingMinutes: number, rates: XPRates): number {
  return Math.floor(remainingMinutes * rates.break_skip_xp_per_min);
}

export function levelForXP(totalXP: number): number {
  return 1 + Math.floor(Math.max(0, totalXP) / XP_PER_LEVEL);
}

export interface LevelInfo {
  level: number;
  /** XP earned inside the current level, 0..XP_PER_LEVEL-1. */
  xpIntoLevel: number;
  xpPerLevel: number;
}

export function levelInfo(totalXP: number): LevelInfo {
  const level = levelForXP(totalXP);
  return {
    level,
    xpIntoLevel: Math.max(0, totalXP) - (level - 1) * XP_PER_LEVEL,
    xpPerLevel: XP_PER_LEVEL,
  };
}

export interface XPAward {
  amount: number;
  totalXP: number;
  levelBefore: number;
  levelAfter: number;
  leveledUp: boolean;
}

/** Adds `amount` to `totalXP` and reports whether the level changed. */
export function applyXP(totalXP: number, amount: number): XPAward {
  const gained = Math.max(0, Math.floor(amount));
  const next = totalXP + gained;
  const levelBefore = levelForXP(totalXP);
  const levelAfter = levelForXP(next);
  return {
    amount: gained,
    totalXP: next,
    levelBefore,
    levelAfter,
    leveledUp: levelAfter > levelBefore,
  };
}
