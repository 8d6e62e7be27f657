/**
 * Shared formatting helpers for plain-text commands and the session view.
 */

import chalk from 'chalk';
import { formatClock } from 'pomoquest-core';
import type { LevelInfo, RunTotals, SessionSnapshot, SessionSummary } from 'pomoquest-core';

/** Build a progress bar of given width. */
export function makeBar(percent: number, width: number): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/** Truncate text to maxLength, appending "..." if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/** 45 -> "45m", 125 -> "2h 05m". */
export function formatMinutes(minutes: number): string {
  const total = Math.max(0, Math.floor(minutes));
  if (total < 60) return `${total}m`;
  const h = Math.floor(total / 60);
  const m = total % 60;
  return `${h}h ${String(m).padStart(2, '0')}m`;
}

export function formatDate(iso: string): string {
  const d = new Date(iso);
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric', year: 'numeric' });
}

/** Countdown phases show time left; flow counts up with a leading "+". */
export function phaseClock(snapshot: SessionSnapshot): string {
  if (snapshot.phase === 'flow') return `+${formatClock(snapshot.elapsedMs / 1000)}`;
  return formatClock(snapshot.remainingMs / 1000);
}

/** Share of the current phase already spent, 0..100. Flow is always full. */
export function phasePercent(snapshot: SessionSnapshot): number {
  if (snapshot.phase === 'flow') return 100;
  if (snapshot.plannedMs <= 0) return 0;
  return (snapshot.elapsedMs / snapshot.plannedMs) * 100;
}

/** Milliseconds as H:MM:SS, hours unpadded. */
export function formatSpan(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
}

/** Work and break cells of the run totals panel: time spent, then the count. */
export function formatRunTotals(totals: RunTotals): { work: string; rest: string } {
  return {
    work: `${formatSpan(totals.workMs)} (${totals.workSessions})`,
    rest: `${formatSpan(totals.breakMs)} (${totals.breaks})`,
  };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/** Two lines printed after the session view closes. */
export function formatSummary(summary: SessionSummary, level: LevelInfo, focusMinutes: number): string {
  const heading = summary.reason === 'interrupt' ? 'Session interrupted:' : 'Session over:';
  const levelUps = summary.levelUps > 0 ? chalk.bold.yellow(` · ${plural(summary.levelUps, 'level up')}!`) : '';
  return (
    `${chalk.bold(heading)} ${plural(summary.sessionsCompleted, 'session')} · ${chalk.green(`+${summary.xpEarned} XP`)}${levelUps}\n` +
    chalk.dim(`Level ${level.level} (${level.xpIntoLevel}/${level.xpPerLevel} XP) · ${formatMinutes(focusMinutes)} focused all time`) + '\n'
  );
}
