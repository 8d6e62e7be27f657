/**
 * `pomoquest list`: Level, XP bar, cumulative stats, today's bounties,
 * pending tasks and the last few sessions.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBountyDefinition } from 'pomoquest-core';
import type { HistoryEntry, ProgressLedger, Task } from 'pomoquest-core';
import { openProgress, globalOptions, fail } from './progress';
import { makeBar, formatMinutes, formatDate, truncate } from '../session/formatters';
import { BRAND_INLINE } from '../session/branding';

const RULE_WIDTH = 60;
const XP_BAR_WIDTH = 30;
const RECENT_SESSIONS = 5;

export function formatTaskLine(task: Task): string {
  const id = chalk.bold(`#${task.id}`.padEnd(5));
  return `  ${id} ${truncate(task.name, 50)}  ${chalk.dim(`added ${formatDate(task.createdAt)}`)}`;
}

export function formatHistoryLine(entry: HistoryEntry): string {
  const length = formatMinutes(entry.seconds / 60).padEnd(7);
  return `  ${chalk.dim(formatDate(entry.date))}  ${length} ${truncate(entry.task, 40)}`;
}

export function formatProgressReport(ledger: ProgressLedger): string {
  const profile = ledger.snapshot;
  const level = ledger.levelInfo();
  const lines: string[] = [];

  lines.push(`${chalk.bold.red(BRAND_INLINE)}  ${chalk.bold.yellow(`Level ${level.level}`)}`);
  lines.push(
    `${chalk.yellow(makeBar((level.xpIntoLevel / level.xpPerLevel) * 100, XP_BAR_WIDTH))} ` +
    `${level.xpIntoLevel}/${level.xpPerLevel} XP ${chalk.dim(`(${profile.totalXP} total)`)}`,
  );
  lines.push(
    `${chalk.dim('Sessions:')} ${profile.stats.sessionsCompleted} completed` +
    chalk.dim(' · ') + `${formatMinutes(profile.stats.focusMinutes)} focused` +
    chalk.dim(' · ') + `${profile.sessionsToday} today`,
  );
  lines.push('');

  lines.push(chalk.bold(`Today's bounties${profile.bountyDate ? chalk.dim(` (${profile.bountyDate})`) : ''}`));
  lines.push(chalk.dim('─'.repeat(RULE_WIDTH)));
  if (profile.bounties.length === 0) {
    lines.push(chalk.dim('  No bounties drawn yet.'));
  }
  for (const bounty of profile.bounties) {
    const def = getBountyDefinition(bounty.kind);
    const icon = bounty.completed ? chalk.green('✔') : chalk.dim('○');
    const progress = def.target > 1 && !bounty.completed ? chalk.dim(` (${bounty.progress}/${bounty.target})`) : '';
    lines.push(`${icon} ${chalk.bold(def.title)}  ${chalk.dim(def.description)}${progress}  ${chalk.yellow(`+${bounty.rewardXP} XP`)}`);
  }
  lines.push('');

  const pending = ledger.pendingTasks();
  lines.push(chalk.bold(`Tasks (${pending.length} pending)`));
  lines.push(chalk.dim('─'.repeat(RULE_WIDTH)));
  if (pending.length === 0) {
    lines.push(chalk.dim('  No pending tasks. Add one with: pomoquest add <name>'));
  }
  for (const task of pending) {
    lines.push(formatTaskLine(task));
  }

  const recent = ledger.recentHistory(RECENT_SESSIONS);
  if (recent.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Recent sessions'));
    lines.push(chalk.dim('─'.repeat(RULE_WIDTH)));
    for (const entry of recent) {
      lines.push(formatHistoryLine(entry));
    }
  }

  return lines.join('\n') + '\n';
}

export function progressJson(ledger: ProgressLedger): Record<string, unknown> {
  const profile = ledger.snapshot;
  return {
    ...ledger.levelInfo(),
    totalXP: profile.totalXP,
    stats: profile.stats,
    sessionsToday: profile.sessionsToday,
    bountyDate: profile.bountyDate,
    bounties: profile.bounties.map(b => ({ ...b, title: getBountyDefinition(b.kind).title })),
    tasks: ledger.pendingTasks(),
    recentSessions: ledger.recentHistory(RECENT_SESSIONS),
  };
}

export async function listAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const { json } = globalOptions(cmd);

  try {
    const { ledger } = openProgress();
    if (json) {
      process.stdout.write(JSON.stringify(progressJson(ledger), null, 2) + '\n');
    } else {
      process.stdout.write(formatProgressReport(ledger));
    }
  } catch (err) {
    fail(err);
  }
}
