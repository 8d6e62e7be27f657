/**
 * `pomoquest done <id>`: Mark a pending task as finished.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { openProgress, globalOptions, fail, parseTaskId } from './progress';

export async function doneAction(rawId: string, cmd: Command): Promise<void> {
  const { json } = globalOptions(cmd);

  try {
    const id = parseTaskId(rawId);
    const { ledger } = openProgress();
    const task = ledger.completeTask(id);
    ledger.save();

    if (json) {
      process.stdout.write(JSON.stringify(task, null, 2) + '\n');
    } else {
      const remaining = ledger.pendingTasks().length;
      process.stdout.write(
        `${chalk.green('✔')} Completed ${chalk.bold(`#${task.id}`)} ${task.name}` +
        chalk.dim(` (${remaining} pending)`) + '\n',
      );
    }
  } catch (err) {
    fail(err);
  }
}
