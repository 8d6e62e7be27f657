/**
 * `pomoquest add <name...>`: Append a pending task.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { openProgress, globalOptions, fail } from './progress';

export async function addAction(words: string[], cmd: Command): Promise<void> {
  const { json } = globalOptions(cmd);

  try {
    const { ledger } = openProgress();
    const task = ledger.addTask(words.join(' '));
    ledger.save();

    if (json) {
      process.stdout.write(JSON.stringify(task, null, 2) + '\n');
    } else {
      process.stdout.write(`${chalk.green('✔')} Added task ${chalk.bold(`#${task.id}`)} ${task.name}\n`);
    }
  } catch (err) {
    fail(err);
  }
}
