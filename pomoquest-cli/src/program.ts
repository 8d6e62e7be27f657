/**
 * Command tree for the `pomoquest` binary. Actions are lazy-loaded.
 */

import { Command } from 'commander';
import { SESSION_KEYS } from 'pomoquest-core';
import { CLI_VERSION, TAGLINE } from './session/branding';

const KEY_HELP = `
Session keys:
  ${SESSION_KEYS.pause}  pause / resume (any pause forfeits Iron Will)
  ${SESSION_KEYS.skip}  finish the current phase now (skipping a break pays bonus XP)
  ${SESSION_KEYS.breakFlow}  end flow (overtime) and start the break
  ${SESSION_KEYS.next}  start the next work session once a break is over
  ${SESSION_KEYS.quit}  quit without counting the unfinished session

Durations: 25 (minutes), 45m, 90s, 1h
`;

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pomoquest')
    .description(TAGLINE)
    .version(CLI_VERSION)
    .option('--json', 'Output as JSON (add, done, list)')
    .addHelpText('after', KEY_HELP);

  // Start command: lazy-load ink and react only when a session actually runs
  const startCmd = new Command('start')
    .description('Start a focus session (default command)')
    .argument('[durations...]', 'Override work, short break and long break, in that order', [])
    .option('--task <id>', 'Attach a pending task; you are asked whether it is finished after each session')
    .option('--label <text>', 'Record this session under a free-text label instead of a task name')
    .option('--force', 'Start even if another session holds the lock')
    .action(async (durations: string[], _opts: Record<string, unknown>, cmd: Command) => {
      const { startAction } = await import('./commands/start');
      return startAction(durations, cmd);
    });
  program.addCommand(startCmd, { isDefault: true });

  const addCmd = new Command('add')
    .description('Add a task')
    .argument('<name...>', 'Task name')
    .action(async (words: string[], _opts: Record<string, unknown>, cmd: Command) => {
      const { addAction } = await import('./commands/add');
      return addAction(words, cmd);
    });
  program.addCommand(addCmd);

  const listCmd = new Command('list')
    .description('Show level, XP, today\'s bounties and pending tasks')
    .action(async (_opts: Record<string, unknown>, cmd: Command) => {
      const { listAction } = await import('./commands/list');
      return listAction(_opts, cmd);
    });
  program.addCommand(listCmd);

  const doneCmd = new Command('done')
    .alias('finish')
    .description('Mark a task as finished')
    .argument('<id>', 'Task id, as shown by list')
    .action(async (id: string, _opts: Record<string, unknown>, cmd: Command) => {
      const { doneAction } = await import('./commands/done');
      return doneAction(id, cmd);
    });
  program.addCommand(doneCmd);

  return program;
}
