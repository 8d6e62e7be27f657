/**
 * Shared command plumbing: load config and progress, report warnings,
 * fail with a red `Error:` line and exit 1.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, ProgressStore, ProgressLedger, InvalidCommandError, errorMessage } from 'pomoquest-core';
import type { PomoConfig, Task } from 'pomoquest-core';

export interface ProgressContext {
  config: PomoConfig;
  store: ProgressStore;
  ledger: ProgressLedger;
}

export interface GlobalOptions {
  json: boolean;
}

export function globalOptions(cmd: Command): GlobalOptions {
  return { json: cmd.optsWithGlobals().json === true };
}

export function warn(message: string): void {
  process.stderr.write(chalk.yellow(`Warning: ${message}\n`));
}

export function fail(err: unknown): never {
  process.stderr.write(chalk.red(`Error: ${errorMessage(err)}\n`));
  process.exit(1);
}

/**
 * Loads config.json, printing its warnings.
 * @throws ConfigError when the default config cannot be created
 */
export function loadSettings(): PomoConfig {
  const loaded = loadConfig();
  for (const warning of loaded.warnings) warn(warning);
  if (loaded.created) {
    process.stderr.write(chalk.dim(`Created default config at ${loaded.path}\n`));
  }
  return loaded.config;
}

/**
 * Loads progress for one command run and rolls the bounty set over when
 * the date changed. The rollover is persisted with the next mutation.
 */
export function openProgress(config: PomoConfig = loadSettings(), now: Date = new Date()): ProgressContext {
  const store = new ProgressStore();
  const { profile, recovered } = store.load();
  if (recovered) warn(recovered.message);

  const ledger = new ProgressLedger(profile, store, config.game_balance);
  ledger.refreshBounties(now);
  return { config, store, ledger };
}

/** @throws InvalidCommandError for anything but a positive integer */
export function parseTaskId(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new InvalidCommandError(`Invalid task id "${raw}"`);
  }
  return Number(trimmed);
}

/** @throws InvalidCommandError when the id is malformed or not pending */
export function requirePendingTask(ledger: ProgressLedger, raw: string): Task {
  const id = parseTaskId(raw);
  const task = ledger.findPendingTask(id);
  if (!task) throw new InvalidCommandError(`No pending task with id ${id}`);
  return task;
}
