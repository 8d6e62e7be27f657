/**
 * `pomoquest start [durations...]`: Run an interactive focus session.
 * Uses Ink (React for the terminal) for rendering.
 *
 * Three producers feed the session loop: the 1-second ticker, ink's input
 * hook and SIGINT/SIGTERM. The loop is the only consumer, so the engine
 * never sees two events at once.
 *
 * A bare `start` on a terminal with pending tasks asks for one first.
 */

import React from 'react';
import type { Command } from 'commander';
import type { Instance } from 'ink';
import { SessionEngine, SessionLoop, FileStatusSink, startTicker } from 'pomoquest-core';
import type { SessionLock, SessionSummary, SessionTimings, Task } from 'pomoquest-core';
import { loadSettings, openProgress, fail, requirePendingTask } from './progress';
import type { ProgressContext } from './progress';
import { resolveStartTimings, resolveStartLabel } from '../session/timings';
import { shouldOfferPicker } from '../session/taskPicker';
import { createAnnouncer } from '../session/announcer';
import { SessionViewState } from '../session/SessionViewState';
import { SessionView } from '../session/ink/SessionView';
import { formatSummary } from '../session/formatters';

const RENDER_THROTTLE_MS = 50;

type StartOptions = {
  task?: string;
  label?: string;
  force?: boolean;
};

interface PreparedSession {
  ctx: ProgressContext;
  timings: SessionTimings;
  task?: Task;
  label?: string;
  lock: SessionLock;
}

/** Everything that can fail runs before the lock is taken or the screen is cleared. */
function prepare(durations: string[], opts: StartOptions): PreparedSession {
  const config = loadSettings();
  const timings = resolveStartTimings(durations, config.times);
  const label = resolveStartLabel(opts.label);
  const ctx = openProgress(config);
  const task = opts.task !== undefined ? requirePendingTask(ctx.ledger, opts.task) : undefined;
  const lock = ctx.store.acquireLock(opts.force === true);
  return { ctx, timings, task, label, lock };
}

export async function startAction(durations: string[], cmd: Command): Promise<void> {
  const opts = cmd.opts<StartOptions>();

  let prepared: PreparedSession;
  try {
    prepared = prepare(durations, opts);
  } catch (err) {
    fail(err);
  }

  const { ctx, timings, label, lock } = prepared;
  const { config, ledger } = ctx;
  let { task } = prepared;

  const pending = ledger.pendingTasks();
  const offerPicker = shouldOfferPicker({
    durations,
    taskOption: opts.task,
    labelOption: opts.label,
    pending: pending.length,
    interactive: process.stdin.isTTY === true,
  });
  if (offerPicker) {
    const { showTaskPicker } = await import('../session/ink/TaskPicker');
    const choice = await showTaskPicker(pending);
    if (choice.type === 'quit') {
      lock.release();
      process.exit(0);
    }
    if (choice.type === 'task') task = choice.task;
  }

  const engine = new SessionEngine({ timings, ledger, label: () => view.label });
  const view: SessionViewState = new SessionViewState({ ledger, initial: engine.snapshot(), task, label });
  const announcer = createAnnouncer(config.sounds, {
    onError: (message) => {
      view.addToast(message, 'warning');
      scheduleRender();
    },
  });
  const sink = new FileStatusSink(undefined, (message) => {
    view.addToast(message, 'warning');
    scheduleRender();
  });
  const loop = new SessionLoop({
    engine,
    sink,
    onUpdate: (snapshot, effects) => {
      view.apply(snapshot, effects);
      for (const effect of effects) {
        if (effect.type === 'phase_changed') announcer.announce(effect.to, snapshot.sessionNumber);
      }
      scheduleRender();
    },
  });

  const onInput = (input: string, ctrl: boolean) => {
    const event = view.handleInput(input, ctrl);
    if (event) {
      loop.push(event);
    } else {
      scheduleRender();
    }
  };

  // ── Render with Ink ──
  const { render } = await import('ink');

  const element = () => React.createElement(SessionView, { model: view.getModel(), colors: config.colors, onInput });
  const instance: Instance = render(element(), { exitOnCtrlC: false });

  // Re-render bridge: throttled rerender with a fresh view model
  let renderTimer: ReturnType<typeof setTimeout> | null = null;
  function scheduleRender() {
    if (renderTimer) return;
    renderTimer = setTimeout(() => {
      renderTimer = null;
      instance.rerender(element());
    }, RENDER_THROTTLE_MS);
  }

  const onSignal = () => loop.push({ type: 'interrupt' });
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  announcer.announce('work', engine.snapshot().sessionNumber);
  const ticker = startTicker(event => loop.push(event));

  let summary: SessionSummary;
  try {
    summary = await loop.run();
  } finally {
    ticker.stop();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (renderTimer) clearTimeout(renderTimer);
    instance.rerender(element());
    instance.unmount();
    lock.release();
  }

  await instance.waitUntilExit();

  process.stdout.write(formatSummary(summary, ledger.levelInfo(), ledger.snapshot.stats.focusMinutes));
  process.exit(0);
}
