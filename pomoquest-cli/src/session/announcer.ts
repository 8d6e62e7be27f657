/**
 * Desktop notification and sound at the start of each work and break phase.
 *
 * Uses `notify-send` and `paplay`, spawned detached so a slow sound server
 * never holds up the timer. A missing binary is reported once and then
 * skipped for the rest of the run.
 */

import { spawn } from 'child_process';
import type { SessionPhase, SoundsConfig } from 'pomoquest-core';

export type Launcher = (command: string, args: string[], onError: (err: Error) => void) => void;

export interface Announcer {
  announce(phase: SessionPhase, sessionNumber: number): void;
}

export interface AnnouncerOptions {
  launch?: Launcher;
  /** Receives one message per unavailable command. */
  onError?: (message: string) => void;
}

interface Announcement {
  title: string;
  body: string;
  sound: string;
}

function spawnDetached(command: string, args: string[], onError: (err: Error) => void): void {
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.on('error', onError);
  child.unref();
}

export function describePhase(phase: SessionPhase, sessionNumber: number, sounds: SoundsConfig): Announcement | null {
  switch (phase) {
    case 'work':
      return { title: 'Time to focus', body: `Work session ${sessionNumber} started`, sound: sounds.work };
    case 'break':
      return { title: 'Break time', body: 'Step away for a few minutes', sound: sounds.break };
    case 'long_break':
      return { title: 'Long break', body: 'Four sessions down. Take a real rest', sound: sounds.break };
    default:
      return null;
  }
}

export function createAnnouncer(sounds: SoundsConfig, opts: AnnouncerOptions = {}): Announcer {
  if (!sounds.enabled) {
    return { announce: () => undefined };
  }

  const launch = opts.launch ?? spawnDetached;
  const disabled = new Set<string>();

  const run = (command: string, args: string[]) => {
    if (disabled.has(command)) return;
    launch(command, args, (err) => {
      if (disabled.has(command)) return;
      disabled.add(command);
      opts.onError?.(`${command} unavailable (${err.message}), skipping`);
    });
  };

  return {
    announce(phase, sessionNumber) {
      const announcement = describePhase(phase, sessionNumber, sounds);
      if (!announcement) return;
      run('notify-send', ['--app-name=pomoquest', announcement.title, announcement.body]);
      if (announcement.sound) run('paplay', [announcement.sound]);
    },
  };
}
