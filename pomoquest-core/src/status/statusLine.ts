/**
 * Short status token for external status bars, e.g. "WORK 24:59" or
 * "FLOW +01:30". A finished or waiting engine publishes an empty line.
 */

import type { SessionSnapshot, SessionPhase } from '../engine/types';
import { formatClock } from '../duration';

export const PHASE_TAGS: Record<SessionPhase, string> = {
  work: 'WORK',
  flow: 'FLOW',
  break: 'BREAK',
  long_break: 'LONG BREAK',
  terminated: '',
};

export function formatStatus(snapshot: SessionSnapshot): string {
  if (snapshot.phase === 'terminated') return '';
  const tag = PHASE_TAGS[snapshot.phase];
  const time = snapshot.phase === 'flow'
    ? `+${formatClock(snapshot.elapsedMs / 1000)}`
    : formatClock(snapshot.remainingMs / 1000);
  const line = `${tag} ${time}`;
  return snapshot.paused ? `${line} [paused]` : line;
}
