/**
 * Daily bounties: three distinct challenges per local calendar day,
 * drawn from a fixed five-entry catalog.
 */

import type { BountyInstance, BountyKind } from './types/progress';

export const BOUNTIES_PER_DAY = 3;
export const MARATHON_TARGET = 4;
export const DEEP_DIVE_MINUTES = 45;
export const EARLY_BIRD_HOUR = 9;
export const NIGHT_OWL_HOUR = 20;

export interface BountyDefinition {
  kind: BountyKind;
  title: string;
  description: string;
  rewardXP: number;
  target: number;
}

export const BOUNTY_CATALOG: readonly BountyDefinition[] = [
  { kind: 'marathon', title: 'Marathon', description: `Complete ${MARATHON_TARGET} sessions`, rewardXP: 100, target: MARATHON_TARGET },
  { kind: 'deep_dive', title: 'Deep Dive', description: `Complete a session longer than ${DEEP_DIVE_MINUTES}m`, rewardXP: 75, target: 1 },
  { kind: 'early_bird', title: 'Early Bird', description: 'Finish a session before 9AM', rewardXP: 50, target: 1 },
  { kind: 'night_owl', title: 'Night Owl', description: 'Finish a session after 8PM', rewardXP: 50, target: 1 },
  { kind: 'iron_will', title: 'Iron Will', description: 'Complete a session without pausing', rewardXP: 60, target: 1 },
];

export function getBountyDefinition(kind: BountyKind): BountyDefinition {
  const def = BOUNTY_CATALOG.find(b => b.kind === kind);
  if (!def) throw new Error(`Unknown bounty kind: ${kind}`);
  return def;
}

export function isBountyKind(value: unknown): value is BountyKind {
  return typeof value === 'string' && BOUNTY_CATALOG.some(b => b.kind === value);
}

/** Local calendar date as YYYY-MM-DD (not UTC). */
export function localDateKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * mulberry32 PRNG seeded from a string hash, so a given date always draws
 * the same bounty set.
 */
export function dateSeededRandom(dateKey: string): () => number {
  let seed = 2166136261;
  for (let i = 0; i < dateKey.length; i++) {
    seed ^= dateKey.charCodeAt(i);
    seed = Math.imul(seed, 16777619);
  }
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6D2B79F5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Draws BOUNTIES_PER_DAY distinct kinds without replacement (partial Fisher-Yates). */
export function generateBounties(random: () => number): BountyInstance[] {
  const pool = [...BOUNTY_CATALOG];
  const picks: BountyInstance[] = [];
  for (let i = 0; i < BOUNTIES_PER_DAY; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
    const def = pool[i];
    picks.push({
      kind: def.kind,
      rewardXP: def.rewardXP,
      progress: 0,
      target: def.target,
      completed: false,
    });
  }
  return picks;
}

/** Facts about one completed work session, as needed for bounty evaluation. */
export interface SessionOutcome {
  /** Whole minutes of base work plus overtime. */
  totalMinutes: number;
  /** Wall-clock time at which the session completed. */
  completedAt: Date;
  pausedThisSession: boolean;
}

export interface CompletedBounty {
  kind: BountyKind;
  title: string;
  rewardXP: number;
}

/**
 * Advances and completes bounties for one session outcome.
 * Mutates `bounties` in place. Already-completed bounties are skipped, so
 * each bounty pays out at most once.
 */
export function evaluateBounties(bounties: BountyInstance[], outcome: SessionOutcome): CompletedBounty[] {
  const completed: CompletedBounty[] = [];
  const hour = outcome.completedAt.getHours();

  for (const bounty of bounties) {
    if (bounty.completed) continue;

    let done = false;
    switch (bounty.kind) {
      case 'marathon':
        bounty.progress += 1;
        done = bounty.progress >= bounty.target;
        break;
      case 'deep_dive':
        done = outcome.totalMinutes > DEEP_DIVE_MINUTES;
        break;
      case 'early_bird':
        done = hour < EARLY_BIRD_HOUR;
        break;
      case 'night_owl':
        done = hour >= NIGHT_OWL_HOUR;
        break;
      case 'iron_will':
        done = !outcome.pausedThisSession;
        break;
    }

    if (done) {
      bounty.completed = true;
      bounty.progress = bounty.target;
      completed.push({ kind: bounty.kind, title: getBountyDefinition(bounty.kind).title, rewardXP: bounty.rewardXP });
    }
  }

  return completed;
}
