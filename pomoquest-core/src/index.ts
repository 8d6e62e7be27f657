/**
 * Public API for pomoquest-core.
 */

// Data model
export type { UserProfile, Task, BountyInstance, BountyKind, ProgressStats, HistoryEntry } from './types/progress';
export { PROGRESS_SCHEMA_VERSION } from './types/progress';
export type {
  PomoConfig,
  TimesConfig,
  ColorsConfig,
  GameBalanceConfig,
  SoundsConfig,
  SessionTimings,
} from './types/config';

// Errors
export {
  PomoQuestError,
  ConfigError,
  StoreCorruptionError,
  StoreWriteError,
  InvalidCommandError,
  DurationParseError,
  SessionLockedError,
  errorMessage,
} from './errors';
export type { PomoQuestErrorCode } from './errors';

// Paths
export { getConfigDir, getDataDir, getConfigPath, getProgressPath, getLockPath, getStatusPath } from './paths';

// Configuration
export { loadConfig, normalizeConfig, resolveTimings, DEFAULT_CONFIG } from './config';
export type { LoadedConfig } from './config';
export { parseDuration, tryParseDuration, formatClock } from './duration';

// XP + bounties
export {
  XP_PER_LEVEL,
  wholeMinutes,
  workXP,
  overtimeXP,
  breakSkipXP,
  levelForXP,
  levelInfo,
  applyXP,
} from './xp';
export type { XPAward, LevelInfo, XPRates } from './xp';
export {
  BOUNTY_CATALOG,
  BOUNTIES_PER_DAY,
  getBountyDefinition,
  generateBounties,
  evaluateBounties,
  dateSeededRandom,
  localDateKey,
} from './bounties';
export type { BountyDefinition, SessionOutcome, CompletedBounty } from './bounties';

// Persistence
export { ProgressStore } from './store/ProgressStore';
export type { LoadedProgress, SessionLock, ProfileWriter, ProgressStoreOptions } from './store/ProgressStore';
export { createProfile, parseProfile, mergeTasks } from './store/profile';
export { ProgressLedger, LONG_BREAK_EVERY, DEFAULT_SESSION_LABEL } from './ledger/ProgressLedger';
export type { SessionAward, BreakSkipAward, WorkSessionResult, LedgerOptions } from './ledger/ProgressLedger';

// Session engine
export { SessionEngine } from './engine/SessionEngine';
export type { SessionEngineOptions } from './engine/SessionEngine';
export { SessionLoop } from './engine/SessionLoop';
export type { SessionLoopOptions, SessionSummary } from './engine/SessionLoop';
export { EventQueue } from './engine/EventQueue';
export { startTicker, TICK_INTERVAL_MS } from './engine/ticker';
export type { Ticker } from './engine/ticker';
export { SESSION_KEYS } from './engine/types';
export type {
  SessionPhase,
  SessionEvent,
  SessionEffect,
  SessionSnapshot,
  TerminationReason,
  RunTotals,
} from './engine/types';

// Status publishing
export { formatStatus, PHASE_TAGS } from './status/statusLine';
export { FileStatusSink } from './status/FileStatusSink';
export type { StatusSink } from './status/FileStatusSink';
