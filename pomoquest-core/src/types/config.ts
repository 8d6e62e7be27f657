/**
 * Shape of ~/.config/pomoquest/config.json.
 * Keys keep the snake_case used in the user-facing document.
 */

export interface TimesConfig {
  work: string;
  short_break: string;
  long_break: string;
}

export interface ColorsConfig {
  work: string;
  break: string;
  pause: string;
  dim: string;
}

export interface GameBalanceConfig {
  xp_per_minute: number;
  overtime_multiplier: number;
  break_skip_xp_per_min: number;
}

export interface SoundsConfig {
  enabled: boolean;
  work: string;
  break: string;
}

export interface PomoConfig {
  times: TimesConfig;
  colors: ColorsConfig;
  game_balance: GameBalanceConfig;
  sounds: SoundsConfig;
}

/** Phase lengths resolved from `times`, in milliseconds. */
export interface SessionTimings {
  workMs: number;
  shortBreakMs: number;
  longBreakMs: number;
}
