/**
 * Loads ~/.config/pomoquest/config.json, generating it with defaults on first run.
 *
 * A malformed document never stops the timer: bad sections or values fall
 * back to their defaults and are reported as warnings. The only fatal case
 * is a missing file that cannot be created.
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  PomoConfig,
  TimesConfig,
  ColorsConfig,
  GameBalanceConfig,
  SoundsConfig,
  SessionTimings,
} from './types/config';
import { getConfigPath } from './paths';
import { tryParseDuration, parseDuration } from './duration';
import { ConfigError, errorMessage } from './errors';

export const DEFAULT_CONFIG: PomoConfig = {
  times: {
    work: '25m',
    short_break: '5m',
    long_break: '15m',
  },
  colors: {
    work: 'cyan',
    break: 'magenta',
    pause: 'yellow',
    dim: 'gray',
  },
  game_balance: {
    xp_per_minute: 10,
    overtime_multiplier: 2.0,
    break_skip_xp_per_min: 5,
  },
  sounds: {
    enabled: true,
    work: '/usr/share/sounds/freedesktop/stereo/complete.oga',
    break: '/usr/share/sounds/freedesktop/stereo/service-login.oga',
  },
};

export interface LoadedConfig {
  config: PomoConfig;
  path: string;
  warnings: string[];
  /** True when the file did not exist and defaults were written. */
  created: boolean;
}

function cloneDefaults(): PomoConfig {
  return {
    times: { ...DEFAULT_CONFIG.times },
    colors: { ...DEFAULT_CONFIG.colors },
    game_balance: { ...DEFAULT_CONFIG.game_balance },
    sounds: { ...DEFAULT_CONFIG.sounds },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type FieldCheck = (value: unknown) => boolean;

const isDurationToken: FieldCheck = (v) => typeof v === 'string' && tryParseDuration(v) !== null;
const isNonEmptyString: FieldCheck = (v) => typeof v === 'string' && v.length > 0;
const isString: FieldCheck = (v) => typeof v === 'string';
const isNonNegativeNumber: FieldCheck = (v) => typeof v === 'number' && Number.isFinite(v) && v >= 0;
const isBoolean: FieldCheck = (v) => typeof v === 'boolean';

/**
 * Overlays the user's values for one section onto its defaults.
 * Unknown keys are ignored; invalid values keep the default and add a warning.
 */
function mergeSection<T extends object>(
  name: string,
  defaults: T,
  raw: unknown,
  checks: Record<keyof T, FieldCheck>,
  warnings: string[],
): T {
  if (raw === undefined) return defaults;
  if (!isRecord(raw)) {
    warnings.push(`config: "${name}" must be an object, using defaults`);
    return defaults;
  }
  const merged = { ...defaults };
  for (const key in checks) {
    if (!(key in raw)) continue;
    const value = raw[key];
    if (checks[key](value)) {
      Object.assign(merged, { [key]: value });
    } else {
      warnings.push(`config: invalid value for ${name}.${key} (${JSON.stringify(value)}), using default`);
    }
  }
  return merged;
}

/**
 * Validates a parsed config document. Always returns a complete config.
 */
export function normalizeConfig(raw: unknown, warnings: string[] = []): PomoConfig {
  const config = cloneDefaults();
  if (!isRecord(raw)) {
    warnings.push('config: document must be a JSON object, using defaults');
    return config;
  }

  config.times = mergeSection<TimesConfig>('times', config.times, raw.times, {
    work: isDurationToken,
    short_break: isDurationToken,
    long_break: isDurationToken,
  }, warnings);

  config.colors = mergeSection<ColorsConfig>('colors', config.colors, raw.colors, {
    work: isNonEmptyString,
    break: isNonEmptyString,
    pause: isNonEmptyString,
    dim: isNonEmptyString,
  }, warnings);

  config.game_balance = mergeSection<GameBalanceConfig>('game_balance', config.game_balance, raw.game_balance, {
    xp_per_minute: isNonNegativeNumber,
    overtime_multiplier: isNonNegativeNumber,
    break_skip_xp_per_min: isNonNegativeNumber,
  }, warnings);

  config.sounds = mergeSection<SoundsConfig>('sounds', config.sounds, raw.sounds, {
    enabled: isBoolean,
    work: isString,
    break: isString,
  }, warnings);

  return config;
}

/**
 * Reads the config file, creating it with defaults when missing.
 * @throws ConfigError when the default file cannot be written
 */
export function loadConfig(configPath: string = getConfigPath()): LoadedConfig {
  const warnings: string[] = [];

  if (!fs.existsSync(configPath)) {
    const config = cloneDefaults();
    try {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(config, null, 4) + '\n', 'utf-8');
    } catch (err) {
      throw new ConfigError(`Cannot create ${configPath}: ${errorMessage(err)}`);
    }
    return { config, path: configPath, warnings, created: true };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    warnings.push(`config: cannot read ${configPath} (${errorMessage(err)}), using defaults`);
    return { config: cloneDefaults(), path: configPath, warnings, created: false };
  }

  return { config: normalizeConfig(raw, warnings), path: configPath, warnings, created: false };
}

/** Converts the configured duration tokens to engine timings. */
export function resolveTimings(times: TimesConfig): SessionTimings {
  return {
    workMs: parseDuration(times.work) * 1000,
    shortBreakMs: parseDuration(times.short_break) * 1000,
    longBreakMs: parseDuration(times.long_break) * 1000,
  };
}
