import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { loadConfig, normalizeConfig, resolveTimings, DEFAULT_CONFIG } from './config';
import { ConfigError } from './errors';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pomoquest-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('writes defaults when the file is missing', () => {
    const configPath = path.join(tmpDir, 'nested', 'config.json');
    const loaded = loadConfig(configPath);

    expect(loaded.created).toBe(true);
    expect(loaded.warnings).toEqual([]);
    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults with a warning on malformed JSON', () => {
    const configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(configPath, '{ "times": ', 'utf-8');

    const loaded = loadConfig(configPath);
    expect(loaded.created).toBe(false);
    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0]).toContain('cannot read');
  });

  it('merges partial sections over defaults', () => {
    const configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({
      times: { work: '50m' },
      game_balance: { overtime_multiplier: 3 },
    }), 'utf-8');

    const { config, warnings } = loadConfig(configPath);
    expect(warnings).toEqual([]);
    expect(config.times).toEqual({ work: '50m', short_break: '5m', long_break: '15m' });
    expect(config.game_balance).toEqual({ xp_per_minute: 10, overtime_multiplier: 3, break_skip_xp_per_min: 5 });
  });

  it('throws ConfigError when the default file cannot be created', () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory', 'utf-8');
    expect(() => loadConfig(path.join(blocker, 'config.json'))).toThrow(ConfigError);
  });
});

describe('normalizeConfig', () => {
  it('replaces invalid values with defaults and names the key', () => {
    const warnings: string[] = [];
    const config = normalizeConfig({
      times: { work: 'forever', short_break: '10m' },
      game_balance: { xp_per_minute: -1 },
      sounds: { enabled: 'yes' },
    }, warnings);

    expect(config.times.work).toBe('25m');
    expect(config.times.short_break).toBe('10m');
    expect(config.game_balance.xp_per_minute).toBe(10);
    expect(config.sounds.enabled).toBe(true);
    expect(warnings).toEqual([
      'config: invalid value for times.work ("forever"), using default',
      'config: invalid value for game_balance.xp_per_minute (-1), using default',
      'config: invalid value for sounds.enabled ("yes"), using default',
    ]);
  });

  it('rejects a non-object section', () => {
    const warnings: string[] = [];
    const config = normalizeConfig({ colors: 'red' }, warnings);
    expect(config.colors).toEqual(DEFAULT_CONFIG.colors);
    expect(warnings).toEqual(['config: "colors" must be an object, using defaults']);
  });

  it('rejects a non-object document', () => {
    const warnings: string[] = [];
    expect(normalizeConfig([1, 2], warnings)).toEqual(DEFAULT_CONFIG);
    expect(warnings).toHaveLength(1);
  });

  it('does not share nested objects with DEFAULT_CONFIG', () => {
    const config = normalizeConfig({});
    config.times.work = '1m';
    expect(DEFAULT_CONFIG.times.work).toBe('25m');
  });
});

describe('resolveTimings', () => {
  it('converts tokens to milliseconds', () => {
    expect(resolveTimings({ work: '25m', short_break: '5m', long_break: '1h' })).toEqual({
      workMs: 1_500_000,
      shortBreakMs: 300_000,
      longBreakMs: 3_600_000,
    });
  });
});
