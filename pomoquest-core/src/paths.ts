/**
 * Config, data and status path resolution.
 */

import * as path from 'path';
import * as os from 'os';

const APP_DIR = 'pomoquest';

/**
 * Gets the pomoquest config directory.
 * $XDG_CONFIG_HOME/pomoquest (default ~/.config/pomoquest) on Unix,
 * %APPDATA%/pomoquest on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), APP_DIR);
  }
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR);
}

/**
 * Gets the pomoquest data directory.
 * $XDG_DATA_HOME/pomoquest (default ~/.local/share/pomoquest) on Unix.
 */
export function getDataDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), APP_DIR, 'data');
  }
  const base = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return path.join(base, APP_DIR);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getProgressPath(): string {
  return path.join(getDataDir(), 'progress.json');
}

export function getLockPath(): string {
  return path.join(getDataDir(), 'session.lock');
}

/** Plain-text file polled by status bars (waybar, polybar, tmux). */
export function getStatusPath(): string {
  return path.join(os.tmpdir(), 'pomoquest_status');
}
