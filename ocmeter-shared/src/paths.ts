/**
 * Default locations of the OpenCode storage tree and of ocmeter's own
 * config directory, plus `~` / environment-variable expansion for
 * user-supplied paths.
 */

import * as path from 'path';
import * as os from 'os';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Base data directory: $XDG_DATA_HOME, else ~/.local/share.
 */
export function getDataHome(env: Env = process.env): string {
  const xdg = env.XDG_DATA_HOME;
  return xdg ? xdg : path.join(os.homedir(), '.local', 'share');
}

/** OpenCode's storage root, e.g. ~/.local/share/opencode/storage */
export function getDefaultStorageDir(env: Env = process.env): string {
  return path.join(getDataHome(env), 'opencode', 'storage');
}

/** Session root holding the ses_* folders. */
export function getDefaultMessagesDir(env: Env = process.env): string {
  return path.join(getDefaultStorageDir(env), 'message');
}

/**
 * Gets the ocmeter config directory.
 * $XDG_CONFIG_HOME/ocmeter or ~/.config/ocmeter on Unix, %APPDATA%/ocmeter on Windows.
 */
export function getConfigDir(env: Env = process.env): string {
  if (process.platform === 'win32') {
    return path.join(env.APPDATA || os.homedir(), 'ocmeter');
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'ocmeter');
}

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references.
 * Unset variables are left as written.
 */
export function expandPath(input: string, env: Env = process.env): string {
  let expanded = input.replace(/\$\{(\w+)\}|\$(\w+)/g, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    const value = name !== undefined ? env[name] : undefined;
    return value !== undefined ? value : match;
  });

  if (expanded === '~') {
    expanded = os.homedir();
  } else if (expanded.startsWith('~/') || expanded.startsWith('~\\')) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  }
  return expanded;
}
