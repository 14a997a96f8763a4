import * as os from 'node:os';
import * as path from 'node:path';
import { FettersError } from './errors.js';

export const APP_DIR_NAME = 'fetters';
export const CONFIG_FILE_NAME = 'config.toml';
export const DATABASE_FILE_NAME = 'fetters.db';

export interface AppPaths {
  configDir: string;
  configFile: string;
  dataDir: string;
  databaseFile: string;
}

export interface PathEnv {
  XDG_CONFIG_HOME?: string;
  XDG_DATA_HOME?: string;
}

/**
 * Per-user config and data locations.
 *
 * `$XDG_CONFIG_HOME/fetters` (default `~/.config/fetters`) holds config.toml;
 * `$XDG_DATA_HOME/fetters` (default `~/.local/share/fetters`) holds the database.
 */
export function resolveAppPaths(
  env: PathEnv = process.env,
  homedir: () => string = os.homedir,
): AppPaths {
  const home = (): string => {
    let dir: string;
    try {
      dir = homedir();
    } catch {
      throw FettersError.applicationDirUnavailable();
    }
    if (!dir) {
      throw FettersError.applicationDirUnavailable();
    }
    return dir;
  };

  const configBase = env.XDG_CONFIG_HOME || path.join(home(), '.config');
  const dataBase = env.XDG_DATA_HOME || path.join(home(), '.local', 'share');

  const configDir = path.join(configBase, APP_DIR_NAME);
  const dataDir = path.join(dataBase, APP_DIR_NAME);

  return {
    configDir,
    configFile: path.join(configDir, CONFIG_FILE_NAME),
    dataDir,
    databaseFile: path.join(dataDir, DATABASE_FILE_NAME),
  };
}
