import { join } from 'node:path';
import { homedir } from 'node:os';

export const DATA_FILE_ENV = 'TASKLITE_DATA_FILE';
const APP_DIR = 'tasklite';
const DATA_FILE = 'tasks.json';

type Env = Record<string, string | undefined>;

/** Returns the platform-appropriate default task file path */
export function getDefaultDataPath(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(home, 'Library', 'Application Support', APP_DIR);
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] || join(home, 'AppData', 'Roaming'), APP_DIR);
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] || join(home, '.local', 'share'), APP_DIR);
  }

  return join(dir, DATA_FILE);
}

/**
 * Resolve the task file to use.
 * Priority: explicit path > TASKLITE_DATA_FILE > platform default.
 */
export function resolveDataFile(explicitPath: string | undefined, env: Env = process.env): string {
  if (explicitPath) return explicitPath;
  const fromEnv = env[DATA_FILE_ENV];
  if (fromEnv) return fromEnv;
  return getDefaultDataPath(env);
}
