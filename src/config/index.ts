import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { IOError, ValidationError } from '../core/errors.js';
import { SETTINGS_ENV, SettingsSchema, type Settings } from './schema.js';

export const APP_DIR_NAME = 'git-usr';
export const PROFILES_FILE_NAME = 'profiles.json';

export interface ConfigLocationOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

export function resolveConfigDir(options: ConfigLocationOptions = {}): string {
  if (options.configDir) {
    return options.configDir;
  }

  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.homeDir ?? os.homedir();

  if (platform === 'win32') {
    const appData = env.APPDATA || path.win32.join(home, 'AppData', 'Roaming');
    return path.win32.join(appData, APP_DIR_NAME);
  }

  return path.posix.join(home, '.config', APP_DIR_NAME);
}

export function profilesFilePath(options: ConfigLocationOptions = {}): string {
  const dir = resolveConfigDir(options);
  const join = (options.platform ?? process.platform) === 'win32' ? path.win32.join : path.posix.join;
  return join(dir, PROFILES_FILE_NAME);
}

/** Like {@link profilesFilePath}, but also creates the config directory. */
export function resolvePath(options: ConfigLocationOptions = {}): string {
  const dir = resolveConfigDir(options);
  ensureConfigDir(dir);
  return profilesFilePath(options);
}

export function ensureConfigDir(dir: string): void {
  if (fs.existsSync(dir)) {
    return;
  }
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new IOError(`Cannot create config directory ${dir}`, dir, { cause: error });
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = SettingsSchema.safeParse({
    configDir: env[SETTINGS_ENV.configDir],
    gitBinary: env[SETTINGS_ENV.gitBinary],
    verbose: env[SETTINGS_ENV.verbose],
    logFile: env[SETTINGS_ENV.logFile]
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path[0];
      const variable = typeof key === 'string' && isSettingsKey(key) ? SETTINGS_ENV[key] : String(key);
      return `${variable}: ${issue.message}`;
    });
    throw new ValidationError(`Invalid environment configuration (${problems.join('; ')})`);
  }

  return result.data;
}

function isSettingsKey(key: string): key is keyof typeof SETTINGS_ENV {
  return key in SETTINGS_ENV;
}
