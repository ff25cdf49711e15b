import { loadSettings } from '../config/index.js';
import type { Settings } from '../config/schema.js';
import { createGitConfig, type GitConfig } from '../core/git-config.js';
import { initProfileStore, type ProfileStore } from '../core/profile-store.js';
import { terminalInput, type InputSource } from './utils/prompt.js';

export interface Output {
  log(message?: string): void;
  error(message: string): void;
}

export interface CommandContext {
  openStore(): ProfileStore;
  git: GitConfig;
  input: InputSource;
  out: Output;
}

export interface CliContext extends CommandContext {
  settings: Settings;
}

export const consoleOutput: Output = {
  log: (message = '') => console.log(message),
  error: (message) => console.error(message)
};

export function createCliContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const settings = loadSettings(env);
  let store: ProfileStore | undefined;

  return {
    settings,
    openStore() {
      store ??= initProfileStore({ configDir: settings.configDir, env });
      return store;
    },
    git: createGitConfig({ binary: settings.gitBinary }),
    input: terminalInput,
    out: consoleOutput
  };
}
