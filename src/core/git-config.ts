import { spawnSync } from 'node:child_process';

import type { Profile, Scope } from '../config/schema.js';
import { ExternalToolError } from './errors.js';
import { log } from './logger.js';

export interface RunResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: string[]) => RunResult;

export interface Identity {
  name: string;
  email: string;
}

export type IdentityField = 'user.name' | 'user.email';

export interface GitConfig {
  getIdentity(scope?: Scope): Identity;
  setIdentity(profile: Profile, scope: Scope): void;
}

export const spawnRunner: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: 'utf8', windowsHide: true });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error
  };
};

export function createGitConfig(options: { binary?: string; runner?: CommandRunner } = {}): GitConfig {
  const binary = options.binary ?? 'git';
  const run = options.runner ?? spawnRunner;

  function exec(args: string[]): RunResult {
    log(2, 'git', `${binary} ${args.join(' ')}`);
    const result = run(binary, args);
    log(3, 'git', `exit ${result.status}`, { stdout: result.stdout, stderr: result.stderr });
    return result;
  }

  function read(field: IdentityField, scope?: Scope): string {
    const args = scope ? ['config', `--${scope}`, field] : ['config', field];
    const result = exec(args);
    // An unset key exits 1; outside a repository or without git there is no value either.
    if (result.error || result.status !== 0) {
      return '';
    }
    return result.stdout.trim();
  }

  function write(field: IdentityField, value: string, scope: Scope): void {
    const args = ['config', `--${scope}`, field, value];
    const result = exec(args);
    if (result.error || result.status !== 0) {
      const reason = result.error?.message ?? (result.stderr.trim() || `exit code ${result.status}`);
      throw new ExternalToolError(
        `Failed to set ${field}: ${reason}`,
        { args: [binary, ...args], status: result.status, stderr: result.stderr },
        { cause: result.error, hint: scope === 'local' ? 'Run inside a git repository, or pass --global.' : undefined }
      );
    }
  }

  return {
    getIdentity(scope) {
      return {
        name: read('user.name', scope),
        email: read('user.email', scope)
      };
    },
    setIdentity(profile, scope) {
      write('user.name', profile.name, scope);
      write('user.email', profile.email, scope);
    }
  };
}

export function sameIdentity(profile: Profile, identity: Identity): boolean {
  return profile.name === identity.name && profile.email === identity.email;
}
