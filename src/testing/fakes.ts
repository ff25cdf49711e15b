import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Scope, Settings } from '../config/schema.js';
import { createGitConfig, type CommandRunner, type RunResult } from '../core/git-config.js';
import { ProfileStore } from '../core/profile-store.js';
import type { CliContext, Output } from '../cli/context.js';
import type { InputSource } from '../cli/utils/prompt.js';

export interface BufferedOutput extends Output {
  stdout: string[];
  stderr: string[];
  text(): string;
}

export function createBufferedOutput(): BufferedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    log(message = '') {
      stdout.push(message);
    },
    error(message) {
      stderr.push(message);
    },
    text() {
      return stdout.join('\n');
    }
  };
}

export function fixedInput(answers: string[]): InputSource & { questions: string[] } {
  const queue = [...answers];
  const questions: string[] = [];
  return {
    questions,
    async ask(question) {
      questions.push(question);
      return queue.shift() ?? '';
    }
  };
}

/**
 * In-memory stand-in for `git config` user.name/user.email, with local values
 * shadowing global ones the way git resolves them.
 */
export class FakeGitRunner {
  readonly calls: string[][] = [];
  readonly values: Record<Scope, Map<string, string>> = {
    local: new Map(),
    global: new Map()
  };
  failOn: string | undefined;

  readonly run: CommandRunner = (command, args) => {
    this.calls.push([command, ...args]);
    const [sub, ...rest] = args;
    if (sub !== 'config') {
      return failure(`unknown command ${sub}`);
    }

    let scope: Scope | undefined;
    if (rest[0] === '--local' || rest[0] === '--global') {
      scope = rest[0] === '--local' ? 'local' : 'global';
      rest.shift();
    }
    const [key, value] = rest;

    if (value !== undefined) {
      if (this.failOn === key) {
        return failure('fatal: not in a git directory');
      }
      this.values[scope ?? 'local'].set(key, value);
      return { status: 0, stdout: '', stderr: '' };
    }

    const found = scope ? this.values[scope].get(key) : this.values.local.get(key) ?? this.values.global.get(key);
    return found === undefined ? { status: 1, stdout: '', stderr: '' } : { status: 0, stdout: `${found}\n`, stderr: '' };
  };

  setCalls(): string[][] {
    return this.calls.filter((call) => call.length === 5);
  }
}

function failure(stderr: string): RunResult {
  return { status: 128, stdout: '', stderr: `${stderr}\n` };
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'git-usr-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface TestContext extends CliContext {
  out: BufferedOutput;
  runner: FakeGitRunner;
  store: ProfileStore;
}

export function createTestContext(dir: string, answers: string[] = [], settings: Partial<Settings> = {}): TestContext {
  const runner = new FakeGitRunner();
  const store = new ProfileStore(path.join(dir, 'profiles.json'));
  return {
    settings: { configDir: dir, gitBinary: 'git', verbose: 0, ...settings },
    openStore: () => store,
    git: createGitConfig({ runner: runner.run }),
    input: fixedInput(answers),
    out: createBufferedOutput(),
    runner,
    store
  };
}
