import assert from 'node:assert/strict';
import test from 'node:test';

import { ExternalToolError, NotFoundError } from '../../../core/errors.js';
import { createTempDir, createTestContext, removeDir } from '../../../testing/fakes.js';
import { addProfile } from './add.js';
import { switchProfile } from './switch.js';

test('add then switch sets exactly that name and email locally', async () => {
  const dir = createTempDir();
  try {
    const ctx = createTestContext(dir);

    await addProfile(ctx, 'work', 'A', 'a@x.com');
    switchProfile(ctx, 'work', 'local');

    assert.deepEqual(ctx.runner.setCalls(), [
      ['git', 'config', '--local', 'user.name', 'A'],
      ['git', 'config', '--local', 'user.email', 'a@x.com']
    ]);
    assert.equal(ctx.runner.values.local.get('user.name'), 'A');
    assert.equal(ctx.runner.values.local.get('user.email'), 'a@x.com');
    assert.deepEqual(ctx.out.stdout.slice(-3), [
      "✓ Switched to 'work' profile for this repository",
      '   Name:  A',
      '   Email: a@x.com'
    ]);
  } finally {
    removeDir(dir);
  }
});

test('switch --global applies to the global scope', () => {
  const dir = createTempDir();
  try {
    const ctx = createTestContext(dir);

    switchProfile(ctx, 'personal', 'global');

    assert.equal(ctx.runner.values.global.get('user.email'), 'you@personal.com');
    assert.equal(ctx.runner.values.local.size, 0);
    assert.equal(ctx.out.stdout[0], "✓ Switched to 'personal' profile globally");
  } finally {
    removeDir(dir);
  }
});

test('switching to an unknown profile lists the available ones', () => {
  const dir = createTempDir();
  try {
    const ctx = createTestContext(dir);

    assert.throws(
      () => switchProfile(ctx, 'oss'),
      (error: unknown) =>
        error instanceof NotFoundError &&
        error.message === "Profile 'oss' not found!" &&
        error.hint === "Available profiles: personal, work\nUse 'git usr add' to create a new profile"
    );
    assert.equal(ctx.runner.calls.length, 0);
  } finally {
    removeDir(dir);
  }
});

test('a git failure surfaces as ExternalToolError', () => {
  const dir = createTempDir();
  try {
    const ctx = createTestContext(dir);
    ctx.runner.failOn = 'user.email';

    assert.throws(() => switchProfile(ctx, 'work'), ExternalToolError);
    assert.equal(ctx.out.stdout.length, 0);
  } finally {
    removeDir(dir);
  }
});
