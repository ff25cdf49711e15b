import assert from 'node:assert/strict';
import test from 'node:test';

import { ValidationError } from '../core/errors.js';
import { bashCompletion, fishCompletion, generateCompletion, powershellCompletion, zshCompletion } from './completion.js';

const PROFILES = ['personal', 'work'];

test('bash completion offers commands, profiles and shells', () => {
  const script = bashCompletion(PROFILES);
  const lines = script.split('\n');

  assert.equal(lines[0], '# bash completion for git-usr');
  assert.ok(lines.includes('    local commands="list current add remove version help completion personal work"'));
  assert.ok(lines.includes('            COMPREPLY=( $(compgen -W "personal work" -- "${cur}") )'));
  assert.ok(lines.includes('            COMPREPLY=( $(compgen -W "bash zsh fish powershell" -- "${cur}") )'));
  assert.ok(lines.includes('complete -F _git_usr git-usr'));
});

test('zsh completion starts with a compdef directive', () => {
  const script = zshCompletion(['work']);
  const lines = script.split('\n');

  assert.equal(lines[0], '#compdef git-usr');
  assert.ok(lines.includes('    profiles=(work)'));
  assert.ok(lines.includes("        'remove:Remove a profile'"));
  assert.ok(lines.includes('        \'--global[Apply globally]\''));
});

test('fish completion registers one entry per profile', () => {
  const lines = fishCompletion(PROFILES).split('\n');

  assert.ok(lines.includes('complete -c git-usr -f -n "__fish_use_subcommand" -a "work" -d "Switch to work profile"'));
  assert.ok(lines.includes('complete -c git-usr -f -n "__fish_seen_subcommand_from remove" -a "personal"'));
  assert.ok(lines.includes('complete -c git-usr -l global -d "Apply globally"'));
});

test('powershell completion quotes profile names', () => {
  const lines = powershellCompletion(["o'brien", 'work']).split('\n');

  assert.ok(lines.includes('Register-ArgumentCompleter -Native -CommandName git-usr -ScriptBlock {'));
  assert.ok(lines.includes("    $profiles = @('o''brien', 'work')"));
  assert.ok(lines.includes("    $tokens = $commandAst.ToString() -split '\\s+'"));
});

test('generateCompletion dispatches on the shell name', () => {
  assert.equal(generateCompletion('fish', PROFILES), fishCompletion(PROFILES));
  assert.equal(generateCompletion('zsh', []), zshCompletion([]));
});

test('unsupported shells are rejected', () => {
  assert.throws(
    () => generateCompletion('tcsh', PROFILES),
    (error: unknown) =>
      error instanceof ValidationError && error.message === 'Unsupported shell: tcsh. Supported: bash, zsh, fish, powershell'
  );
});
