import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { z } from 'zod';

import { setLogSink, setLoggerMuted } from '../src/log.js';
import { SafetyGate, isProtectedDeleteTarget, summarizeCall, unquoteCommand } from '../src/safety.js';
import { executeCommandTool } from '../src/tools/exec.js';
import { copyFileTool, readFileTool, writeFileTool } from '../src/tools/file-ops.js';
import { defineTool } from '../src/tools/registry.js';

const noteTool = defineTool({
  name: 'save_note',
  description: 'Store a note',
  parameters: z.object({ text: z.string() }),
  safety: 'safe',
  category: 'system',
  run: async (args) => args.text,
});

const blockedTool = defineTool({
  name: 'format_disk',
  description: 'Never allowed',
  parameters: z.object({}),
  safety: 'blocked',
  category: 'system',
  run: async () => 'unreachable',
});

let workspace: string;
let outside: string;

before(async () => {
  setLoggerMuted(true);
  workspace = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'toolrelay-safety-ws-')));
  outside = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'toolrelay-safety-out-')));
});

after(async () => {
  setLoggerMuted(false);
  await fs.rm(workspace, { recursive: true, force: true });
  await fs.rm(outside, { recursive: true, force: true });
});

describe('forbidden commands', () => {
  it('denies rm -rf / for a shell-executing tool', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    const v = await gate.check(executeCommandTool, { cmd: 'rm -rf /' });
    assert.deepEqual(v, { kind: 'deny', reason: 'blocked pattern: rm targeting /' });
  });

  it('collapses whitespace before matching', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand('rm   -rf \t /'), { kind: 'deny', reason: 'blocked pattern: rm targeting /' });
  });

  it('denies mkfs and fork bombs', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand('mkfs.ext4 /dev/sdb1'), {
      kind: 'deny',
      reason: 'blocked pattern: mkfs (filesystem creation)',
    });
    assert.deepEqual(gate.checkCommand(':(){ :|:& };:'), { kind: 'deny', reason: 'blocked pattern: fork bomb' });
  });

  it('denies rm of a protected delete root', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand('rm -rf /home'), {
      kind: 'deny',
      reason: 'blocked pattern: rm targeting protected directory',
    });
  });

  it('sees through quoted rm targets', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand("rm -rf '/'"), { kind: 'deny', reason: 'blocked pattern: rm targeting /' });
    assert.deepEqual(gate.checkCommand('rm -rf "/etc"'), {
      kind: 'deny',
      reason: 'blocked pattern: rm targeting system directory',
    });
    assert.deepEqual(gate.checkCommand('rm -rf "/home/alice"'), {
      kind: 'deny',
      reason: 'blocked pattern: rm targeting protected directory',
    });
  });

  it('denies rm of the home directory however it is spelled', () => {
    const gate = new SafetyGate({ cwd: workspace });
    for (const cmd of ['rm -rf "$HOME"', 'rm -rf ${HOME}', 'rm -r "${HOME}"']) {
      assert.deepEqual(gate.checkCommand(cmd), { kind: 'deny', reason: 'blocked pattern: rm targeting $HOME' }, cmd);
    }
  });

  it('denies quoted targets through check() before any approval', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    const v = await gate.check(executeCommandTool, { cmd: "rm -rf '/'" });
    assert.equal(v.kind, 'deny');
  });

  it('only treats arguments of rm itself as delete targets', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand('rm -rf build; ls /'), {
      kind: 'confirm',
      reason: 'rm with -r or -f flags',
      prompt: 'Cautious command (rm with -r or -f flags): rm -rf build; ls /',
    });
  });

  it('applies user forbidden patterns', () => {
    const gate = new SafetyGate({ cwd: workspace, safety: { forbidden_patterns: ['\\bterraform destroy\\b'] } });
    assert.deepEqual(gate.checkCommand('terraform destroy -auto-approve'), {
      kind: 'deny',
      reason: 'blocked pattern: user forbidden: \\bterraform destroy\\b',
    });
  });

  it('skips an invalid user regex with a warning', () => {
    const lines: string[] = [];
    setLoggerMuted(false);
    const prev = setLogSink((line) => lines.push(line));
    try {
      const gate = new SafetyGate({ cwd: workspace, safety: { forbidden_patterns: ['(['] } });
      assert.deepEqual(gate.checkCommand('ls'), { kind: 'allow' });
    } finally {
      setLogSink(prev);
      setLoggerMuted(true);
    }
    assert.equal(lines.length, 1);
    assert.ok(lines[0].startsWith('[safety] warn: invalid regex in forbidden_patterns, skipped pattern=(['));
  });
});

describe('tool-name independence', () => {
  it('does not deny a command-looking string in a non-shell argument', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(noteTool, { text: 'rm -rf /' }), { kind: 'allow' });
  });

  it('asks for confirmation of write_file, not a denial, for the same string as content', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    const v = await gate.check(writeFileTool, { path: 'notes.txt', content: 'rm -rf /' });
    assert.deepEqual(v, { kind: 'confirm', reason: 'write_file requires approval', prompt: 'write_file: notes.txt' });
  });
});

describe('cautious commands', () => {
  it('asks for confirmation with the matched reason', () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(gate.checkCommand('sudo ls'), {
      kind: 'confirm',
      reason: 'sudo (privilege escalation)',
      prompt: 'Cautious command (sudo (privilege escalation)): sudo ls',
    });
  });

  it('denies cautious commands in lockdown', () => {
    const gate = new SafetyGate({ cwd: workspace, lockdown: true });
    assert.deepEqual(gate.checkCommand('git reset --hard HEAD'), {
      kind: 'deny',
      reason: 'blocked pattern (lockdown): git reset --hard',
    });
  });

  it('lets allow_patterns bypass a cautious match', () => {
    const gate = new SafetyGate({ cwd: workspace, safety: { allow_patterns: ['^npm install$'] } });
    assert.deepEqual(gate.checkCommand('npm install'), { kind: 'allow' });
  });

  it('falls back to the confirm class for an ordinary command', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(executeCommandTool, { cmd: 'ls -la' }), {
      kind: 'confirm',
      reason: 'execute_command requires approval',
      prompt: 'execute_command: ls -la',
    });
  });
});

describe('blocked class', () => {
  it('denies before looking at arguments', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(blockedTool, {}), { kind: 'deny', reason: 'blocked tool: format_disk' });
  });
});

describe('path checks', () => {
  it('allows a path that stays inside the workspace', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(readFileTool, { path: 'src/../a.txt' }), { kind: 'allow' });
  });

  it('denies ../ escapes', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(readFileTool, { path: '../elsewhere.txt' }), {
      kind: 'deny',
      reason: `path traversal: ../elsewhere.txt is outside the workspace ${workspace}`,
    });
  });

  it('checks both ends of a copy', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(copyFileTool, { source: 'a.txt', destination: '../stolen.txt' }), {
      kind: 'deny',
      reason: `path traversal: ../stolen.txt is outside the workspace ${workspace}`,
    });
    assert.deepEqual(await gate.check(copyFileTool, { source: 'a.txt', destination: 'b.txt' }), {
      kind: 'confirm',
      reason: 'copy_file requires approval',
      prompt: 'copy_file: a.txt -> b.txt',
    });
  });

  it('denies protected system paths', async () => {
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(readFileTool, { path: '/etc/passwd' }), {
      kind: 'deny',
      reason: 'protected path: /etc/passwd',
    });
  });

  it('accepts configured allowed dirs', async () => {
    const gate = new SafetyGate({ cwd: workspace, allowedDirs: [outside] });
    assert.deepEqual(await gate.check(readFileTool, { path: path.join(outside, 'data.csv') }), { kind: 'allow' });
  });

  it('denies a symlink that leads out of the workspace', async () => {
    await fs.symlink(outside, path.join(workspace, 'link'));
    const gate = new SafetyGate({ cwd: workspace });
    assert.deepEqual(await gate.check(readFileTool, { path: 'link/secret.txt' }), {
      kind: 'deny',
      reason: `path traversal: link/secret.txt resolves to ${path.join(outside, 'secret.txt')} (outside the workspace)`,
    });
  });
});

describe('helpers', () => {
  it('isProtectedDeleteTarget flags whole homes only', () => {
    assert.equal(isProtectedDeleteTarget('rm -rf /home/alice'), true);
    assert.equal(isProtectedDeleteTarget('rm -rf /home/alice/tmp'), false);
    assert.equal(isProtectedDeleteTarget('rm -rf ./build'), false);
  });

  it('isProtectedDeleteTarget unquotes targets and recognises home', () => {
    assert.equal(isProtectedDeleteTarget('rm -rf "/var"'), true);
    assert.equal(isProtectedDeleteTarget("rm -rf '~/'"), true);
    assert.equal(isProtectedDeleteTarget('rm -f "$HOME"'), true);
    assert.equal(isProtectedDeleteTarget('rm -rf "$HOME/tmp"'), false);
  });

  it('unquoteCommand drops quotes and braces around HOME', () => {
    assert.equal(unquoteCommand(`rm -rf "/a b" '/c' \${HOME}`), 'rm -rf /a b /c $HOME');
  });

  it('summarizeCall picks the most telling argument', () => {
    assert.equal(summarizeCall('web_fetch', { url: 'https://example.com' }), 'web_fetch: https://example.com');
    assert.equal(summarizeCall('git_status', {}), 'git_status');
    assert.equal(summarizeCall('copy_file', { source: 'a.txt', destination: 'b/a.txt' }), 'copy_file: a.txt -> b/a.txt');
    assert.equal(summarizeCall('git_branch', { action: 'delete', branch_name: 'old' }), 'git_branch: delete old');
    assert.equal(summarizeCall('git_push', { remote: 'origin', branch: 'main' }), 'git_push: origin main');
  });
});
