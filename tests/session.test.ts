import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { AgentSession, renderToolContent } from '../src/agent/session.js';
import { SessionStore, exportMarkdown } from '../src/agent/session-store.js';
import { setLogSink, setLoggerMuted } from '../src/log.js';
import type { SessionSummary } from '../src/agent/session-store.js';
import type { SessionSnapshot } from '../src/types.js';

function fresh(maxSteps = 10): AgentSession {
  return AgentSession.create({
    id: 'sess-1',
    model: 'test/model',
    cwd: '/work',
    maxSteps,
    systemPrompt: 'You are a test.',
    request: 'list files',
  });
}

const listCall = { id: 'c1', name: 'list_directory', args: { path: '.' } };
const readCall = { id: 'c2', name: 'read_file', args: { path: 'a.txt' } };

describe('renderToolContent', () => {
  it('uses the output on success and prefixes errors', () => {
    assert.equal(renderToolContent({ callId: 'c', name: 't', success: true, output: 'ok' }), 'ok');
    assert.equal(renderToolContent({ callId: 'c', name: 't', success: true }), '');
    assert.equal(renderToolContent({ callId: 'c', name: 't', success: false, error: 'nope' }), 'error: nope');
  });
});

describe('AgentSession', () => {
  it('starts with the system prompt and the request', () => {
    const s = fresh();
    assert.deepEqual(s.transcript, [
      { role: 'system', content: 'You are a test.' },
      { role: 'user', content: 'list files' },
    ]);
    assert.equal(s.state, 'awaiting-model');
    assert.equal(s.steps, 0);
  });

  it('blocks other turns while tool calls are pending', () => {
    const s = fresh();
    s.appendAssistant('', [listCall, readCall]);
    assert.deepEqual(s.pendingCallIds, ['c1', 'c2']);

    assert.throws(() => s.appendUser('hello?'), { message: '2 tool call(s) still pending: c1, c2' });
    assert.throws(() => s.beginStep(), { message: 'cannot call the model with unresolved tool calls' });
    assert.throws(() => s.finish('done'), { message: 'cannot finish with unresolved tool calls' });

    s.appendToolResult({ callId: 'c2', name: 'read_file', success: true, output: '1| hi' });
    s.appendToolResult({ callId: 'c1', name: 'list_directory', success: true, output: 'file\t2\ta.txt' });
    assert.deepEqual(s.pendingCallIds, []);
    assert.equal(s.beginStep(), 1);
  });

  it('rejects results for unknown or already resolved calls', () => {
    const s = fresh();
    s.appendAssistant('', [listCall]);
    assert.throws(() => s.appendToolResult({ callId: 'zz', name: 'x', success: true }), {
      message: 'cannot append result for unknown tool call "zz"',
    });
    s.appendToolResult({ callId: 'c1', name: 'list_directory', success: true, output: '' });
    assert.throws(() => s.appendToolResult({ callId: 'c1', name: 'list_directory', success: true }), {
      message: 'cannot append result for already resolved tool call "c1"',
    });
    assert.equal(s.transcript.length, 4);
  });

  it('rejects reused call ids without recording anything', () => {
    const s = fresh();
    s.appendAssistant('', [listCall]);
    s.appendToolResult({ callId: 'c1', name: 'list_directory', success: true, output: '' });
    assert.throws(() => s.appendAssistant('', [readCall, listCall]), { message: 'duplicate tool call id "c1"' });
    assert.deepEqual(s.pendingCallIds, []);
    assert.equal(s.transcript.length, 4);
  });

  it('reports an exhausted budget', () => {
    const s = fresh(1);
    assert.equal(s.budgetExhausted, false);
    s.beginStep();
    assert.equal(s.budgetExhausted, true);
  });

  it('resumes with interrupted results and a fresh budget', () => {
    const s = fresh(2);
    s.beginStep();
    s.appendAssistant('', [listCall]);
    s.fail(new Error('network down'));

    s.resume({ maxSteps: 5, message: 'try again' });

    assert.equal(s.state, 'awaiting-model');
    assert.equal(s.steps, 0);
    assert.equal(s.maxSteps, 5);
    assert.equal(s.failure, undefined);
    assert.deepEqual(s.transcript.slice(3), [
      {
        role: 'tool',
        content: 'error: interrupted',
        result: { callId: 'c1', name: 'list_directory', success: false, error: 'interrupted' },
      },
      { role: 'user', content: 'try again' },
    ]);
  });

  it('restores pending calls from a snapshot', () => {
    const s = fresh();
    s.appendAssistant('checking', [listCall]);
    const restored = AgentSession.fromSnapshot(s.toSnapshot());
    assert.deepEqual(restored.pendingCallIds, ['c1']);
    assert.equal(restored.id, 'sess-1');
    assert.deepEqual(restored.transcript, s.transcript);
  });
});

describe('SessionStore', () => {
  let dir: string;

  before(async () => {
    setLoggerMuted(true);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolrelay-sessions-'));
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('saves and loads a session', async () => {
    const store = new SessionStore(dir);
    const s = fresh();
    s.beginStep();
    s.appendAssistant('two files');
    s.finish('two files');

    const file = await store.save(s);
    assert.equal(file, path.join(dir, 'sess-1.json'));
    assert.equal((await fs.stat(file)).mode & 0o777, 0o600);

    const snap = await store.load('sess-1');
    assert.equal(snap.state, 'done');
    assert.equal(snap.finalText, 'two files');
    assert.equal(snap.steps, 1);
    assert.deepEqual(snap.transcript, s.transcript);
  });

  it('rejects ids that could escape the directory', () => {
    const store = new SessionStore(dir);
    assert.throws(() => store.pathFor('../etc/passwd'), { message: 'invalid session id: "../etc/passwd"' });
  });

  it('reports missing and corrupt sessions', async () => {
    const store = new SessionStore(dir);
    await assert.rejects(store.load('nope'), { message: 'no saved session nope' });
    await fs.writeFile(path.join(dir, 'bad.json'), '{"id":"bad"}');
    await assert.rejects(store.load('bad'), { message: 'session bad is corrupt: Required' });
  });

  it('lists newest first and skips unreadable files', async () => {
    const store = new SessionStore(dir);
    const older = fresh().toSnapshot();
    await store.save({ ...older, id: 'old', updatedAt: '2001-01-01T00:00:00.000Z' });
    await store.save({ ...older, id: 'new', updatedAt: '2002-01-01T00:00:00.000Z' });

    const lines: string[] = [];
    const prev = setLogSink((line) => lines.push(line));
    setLoggerMuted(false);
    let list: SessionSummary[];
    try {
      list = await store.list();
    } finally {
      setLoggerMuted(true);
      setLogSink(prev);
    }

    assert.deepEqual(
      list.map((x) => x.id),
      ['sess-1', 'new', 'old']
    );
    assert.deepEqual(lines, [
      '[sessions] warn: skipping unreadable session file=bad.json error="session bad is corrupt: Required"',
    ]);
    assert.equal(list.find((x) => x.id === 'old')?.title, 'list files');
  });

  it('returns an empty list for a missing directory', async () => {
    assert.deepEqual(await new SessionStore(path.join(dir, 'missing')).list(), []);
  });
});

describe('exportMarkdown', () => {
  it('renders turns and skips the system prompt', () => {
    const snap: SessionSnapshot = {
      id: 's1',
      model: 'test/model',
      cwd: '/work',
      transcript: [
        { role: 'system', content: 'secret instructions' },
        { role: 'user', content: 'list files' },
        { role: 'assistant', content: '', toolCalls: [listCall] },
        {
          role: 'tool',
          content: 'file\t2\ta.txt',
          result: { callId: 'c1', name: 'list_directory', success: true, output: 'file\t2\ta.txt' },
        },
        { role: 'assistant', content: 'One file.' },
      ],
      steps: 2,
      maxSteps: 10,
      state: 'done',
      finalText: 'One file.',
      createdAt: '2026-01-02T03:04:05.000Z',
      updatedAt: '2026-01-02T03:04:09.000Z',
    };

    const expected = [
      '# Session s1',
      '',
      '- model: test/model',
      '- workspace: /work',
      '- state: done',
      '- steps: 2/10',
      '- created: 2026-01-02T03:04:05.000Z',
      '',
      '## User',
      '',
      'list files',
      '',
      '## Assistant',
      '',
      '**tool call** `list_directory` (c1)',
      '',
      '```\n{\n  "path": "."\n}\n```',
      '',
      '### Result: list_directory (ok)',
      '',
      '```\nfile\t2\ta.txt\n```',
      '',
      '## Assistant',
      '',
      'One file.',
    ].join('\n');
    assert.equal(exportMarkdown(snap), expected + '\n');
  });

  it('lengthens the fence around backticks and notes failures', () => {
    const snap: SessionSnapshot = {
      id: 's2',
      model: 'm',
      cwd: '/w',
      transcript: [
        { role: 'user', content: 'go' },
        { role: 'assistant', content: '', toolCalls: [{ id: 'c9', name: 'read_file', args: {} }] },
        {
          role: 'tool',
          content: 'error: has ``` inside',
          result: { callId: 'c9', name: 'read_file', success: false, error: 'has ``` inside' },
        },
      ],
      steps: 1,
      maxSteps: 1,
      state: 'failed',
      failure: { name: 'BudgetExceededError', message: 'step budget exhausted after 1 model calls' },
      createdAt: 't0',
      updatedAt: 't1',
    };
    const md = exportMarkdown(snap);
    assert.ok(md.includes('- failure: BudgetExceededError: step budget exhausted after 1 model calls\n'));
    assert.ok(md.includes('### Result: read_file (failed)\n\n````\nerror: has ``` inside\n````\n'));
  });
});
