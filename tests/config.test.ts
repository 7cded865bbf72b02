import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { ConfigError, ConfigLockError } from '../src/agent/errors.js';
import { acquireLock, releaseLock, withFileLock } from '../src/config-lock.js';
import { DEFAULT_MODEL, loadConfig, lockPathFor, readConfigFile, setConfigValue, updateConfigFile } from '../src/config.js';
import { setLogSink, setLoggerMuted } from '../src/log.js';
import { isRecord } from '../src/utils.js';

let tmpDir: string;
let n = 0;

/** Fresh config path per test; the file is written only when `content` is given. */
async function configFile(content?: string): Promise<string> {
  const p = path.join(tmpDir, `case-${++n}`, 'config.json');
  await fs.mkdir(path.dirname(p), { recursive: true });
  if (content !== undefined) await fs.writeFile(p, content);
  return p;
}

before(async () => {
  setLoggerMuted(true);
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolrelay-config-'));
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('uses defaults when the file is missing', async () => {
    const configPath = await configFile();
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.model, DEFAULT_MODEL);
    assert.equal(config.max_steps, 20);
    assert.equal(config.agent_max_steps, 50);
    assert.equal(config.max_retries, 3);
    assert.equal(config.retry_base_ms, 1000);
    assert.equal(config.approval_mode, 'default');
    assert.equal(config.stream, true);
    assert.deepEqual(config.fallback_models, []);
    assert.deepEqual(config.providers, { openrouter: {}, groq: {}, ollama: {} });
    assert.deepEqual(config.safety, {
      forbidden_patterns: [],
      cautious_patterns: [],
      allow_patterns: [],
      protected_paths: [],
    });
  });

  it('treats an empty file as no file', async () => {
    const configPath = await configFile('  \n');
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.model, DEFAULT_MODEL);
  });

  it('layers file, then env, then cli', async () => {
    const configPath = await configFile(
      JSON.stringify({ model: 'file/model', max_steps: 5, providers: { groq: { base_url: 'http://groq.test' } } })
    );
    const { config } = await loadConfig({
      configPath,
      env: { TOOLRELAY_MODEL: 'env/model', GROQ_API_KEY: 'test-secret', TOOLRELAY_VERBOSE: 'yes' },
      cli: { model: 'cli/model', lockdown: true, stream: undefined },
    });
    assert.equal(config.model, 'cli/model');
    assert.equal(config.max_steps, 5);
    assert.deepEqual(config.providers.groq, { base_url: 'http://groq.test', api_key: 'test-secret' });
    assert.equal(config.verbose, true);
    assert.equal(config.lockdown, true);
    assert.equal(config.stream, true);
  });

  it('parses numeric and approval env values', async () => {
    const configPath = await configFile();
    const { config } = await loadConfig({
      configPath,
      env: { TOOLRELAY_MAX_STEPS: '7', TOOLRELAY_APPROVAL_MODE: 'YOLO', OLLAMA_HOST: 'gpu-box:11434' },
    });
    assert.equal(config.max_steps, 7);
    assert.equal(config.approval_mode, 'yolo');
    assert.equal(config.providers.ollama.base_url, 'gpu-box:11434');
  });

  it('ignores an unknown approval mode with a warning', async () => {
    const configPath = await configFile();
    const lines: string[] = [];
    const prev = setLogSink((line) => lines.push(line));
    setLoggerMuted(false);
    try {
      const { config } = await loadConfig({ configPath, env: { TOOLRELAY_APPROVAL_MODE: 'sometimes' } });
      assert.equal(config.approval_mode, 'default');
    } finally {
      setLoggerMuted(true);
      setLogSink(prev);
    }
    assert.deepEqual(lines, ['[config] warn: ignoring unknown TOOLRELAY_APPROVAL_MODE value=sometimes']);
  });

  it('rejects invalid JSON', async () => {
    const configPath = await configFile('{ "model": ');
    await assert.rejects(loadConfig({ configPath, env: {} }), (e) => {
      assert.ok(e instanceof ConfigError);
      assert.ok(e.message.startsWith(`invalid JSON in ${configPath}: `));
      assert.equal(e.file, configPath);
      return true;
    });
  });

  it('rejects a file that is not an object', async () => {
    const configPath = await configFile('["model"]');
    await assert.rejects(readConfigFile(configPath), {
      name: 'ConfigError',
      message: `${configPath} must contain a JSON object`,
    });
  });

  it('names every invalid field', async () => {
    const configPath = await configFile(JSON.stringify({ max_steps: 'ten', temperature: 3 }));
    await assert.rejects(loadConfig({ configPath, env: {} }), {
      name: 'ConfigError',
      message:
        `invalid config ${configPath}: max_steps: Expected number, received string; ` +
        'temperature: Number must be less than or equal to 2',
    });
  });
});

describe('setConfigValue', () => {
  it('writes one key and keeps keys it does not know', async () => {
    const configPath = await configFile(JSON.stringify({ model: 'a/b', custom: { keep: 1 } }));

    const config = await setConfigValue('providers.groq.api_key', 'test-secret', { configPath });

    assert.equal(config.providers.groq.api_key, 'test-secret');
    const written: unknown = JSON.parse(await fs.readFile(configPath, 'utf8'));
    assert.deepEqual(written, { model: 'a/b', custom: { keep: 1 }, providers: { groq: { api_key: 'test-secret' } } });
    assert.equal((await fs.stat(configPath)).mode & 0o777, 0o600);
    await assert.rejects(fs.stat(lockPathFor(configPath)), { code: 'ENOENT' });
  });

  it('creates the file when missing', async () => {
    const configPath = await configFile();
    await setConfigValue('model', 'groq/llama-3.1-8b-instant', { configPath });
    assert.equal(await fs.readFile(configPath, 'utf8'), '{\n  "model": "groq/llama-3.1-8b-instant"\n}\n');
  });

  it('leaves the file alone when the result would not validate', async () => {
    const original = JSON.stringify({ max_steps: 4 });
    const configPath = await configFile(original);
    await assert.rejects(setConfigValue('max_steps', -1, { configPath }), ConfigError);
    assert.equal(await fs.readFile(configPath, 'utf8'), original);
    await assert.rejects(fs.stat(lockPathFor(configPath)), { code: 'ENOENT' });
  });

  it('rejects an empty key', async () => {
    await assert.rejects(setConfigValue('..', 1), { message: 'invalid config key: ".."' });
  });

  it('serialises concurrent writers', async () => {
    const configPath = await configFile(JSON.stringify({ counter: 0 }));
    const bump = () =>
      updateConfigFile(
        (raw) => {
          raw.counter = typeof raw.counter === 'number' ? raw.counter + 1 : 1;
        },
        { configPath, lock: { pollMs: 5 } }
      );
    await Promise.all([bump(), bump(), bump()]);
    const written: unknown = JSON.parse(await fs.readFile(configPath, 'utf8'));
    assert.deepEqual(written, { counter: 3 });
  });
});

describe('config lock', () => {
  it('reclaims a stale lock', async () => {
    const configPath = await configFile();
    const lockFile = lockPathFor(configPath);
    await fs.writeFile(lockFile, JSON.stringify({ pid: process.pid, startedAt: Date.now() - 60_000 }));

    await setConfigValue('model', 'x/y', { configPath });

    assert.equal(JSON.parse(await fs.readFile(configPath, 'utf8')).model, 'x/y');
    await assert.rejects(fs.stat(lockFile), { code: 'ENOENT' });
  });

  it('lets only one of two waiters reclaim the same stale lock', async () => {
    const lockFile = path.join(tmpDir, 'contended.lock');
    await fs.writeFile(lockFile, JSON.stringify({ pid: process.pid, startedAt: Date.now() - 60_000 }));

    let holders = 0;
    let maxHolders = 0;
    const order: string[] = [];
    const critical = (name: string) =>
      withFileLock(
        lockFile,
        async () => {
          holders += 1;
          maxHolders = Math.max(maxHolders, holders);
          order.push(name);
          await new Promise((resolve) => setTimeout(resolve, 40));
          holders -= 1;
        },
        { pollMs: 5, timeoutMs: 2_000 }
      );

    await Promise.all([critical('a'), critical('b')]);

    assert.equal(maxHolders, 1);
    assert.deepEqual([...order].sort(), ['a', 'b']);
    await assert.rejects(fs.stat(lockFile), { code: 'ENOENT' });
    await assert.rejects(fs.stat(`${lockFile}.reclaim`), { code: 'ENOENT' });
  });

  it('clears a reclaim guard left behind by a crashed process', async () => {
    const lockFile = path.join(tmpDir, 'abandoned.lock');
    await fs.writeFile(`${lockFile}.reclaim`, JSON.stringify({ pid: process.pid, startedAt: Date.now() - 60_000 }));
    await fs.writeFile(lockFile, JSON.stringify({ pid: process.pid, startedAt: Date.now() - 60_000 }));

    await acquireLock(lockFile, { pollMs: 5, timeoutMs: 500 });
    const held: unknown = JSON.parse(await fs.readFile(lockFile, 'utf8'));
    assert.ok(isRecord(held));
    assert.equal(held.pid, process.pid);
    assert.ok(typeof held.startedAt === 'number' && Date.now() - held.startedAt < 5_000);
    await releaseLock(lockFile);
    await assert.rejects(fs.stat(`${lockFile}.reclaim`), { code: 'ENOENT' });
  });

  it('reclaims an unreadable lock by its age', async () => {
    const lockFile = path.join(tmpDir, 'garbled.lock');
    await fs.writeFile(lockFile, '{"pid":');
    const old = new Date(Date.now() - 120_000);
    await fs.utimes(lockFile, old, old);

    await acquireLock(lockFile, { timeoutMs: 200 });
    const held: unknown = JSON.parse(await fs.readFile(lockFile, 'utf8'));
    assert.deepEqual(Object.keys(Object(held)), ['pid', 'startedAt']);
    await releaseLock(lockFile);
  });

  it('times out while a live process holds the lock', async () => {
    const configPath = await configFile(JSON.stringify({ model: 'a/b' }));
    const lockFile = lockPathFor(configPath);
    const held = JSON.stringify({ pid: process.pid, startedAt: Date.now() });
    await fs.writeFile(lockFile, held);

    await assert.rejects(setConfigValue('model', 'c/d', { configPath, lock: { timeoutMs: 100, pollMs: 10 } }), (e) => {
      assert.ok(e instanceof ConfigLockError);
      assert.equal(e.message, `timed out waiting for config lock ${lockFile}`);
      return true;
    });
    assert.equal(await fs.readFile(lockFile, 'utf8'), held);
    assert.equal(JSON.parse(await fs.readFile(configPath, 'utf8')).model, 'a/b');
  });

  it('releases the lock when the callback throws', async () => {
    const lockFile = path.join(tmpDir, 'throws.lock');
    await assert.rejects(
      withFileLock(lockFile, async () => {
        throw new Error('inner failure');
      }),
      { message: 'inner failure' }
    );
    await assert.rejects(fs.stat(lockFile), { code: 'ENOENT' });
  });
});
