import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { configureLogging, createLogger, getLogLevel, setLogLevel, setLogSink, setLoggerMuted } from '../src/log.js';

describe('createLogger', () => {
  let lines: string[];
  let restore: (line: string) => void;

  beforeEach(() => {
    lines = [];
    restore = setLogSink((line) => lines.push(line));
    setLoggerMuted(false);
    setLogLevel('warn');
  });

  afterEach(() => {
    setLogSink(restore);
    setLogLevel('warn');
  });

  it('drops messages below the threshold', () => {
    const log = createLogger('client');
    log.debug('hidden');
    log.info('hidden too');
    log.warn('shown');
    assert.deepEqual(lines, ['[client] warn: shown']);
  });

  it('formats fields and quotes values with spaces', () => {
    setLogLevel('debug');
    const log = createLogger('retry');
    log.debug('retrying in 2000ms', { attempt: 2, of: 4, model: 'a/b', error: '503 Service Unavailable', skip: undefined });
    log.error('gave up', { ok: false, ids: ['c1'] });
    assert.deepEqual(lines, [
      '[retry] retrying in 2000ms attempt=2 of=4 model=a/b error="503 Service Unavailable"',
      '[retry] error: gave up ok=false ids=["c1"]',
    ]);
  });

  it('stays silent while muted', () => {
    setLoggerMuted(true);
    createLogger('x').error('nothing');
    assert.deepEqual(lines, []);
  });

  it('takes verbose and TOOLRELAY_QUIET from configureLogging', () => {
    const prev = process.env.TOOLRELAY_QUIET;
    try {
      delete process.env.TOOLRELAY_QUIET;
      configureLogging({ verbose: true });
      assert.equal(getLogLevel(), 'debug');
      createLogger('agent').info('model call');

      process.env.TOOLRELAY_QUIET = '1';
      configureLogging({ verbose: false });
      assert.equal(getLogLevel(), 'warn');
      createLogger('agent').warn('muted');
    } finally {
      if (prev === undefined) delete process.env.TOOLRELAY_QUIET;
      else process.env.TOOLRELAY_QUIET = prev;
      setLoggerMuted(false);
    }
    assert.deepEqual(lines, ['[agent] model call']);
  });
});
