import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigLockError } from './agent/errors.js';
import { createLogger } from './log.js';
import { errorCode, isRecord, sleep } from './utils.js';

const log = createLogger('config');

const STALE_LOCK_MS = 30_000;
const ACQUIRE_TIMEOUT_MS = 5_000;
const POLL_MS = 50;

export type LockOptions = {
  staleMs?: number;
  timeoutMs?: number;
  pollMs?: number;
};

type LockInfo = {
  pid: number;
  startedAt: number;
};

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(e) === 'EPERM';
  }
}

async function readLock(lockFile: string): Promise<LockInfo | null> {
  let raw: string;
  let mtimeMs: number;
  try {
    [raw, mtimeMs] = await Promise.all([
      fs.readFile(lockFile, 'utf8'),
      fs.stat(lockFile).then((st) => st.mtimeMs),
    ]);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') return null;
    throw e;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed) && typeof parsed.pid === 'number') {
      return {
        pid: parsed.pid,
        startedAt: typeof parsed.startedAt === 'number' ? parsed.startedAt : mtimeMs,
      };
    }
  } catch {
    // half-written by a crashed writer; judge by mtime alone
  }
  return { pid: 0, startedAt: mtimeMs };
}

function isStale(lock: LockInfo, staleMs: number): boolean {
  if (Date.now() - lock.startedAt > staleMs) return true;
  return lock.pid > 0 && !isPidAlive(lock.pid);
}

function sameLock(a: LockInfo, b: LockInfo): boolean {
  return a.pid === b.pid && a.startedAt === b.startedAt;
}

/**
 * Remove `lockFile` if it is still the stale lock `seen`. Reclaimers take the
 * `.reclaim` guard first, so a lock written after `seen` is never removed.
 * Returns false when another process is reclaiming or the lock has changed.
 */
async function reclaimStale(lockFile: string, seen: LockInfo, staleMs: number): Promise<boolean> {
  const guard = `${lockFile}.reclaim`;
  try {
    await fs.writeFile(guard, JSON.stringify({ pid: process.pid, startedAt: Date.now() }), {
      encoding: 'utf8',
      flag: 'wx',
      mode: 0o600,
    });
  } catch (e) {
    if (errorCode(e) !== 'EEXIST') throw e;
    // a reclaimer that crashed leaves its guard behind
    const other = await readLock(guard);
    if (other && isStale(other, staleMs)) await fs.rm(guard, { force: true });
    return false;
  }
  try {
    const current = await readLock(lockFile);
    if (!current || !sameLock(current, seen)) return false;
    log.warn('reclaiming stale config lock', { pid: current.pid, lock: lockFile });
    await fs.rm(lockFile, { force: true });
    return true;
  } finally {
    await fs.rm(guard, { force: true });
  }
}

/**
 * Advisory lock: the lock file is created exclusively (`wx`) and holds the
 * owner's pid. A lock older than 30s, or whose pid is gone, is reclaimed.
 */
export async function acquireLock(lockFile: string, opts: LockOptions = {}): Promise<void> {
  const staleMs = opts.staleMs ?? STALE_LOCK_MS;
  const timeoutMs = opts.timeoutMs ?? ACQUIRE_TIMEOUT_MS;
  const pollMs = opts.pollMs ?? POLL_MS;
  const deadline = Date.now() + timeoutMs;

  await fs.mkdir(path.dirname(lockFile), { recursive: true, mode: 0o700 });
  const payload = JSON.stringify({ pid: process.pid, startedAt: Date.now() });

  for (;;) {
    try {
      await fs.writeFile(lockFile, payload, { encoding: 'utf8', flag: 'wx', mode: 0o600 });
      return;
    } catch (e) {
      if (errorCode(e) !== 'EEXIST') throw e;
    }

    const existing = await readLock(lockFile);
    if (existing && isStale(existing, staleMs) && (await reclaimStale(lockFile, existing, staleMs))) continue;
    if (Date.now() >= deadline) throw new ConfigLockError(lockFile);
    await sleep(pollMs);
  }
}

export async function releaseLock(lockFile: string): Promise<void> {
  await fs.rm(lockFile, { force: true });
}

export async function withFileLock<T>(lockFile: string, fn: () => Promise<T>, opts?: LockOptions): Promise<T> {
  await acquireLock(lockFile, opts);
  try {
    return await fn();
  } finally {
    await releaseLock(lockFile);
  }
}
