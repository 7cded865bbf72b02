/**
 * Shared utility functions.
 */

import { spawnSync } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), 'utf8'));
      if (isRecord(parsed) && typeof parsed.version === 'string') return parsed.version;
    } catch {
      continue;
    }
  }
  return '0.0.0';
})();

/** Resolved absolute path to bash (falls back to plain `bash` on PATH). */
export const BASH_PATH: string = (() => {
  try {
    const r = spawnSync('which', ['bash'], { encoding: 'utf8', timeout: 1000 });
    const p = r.stdout?.split(/\r?\n/)[0]?.trim();
    if (p && p.startsWith('/')) return p;
  } catch {
    return '/bin/bash';
  }
  return '/bin/bash';
})();

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * XDG-compatible state directory for persistent app data.
 * `~/.local/state/toolrelay`
 */
export function stateDir(): string {
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'toolrelay');
  return path.join(os.homedir(), '.local', 'state', 'toolrelay');
}

/**
 * XDG-compatible config directory.
 * `~/.config/toolrelay`
 * Can be overridden with TOOLRELAY_CONFIG_DIR environment variable.
 */
export function configDir(): string {
  if (process.env.TOOLRELAY_CONFIG_DIR) return process.env.TOOLRELAY_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'toolrelay');
  return path.join(os.homedir(), '.config', 'toolrelay');
}

/**
 * Generate a timestamped random ID: `<ts>-<random>`
 * Used for session ids.
 */
export function timestampedId(): string {
  const ts = Date.now().toString(36);
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}

/** Sleep that rejects early when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** errno-style `code` of an unknown thrown value, if any. */
export function errorCode(e: unknown): string | undefined {
  if (!isRecord(e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}
