import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';

import { z } from 'zod';

import { createLogger } from '../log.js';
import { BASH_PATH } from '../utils.js';

import { defineTool } from './registry.js';
import { stripAnsi, truncateBytes } from './text-utils.js';
import { ToolExecutionError } from './tool-error.js';

const log = createLogger('exec');

const DEFAULT_MAX_EXEC_BYTES = 16 * 1024;
const CAPTURE_LIMIT = 256 * 1024;

export type ExecResult = {
  rc: number;
  out: string;
  err: string;
  truncated: boolean;
};

export type SpawnOptions = {
  cwd: string;
  timeoutSec: number;
  signal?: AbortSignal;
  /** Run `file` through bash (`file` is then the whole command line). */
  shell?: boolean;
  maxBytes?: number;
};

/**
 * Spawn a process in its own process group, capture capped stdout/stderr,
 * and kill the whole group on timeout or abort.
 */
export async function runProcess(
  file: string,
  args: string[],
  opts: SpawnOptions
): Promise<ExecResult & { killed: boolean }> {
  if (opts.signal?.aborted) throw new ToolExecutionError('internal', 'aborted before start');
  try {
    await fs.access(opts.cwd);
  } catch {
    throw new ToolExecutionError('not_found', `working directory does not exist: ${opts.cwd}`);
  }

  const child = spawn(file, args, {
    cwd: opts.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: opts.shell ? BASH_PATH : false,
    detached: true,
  });

  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_EXEC_BYTES;
  const outChunks: Buffer[] = [];
  const errChunks: Buffer[] = [];
  const seen = { out: 0, err: 0 };
  const captured = { out: 0, err: 0 };
  let killed = false;
  let aborted = false;

  const killProcessGroup = () => {
    const pid = child.pid;
    if (!pid) return;
    try {
      // detached:true places the child in its own process group.
      process.kill(-pid, 'SIGKILL');
    } catch {
      child.kill('SIGKILL');
    }
  };

  const killTimer = setTimeout(
    () => {
      killed = true;
      killProcessGroup();
    },
    Math.max(1, opts.timeoutSec) * 1000
  );

  const onAbort = () => {
    aborted = true;
    killProcessGroup();
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  const pushCapped = (chunks: Buffer[], buf: Buffer, kind: 'out' | 'err') => {
    seen[kind] += buf.length;
    const remaining = CAPTURE_LIMIT - captured[kind];
    if (remaining <= 0) return;
    const take = buf.length <= remaining ? buf : buf.subarray(0, remaining);
    chunks.push(Buffer.from(take));
    captured[kind] += take.length;
  };

  child.stdout.on('data', (d: Buffer) => pushCapped(outChunks, d, 'out'));
  child.stderr.on('data', (d: Buffer) => pushCapped(errChunks, d, 'err'));

  let rc: number;
  try {
    rc = await new Promise<number>((resolve, reject) => {
      child.on('error', (err: NodeJS.ErrnoException) => {
        reject(
          new ToolExecutionError(
            err.code === 'ENOENT' ? 'not_found' : 'internal',
            `failed to spawn ${opts.shell ? 'shell' : file}: ${err.message}`
          )
        );
      });
      child.on('close', (code) => resolve(code ?? 1));
    });
  } finally {
    clearTimeout(killTimer);
    opts.signal?.removeEventListener('abort', onAbort);
  }

  if (aborted) throw new ToolExecutionError('internal', 'aborted');

  const outT = truncateBytes(
    stripAnsi(Buffer.concat(outChunks).toString('utf8')).trimEnd(),
    maxBytes,
    seen.out
  );
  const errT = truncateBytes(
    stripAnsi(Buffer.concat(errChunks).toString('utf8')).trimEnd(),
    maxBytes,
    seen.err
  );

  let errText = errT.text;
  if (killed) {
    errText = (errText ? errText + '\n' : '') + `[killed after ${opts.timeoutSec}s timeout]`;
  }

  return {
    rc,
    out: outT.text,
    err: errText,
    truncated: outT.truncated || errT.truncated || seen.out > captured.out || seen.err > captured.err,
    killed,
  };
}

export const executeCommandTool = defineTool({
  name: 'execute_command',
  description:
    'Run a shell command with bash in the workspace. Returns JSON {rc, out, err, truncated}. ' +
    'Commands are killed after the configured timeout.',
  parameters: z.object({
    cmd: z.string().min(1).describe('Shell command line'),
    timeout: z.number().int().min(1).max(600).optional().describe('Seconds before the command is killed'),
  }),
  safety: 'confirm',
  category: 'exec',
  guard: { command: ['cmd'] },
  async run(args, ctx) {
    const timeoutSec = args.timeout ?? ctx.execTimeoutSec;
    log.debug('exec', { cmd: args.cmd, timeoutSec });
    const r = await runProcess(args.cmd, [], {
      cwd: ctx.cwd,
      timeoutSec,
      signal: ctx.signal,
      shell: true,
    });

    let out = r.out;
    if (!out && !r.err && !r.killed) {
      out =
        r.rc === 0
          ? '[command completed successfully with no output]'
          : `[command exited with code ${r.rc} and produced no output]`;
    }
    const result: ExecResult = { rc: r.rc, out, err: r.err, truncated: r.truncated };
    return JSON.stringify(result);
  },
});
