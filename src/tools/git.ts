import { z } from 'zod';

import type { ToolContext } from '../types.js';

import type { ExecResult } from './exec.js';
import { runProcess } from './exec.js';
import { defineTool } from './registry.js';
import { ToolExecutionError } from './tool-error.js';

const GIT_TIMEOUT_SEC = 30;
const NETWORK_TIMEOUT_SEC = 120;

const refName = z
  .string()
  .min(1)
  .regex(/^[^-\s]\S*$/, 'must not start with "-" or contain whitespace');

export function clipLines(s: string, maxLines: number): string {
  const lines = s.split(/\r?\n/);
  if (lines.length <= maxLines) return s;
  return lines.slice(0, maxLines).join('\n') + `\n[truncated: ${lines.length - maxLines} more lines]`;
}

/**
 * Run git without a shell. An exit code outside `okCodes` becomes a tool
 * error carrying stderr.
 */
export async function gitExec(
  ctx: ToolContext,
  args: string[],
  opts: { okCodes?: readonly number[]; timeoutSec?: number } = {}
): Promise<ExecResult> {
  const r = await runProcess('git', args, {
    cwd: ctx.cwd,
    timeoutSec: opts.timeoutSec ?? GIT_TIMEOUT_SEC,
    signal: ctx.signal,
    maxBytes: 32 * 1024,
  });
  if (!(opts.okCodes ?? [0]).includes(r.rc)) {
    const detail = r.err.trim() || r.out.trim() || `exit code ${r.rc}`;
    const code = /not a git repository/i.test(detail) ? 'not_found' : 'internal';
    throw new ToolExecutionError(code, `git ${args[0]} failed: ${detail}`);
  }
  return r;
}

async function git(ctx: ToolContext, args: string[]): Promise<string> {
  return (await gitExec(ctx, args)).out;
}

/** push and pull report progress on stderr. */
function combined(r: ExecResult): string {
  return [r.out.trim(), r.err.trim()].filter(Boolean).join('\n') || '[no output]';
}

export const gitStatusTool = defineTool({
  name: 'git_status',
  description: 'Show the working tree status (branch plus short status).',
  parameters: z.object({}),
  safety: 'safe',
  category: 'git',
  async run(_args, ctx) {
    const lines = (await git(ctx, ['status', '--short', '--branch'])).trimEnd().split('\n').filter(Boolean);
    if (lines.every((l) => l.startsWith('## '))) lines.push('[clean working tree]');
    return lines.join('\n');
  },
});

export const gitDiffTool = defineTool({
  name: 'git_diff',
  description: 'Show unstaged changes, or staged changes with staged=true. Optionally limit to one path.',
  parameters: z.object({
    staged: z.boolean().optional(),
    path: z.string().optional(),
  }),
  safety: 'safe',
  category: 'git',
  async run(args, ctx) {
    const argv = ['diff', '--no-color'];
    if (args.staged) argv.push('--cached');
    if (args.path) argv.push('--', args.path);
    const out = await git(ctx, argv);
    return out.trim() ? clipLines(out, 800) : '[no changes]';
  },
});

export const gitLogTool = defineTool({
  name: 'git_log',
  description: 'Show recent commits, one line each.',
  parameters: z.object({
    count: z.number().int().min(1).max(100).default(10),
  }),
  safety: 'safe',
  category: 'git',
  async run(args, ctx) {
    let out: string;
    try {
      out = await git(ctx, ['log', '--oneline', '--no-color', '-n', String(args.count)]);
    } catch (e) {
      // unborn branch in a fresh repository
      if (e instanceof ToolExecutionError && /does not have any commits yet/.test(e.message)) return '[no commits]';
      throw e;
    }
    return out.trim() ? out : '[no commits]';
  },
});

export const gitCommitTool = defineTool({
  name: 'git_commit',
  description: 'Commit staged changes. With add_all=true, stage every change first (git add -A).',
  parameters: z.object({
    message: z.string().min(1),
    add_all: z.boolean().optional(),
  }),
  safety: 'confirm',
  category: 'git',
  async run(args, ctx) {
    if (args.add_all) await git(ctx, ['add', '-A']);
    const out = await git(ctx, ['commit', '-m', args.message]);
    return out.trim();
  },
});

export const gitBranchTool = defineTool({
  name: 'git_branch',
  description:
    'List, create, switch or delete branches. branch_name is required for every action except list.',
  parameters: z.object({
    action: z.enum(['list', 'create', 'switch', 'delete']).default('list'),
    branch_name: refName.optional(),
  }),
  safety: 'confirm',
  category: 'git',
  async run(args, ctx) {
    if (args.action === 'list') {
      const out = await git(ctx, ['branch', '--no-color']);
      return out.trimEnd() || '[no branches]';
    }

    const name = args.branch_name;
    if (!name) throw new ToolExecutionError('invalid_args', `branch_name is required to ${args.action} a branch`);
    if (args.action === 'create') {
      await git(ctx, ['branch', name]);
      return `created branch ${name}`;
    }
    if (args.action === 'switch') {
      await git(ctx, ['switch', name]);
      return `switched to ${name}`;
    }
    // -d refuses branches that are not merged
    return (await git(ctx, ['branch', '-d', name])).trim();
  },
});

export const gitPushTool = defineTool({
  name: 'git_push',
  description: 'Push commits to a remote (default origin). branch defaults to the current upstream.',
  parameters: z.object({
    remote: refName.default('origin'),
    branch: refName.optional(),
  }),
  safety: 'confirm',
  category: 'git',
  async run(args, ctx) {
    const argv = ['push', args.remote];
    if (args.branch) argv.push(args.branch);
    return combined(await gitExec(ctx, argv, { timeoutSec: NETWORK_TIMEOUT_SEC }));
  },
});

export const gitPullTool = defineTool({
  name: 'git_pull',
  description: 'Fetch and merge from a remote (default origin). branch defaults to the current upstream.',
  parameters: z.object({
    remote: refName.default('origin'),
    branch: refName.optional(),
  }),
  safety: 'confirm',
  category: 'git',
  async run(args, ctx) {
    const argv = ['pull', '--no-edit', args.remote];
    if (args.branch) argv.push(args.branch);
    return combined(await gitExec(ctx, argv, { timeoutSec: NETWORK_TIMEOUT_SEC }));
  },
});
