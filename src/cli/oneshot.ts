/**
 * `ask` / `agent`: one request (or a resumed session) run to completion.
 */

import readline from 'node:readline/promises';

import { newSession } from '../agent.js';
import { AgentSession } from '../agent/session.js';
import { err as errFmt } from '../term.js';

import { buildAgentDeps, buildRegistry, runAgentTurn } from './agent-turn.js';
import { flagString, friendlyError } from './args.js';
import type { CliContext } from './context.js';

export type OneShotMode = 'ask' | 'agent';

/** Returns the process exit code. */
export async function runOneShot(ctx: CliContext, mode: OneShotMode, prompt: string): Promise<number> {
  const { config } = ctx;
  const maxSteps = mode === 'agent' && ctx.args.flags['max-steps'] === undefined ? config.agent_max_steps : config.max_steps;
  const resumeId = flagString(ctx.args, 'resume');
  const registry = buildRegistry(ctx);

  let session: AgentSession;
  if (resumeId) {
    session = AgentSession.fromSnapshot(await ctx.store.load(resumeId));
    session.resume({ maxSteps, message: prompt || undefined });
    if (session.cwd !== ctx.cwd) ctx.stderr(ctx.S.dim(`resuming in ${session.cwd}`) + '\n');
  } else {
    if (!prompt.trim()) {
      ctx.stderr(errFmt(`${mode} needs a prompt`, ctx.S) + '\n');
      return 2;
    }
    session = newSession({
      model: config.model,
      cwd: ctx.cwd,
      maxSteps,
      request: prompt,
      registry,
      approvalMode: config.approval_mode,
    });
  }

  const ac = new AbortController();
  const onSigint = () => ac.abort();
  process.once('SIGINT', onSigint);
  const rl = ctx.interactive ? readline.createInterface({ input: process.stdin, output: process.stderr }) : undefined;
  rl?.on('SIGINT', onSigint);
  try {
    const deps = buildAgentDeps(ctx, { session, registry, signal: ac.signal, rl });
    const outcome = await runAgentTurn(ctx, session, deps);
    if (outcome.state === 'failed') {
      ctx.stderr(errFmt(friendlyError(outcome.error), ctx.S) + '\n');
      ctx.stderr(ctx.S.dim(`session ${session.id} saved; continue with --resume ${session.id}`) + '\n');
      return 1;
    }
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
    rl?.close();
  }
}
