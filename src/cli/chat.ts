/**
 * `chat`: interactive loop. Every message continues the same session, so
 * the model sees the whole conversation; each message gets a fresh step
 * budget.
 */

import readline from 'node:readline/promises';

import { newSession } from '../agent.js';
import { AgentSession } from '../agent/session.js';
import { banner, err as errFmt } from '../term.js';

import { buildAgentDeps, buildRegistry, runAgentTurn } from './agent-turn.js';
import { flagString, friendlyError } from './args.js';
import type { CliContext } from './context.js';

const EXIT_WORDS = new Set(['/exit', '/quit', 'exit', 'quit']);

export async function runChat(ctx: CliContext): Promise<number> {
  const { config, S } = ctx;
  const registry = buildRegistry(ctx);
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  let closed = false;
  let current: AbortController | undefined;
  rl.on('close', () => {
    closed = true;
  });
  // readline owns Ctrl+C while the terminal is in raw mode
  rl.on('SIGINT', () => {
    if (current) current.abort();
    else rl.close();
  });

  let session: AgentSession | undefined;
  const resumeId = flagString(ctx.args, 'resume');
  if (resumeId) {
    session = AgentSession.fromSnapshot(await ctx.store.load(resumeId));
    if (session.cwd !== ctx.cwd) ctx.stderr(S.dim(`resuming in ${session.cwd}`) + '\n');
  }

  ctx.stderr(banner(`toolrelay chat · ${session?.model ?? config.model}`, S) + '\n');
  ctx.stderr(S.dim('Type /exit to quit. Ctrl+C cancels the running request.') + '\n');

  try {
    for (;;) {
      let line: string;
      try {
        line = (await rl.question(S.cyan('› '))).trim();
      } catch (e) {
        // stdin closed (Ctrl+D)
        if (closed) break;
        throw e;
      }
      if (!line) continue;
      if (EXIT_WORDS.has(line)) break;

      if (session) {
        session.resume({ maxSteps: config.max_steps, message: line });
      } else {
        session = newSession({
          model: config.model,
          cwd: ctx.cwd,
          maxSteps: config.max_steps,
          request: line,
          registry,
          approvalMode: config.approval_mode,
        });
      }

      const ac = new AbortController();
      current = ac;
      try {
        const outcome = await runAgentTurn(ctx, session, buildAgentDeps(ctx, { session, registry, signal: ac.signal, rl }));
        if (outcome.state === 'failed') ctx.stderr(errFmt(friendlyError(outcome.error), S) + '\n');
      } finally {
        current = undefined;
      }
    }
  } finally {
    rl.close();
  }
  if (session) ctx.stderr(S.dim(`session ${session.id} saved`) + '\n');
  return 0;
}
