/**
 * Shared helper: wire gateway, tools, gate and confirmations from config,
 * run one session to completion with terminal hooks, and save it.
 */

import { runSession } from '../agent.js';
import type { AgentDeps, RunOutcome } from '../agent.js';
import type { AgentSession } from '../agent/session.js';
import { createConfirmProvider } from '../confirm/index.js';
import type { Asker } from '../confirm/index.js';
import { createGateway } from '../gateway.js';
import { SafetyGate } from '../safety.js';
import { toolCallLine, toolResultLine } from '../term.js';
import { createDefaultRegistry } from '../tools/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { AgentHooks } from '../types.js';

import type { CliContext } from './context.js';

export function buildRegistry(ctx: CliContext): ToolRegistry {
  return createDefaultRegistry(ctx.config.tools);
}

export function buildAgentDeps(
  ctx: CliContext,
  opts: { session: AgentSession; registry: ToolRegistry; signal: AbortSignal; rl?: Asker }
): Omit<AgentDeps, 'hooks'> {
  const { config } = ctx;
  const { gateway } = createGateway(config, {
    onRetry: (info) =>
      ctx.stderr(ctx.S.dim(`\n[retry ${info.attempt}/${info.maxAttempts - 1}] ${info.error.message}; waiting ${info.delayMs}ms\n`)),
  });
  return {
    gateway,
    registry: opts.registry,
    // the snapshot's workspace, which `--resume` may have brought from elsewhere
    gate: new SafetyGate({
      cwd: opts.session.cwd,
      allowedDirs: config.allowed_dirs,
      lockdown: config.lockdown,
      safety: config.safety,
    }),
    confirm: createConfirmProvider({
      mode: config.approval_mode,
      styler: ctx.S,
      rl: opts.rl,
      interactive: ctx.interactive,
    }),
    approvalMode: config.approval_mode,
    signal: opts.signal,
    execTimeoutSec: config.exec_timeout,
    httpTimeoutMs: config.request_timeout * 1000,
    temperature: config.temperature,
    maxTokens: config.max_tokens,
  };
}

/** First line of a tool result, for the trace. */
function resultSummary(text: string | undefined): string {
  const first = (text ?? '').split('\n')[0] ?? '';
  return first.length > 100 ? first.slice(0, 97) + '...' : first;
}

/**
 * Runs the session with streaming/trace hooks, prints the final answer when
 * it was not streamed, and saves the session whatever the outcome.
 */
export async function runAgentTurn(
  ctx: CliContext,
  session: AgentSession,
  deps: Omit<AgentDeps, 'hooks'>
): Promise<RunOutcome> {
  const { S } = ctx;
  let streamed = false;
  let midLine = false;

  const hooks: AgentHooks = {
    onToken: ctx.config.stream
      ? (t) => {
          streamed = true;
          midLine = !t.endsWith('\n');
          ctx.stdout(t);
        }
      : undefined,
    onToolCall: (call) => {
      if (midLine) ctx.stdout('\n');
      midLine = false;
      streamed = false;
      ctx.stderr(toolCallLine(call.name, call.args, S) + '\n');
    },
    onToolResult: (r) => {
      const summary = r.success ? resultSummary(r.output) : resultSummary(r.error);
      ctx.stderr(toolResultLine(r.success, summary, r.durationMs, S) + '\n');
    },
  };

  let outcome: RunOutcome;
  try {
    outcome = await runSession(session, { ...deps, hooks });
  } finally {
    await ctx.store.save(session);
  }

  if (outcome.state === 'done') {
    if (!streamed) ctx.stdout(outcome.text);
    if (!outcome.text.endsWith('\n')) ctx.stdout('\n');
  } else if (midLine) {
    ctx.stdout('\n');
  }
  return outcome;
}
