/**
 * The tool-calling loop.
 *
 *   awaiting-model ──Final──────────────▶ done
 *        │  ▲
 *   ToolCalls │ all results appended
 *        ▼  │
 *   executing-tools ──unknown tool──────▶ failed
 *
 * Provider errors (after retries), an exhausted step budget and
 * cancellation also end in `failed`. Tools in a batch run one at a time,
 * in the order the model asked for them.
 */

import path from 'node:path';

import { BudgetExceededError, CancelledError, ProviderError, SafetyDeniedError, UnknownToolError } from './agent/errors.js';
import { buildDefaultSystemPrompt } from './agent/prompt-builder.js';
import { AgentSession } from './agent/session.js';
import { createLogger } from './log.js';
import type { SafetyGate } from './safety.js';
import type { ToolRegistry } from './tools/registry.js';
import type {
  AgentHooks,
  ApprovalMode,
  ConfirmationProvider,
  ModelGateway,
  SessionState,
  ToolCallRequest,
  ToolContext,
  ToolResult,
} from './types.js';

const log = createLogger('agent');

export type AgentDeps = {
  gateway: ModelGateway;
  registry: ToolRegistry;
  gate: SafetyGate;
  confirm: ConfirmationProvider;
  approvalMode?: ApprovalMode;
  hooks?: AgentHooks;
  signal?: AbortSignal;
  /** Seconds before a shell command is killed. */
  execTimeoutSec?: number;
  httpTimeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
};

export type RunOutcome =
  | { state: 'done'; text: string; steps: number }
  | { state: 'failed'; error: Error; steps: number };

/** Errors that end a session normally; anything else is a bug and is rethrown. */
function isSessionError(e: unknown): e is Error {
  return (
    e instanceof ProviderError ||
    e instanceof UnknownToolError ||
    e instanceof BudgetExceededError ||
    e instanceof CancelledError
  );
}

export function newSession(opts: {
  model: string;
  cwd: string;
  maxSteps: number;
  request: string;
  registry: ToolRegistry;
  approvalMode?: ApprovalMode;
  id?: string;
}): AgentSession {
  const systemPrompt = buildDefaultSystemPrompt({
    cwd: opts.cwd,
    model: opts.model,
    toolNames: opts.registry.list().map((t) => t.name),
    approvalRequired: opts.approvalMode !== 'yolo',
  });
  return AgentSession.create({
    id: opts.id,
    model: opts.model,
    cwd: opts.cwd,
    maxSteps: opts.maxSteps,
    systemPrompt,
    request: opts.request,
  });
}

class LoopRunner {
  private readonly mode: ApprovalMode;
  private readonly ctx: ToolContext;

  constructor(
    private readonly session: AgentSession,
    private readonly deps: AgentDeps
  ) {
    this.mode = deps.approvalMode ?? 'default';
    this.ctx = {
      cwd: session.cwd,
      signal: deps.signal,
      execTimeoutSec: deps.execTimeoutSec ?? 60,
      httpTimeoutMs: deps.httpTimeoutMs ?? 30_000,
    };
  }

  private enter(state: SessionState): void {
    if (this.session.state === state) return;
    this.session.setState(state);
    this.deps.hooks?.onStateChange?.(state);
  }

  private checkCancelled(): void {
    if (this.deps.signal?.aborted) throw new CancelledError();
  }

  async run(): Promise<RunOutcome> {
    const { session } = this;
    try {
      for (;;) {
        this.enter('awaiting-model');
        this.checkCancelled();
        if (session.budgetExhausted) throw new BudgetExceededError(session.maxSteps);

        const step = session.beginStep();
        log.debug('model call', { step, of: session.maxSteps, model: session.model });
        const completion = await this.deps.gateway.send({
          model: session.model,
          transcript: session.transcript,
          tools: this.deps.registry.schemas(),
          signal: this.deps.signal,
          onToken: this.deps.hooks?.onToken,
          temperature: this.deps.temperature,
          maxTokens: this.deps.maxTokens,
        });
        const calls = completion.kind === 'tool_calls' ? completion.calls : [];
        this.deps.hooks?.onTurnEnd?.({ step, toolCalls: calls.length, usage: completion.usage });

        if (!calls.length) {
          const text = completion.text ?? '';
          session.appendAssistant(text);
          session.finish(text);
          this.deps.hooks?.onStateChange?.('done');
          return { state: 'done', text, steps: session.steps };
        }

        session.appendAssistant(completion.text ?? '', calls);
        this.enter('executing-tools');
        await this.executeBatch(calls);
      }
    } catch (e) {
      const err = e instanceof Error && !isSessionError(e) && this.deps.signal?.aborted ? new CancelledError() : e;
      const reason = err instanceof CancelledError ? 'cancelled' : `not executed: ${err instanceof Error ? err.message : String(err)}`;
      // Nothing may stay dangling, whatever ended the run.
      for (const call of session.pendingCalls) this.record({ callId: call.id, name: call.name, success: false, error: reason });

      if (!(err instanceof Error)) throw err;
      session.fail(err);
      this.deps.hooks?.onStateChange?.('failed');
      if (!isSessionError(err)) throw err;
      log.debug('session failed', { name: err.name, error: err.message });
      return { state: 'failed', error: err, steps: session.steps };
    }
  }

  private record(result: ToolResult): void {
    this.session.appendToolResult(result);
    this.deps.hooks?.onToolResult?.(result);
  }

  private async executeBatch(calls: ToolCallRequest[]): Promise<void> {
    const unknown = calls.find((c) => !this.deps.registry.isEnabled(c.name));
    if (unknown) {
      log.warn(`model requested unknown tool ${unknown.name}`, { batch: calls.length });
      for (const call of calls) {
        this.record({
          callId: call.id,
          name: call.name,
          success: false,
          error: `not executed: unknown tool ${unknown.name}`,
        });
      }
      throw new UnknownToolError(unknown.name);
    }

    for (const call of calls) {
      this.checkCancelled();
      this.deps.hooks?.onToolCall?.(call);
      this.record(await this.runOne(call));
    }
  }

  private async runOne(call: ToolCallRequest): Promise<ToolResult> {
    const { registry, gate, confirm } = this.deps;
    const spec = registry.resolve(call.name);
    const verdict = await gate.check(spec, call.args);

    if (verdict.kind === 'deny') {
      const denied = new SafetyDeniedError(call.name, verdict.reason);
      await confirm.showBlocked?.({ tool: call.name, args: call.args, reason: denied.reason });
      return { callId: call.id, name: call.name, success: false, error: denied.message };
    }

    if (verdict.kind === 'confirm') {
      const approved = await this.decide(call, verdict.reason, verdict.prompt);
      if (!approved) {
        log.debug('declined', { tool: call.name, mode: this.mode });
        return { callId: call.id, name: call.name, success: false, error: 'user declined' };
      }
    }

    return registry.execute(call.name, call.args, this.ctx, call.id);
  }

  private async decide(call: ToolCallRequest, reason: string, summary: string): Promise<boolean> {
    switch (this.mode) {
      case 'yolo':
        log.debug('auto-approved (yolo)', { tool: call.name });
        return true;
      case 'reject':
        return false;
      case 'default':
        return this.deps.confirm.confirm({ tool: call.name, args: call.args, summary, reason, mode: this.mode });
    }
  }
}

/**
 * Drive a session until `done` or `failed`. Session-ending errors come back
 * in the outcome (and on `session.failure`); anything else is rethrown
 * after the session is marked failed.
 */
export async function runSession(session: AgentSession, deps: AgentDeps): Promise<RunOutcome> {
  if (session.state === 'done' || session.state === 'failed') {
    throw new Error(`session ${session.id} is ${session.state}; resume it first`);
  }
  const workspace = path.resolve(session.cwd);
  if (deps.gate.cwd !== workspace) {
    throw new Error(`safety gate is rooted at ${deps.gate.cwd}, not at the session workspace ${workspace}`);
  }
  return new LoopRunner(session, deps).run();
}
