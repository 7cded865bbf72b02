import type {
  ConversationTurn,
  SessionFailure,
  SessionSnapshot,
  SessionState,
  ToolCallRequest,
  ToolResult,
} from '../types.js';
import { timestampedId } from '../utils.js';

/** Text a tool turn carries for the model. */
export function renderToolContent(result: ToolResult): string {
  if (result.success) return result.output ?? '';
  return `error: ${result.error ?? 'unknown error'}`;
}

export type NewSessionOptions = {
  id?: string;
  model: string;
  cwd: string;
  maxSteps: number;
  systemPrompt: string;
  request: string;
};

/**
 * One conversation with its append-only transcript and step budget.
 *
 * Issued tool calls stay pending until a result with the same id is
 * appended; nothing else may be appended while any is pending.
 */
export class AgentSession {
  readonly id: string;
  model: string;
  readonly cwd: string;
  maxSteps: number;
  steps = 0;
  state: SessionState = 'awaiting-model';
  finalText?: string;
  failure?: SessionFailure;
  readonly createdAt: string;
  updatedAt: string;

  private readonly turns: ConversationTurn[] = [];
  /** Issued, not yet resolved; insertion order = issue order. */
  private readonly pending = new Map<string, ToolCallRequest>();
  private readonly resolved = new Set<string>();

  private constructor(init: { id: string; model: string; cwd: string; maxSteps: number; createdAt: string }) {
    this.id = init.id;
    this.model = init.model;
    this.cwd = init.cwd;
    this.maxSteps = init.maxSteps;
    this.createdAt = init.createdAt;
    this.updatedAt = init.createdAt;
  }

  static create(opts: NewSessionOptions): AgentSession {
    const session = new AgentSession({
      id: opts.id ?? timestampedId(),
      model: opts.model,
      cwd: opts.cwd,
      maxSteps: opts.maxSteps,
      createdAt: new Date().toISOString(),
    });
    session.push({ role: 'system', content: opts.systemPrompt });
    session.push({ role: 'user', content: opts.request });
    return session;
  }

  static fromSnapshot(snap: SessionSnapshot): AgentSession {
    const session = new AgentSession(snap);
    for (const turn of snap.transcript) session.push(turn);
    session.steps = snap.steps;
    session.state = snap.state;
    session.finalText = snap.finalText;
    session.failure = snap.failure;
    session.updatedAt = snap.updatedAt;
    return session;
  }

  get transcript(): readonly ConversationTurn[] {
    return this.turns;
  }

  get pendingCallIds(): string[] {
    return [...this.pending.keys()];
  }

  get pendingCalls(): ToolCallRequest[] {
    return [...this.pending.values()];
  }

  get budgetExhausted(): boolean {
    return this.steps >= this.maxSteps;
  }

  private touch(): void {
    this.updatedAt = new Date().toISOString();
  }

  /** Validates the turn against the pending set, then records it. */
  private push(turn: ConversationTurn): void {
    if (turn.role === 'tool') {
      const id = turn.result.callId;
      if (!this.pending.has(id)) {
        const why = this.resolved.has(id) ? 'already resolved' : 'unknown';
        throw new Error(`cannot append result for ${why} tool call ${JSON.stringify(id)}`);
      }
      this.pending.delete(id);
      this.resolved.add(id);
    } else {
      if (this.pending.size) {
        throw new Error(`${this.pending.size} tool call(s) still pending: ${this.pendingCallIds.join(', ')}`);
      }
      if (turn.role === 'assistant') {
        const ids = new Set<string>();
        for (const call of turn.toolCalls ?? []) {
          if (ids.has(call.id) || this.resolved.has(call.id)) {
            throw new Error(`duplicate tool call id ${JSON.stringify(call.id)}`);
          }
          ids.add(call.id);
        }
        for (const call of turn.toolCalls ?? []) this.pending.set(call.id, call);
      }
    }
    this.turns.push(turn);
    this.touch();
  }

  appendUser(content: string): void {
    this.push({ role: 'user', content });
  }

  appendAssistant(content: string, toolCalls?: ToolCallRequest[]): void {
    this.push(toolCalls?.length ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content });
  }

  appendToolResult(result: ToolResult): void {
    this.push({ role: 'tool', content: renderToolContent(result), result });
  }

  /** Count one model call; callers check `budgetExhausted` first. */
  beginStep(): number {
    if (this.pending.size) throw new Error('cannot call the model with unresolved tool calls');
    this.steps += 1;
    this.touch();
    return this.steps;
  }

  setState(state: SessionState): void {
    this.state = state;
    this.touch();
  }

  finish(text: string): void {
    if (this.pending.size) throw new Error('cannot finish with unresolved tool calls');
    this.finalText = text;
    this.failure = undefined;
    this.setState('done');
  }

  fail(err: Error): void {
    this.failure = { name: err.name, message: err.message };
    this.setState('failed');
  }

  /**
   * Continue after `failed`/`done` with a fresh step budget. Calls left
   * dangling by an interrupted run get failed results; a follow-up message
   * becomes a new user turn.
   */
  resume(opts: { maxSteps?: number; message?: string } = {}): void {
    for (const call of this.pendingCalls) {
      this.appendToolResult({ callId: call.id, name: call.name, success: false, error: 'interrupted' });
    }
    if (opts.maxSteps !== undefined) this.maxSteps = opts.maxSteps;
    this.steps = 0;
    this.failure = undefined;
    this.finalText = undefined;
    if (opts.message) this.appendUser(opts.message);
    this.setState('awaiting-model');
  }

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      model: this.model,
      cwd: this.cwd,
      transcript: [...this.turns],
      steps: this.steps,
      maxSteps: this.maxSteps,
      state: this.state,
      finalText: this.finalText,
      failure: this.failure,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }
}
