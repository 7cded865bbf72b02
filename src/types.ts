import type { ZodTypeAny } from 'zod';

// --- Transcript ---

export type ToolCallRequest = {
  /** Provider-assigned id; synthesised as `call_<n>` when the provider omits one. */
  id: string;
  name: string;
  args: Record<string, unknown>;
};

export type ToolResult = {
  callId: string;
  name: string;
  success: boolean;
  output?: string;
  error?: string;
  durationMs?: number;
};

export type SystemTurn = { role: 'system'; content: string };
export type UserTurn = { role: 'user'; content: string };
export type AssistantTurn = {
  role: 'assistant';
  content: string;
  toolCalls?: ToolCallRequest[];
};
export type ToolTurn = {
  role: 'tool';
  /** Text rendered for the model. */
  content: string;
  result: ToolResult;
};

export type ConversationTurn = SystemTurn | UserTurn | AssistantTurn | ToolTurn;

// --- Gateway ---

export type TokenUsage = {
  promptTokens?: number;
  completionTokens?: number;
};

export type Completion =
  | { kind: 'final'; text: string; usage?: TokenUsage }
  | { kind: 'tool_calls'; calls: ToolCallRequest[]; text?: string; usage?: TokenUsage };

/** Wire declaration of a tool (OpenAI function-tool shape). */
export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
};

export type SendRequest = {
  model: string;
  transcript: readonly ConversationTurn[];
  tools: ToolSchema[];
  signal?: AbortSignal;
  onToken?: (token: string) => void;
  temperature?: number;
  maxTokens?: number;
};

export interface ModelGateway {
  send(req: SendRequest): Promise<Completion>;
}

export type ModelInfo = {
  id: string;
  provider: ProviderName;
  contextLength?: number;
};

export type ProviderName = 'openrouter' | 'groq' | 'ollama';

// --- Tools ---

export type SafetyClass = 'safe' | 'confirm' | 'blocked';
export type ToolCategory = 'file' | 'exec' | 'git' | 'web' | 'system';

export type ToolGuard = {
  /** Argument names whose string values are shell commands. */
  command?: string[];
  /** Argument names whose string values are filesystem paths. */
  paths?: string[];
};

export type ToolContext = {
  /** Session workspace; relative paths resolve against it. */
  cwd: string;
  signal?: AbortSignal;
  /** Seconds before a shell command is killed. */
  execTimeoutSec: number;
  /** Per-request timeout for outbound HTTP tools (ms). */
  httpTimeoutMs: number;
};

export type ToolSpec<S extends ZodTypeAny = ZodTypeAny> = {
  name: string;
  description: string;
  parameters: S;
  safety: SafetyClass;
  category: ToolCategory;
  guard?: ToolGuard;
  run(args: S['_output'], ctx: ToolContext): Promise<string>;
};

export type ToolStats = {
  calls: number;
  failures: number;
  totalMs: number;
};

// --- Safety ---

export type Verdict =
  | { kind: 'allow' }
  | { kind: 'confirm'; reason: string; prompt: string }
  | { kind: 'deny'; reason: string };

export type ApprovalMode = 'default' | 'yolo' | 'reject';

/**
 * Frontend-agnostic confirmation interface.
 * Implementations: TerminalConfirmProvider, HeadlessConfirmProvider, AutoApproveProvider.
 */
export interface ConfirmationProvider {
  /** Confirm a single action. Returns true to approve, false to reject. */
  confirm(opts: ConfirmRequest): Promise<boolean>;
  /** Called when an action is blocked (informational). */
  showBlocked?(opts: BlockedNotice): Promise<void>;
}

export type ConfirmRequest = {
  tool: string;
  args: Record<string, unknown>;
  summary: string;
  reason: string;
  mode: ApprovalMode;
};

export type BlockedNotice = {
  tool: string;
  args: Record<string, unknown>;
  reason: string;
};

// --- Session ---

export type SessionState = 'awaiting-model' | 'executing-tools' | 'done' | 'failed';

export type SessionFailure = {
  name: string;
  message: string;
};

export type SessionSnapshot = {
  id: string;
  model: string;
  cwd: string;
  transcript: ConversationTurn[];
  steps: number;
  maxSteps: number;
  state: SessionState;
  finalText?: string;
  failure?: SessionFailure;
  createdAt: string;
  updatedAt: string;
};

export type AgentHooks = {
  onToken?: (token: string) => void;
  onToolCall?: (call: ToolCallRequest) => void;
  onToolResult?: (result: ToolResult) => void;
  onTurnEnd?: (info: { step: number; toolCalls: number; usage?: TokenUsage }) => void;
  onStateChange?: (state: SessionState) => void;
};
