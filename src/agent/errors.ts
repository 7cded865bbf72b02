/**
 * Errors that end or interrupt a session. Per-tool failures never use these:
 * they become failed ToolResults (see tools/tool-error.ts).
 */

export type ProviderErrorInit = {
  provider: string;
  status?: number;
  retryable: boolean;
  /** Server-suggested wait before retrying, from a Retry-After header. */
  retryAfterMs?: number;
  cause?: unknown;
};

/** Network/remote failure from a model provider. */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;

  constructor(message: string, init: ProviderErrorInit) {
    super(message, init.cause !== undefined ? { cause: init.cause } : undefined);
    this.name = 'ProviderError';
    this.provider = init.provider;
    this.status = init.status;
    this.retryable = init.retryable;
    this.retryAfterMs = init.retryAfterMs;
  }
}

/** 408, 429 and 5xx are worth another attempt; other 4xx are not. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`unknown tool ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class SafetyDeniedError extends Error {
  constructor(
    readonly toolName: string,
    readonly reason: string
  ) {
    super(reason);
    this.name = 'SafetyDeniedError';
  }
}

export class BudgetExceededError extends Error {
  constructor(readonly maxSteps: number) {
    super(`step budget exhausted after ${maxSteps} model calls`);
    this.name = 'BudgetExceededError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigLockError extends Error {
  constructor(readonly lockFile: string) {
    super(`timed out waiting for config lock ${lockFile}`);
    this.name = 'ConfigLockError';
  }
}

/** True for AbortController-driven failures (DOMException or undici AbortError). */
export function isAbortError(e: unknown): boolean {
  if (e instanceof CancelledError) return true;
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError');
}
