/**
 * Resilient gateway wrapper.
 *
 * Two-level failover for model calls:
 *   1. Retry loop: exponential backoff, raised (never lowered) by Retry-After
 *   2. Model fallback: try fallback models once the primary exhausts its retries
 *
 * Non-retryable ProviderErrors (bad key, unknown model) and cancellations
 * surface immediately, without touching the fallback chain.
 */

import { createLogger } from '../log.js';
import type { Completion, ModelGateway, SendRequest } from '../types.js';
import { sleep as defaultSleep } from '../utils.js';

import { CancelledError, ProviderError, isAbortError } from './errors.js';

const log = createLogger('retry');

/** Upper bound on how far a Retry-After hint may stretch one wait. */
const MAX_RETRY_AFTER_MS = 60_000;

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  model: string;
  delayMs: number;
  error: ProviderError;
}

export interface ResilientOptions {
  /** Retries after the first attempt. Default: 3 (four attempts). */
  maxRetries?: number;
  /** First backoff in ms. Default: 1000. */
  baseDelayMs?: number;
  /** Models tried, in order, after the primary exhausts its retries. */
  fallbackModels?: string[];
  /** Called before each backoff wait. */
  onRetry?: (info: RetryInfo) => void;
  /** Injected for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Delay before retry number `attempt` (1-based).
 * First retry waits `base`; each later one waits double the previous actual
 * wait; a Retry-After hint can raise the current wait but never lower it.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  previousMs: number | undefined,
  retryAfterMs?: number
): number {
  const computed = attempt <= 1 || previousMs === undefined ? baseDelayMs : previousMs * 2;
  if (retryAfterMs === undefined) return computed;
  return Math.max(computed, Math.min(retryAfterMs, Math.max(MAX_RETRY_AFTER_MS, computed)));
}

export class ResilientGateway implements ModelGateway {
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly inner: ModelGateway,
    private readonly options: ResilientOptions = {}
  ) {
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.baseDelayMs = Math.max(1, options.baseDelayMs ?? 1000);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async send(req: SendRequest): Promise<Completion> {
    const chain = [req.model, ...(this.options.fallbackModels ?? []).filter((m) => m !== req.model)];
    let lastErr: ProviderError | undefined;

    for (const [i, model] of chain.entries()) {
      if (i > 0) log.warn(`falling back to ${model}`, { after: chain[i - 1] });
      try {
        return await this.sendWithRetries({ ...req, model });
      } catch (e) {
        if (!(e instanceof ProviderError) || !e.retryable) throw e;
        lastErr = e;
      }
    }
    // chain always has at least the primary model
    throw lastErr ?? new ProviderError('no model attempted', { provider: 'unknown', retryable: false });
  }

  private async sendWithRetries(req: SendRequest): Promise<Completion> {
    const maxAttempts = this.maxRetries + 1;
    let previousDelay: number | undefined;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.inner.send(req);
      } catch (e) {
        if (!(e instanceof ProviderError) || !e.retryable) throw e;
        if (attempt >= maxAttempts) {
          log.warn(`giving up on ${req.model} after ${attempt} attempts`, { error: e.message });
          throw e;
        }

        const delayMs = backoffDelay(attempt, this.baseDelayMs, previousDelay, e.retryAfterMs);
        previousDelay = delayMs;
        log.warn(`retrying in ${delayMs}ms`, {
          attempt: attempt + 1,
          of: maxAttempts,
          model: req.model,
          error: e.message.slice(0, 200),
        });
        this.options.onRetry?.({ attempt, maxAttempts, model: req.model, delayMs, error: e });

        try {
          await this.sleep(delayMs, req.signal);
        } catch (waitErr) {
          if (req.signal?.aborted || isAbortError(waitErr)) throw new CancelledError();
          throw waitErr;
        }
      }
    }
  }
}
