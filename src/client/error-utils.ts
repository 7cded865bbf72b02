import { CancelledError, ProviderError, isAbortError, isRetryableStatus } from '../agent/errors.js';
import { errorMessage, isRecord } from '../utils.js';

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;

export function isConnRefused(e: unknown): boolean {
  if (isRecord(e) && isRecord(e.cause) && e.cause.code === 'ECONNREFUSED') return true;
  return RE_CONN_REFUSED.test(errorMessage(e));
}

/** Retry-After as delta-seconds or an HTTP date; undefined when absent/unparsable. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Math.round(Number(trimmed) * 1000);
  const at = Date.parse(trimmed);
  if (Number.isFinite(at)) return Math.max(0, at - now);
  return undefined;
}

/** Pull a human message out of a provider error body (`{error:{message}}` or `{error:"..."}`). */
export function errorBodyMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) {
      const err = parsed.error;
      if (typeof err === 'string') return err;
      if (isRecord(err) && typeof err.message === 'string') return err.message;
      if (typeof parsed.message === 'string') return parsed.message;
    }
  } catch {
    // not JSON; fall through to raw text
  }
  return text.slice(0, 500);
}

export async function httpError(provider: string, res: Response, what: string): Promise<ProviderError> {
  const text = await res.text().catch(() => '');
  const detail = text ? `: ${errorBodyMessage(text)}` : '';
  return new ProviderError(`${what} failed: ${res.status} ${res.statusText}${detail}`, {
    provider,
    status: res.status,
    retryable: isRetryableStatus(res.status),
    retryAfterMs: parseRetryAfter(res.headers.get('retry-after')),
  });
}

export function malformed(provider: string, detail: string, cause?: unknown): ProviderError {
  return new ProviderError(`malformed response from ${provider}: ${detail}`, {
    provider,
    retryable: true,
    cause,
  });
}

/**
 * Per-call abort scope: one controller fed by the caller's signal and the
 * request timeout. `translate` maps whatever the call threw to CancelledError
 * (caller abort), a retryable timeout, or a retryable network ProviderError.
 */
export class CallScope {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private timedOut = false;
  private readonly onCallerAbort = () => this.controller.abort();

  constructor(
    private readonly provider: string,
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    if (callerSignal?.aborted) this.controller.abort();
    callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  translate(e: unknown, url: string): Error {
    if (e instanceof ProviderError || e instanceof CancelledError) return e;
    if (this.callerSignal?.aborted) return new CancelledError();
    if (this.timedOut) {
      return new ProviderError(`request to ${url} timed out after ${this.timeoutMs}ms`, {
        provider: this.provider,
        retryable: true,
        cause: e,
      });
    }
    if (isAbortError(e)) return new CancelledError();
    const hint = isConnRefused(e) ? ' (connection refused)' : '';
    return new ProviderError(`cannot reach ${url}${hint}: ${errorMessage(e)}`, {
      provider: this.provider,
      retryable: true,
      cause: e,
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}
