import { CancelledError } from '../agent/errors.js';
import type { ProviderError } from '../agent/errors.js';
import { createLogger } from '../log.js';
import { sleep } from '../utils.js';

const log = createLogger('pressure');

/** Statuses a provider sends when it is shedding load. */
const PRESSURE_STATUSES: ReadonlySet<number> = new Set([429, 503]);

/**
 * Load pressure reported by one provider. 429/503 failures inside a rolling
 * window raise an escalating pre-request delay once they reach `threshold`,
 * and a Retry-After on any of them holds requests until it has passed.
 */
export class RateLimiter {
  private hits: number[] = [];
  private level = 0;
  private holdUntil = 0;

  constructor(
    readonly windowMs = 60_000,
    readonly threshold = 5,
    readonly maxDelayMs = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  /** Record a failed call. Returns false when its status is not a pressure signal. */
  note(err: ProviderError): boolean {
    if (err.status === undefined || !PRESSURE_STATUSES.has(err.status)) return false;
    const t = this.now();
    this.hits.push(t);
    this.prune(t);
    if (this.hits.length >= this.threshold) this.level = Math.min(this.level + 1, 6);
    if (err.retryAfterMs !== undefined) {
      this.holdUntil = Math.max(this.holdUntil, t + Math.min(err.retryAfterMs, this.maxDelayMs));
    }
    return true;
  }

  /** 0 below the threshold (bar a pending Retry-After), else 2^level seconds, capped. */
  delayMs(): number {
    const t = this.now();
    this.prune(t);
    const hold = Math.max(0, this.holdUntil - t);
    if (this.hits.length < this.threshold) {
      if (!this.hits.length) this.level = 0;
      return hold;
    }
    return Math.max(hold, Math.min(2 ** this.level * 1000, this.maxDelayMs));
  }

  get recentCount(): number {
    this.prune(this.now());
    return this.hits.length;
  }

  /** Sleep out the current delay before a request; an abort becomes CancelledError. */
  async wait(provider: string, signal?: AbortSignal): Promise<void> {
    const delay = this.delayMs();
    if (delay <= 0) return;
    log.warn(`${provider} is under pressure, holding the request`, { delayMs: delay, recent: this.hits.length });
    try {
      await sleep(delay, signal);
    } catch (e) {
      if (signal?.aborted) throw new CancelledError();
      throw e;
    }
  }

  private prune(t: number): void {
    const cutoff = t - this.windowMs;
    this.hits = this.hits.filter((h) => h > cutoff);
  }
}
