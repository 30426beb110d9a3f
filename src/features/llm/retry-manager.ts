export interface BackoffOptions {
  backoffMs: number;
  maxBackoffMs: number;
}

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleep: Sleeper = async (ms) => { await new Promise(r => setTimeout(r, ms)); };

/**
 * Computes and waits out the delay between escalation attempts. `attempt` is
 * the number of attempts already made, so the first wait uses the base delay.
 */
export class RetryManager {
  constructor(private sleeper: Sleeper = defaultSleep, private random: () => number = Math.random) {}

  computeBackoff(attempt: number, options: BackoffOptions, err?: unknown): number {
    const base = options.backoffMs;
    if (base <= 0) return 0;
    const jitter = this.random() * Math.min(200, base);
    const expo = Math.min(options.maxBackoffMs, Math.floor(base * Math.pow(2, Math.max(0, attempt - 1)) + jitter));
    const suggested = this.retryAfter(err);
    return suggested ? Math.max(suggested, expo) : expo;
  }

  async wait(attempt: number, options: BackoffOptions, err?: unknown): Promise<number> {
    const delay = this.computeBackoff(attempt, options, err);
    if (delay > 0) await this.sleeper(delay);
    return delay;
  }

  private retryAfter(err: unknown): number | undefined {
    if (typeof err !== 'object' || err === null || !('retryAfterMs' in err)) return undefined;
    const value = err.retryAfterMs;
    return typeof value === 'number' && value > 0 ? value : undefined;
  }
}
