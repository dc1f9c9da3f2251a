import { setTimeout as delay } from "timers/promises";
import { TransientInfrastructureError, errorMessage } from "./errors";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  attempt: number;
  reason: string;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (decision: RetryDecision, error: unknown) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
};

/**
 * Bounded retry with exponential backoff and full jitter. Only transient
 * infrastructure failures qualify; everything else is terminal on the
 * first attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(
    options: Partial<RetryOptions> = {},
    private readonly random: () => number = Math.random,
  ) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.maxAttempts = Math.max(1, resolved.maxAttempts);
    this.baseDelayMs = resolved.baseDelayMs;
    this.maxDelayMs = resolved.maxDelayMs;
  }

  isRetryable(error: unknown): boolean {
    return error instanceof TransientInfrastructureError;
  }

  // attempt is 1-indexed: the attempt that just failed
  decide(attempt: number, error: unknown): RetryDecision {
    const reason = errorMessage(error);

    if (!this.isRetryable(error)) {
      return { shouldRetry: false, delayMs: 0, attempt, reason };
    }

    if (attempt >= this.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        attempt,
        reason: `Retry limit reached (${this.maxAttempts}) after attempt ${attempt}: ${reason}`,
      };
    }

    const ceiling = Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    return {
      shouldRetry: true,
      delayMs: Math.floor(this.random() * ceiling),
      attempt,
      reason,
    };
  }

  async run<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    const sleep = hooks.sleep ?? ((ms: number) => delay(ms));

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const decision = this.decide(attempt, error);
        if (!decision.shouldRetry) throw error;
        hooks.onRetry?.(decision, error);
        await sleep(decision.delayMs);
      }
    }
  }
}
