import { setTimeout as delay } from "node:timers/promises";
import { config } from "../config.js";
import { CallTimeoutError, errorMessage } from "./errors.js";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AttemptContext {
  attempt: number;
  signal: AbortSignal;
  timeoutMs: number;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  delaysMs: readonly number[];
  timeoutsMs: readonly number[];
  sleep?: SleepFn;
  isRetryable?: (error: unknown) => boolean;
  createTimeoutError?: (timeoutMs: number) => Error;
}

export interface ProviderFailure<P> {
  provider: P;
  error: unknown;
}

export interface FallbackResult<P, T> {
  value: T;
  provider: P;
  failures: ProviderFailure<P>[];
}

export class FallbackExhaustedError<P = unknown> extends Error {
  readonly failures: ProviderFailure<P>[];

  constructor(failures: ProviderFailure<P>[]) {
    const detail = failures
      .map((item) => `${String(item.provider)}: ${errorMessage(item.error)}`)
      .join("; ");
    super(failures.length > 0 ? `All providers failed (${detail})` : "No provider available");
    this.name = "FallbackExhaustedError";
    this.failures = failures;
  }
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function pickFromSchedule(schedule: readonly number[], index: number, fallback: number): number {
  if (schedule.length === 0) {
    return fallback;
  }
  return schedule[Math.min(index, schedule.length - 1)] ?? fallback;
}

/**
 * Bounded retry with escalating per-attempt timeouts and an optional provider
 * fallback chain. Every attempt receives its own AbortSignal which fires on
 * timeout or when the caller's signal aborts; operations that ignore the signal
 * are still cut off at the deadline.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly options: RetryPolicyOptions;
  private readonly sleep: SleepFn;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly createTimeoutError: (timeoutMs: number) => Error;

  constructor(options: RetryPolicyOptions) {
    this.options = options;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.sleep = options.sleep ?? defaultSleep;
    this.isRetryable = options.isRetryable ?? (() => true);
    this.createTimeoutError =
      options.createTimeoutError ?? ((timeoutMs) => new CallTimeoutError(timeoutMs));
  }

  with(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({ ...this.options, ...overrides });
  }

  async run<T>(
    operation: (attempt: AttemptContext) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: unknown = new Error("Retry policy made no attempts");

    for (let index = 0; index < this.maxAttempts; index += 1) {
      signal?.throwIfAborted();
      const timeoutMs = pickFromSchedule(this.options.timeoutsMs, index, 30_000);

      try {
        return await this.runAttempt(operation, index + 1, timeoutMs, signal);
      } catch (error) {
        lastError = error;
        if (signal?.aborted) {
          throw error;
        }
        if (!this.isRetryable(error) || index === this.maxAttempts - 1) {
          break;
        }
        await this.sleep(pickFromSchedule(this.options.delaysMs, index, 0), signal);
      }
    }

    throw lastError;
  }

  async runWithFallback<P, T>(
    chain: readonly P[],
    operation: (provider: P, attempt: AttemptContext) => Promise<T>,
    signal?: AbortSignal
  ): Promise<FallbackResult<P, T>> {
    const failures: ProviderFailure<P>[] = [];

    for (const provider of chain) {
      signal?.throwIfAborted();
      try {
        const value = await this.run((attempt) => operation(provider, attempt), signal);
        return { value, provider, failures };
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        failures.push({ provider, error });
      }
    }

    throw new FallbackExhaustedError(failures);
  }

  private runAttempt<T>(
    operation: (attempt: AttemptContext) => Promise<T>,
    attempt: number,
    timeoutMs: number,
    parent?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (settle: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        parent?.removeEventListener("abort", onParentAbort);
        settle();
      };

      const onParentAbort = (): void => {
        const reason: unknown = parent?.reason;
        controller.abort(reason);
        finish(() => reject(reason));
      };

      timer = setTimeout(() => {
        const timeoutError = this.createTimeoutError(timeoutMs);
        controller.abort(timeoutError);
        finish(() => reject(timeoutError));
      }, timeoutMs);
      parent?.addEventListener("abort", onParentAbort, { once: true });

      Promise.resolve()
        .then(() => operation({ attempt, signal: controller.signal, timeoutMs }))
        .then(
          (value) => finish(() => resolve(value)),
          (error: unknown) => finish(() => reject(error))
        );
    });
  }
}

export function createRetryPolicy(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.retry.maxAttempts,
    delaysMs: config.retry.delaysMs,
    timeoutsMs: config.retry.timeoutsMs,
    ...overrides
  });
}
