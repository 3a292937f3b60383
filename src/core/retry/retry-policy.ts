import type { RetryPlan } from "../../types/error/assistant-error";
import type { RetryEnvelope } from "../../types/retry";
import { ExhaustedRetriesError, TransportError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { cloneEnvelope, createRetryEnvelope } from "./retry-envelopes";

export type FailureClassification = "retryable" | "fatal";

/**
 * Pure mapping from a failure to whether another attempt may follow it.
 */
export type FailureClassifier = (error: unknown) => FailureClassification;

/**
 * Only a transport reporting the service as unavailable is worth another attempt.
 */
export const classifyTransportFailure: FailureClassifier = (error) =>
  error instanceof TransportError && error.status === "unavailable" ? "retryable" : "fatal";

export interface RetryClock {
  now(): number;
  wait(ms: number): Promise<void>;
}

export const systemRetryClock: RetryClock = {
  now: () => Date.now(),
  wait: (ms) =>
    ms <= 0 ? Promise.resolve() : new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

export interface RetryHooks {
  /** Called before each attempt with the delay that preceded it. */
  onAttempt?: (attempt: number, previousDelayMs: number) => void | Promise<void>;
  onRetryScheduled?: (plan: RetryPlan, error: unknown) => void | Promise<void>;
}

export interface RetryPolicyOptions {
  envelope?: Partial<RetryEnvelope>;
  classify?: FailureClassifier;
  clock?: RetryClock;
  logger?: Logger;
}

/**
 * Bounded retry around one unit of work.
 *
 * A failure the classifier calls fatal propagates untouched. Retryable
 * failures are retried until `maxAttempts` is spent, after which the last one
 * is wrapped in {@link ExhaustedRetriesError}.
 */
export class RetryPolicy {
  readonly envelope: RetryEnvelope;
  readonly classify: FailureClassifier;
  private readonly clock: RetryClock;
  private readonly logger?: Logger;

  constructor(options: RetryPolicyOptions = {}) {
    this.envelope = createRetryEnvelope(options.envelope);
    if (!Number.isInteger(this.envelope.maxAttempts) || this.envelope.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.envelope.maxAttempts}`);
    }
    this.classify = options.classify ?? classifyTransportFailure;
    this.clock = options.clock ?? systemRetryClock;
    this.logger = options.logger;
  }

  get maxAttempts(): number {
    return this.envelope.maxAttempts;
  }

  async execute<T>(work: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    let previousDelay = 0;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.envelope.maxAttempts; attempt += 1) {
      await hooks.onAttempt?.(attempt, previousDelay);
      try {
        return await work(attempt);
      } catch (error: unknown) {
        if (this.classify(error) === "fatal") {
          throw error;
        }
        lastError = error;
        if (attempt >= this.envelope.maxAttempts) {
          break;
        }

        const delayMs = this.calculateDelay(attempt);
        const plan: RetryPlan = {
          policy: this.envelope.policy,
          attempt,
          maxAttempts: this.envelope.maxAttempts,
          delayMs,
          nextAttemptAt: new Date(this.clock.now() + delayMs),
        };
        this.logger?.warn("Transient failure, retrying", {
          attempt,
          maxAttempts: this.envelope.maxAttempts,
          delayMs,
          error: errorMessage(error),
        });
        await hooks.onRetryScheduled?.(plan, error);
        previousDelay = delayMs;
        await this.clock.wait(delayMs);
      }
    }

    throw new ExhaustedRetriesError(this.envelope.maxAttempts, lastError);
  }

  /**
   * Delay before the attempt following `attempt`.
   */
  calculateDelay(attempt: number): number {
    const envelope = this.envelope;
    switch (envelope.policy) {
      case "immediate":
        return 0;
      case "linear":
        return Math.min(
          envelope.initialDelayMs + (attempt - 1) * envelope.multiplier,
          envelope.maxDelayMs,
        );
      case "exponential":
      default:
        return Math.min(
          envelope.initialDelayMs * Math.pow(envelope.multiplier, attempt - 1),
          envelope.maxDelayMs,
        );
    }
  }

  describe(): RetryEnvelope {
    return cloneEnvelope(this.envelope);
  }
}
