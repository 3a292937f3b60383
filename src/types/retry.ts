/**
 * Supported delay shapes between turn attempts.
 */
export type RetryDelayPolicy = "immediate" | "linear" | "exponential";

/**
 * Retry envelope for one assist turn.
 *
 * @remarks
 * The defaults make at most three attempts with no delay between them.
 */
export interface RetryEnvelope {
  policy: RetryDelayPolicy;
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}
