import type { RetryEnvelope } from "../../types/retry";

export const RETRY_GUARDRAILS = {
  minAttempts: 1,
  maxAttempts: 8,
  minInitialDelayMs: 0,
  maxInitialDelayMs: 5_000,
  minMultiplier: 1,
  maxMultiplier: 5,
  minMaxDelayMs: 0,
  maxMaxDelayMs: 60_000,
} as const;

/**
 * Three attempts per turn, back to back.
 */
export const DEFAULT_TURN_RETRY_ENVELOPE: RetryEnvelope = {
  policy: "immediate",
  maxAttempts: 3,
  initialDelayMs: 0,
  multiplier: 2,
  maxDelayMs: 10_000,
};

export const createRetryEnvelope = (
  overrides: Partial<RetryEnvelope> = {},
): RetryEnvelope => ({
  policy: overrides.policy ?? DEFAULT_TURN_RETRY_ENVELOPE.policy,
  maxAttempts: overrides.maxAttempts ?? DEFAULT_TURN_RETRY_ENVELOPE.maxAttempts,
  initialDelayMs: overrides.initialDelayMs ?? DEFAULT_TURN_RETRY_ENVELOPE.initialDelayMs,
  multiplier: overrides.multiplier ?? DEFAULT_TURN_RETRY_ENVELOPE.multiplier,
  maxDelayMs: overrides.maxDelayMs ?? DEFAULT_TURN_RETRY_ENVELOPE.maxDelayMs,
});

export const cloneEnvelope = (envelope: RetryEnvelope): RetryEnvelope => ({
  ...envelope,
});
