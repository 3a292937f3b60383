import { randomUUID } from "crypto";
import { AssistantFailure, errorMessage } from "../../core/errors";
import type {
    AssistantError,
    ErrorCorrelation,
    RetryPlan,
} from "../../types/error/assistant-error";
import {
    DEFAULT_SEVERITY_FOR_DOMAIN,
    DEFAULT_USER_IMPACT_FOR_DOMAIN,
    type AssistantFaultDomain,
    type AssistantSeverity,
    type AssistantUserImpact,
} from "../../types/error/error-taxonomy";

/**
 * Describes the information required to construct a normalized {@link AssistantError}.
 * @remarks
 * Capture the fault domain and correlation as early as possible so the retry policy
 * and the CLI can make decisions without inspecting error classes.
 */
export interface WrapErrorOptions {
  faultDomain: AssistantFaultDomain;
  code: string;
  message: string;
  remediation: string;
  severity?: AssistantSeverity;
  userImpact?: AssistantUserImpact;
  metadata?: Record<string, unknown>;
  cause?: Error;
  retryPlan?: RetryPlan;
  correlation?: ErrorCorrelation;
  timestamp?: Date;
}

export function createAssistantError(options: WrapErrorOptions): AssistantError {
  const severity = options.severity ?? DEFAULT_SEVERITY_FOR_DOMAIN[options.faultDomain];
  const userImpact = options.userImpact ?? DEFAULT_USER_IMPACT_FOR_DOMAIN[options.faultDomain];

  return {
    id: randomUUID(),
    faultDomain: options.faultDomain,
    severity,
    userImpact,
    code: options.code,
    message: options.message,
    remediation: options.remediation,
    cause: options.cause,
    metadata: options.metadata,
    timestamp: options.timestamp ?? new Date(),
    retryPlan: options.retryPlan,
    correlation: options.correlation,
  };
}

export interface WrapUnknownErrorOptions extends WrapErrorOptions {
  error: unknown;
}

/**
 * Normalizes an unknown error into an {@link AssistantError}, keeping the original error as the cause.
 */
export function wrapError(options: WrapUnknownErrorOptions): AssistantError {
  const { error, ...rest } = options;
  const cause = error instanceof Error ? error : new Error(errorMessage(error));
  return createAssistantError({ ...rest, cause });
}

/**
 * Builds an envelope from anything thrown. {@link AssistantFailure} subclasses
 * keep their own taxonomy; other errors land in `fallbackDomain`.
 */
export function toAssistantError(
  error: unknown,
  fallbackDomain: AssistantFaultDomain = "infrastructure",
  correlation?: ErrorCorrelation,
): AssistantError {
  if (error instanceof AssistantFailure) {
    return createAssistantError({
      faultDomain: error.faultDomain,
      code: error.code,
      message: error.message,
      remediation: error.remediation,
      metadata: error.metadata,
      cause: error,
      correlation,
    });
  }
  return wrapError({
    error,
    faultDomain: fallbackDomain,
    code: "UNEXPECTED_ERROR",
    message: errorMessage(error),
    remediation: "Run again with --verbose and inspect the log.",
    correlation,
  });
}

/**
 * One-line, user-facing description used when the process exits on a failure.
 */
export function describeError(error: unknown): string {
  const envelope = toAssistantError(error);
  return `${envelope.code}: ${envelope.message}. ${envelope.remediation}`;
}

/**
 * Compact, log-safe view of an envelope.
 */
export function summarizeError(envelope: AssistantError): Record<string, unknown> {
  return {
    id: envelope.id,
    domain: envelope.faultDomain,
    severity: envelope.severity,
    code: envelope.code,
    message: envelope.message,
    ...(envelope.correlation ? { correlationId: envelope.correlation.correlationId } : {}),
    ...(envelope.retryPlan ? { retryPlan: envelope.retryPlan } : {}),
  };
}
