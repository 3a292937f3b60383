import type {
    AssistantFaultDomain,
    AssistantSeverity,
    AssistantUserImpact,
} from "./error-taxonomy";

export type RetryPlanPolicy = "none" | "immediate" | "linear" | "exponential";

export interface RetryPlan {
  policy: RetryPlanPolicy;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  nextAttemptAt?: Date;
}

export interface ErrorCorrelation {
  correlationId: string;
  sessionId?: string;
  turnId?: string;
}

/**
 * Normalized description of a failure, independent of the thrown error class.
 */
export interface AssistantError {
  id: string;
  faultDomain: AssistantFaultDomain;
  severity: AssistantSeverity;
  userImpact: AssistantUserImpact;
  code: string;
  message: string;
  remediation: string;
  cause?: Error;
  metadata?: Record<string, unknown>;
  timestamp: Date;
  retryPlan?: RetryPlan;
  correlation?: ErrorCorrelation;
}

export type { AssistantFaultDomain } from "./error-taxonomy";
