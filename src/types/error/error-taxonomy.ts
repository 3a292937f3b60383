/**
 * Where a failure originated. Drives the default severity and user impact.
 */
export type AssistantFaultDomain =
  | "auth"
  | "configuration"
  | "session"
  | "transport"
  | "audio"
  | "device"
  | "infrastructure";

export type AssistantSeverity = "info" | "warning" | "error" | "critical";

/**
 * `transparent` failures go unnoticed, `degraded` ones lose part of a turn and
 * `blocked` ones stop the client until someone fixes them.
 */
export type AssistantUserImpact = "transparent" | "degraded" | "blocked";

export const DEFAULT_SEVERITY_FOR_DOMAIN: Record<AssistantFaultDomain, AssistantSeverity> = {
  auth: "critical",
  configuration: "critical",
  session: "error",
  transport: "error",
  audio: "error",
  device: "warning",
  infrastructure: "critical",
};

export const DEFAULT_USER_IMPACT_FOR_DOMAIN: Record<AssistantFaultDomain, AssistantUserImpact> = {
  auth: "blocked",
  configuration: "blocked",
  session: "degraded",
  transport: "degraded",
  audio: "degraded",
  device: "transparent",
  infrastructure: "blocked",
};
