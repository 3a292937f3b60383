import type { AssistantFaultDomain } from "../types/error/error-taxonomy";
import type { ValidationError } from "../types/configuration";

/**
 * Base class for failures the client raises itself. Subclasses carry the
 * taxonomy fields needed to build an {@link AssistantError} envelope.
 */
export abstract class AssistantFailure extends Error {
  abstract readonly faultDomain: AssistantFaultDomain;
  abstract readonly code: string;
  abstract readonly remediation: string;
  readonly metadata?: Record<string, unknown>;

  protected constructor(
    message: string,
    options: { cause?: unknown; metadata?: Record<string, unknown> } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.metadata = options.metadata;
  }
}

/**
 * Status of a failed assist call.
 */
export type TransportStatus =
  | "unavailable"
  | "unauthenticated"
  | "permission-denied"
  | "invalid-argument"
  | "deadline-exceeded"
  | "cancelled"
  | "internal"
  | "unknown";

const TRANSPORT_REMEDIATION: Record<TransportStatus, string> = {
  unavailable: "The assistant service is temporarily unreachable. Check connectivity and try again.",
  unauthenticated: "Refresh the access token in the credentials file.",
  "permission-denied": "Check that the device model is registered for this project.",
  "invalid-argument": "Check the language code, device identifiers and audio settings.",
  "deadline-exceeded": "Shorten the request or raise the call deadline.",
  cancelled: "The turn was cancelled locally.",
  internal: "The assistant service failed; retry later.",
  unknown: "Inspect the debug log for the transport failure.",
};

export class TransportError extends AssistantFailure {
  readonly faultDomain = "transport" as const;
  readonly code: string;
  readonly remediation: string;

  constructor(
    readonly status: TransportStatus,
    message: string,
    options: { cause?: unknown; metadata?: Record<string, unknown> } = {},
  ) {
    super(message, options);
    this.code = `TRANSPORT_${status.toUpperCase().replace(/-/g, "_")}`;
    this.remediation = TRANSPORT_REMEDIATION[status];
  }
}

/**
 * Raised when every permitted attempt of a turn failed with a retryable error.
 */
export class ExhaustedRetriesError extends AssistantFailure {
  readonly faultDomain = "transport" as const;
  readonly code = "RETRY_EXHAUSTED";
  readonly remediation = "The service stayed unavailable across all attempts. Try again later.";

  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Giving up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(lastError)}`,
      { cause: lastError, metadata: { attempts } },
    );
  }
}

export class ConfigurationError extends AssistantFailure {
  readonly faultDomain: "configuration" | "auth";
  readonly code: string;
  readonly remediation: string;

  constructor(
    message: string,
    readonly errors: ValidationError[] = [],
    options: { faultDomain?: "configuration" | "auth"; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause, metadata: { errorCount: errors.length } });
    this.faultDomain = options.faultDomain ?? "configuration";
    this.code = errors[0]?.code ?? "CONFIGURATION_INVALID";
    this.remediation =
      errors.find((e) => e.remediation)?.remediation ??
      "Fix the configuration file, environment or command line options.";
  }
}

export type SessionErrorCode = "SESSION_DISPOSED" | "TURN_IN_PROGRESS";

export class SessionError extends AssistantFailure {
  readonly faultDomain = "session" as const;
  readonly remediation = "Wait for the running turn to finish or create a new session.";

  constructor(
    readonly code: SessionErrorCode,
    message: string,
  ) {
    super(message);
  }
}

/**
 * A device request that could not be decoded. Contained by the dispatcher.
 */
export class MalformedDeviceActionError extends AssistantFailure {
  readonly faultDomain = "device" as const;
  readonly code = "DEVICE_ACTION_MALFORMED";
  readonly remediation = "Check the device action package deployed for this model.";

  constructor(message: string, options: { cause?: unknown; metadata?: Record<string, unknown> } = {}) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
