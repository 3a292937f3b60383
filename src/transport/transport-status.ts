import { TransportError, type TransportStatus } from "../core/errors";

const WIRE_STATUS: Record<string, TransportStatus> = {
  UNAVAILABLE: "unavailable",
  UNAUTHENTICATED: "unauthenticated",
  PERMISSION_DENIED: "permission-denied",
  INVALID_ARGUMENT: "invalid-argument",
  DEADLINE_EXCEEDED: "deadline-exceeded",
  CANCELLED: "cancelled",
  INTERNAL: "internal",
};

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
]);

/**
 * Status named in a `status` frame sent by the service.
 */
export function statusFromWire(code: string): TransportStatus {
  return WIRE_STATUS[code.toUpperCase()] ?? "unknown";
}

/**
 * Status for an HTTP response that refused the WebSocket upgrade.
 */
export function statusFromHttp(statusCode: number | undefined): TransportStatus {
  switch (statusCode) {
    case 400:
      return "invalid-argument";
    case 401:
      return "unauthenticated";
    case 403:
      return "permission-denied";
    case 408:
    case 504:
      return "deadline-exceeded";
    case 429:
    case 502:
    case 503:
      return "unavailable";
    default:
      return statusCode !== undefined && statusCode >= 500 ? "internal" : "unknown";
  }
}

/**
 * Status for a close frame received before the service finished the call.
 */
export function statusFromCloseCode(code: number): TransportStatus {
  switch (code) {
    case 1001:
    case 1006:
    case 1012:
    case 1013:
      return "unavailable";
    case 1007:
      return "invalid-argument";
    case 1008:
      return "permission-denied";
    case 1011:
      return "internal";
    case 4001:
      return "unauthenticated";
    case 4003:
      return "permission-denied";
    default:
      return "unknown";
  }
}

export function statusFromSocketError(error: Error): TransportStatus {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return "unavailable";
  }
  return "unknown";
}

export function transportErrorFromSocket(error: Error, endpoint: string): TransportError {
  return new TransportError(
    statusFromSocketError(error),
    `Connection to ${endpoint} failed: ${error.message}`,
    { cause: error, metadata: { endpoint } },
  );
}
