import type { DeviceCommandParams } from "../types/device-action";

export class InvalidCommandParamError extends Error {
  constructor(
    readonly param: string,
    expected: string,
  ) {
    super(`Parameter "${param}" must be ${expected}`);
    this.name = "InvalidCommandParamError";
  }
}

export function requireBoolean(params: DeviceCommandParams, name: string): boolean {
  const value = params[name];
  if (typeof value !== "boolean") {
    throw new InvalidCommandParamError(name, "a boolean");
  }
  return value;
}

export function requireNumber(params: DeviceCommandParams, name: string): number {
  const value = params[name];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidCommandParamError(name, "a number");
  }
  return value;
}

export function optionalString(params: DeviceCommandParams, name: string, fallback = ""): string {
  const value = params[name];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new InvalidCommandParamError(name, "a string");
  }
  return value;
}

/**
 * Human readable rendering of structured params such as `color`.
 */
export function describeParam(params: DeviceCommandParams, name: string): string {
  const value = params[name];
  if (value === undefined) {
    return "unspecified";
  }
  return typeof value === "string" ? value : JSON.stringify(value);
}
