import { MalformedDeviceActionError, errorMessage } from "../core/errors";
import { asRecordArray, isRecord } from "../core/guards";
import { validateAgainstSchema } from "../core/schema-registry";
import type { DeviceCommand } from "../types/device-action";

export const EXECUTE_INTENT = "action.devices.EXECUTE";

export interface ParsedDeviceRequest {
  requestId?: string;
  commands: DeviceCommand[];
  /** Executions addressed only to other devices. */
  skipped: number;
  /** Executions dropped because they name no command; their siblings still run. */
  invalid: InvalidExecution[];
}

export interface InvalidExecution {
  execution: unknown;
  errors: string[];
}

/**
 * Decodes a device request sent by the assist service.
 *
 * @remarks
 * Accepts the smart-home EXECUTE envelope as well as a bare `{command, params}`
 * object or an array of them. In an EXECUTE envelope, a command that lists
 * devices is kept only when this device is among them. Each execution is
 * checked on its own, so one bad execution does not drop the others.
 *
 * @throws MalformedDeviceActionError when the payload is not JSON or does not match any accepted shape.
 */
export function parseDeviceRequest(json: string, deviceId: string): ParsedDeviceRequest {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error: unknown) {
    throw new MalformedDeviceActionError(`Device request is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const validation = validateAgainstSchema("device-request", payload);
  if (!validation.valid) {
    throw new MalformedDeviceActionError("Device request does not match any known shape", {
      metadata: { errors: validation.errors },
    });
  }

  if (Array.isArray(payload)) {
    const collected = collectExecutions(payload);
    return { commands: collected.commands, skipped: 0, invalid: collected.invalid };
  }
  if (!isRecord(payload)) {
    throw new MalformedDeviceActionError("Device request must be an object or an array");
  }
  if (typeof payload.command === "string") {
    return { commands: [toCommand(payload)], skipped: 0, invalid: [] };
  }
  return parseExecuteRequest(payload, deviceId);
}

function parseExecuteRequest(
  request: Record<string, unknown>,
  deviceId: string,
): ParsedDeviceRequest {
  const commands: DeviceCommand[] = [];
  const invalid: InvalidExecution[] = [];
  let skipped = 0;

  for (const input of asRecordArray(request.inputs)) {
    if (input.intent !== EXECUTE_INTENT || !isRecord(input.payload)) {
      continue;
    }
    for (const command of asRecordArray(input.payload.commands)) {
      const executions = Array.isArray(command.execution) ? command.execution : [];
      if (!isAddressedTo(command.devices, deviceId)) {
        skipped += executions.length;
        continue;
      }
      const collected = collectExecutions(executions);
      commands.push(...collected.commands);
      invalid.push(...collected.invalid);
    }
  }

  return {
    requestId: typeof request.requestId === "string" ? request.requestId : undefined,
    commands,
    skipped,
    invalid,
  };
}

function collectExecutions(executions: unknown[]): Pick<ParsedDeviceRequest, "commands" | "invalid"> {
  const commands: DeviceCommand[] = [];
  const invalid: InvalidExecution[] = [];
  for (const execution of executions) {
    const validation = validateAgainstSchema("device-execution", execution);
    if (validation.valid && isRecord(execution)) {
      commands.push(toCommand(execution));
    } else {
      invalid.push({ execution, errors: validation.errors });
    }
  }
  return { commands, invalid };
}

function isAddressedTo(devices: unknown, deviceId: string): boolean {
  if (devices === undefined) {
    return true;
  }
  return asRecordArray(devices).some((device) => device.id === deviceId);
}

function toCommand(execution: Record<string, unknown>): DeviceCommand {
  return {
    name: String(execution.command),
    params: isRecord(execution.params) ? { ...execution.params } : {},
  };
}
