export type DeviceCommandParams = Readonly<Record<string, unknown>>;

/**
 * A command the assist service asks this device to execute.
 */
export interface DeviceCommand {
  /** Reverse-DNS command identifier, e.g. `action.devices.commands.OnOff`. */
  name: string;
  params: DeviceCommandParams;
}

export interface PendingActionResult {
  actionId: string;
  command: string;
  status: "completed" | "failed";
  durationMs: number;
  error?: Error;
}

/**
 * Handle for a device command running in the background.
 *
 * @remarks
 * `wait()` never rejects. A failing handler is reported through the result's
 * `status` and `error`.
 */
export interface PendingAction {
  readonly id: string;
  readonly command: string;
  wait(): Promise<PendingActionResult>;
}

export interface CommandExecutionContext {
  actionId: string;
  command: string;
  deviceId: string;
}

export type DeviceCommandHandler = (
  params: DeviceCommandParams,
  context: CommandExecutionContext,
) => void | Promise<void>;

/**
 * Dispatch surface the response state machine depends on.
 */
export interface DeviceActionDispatch {
  handle(command: DeviceCommand): PendingAction[];
  /** Decodes a raw device request and dispatches every command addressed to this device. */
  handleRequest(deviceRequestJson: string): PendingAction[];
}

/**
 * Anything handlers can be registered on: a dispatcher or its builder.
 */
export interface CommandRegistry {
  register(commandName: string, handler: DeviceCommandHandler): unknown;
}
