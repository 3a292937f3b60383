import { randomUUID } from "crypto";
import { MalformedDeviceActionError, errorMessage, toError } from "../core/errors";
import type { Logger } from "../core/logger";
import type { RuntimeContext } from "../core/runtime-context";
import type {
    CommandExecutionContext,
    DeviceActionDispatch,
    DeviceCommand,
    DeviceCommandHandler,
    PendingAction,
    PendingActionResult,
} from "../types/device-action";
import { ActionTaskPool } from "./action-task-pool";
import { parseDeviceRequest } from "./device-request-parser";

export const DEFAULT_MAX_CONCURRENT_ACTIONS = 10;

export interface DeviceActionDispatcherOptions {
  deviceId: string;
  context: RuntimeContext;
  maxConcurrent?: number;
}

/**
 * Maps command names to handlers and runs each dispatched command in the background.
 *
 * @remarks
 * Handlers are registered before the first turn; {@link freeze} makes the
 * registry read-only for the rest of the process. Unknown commands are logged
 * and produce no pending action. A handler that throws or rejects only fails
 * its own {@link PendingAction}; it never reaches the turn.
 */
export class DeviceActionDispatcher implements DeviceActionDispatch {
  readonly deviceId: string;
  private readonly handlers = new Map<string, DeviceCommandHandler>();
  private readonly pool: ActionTaskPool;
  private readonly context: RuntimeContext;
  private readonly logger: Logger;
  private frozen = false;

  constructor(options: DeviceActionDispatcherOptions) {
    this.deviceId = options.deviceId;
    this.context = options.context;
    this.logger = options.context.logger;
    this.pool = new ActionTaskPool(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT_ACTIONS);
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get commandNames(): string[] {
    return Array.from(this.handlers.keys());
  }

  register(commandName: string, handler: DeviceCommandHandler): this {
    if (this.frozen) {
      throw new Error(`Cannot register "${commandName}": the dispatcher is frozen`);
    }
    if (this.handlers.has(commandName)) {
      this.logger.warn("Replacing device command handler", { command: commandName });
    }
    this.handlers.set(commandName, handler);
    this.logger.debug("Device command handler registered", { command: commandName });
    return this;
  }

  has(commandName: string): boolean {
    return this.handlers.has(commandName);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  handle(command: DeviceCommand): PendingAction[] {
    const handler = this.handlers.get(command.name);
    if (!handler) {
      this.context.increment("unknownCommands");
      this.logger.warn("No handler registered for device command", { command: command.name });
      return [];
    }
    return [this.schedule(command, handler)];
  }

  handleRequest(deviceRequestJson: string): PendingAction[] {
    let commands: DeviceCommand[];
    try {
      const request = parseDeviceRequest(deviceRequestJson, this.deviceId);
      this.logger.debug("Device request received", {
        requestId: request.requestId,
        commands: request.commands.map((command) => command.name),
        skipped: request.skipped,
      });
      for (const dropped of request.invalid) {
        this.context.increment("malformedDeviceActions");
        this.logger.warn("Skipping malformed device command", { errors: dropped.errors });
      }
      commands = request.commands;
    } catch (error: unknown) {
      if (!(error instanceof MalformedDeviceActionError)) {
        throw error;
      }
      this.context.increment("malformedDeviceActions");
      this.logger.warn("Skipping malformed device request", {
        error: error.message,
        ...error.metadata,
      });
      return [];
    }
    return commands.flatMap((command) => this.handle(command));
  }

  private schedule(command: DeviceCommand, handler: DeviceCommandHandler): PendingAction {
    const executionContext: CommandExecutionContext = {
      actionId: randomUUID(),
      command: command.name,
      deviceId: this.deviceId,
    };
    this.context.increment("deviceActionsDispatched");
    this.logger.info("Dispatching device command", {
      actionId: executionContext.actionId,
      command: command.name,
      params: command.params,
    });

    const completion = this.pool.submit(() => this.execute(command, handler, executionContext));
    return {
      id: executionContext.actionId,
      command: command.name,
      wait: () => completion,
    };
  }

  /**
   * Runs one handler. Always resolves; failures are reported in the result.
   */
  private async execute(
    command: DeviceCommand,
    handler: DeviceCommandHandler,
    executionContext: CommandExecutionContext,
  ): Promise<PendingActionResult> {
    const started = Date.now();
    try {
      await handler(command.params, executionContext);
      return {
        actionId: executionContext.actionId,
        command: command.name,
        status: "completed",
        durationMs: Date.now() - started,
      };
    } catch (error: unknown) {
      this.context.increment("deviceActionFailures");
      this.logger.error("Device command handler failed", {
        actionId: executionContext.actionId,
        command: command.name,
        error: errorMessage(error),
      });
      return {
        actionId: executionContext.actionId,
        command: command.name,
        status: "failed",
        durationMs: Date.now() - started,
        error: toError(error),
      };
    }
  }
}

/**
 * Collects handlers and produces a frozen dispatcher.
 */
export class DeviceActionDispatcherBuilder {
  private readonly entries: Array<[string, DeviceCommandHandler]> = [];

  constructor(private readonly options: DeviceActionDispatcherOptions) {}

  register(commandName: string, handler: DeviceCommandHandler): this {
    this.entries.push([commandName, handler]);
    return this;
  }

  build(): DeviceActionDispatcher {
    const dispatcher = new DeviceActionDispatcher(this.options);
    for (const [name, handler] of this.entries) {
      dispatcher.register(name, handler);
    }
    return dispatcher.freeze();
  }
}
