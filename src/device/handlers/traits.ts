import type { Logger } from "../../core/logger";
import type { CommandRegistry } from "../../types/device-action";
import { describeParam, requireBoolean, requireNumber } from "../command-params";
import type { ProcessRunner } from "../process-runner";

export const TRAIT_COMMANDS = {
  brightnessAbsolute: "action.devices.commands.BrightnessAbsolute",
  colorAbsolute: "action.devices.commands.ColorAbsolute",
  dock: "action.devices.commands.Dock",
  onOff: "action.devices.commands.OnOff",
  startStop: "action.devices.commands.StartStop",
  pauseUnpause: "action.devices.commands.PauseUnpause",
  thermostatSetpoint: "action.devices.commands.ThermostatTemperatureSetpoint",
} as const;

export interface TraitHandlerOptions {
  logger: Logger;
  run: ProcessRunner;
  /** Executable and arguments for switching on. */
  onCommand?: readonly string[];
  offCommand?: readonly string[];
}

/**
 * Registers the standard smart-home traits. Apart from `OnOff`, which runs the
 * configured executables, the traits only log the requested change.
 */
export function registerTraitHandlers(
  dispatcher: CommandRegistry,
  options: TraitHandlerOptions,
): void {
  const { logger } = options;

  dispatcher.register(TRAIT_COMMANDS.brightnessAbsolute, (params) => {
    logger.info("Setting the brightness", { brightness: requireNumber(params, "brightness") });
  });

  dispatcher.register(TRAIT_COMMANDS.colorAbsolute, (params) => {
    logger.info("Setting the color", { color: describeParam(params, "color") });
  });

  dispatcher.register(TRAIT_COMMANDS.dock, () => {
    logger.info("Returning for charging");
  });

  dispatcher.register(TRAIT_COMMANDS.onOff, async (params) => {
    const on = requireBoolean(params, "on");
    const command = on ? options.onCommand : options.offCommand;
    if (command && command.length > 0) {
      const [file, ...args] = command;
      await options.run(file, args);
    }
    logger.info(on ? "Turning device on" : "Turning device off");
  });

  dispatcher.register(TRAIT_COMMANDS.startStop, (params) => {
    logger.info(requireBoolean(params, "start") ? "Starting device" : "Stopping device");
  });

  dispatcher.register(TRAIT_COMMANDS.pauseUnpause, (params) => {
    logger.info(requireBoolean(params, "pause") ? "Setting pause" : "Unsetting pause");
  });

  dispatcher.register(TRAIT_COMMANDS.thermostatSetpoint, (params) => {
    logger.info("Setting thermostat", {
      setpoint: requireNumber(params, "thermostatTemperatureSetpoint"),
    });
  });
}
