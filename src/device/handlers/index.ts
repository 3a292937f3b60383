import type { Logger } from "../../core/logger";
import type { TextToSpeech } from "../../speech/text-to-speech";
import type { ActionsConfig } from "../../types/configuration";
import type { CommandRegistry } from "../../types/device-action";
import type { HardwareCapability } from "../hardware/hardware-capability";
import { type ProcessRunner, runProcess } from "../process-runner";
import { CommitReportClient } from "../reporting/commit-report-client";
import { registerCommitCountReportHandler } from "./commit-count-report";
import { registerSensorReportHandlers } from "./sensor-reports";
import { registerTraitHandlers } from "./traits";

export { COMMIT_COUNT_REPORT_COMMAND } from "./commit-count-report";
export { SENSOR_COMMANDS } from "./sensor-reports";
export { TRAIT_COMMANDS } from "./traits";

export interface DefaultHandlerDependencies {
  actions: ActionsConfig;
  hardware: HardwareCapability;
  speech: TextToSpeech;
  logger: Logger;
  run?: ProcessRunner;
  commitReportClient?: CommitReportClient;
}

/**
 * Registers every built-in command. The commit count report is only
 * available when a workflow endpoint is configured.
 */
export function registerDefaultHandlers(
  dispatcher: CommandRegistry,
  deps: DefaultHandlerDependencies,
): void {
  registerTraitHandlers(dispatcher, {
    logger: deps.logger,
    run: deps.run ?? runProcess,
    onCommand: deps.actions.onCommand,
    offCommand: deps.actions.offCommand,
  });
  registerSensorReportHandlers(dispatcher, {
    hardware: deps.hardware,
    speech: deps.speech,
    logger: deps.logger,
  });

  const report = deps.actions.commitReport;
  if (report) {
    registerCommitCountReportHandler(dispatcher, {
      client: deps.commitReportClient ?? new CommitReportClient(report),
      owners: report.owners,
      speech: deps.speech,
      logger: deps.logger,
    });
  }
}
