import type { Logger } from "../core/logger";
import type { ProcessRunner } from "../device/process-runner";
import { runProcess } from "../device/process-runner";

/**
 * Speaks short status phrases produced by device actions.
 */
export interface TextToSpeech {
  speak(text: string): Promise<void>;
}

/**
 * Used when no synthesis command is configured: the phrase is only logged.
 */
export class LoggingTextToSpeech implements TextToSpeech {
  constructor(private readonly logger: Logger) {}

  async speak(text: string): Promise<void> {
    this.logger.info("Speech output", { text });
  }
}

/**
 * Hands each phrase to an external synthesizer, passed as the last argument.
 */
export class CommandTextToSpeech implements TextToSpeech {
  constructor(
    private readonly command: readonly string[],
    private readonly logger: Logger,
    private readonly run: ProcessRunner = runProcess,
  ) {
    if (command.length === 0) {
      throw new Error("Speech command must name an executable");
    }
  }

  async speak(text: string): Promise<void> {
    const [file, ...args] = this.command;
    this.logger.debug("Synthesizing speech", { file, text });
    await this.run(file, [...args, text]);
  }
}

export function createTextToSpeech(
  command: readonly string[] | undefined,
  logger: Logger,
): TextToSpeech {
  return command && command.length > 0
    ? new CommandTextToSpeech(command, logger)
    : new LoggingTextToSpeech(logger);
}
