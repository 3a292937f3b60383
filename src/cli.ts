#!/usr/bin/env node
import { createInterface } from "readline";
import { ConversationStream } from "./audio/conversation-stream";
import { RawPcmFileSink, RawPcmFileSource } from "./audio/pcm-file";
import { ProcessAudioSink, ProcessAudioSource, expandAudioCommand } from "./audio/process-audio";
import { loadAccessToken } from "./auth/credentials";
import { parseCliOptions, HELP } from "./cli-options";
import { ConfigurationManager } from "./config/configuration-manager";
import { resolveDeviceIdentity } from "./config/device-config-store";
import {
  runConversation,
  runSingleTurn,
  type ConversationLoopOptions,
  type TurnTrigger,
} from "./conversation/conversation-loop";
import { ConversationSession } from "./conversation/conversation-session";
import { ResponseStateMachine } from "./conversation/response-state-machine";
import { Logger } from "./core/logger";
import { RetryPolicy } from "./core/retry/retry-policy";
import { RuntimeContext } from "./core/runtime-context";
import { DeviceActionDispatcherBuilder } from "./device/device-action-dispatcher";
import { createHardwareCapability } from "./device/hardware/hardware-capability";
import { registerDefaultHandlers } from "./device/handlers";
import { HtmlFileDisplay } from "./display/screen-out-display";
import { describeError } from "./helpers/error/envelope";
import { createTextToSpeech } from "./speech/text-to-speech";
import { WebSocketAssistantTransport } from "./transport/websocket-transport";
import type { AudioConfig } from "./types/configuration";
import type { AudioSink, AudioSource } from "./types/audio";

function createAudio(config: AudioConfig, logger: Logger): ConversationStream {
  const source: AudioSource = config.inputFile
    ? new RawPcmFileSource({ path: config.inputFile, sampleRate: config.sampleRate, sampleWidth: config.sampleWidth })
    : new ProcessAudioSource(expandAudioCommand(config.captureCommand, config.sampleRate), logger);
  const sink: AudioSink = config.outputFile
    ? new RawPcmFileSink(config.outputFile)
    : new ProcessAudioSink(expandAudioCommand(config.playbackCommand, config.sampleRate), logger);
  return new ConversationStream({
    source,
    sink,
    sampleRate: config.sampleRate,
    sampleWidth: config.sampleWidth,
    iterSize: config.iterSize,
    volumePercentage: config.volumePercentage,
  });
}

/**
 * Waits for Enter on stdin. Resolves false once stdin closes.
 */
function createEnterTrigger(): { trigger: TurnTrigger; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  const trigger: TurnTrigger = () =>
    new Promise<boolean>((resolve) => {
      if (closed) {
        resolve(false);
        return;
      }
      const onClose = (): void => resolve(false);
      rl.once("close", onClose);
      rl.question("Press Enter to send a new request... ", () => {
        rl.off("close", onClose);
        resolve(true);
      });
    });
  return { trigger, close: () => rl.close() };
}

export async function main(argv: string[]): Promise<number> {
  const cli = parseCliOptions(argv);
  if (cli.help) {
    process.stdout.write(HELP);
    return 0;
  }

  Logger.setDefaultLevel(cli.verbose ? "debug" : "info");
  const logger = new Logger("AssistantTurn");
  const context = new RuntimeContext(logger);

  const configuration = new ConfigurationManager(logger, {
    configFile: cli.configFile,
    overrides: cli.overrides,
  });
  await configuration.initialize();
  const config = configuration.getConfiguration();
  logger.setLevel(config.logging.level);

  const identity = await resolveDeviceIdentity(config.device);
  const token = await loadAccessToken(config.assistant);

  const hardware = createHardwareCapability(config.hardware, logger);
  const builder = new DeviceActionDispatcherBuilder({
    deviceId: identity.id,
    context,
    maxConcurrent: config.actions.maxConcurrent,
  });
  registerDefaultHandlers(builder, {
    actions: config.actions,
    hardware,
    speech: createTextToSpeech(config.actions.speechCommand, logger),
    logger,
  });
  const dispatcher = builder.build();

  const display = config.assistant.displayEnabled ? new HtmlFileDisplay(logger) : undefined;
  const stateMachine = new ResponseStateMachine(context, { display });
  stateMachine.onTranscript((event) => {
    process.stdout.write(`> ${event.transcript}\n`);
  });

  const session = new ConversationSession({
    turnConfig: {
      languageCode: config.assistant.languageCode,
      deviceModelId: identity.modelId,
      deviceId: identity.id,
      sampleRate: config.audio.sampleRate,
      volumePercentage: config.audio.volumePercentage,
      displayEnabled: config.assistant.displayEnabled,
    },
    audio: createAudio(config.audio, logger),
    transport: new WebSocketAssistantTransport({
      endpoint: config.assistant.endpoint,
      logger,
      accessToken: async () => token,
    }),
    dispatcher,
    context,
    retryPolicy: new RetryPolicy({ envelope: config.retry, logger }),
    stateMachine,
    deadlineMs: config.assistant.deadlineSeconds * 1000,
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.info("Interrupted; cancelling the current turn");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  // Recorded input or output means exactly one turn.
  const fileMode = config.audio.inputFile !== undefined || config.audio.outputFile !== undefined;
  const enter = fileMode ? undefined : createEnterTrigger();
  const loopOptions: ConversationLoopOptions = {
    once: cli.once,
    indicator: hardware,
    logger,
    signal: controller.signal,
  };

  try {
    const turns = enter
      ? await runConversation(session, enter.trigger, loopOptions)
      : await runSingleTurn(session, loopOptions);
    logger.info("Conversation finished", { turns, counters: context.snapshot() });
    return 0;
  } finally {
    process.off("SIGINT", onInterrupt);
    enter?.close();
    await session.dispose();
    await display?.flush();
    context.dispose();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = 1;
    },
  );
}
