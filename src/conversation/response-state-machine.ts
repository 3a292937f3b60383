import { EventEmitter } from "events";
import type { RuntimeContext } from "../core/runtime-context";
import type { Logger } from "../core/logger";
import type { ScreenOutDisplay } from "../display/screen-out-display";
import type { InboundMessage } from "../types/assist-messages";
import type { AudioChannel } from "../types/audio";
import type {
    TranscriptEvent,
    TurnOutcome,
    TurnPhase,
    TurnTransitionCause,
    TurnTransitionEvent,
} from "../types/conversation";
import type { DeviceActionDispatch, PendingAction } from "../types/device-action";
import type { Disposable } from "../types/disposal";
import type { ConversationState } from "./conversation-state";

export type TurnTransitionHandler = (event: TurnTransitionEvent) => void;
export type TranscriptHandler = (event: TranscriptEvent) => void;

export interface ResponseStateMachineOptions {
  display?: ScreenOutDisplay;
}

/**
 * Mutable bookkeeping for the turn currently being processed.
 */
interface TurnProgress {
  phase: TurnPhase;
  continueConversation: boolean;
  pending: PendingAction[];
}

/**
 * Drives the audio channel and dialog state from the inbound half of a turn.
 *
 * @remarks
 * Every concern of a message is applied independently: a single message may
 * end the utterance, carry audio and update the dialog state at once.
 * Playback is stopped when the stream ends whether or not any audio arrived.
 */
export class ResponseStateMachine {
  private readonly emitter = new EventEmitter();
  private readonly logger: Logger;

  constructor(
    private readonly context: RuntimeContext,
    private readonly options: ResponseStateMachineOptions = {},
  ) {
    this.logger = context.logger;
  }

  onTransition(handler: TurnTransitionHandler): Disposable {
    this.emitter.on("turn-transition", handler);
    return {
      dispose: () => this.emitter.off("turn-transition", handler),
    };
  }

  onTranscript(handler: TranscriptHandler): Disposable {
    this.emitter.on("transcript", handler);
    return {
      dispose: () => this.emitter.off("transcript", handler),
    };
  }

  async processTurn(
    inbound: AsyncIterable<InboundMessage>,
    audio: AudioChannel,
    state: ConversationState,
    dispatch: DeviceActionDispatch,
    displayEnabled: boolean,
  ): Promise<TurnOutcome> {
    const progress: TurnProgress = {
      phase: "recording",
      continueConversation: false,
      pending: [],
    };

    for await (const message of inbound) {
      await this.applyMessage(message, progress, audio, state, dispatch, displayEnabled);
    }

    if (progress.pending.length > 0) {
      this.logger.info("Waiting for device actions to complete", {
        count: progress.pending.length,
      });
      const results = await Promise.all(progress.pending.map((action) => action.wait()));
      const failed = results.filter((result) => result.status === "failed");
      if (failed.length > 0) {
        this.logger.warn("Device actions failed during turn", {
          failed: failed.map((result) => ({
            actionId: result.actionId,
            command: result.command,
            error: result.error?.message,
          })),
        });
      }
    }

    await audio.stopPlayback();
    this.transition(progress, "playback-stopped", "stream-complete");
    this.logger.info("Finished playing assistant response", {
      continueConversation: progress.continueConversation,
    });
    return { continueConversation: progress.continueConversation };
  }

  private async applyMessage(
    message: InboundMessage,
    progress: TurnProgress,
    audio: AudioChannel,
    state: ConversationState,
    dispatch: DeviceActionDispatch,
    displayEnabled: boolean,
  ): Promise<void> {
    if (message.eventType === "END_OF_UTTERANCE") {
      this.logger.info("End of audio request detected");
      await audio.stopRecording();
      if (progress.phase === "recording") {
        this.transition(progress, "recording-stopped", "end-of-utterance");
      }
    }

    if (message.speechResults && message.speechResults.length > 0) {
      const transcript = message.speechResults.map((result) => result.transcript).join(" ");
      this.logger.info("Transcript of user request", { transcript });
      const event: TranscriptEvent = {
        type: "transcript",
        transcript,
        results: message.speechResults.map((result) => ({ ...result })),
        timestamp: new Date().toISOString(),
      };
      this.emitter.emit("transcript", event);
    }

    const audioData = message.audioOut?.audioData;
    if (audioData && audioData.length > 0) {
      if (!audio.isPlaying) {
        await audio.stopRecording();
        if (progress.phase === "recording") {
          this.transition(progress, "recording-stopped", "audio-out");
        }
        await audio.startPlayback();
        this.transition(progress, "playing", "audio-out");
        this.logger.info("Playing assistant response");
      }
      await audio.write(audioData);
    }

    const dialog = message.dialogStateOut;
    if (dialog) {
      if (dialog.conversationState && dialog.conversationState.length > 0) {
        this.logger.debug("Updating conversation state", {
          bytes: dialog.conversationState.length,
        });
        state.updateContinuationToken(dialog.conversationState);
      }
      if (dialog.volumePercentage) {
        this.logger.info("Setting volume", { volumePercentage: dialog.volumePercentage });
        audio.volumePercentage = dialog.volumePercentage;
      }
      if (dialog.microphoneMode === "DIALOG_FOLLOW_ON") {
        progress.continueConversation = true;
        this.logger.info("Expecting follow-on query from user");
      } else if (dialog.microphoneMode === "CLOSE_MICROPHONE") {
        progress.continueConversation = false;
      }
      if (dialog.supplementalDisplayText) {
        this.logger.info("Assistant display text", { text: dialog.supplementalDisplayText });
      }
    }

    const deviceRequestJson = message.deviceAction?.deviceRequestJson;
    if (deviceRequestJson) {
      const actions = dispatch.handleRequest(deviceRequestJson);
      progress.pending.push(...actions);
    }

    const screen = message.screenOut?.data;
    if (displayEnabled && screen && this.options.display) {
      this.options.display.show(screen, message.screenOut?.format);
    }
  }

  private transition(progress: TurnProgress, to: TurnPhase, cause: TurnTransitionCause): void {
    const event: TurnTransitionEvent = {
      type: "turn-transition",
      from: progress.phase,
      to,
      cause,
      timestamp: new Date().toISOString(),
    };
    progress.phase = to;
    this.emitter.emit("turn-transition", event);
  }
}
