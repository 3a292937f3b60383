import type {
    AssistConfig,
    ConfigRequest,
    OutboundMessage,
} from "../types/assist-messages";
import type { AudioChannel } from "../types/audio";
import type { ConversationStateSnapshot, TurnConfig } from "../types/conversation";
import type { ConversationState } from "./conversation-state";

/**
 * Builds the outbound half of one turn.
 */
export class RequestEncoder {
  buildConfig(config: TurnConfig, snapshot: ConversationStateSnapshot): AssistConfig {
    const assistConfig: AssistConfig = {
      audioInConfig: {
        encoding: "LINEAR16",
        sampleRateHertz: config.sampleRate,
      },
      audioOutConfig: {
        encoding: "LINEAR16",
        sampleRateHertz: config.sampleRate,
        volumePercentage: config.volumePercentage,
      },
      dialogStateIn: {
        languageCode: config.languageCode,
        isNewConversation: snapshot.isNewConversation,
        ...(snapshot.continuationToken && snapshot.continuationToken.length > 0
          ? { conversationState: snapshot.continuationToken }
          : {}),
      },
      deviceConfig: {
        deviceId: config.deviceId,
        deviceModelId: config.deviceModelId,
      },
    };
    if (config.displayEnabled) {
      assistConfig.screenOutConfig = { screenMode: "PLAYING" };
    }
    return assistConfig;
  }

  /**
   * Lazily yields the config message followed by captured audio until
   * recording stops or the source runs dry. Nothing is read from `audio` until
   * the consumer asks for the next message.
   */
  async *encode(
    config: TurnConfig,
    state: ConversationState,
    audio: AudioChannel,
  ): AsyncGenerator<OutboundMessage, void, undefined> {
    const request: ConfigRequest = {
      kind: "config",
      config: this.buildConfig(config, state.snapshot()),
    };
    state.clearNewConversation();
    yield request;

    while (audio.isRecording) {
      const chunk = await audio.readChunk();
      if (!chunk) {
        return;
      }
      yield { kind: "audio", audioIn: chunk };
    }
  }
}
