import type { Logger } from "../core/logger";
import type { InboundMessage, OutboundMessage } from "../types/assist-messages";

/**
 * Log-safe view of an outbound message: audio is reduced to its length.
 */
export function describeOutbound(message: OutboundMessage): Record<string, unknown> {
  if (message.kind === "audio") {
    return { kind: "audio", audioInBytes: message.audioIn.length };
  }
  const { dialogStateIn, ...rest } = message.config;
  return {
    kind: "config",
    config: {
      ...rest,
      dialogStateIn: {
        languageCode: dialogStateIn.languageCode,
        isNewConversation: dialogStateIn.isNewConversation,
        conversationStateBytes: dialogStateIn.conversationState?.length ?? 0,
      },
    },
  };
}

export function describeInbound(message: InboundMessage): Record<string, unknown> {
  const view: Record<string, unknown> = {};
  if (message.eventType) {
    view.eventType = message.eventType;
  }
  if (message.speechResults?.length) {
    view.speechResults = message.speechResults.map((result) => ({ ...result }));
  }
  if (message.audioOut) {
    view.audioOutBytes = message.audioOut.audioData.length;
  }
  if (message.dialogStateOut) {
    const { conversationState, ...dialog } = message.dialogStateOut;
    view.dialogStateOut = {
      ...dialog,
      ...(conversationState ? { conversationStateBytes: conversationState.length } : {}),
    };
  }
  if (message.deviceAction?.deviceRequestJson) {
    view.deviceRequestJson = message.deviceAction.deviceRequestJson;
  }
  if (message.screenOut?.data) {
    view.screenOutBytes = message.screenOut.data.length;
  }
  return view;
}

/**
 * Passes `source` through unchanged, logging every item at debug level.
 */
export async function* logMessages<T>(
  source: AsyncIterable<T>,
  logger: Logger,
  label: string,
  describe: (message: T) => Record<string, unknown>,
): AsyncGenerator<T, void, undefined> {
  for await (const message of source) {
    if (logger.isLevelEnabled("debug")) {
      logger.debug(label, describe(message));
    }
    yield message;
  }
}
