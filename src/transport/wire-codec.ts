import { TransportError, type TransportStatus } from "../core/errors";
import { asRecordArray, isRecord } from "../core/guards";
import { validateAgainstSchema } from "../core/schema-registry";
import type {
    AssistEventType,
    InboundMessage,
    MicrophoneMode,
    OutboundMessage,
    SpeechRecognitionResult,
} from "../types/assist-messages";
import { statusFromWire } from "./transport-status";

/**
 * Frames are JSON text. Byte fields travel as base64.
 */
export type ServerFrame =
  | { type: "response"; response: InboundMessage }
  | { type: "status"; status: TransportStatus; message: string };

export const END_OF_REQUESTS_FRAME = JSON.stringify({ type: "end" });

export function encodeRequest(message: OutboundMessage): string {
  if (message.kind === "audio") {
    return JSON.stringify({ type: "audio", audioIn: message.audioIn.toString("base64") });
  }
  const { dialogStateIn, ...config } = message.config;
  return JSON.stringify({
    type: "config",
    config: {
      ...config,
      dialogStateIn: {
        languageCode: dialogStateIn.languageCode,
        isNewConversation: dialogStateIn.isNewConversation,
        ...(dialogStateIn.conversationState
          ? { conversationState: dialogStateIn.conversationState.toString("base64") }
          : {}),
      },
    },
  });
}

/**
 * Parses and validates one frame from the service.
 *
 * @throws TransportError with status `internal` when the frame is not a valid service frame.
 */
export function decodeFrame(text: string): ServerFrame {
  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch (error: unknown) {
    throw new TransportError("internal", "Received a frame that is not JSON", { cause: error });
  }
  const validation = validateAgainstSchema("assist-response-frame", frame);
  if (!validation.valid || !isRecord(frame)) {
    throw new TransportError("internal", "Received a malformed frame", {
      metadata: { errors: validation.errors },
    });
  }
  if (frame.type === "status") {
    const code = String(frame.code);
    return {
      type: "status",
      status: statusFromWire(code),
      message: typeof frame.message === "string" ? frame.message : code,
    };
  }
  return { type: "response", response: decodeResponse(isRecord(frame.response) ? frame.response : {}) };
}

function decodeResponse(raw: Record<string, unknown>): InboundMessage {
  const message: InboundMessage = {};
  const eventType = raw.eventType;
  if (isEventType(eventType)) {
    message.eventType = eventType;
  }
  if (Array.isArray(raw.speechResults)) {
    message.speechResults = asRecordArray(raw.speechResults).map(
      (result): SpeechRecognitionResult => ({
        transcript: String(result.transcript),
        ...(typeof result.stability === "number" ? { stability: result.stability } : {}),
      }),
    );
  }
  if (isRecord(raw.audioOut)) {
    message.audioOut = { audioData: fromBase64(raw.audioOut.audioData) ?? Buffer.alloc(0) };
  }
  if (isRecord(raw.dialogStateOut)) {
    const dialog = raw.dialogStateOut;
    const microphoneMode = dialog.microphoneMode;
    message.dialogStateOut = {
      ...(typeof dialog.conversationState === "string"
        ? { conversationState: fromBase64(dialog.conversationState) }
        : {}),
      ...(typeof dialog.volumePercentage === "number"
        ? { volumePercentage: dialog.volumePercentage }
        : {}),
      ...(isMicrophoneMode(microphoneMode) ? { microphoneMode } : {}),
      ...(typeof dialog.supplementalDisplayText === "string"
        ? { supplementalDisplayText: dialog.supplementalDisplayText }
        : {}),
    };
  }
  if (isRecord(raw.deviceAction)) {
    const json = raw.deviceAction.deviceRequestJson;
    message.deviceAction = typeof json === "string" ? { deviceRequestJson: json } : {};
  }
  if (isRecord(raw.screenOut)) {
    const data = fromBase64(raw.screenOut.data);
    message.screenOut = {
      ...(raw.screenOut.format === "HTML" ? { format: "HTML" as const } : {}),
      ...(data ? { data } : {}),
    };
  }
  return message;
}

function isEventType(value: unknown): value is AssistEventType {
  return value === "END_OF_UTTERANCE" || value === "EVENT_TYPE_UNSPECIFIED";
}

function isMicrophoneMode(value: unknown): value is MicrophoneMode {
  return (
    value === "DIALOG_FOLLOW_ON" ||
    value === "CLOSE_MICROPHONE" ||
    value === "MICROPHONE_MODE_UNSPECIFIED"
  );
}

function fromBase64(value: unknown): Buffer | undefined {
  return typeof value === "string" ? Buffer.from(value, "base64") : undefined;
}
