/**
 * Message shapes exchanged with the assist service during one turn.
 *
 * @remarks
 * Enum members keep the service's wire names so frames can be passed through
 * without translation tables.
 */

export type AudioEncoding = "LINEAR16";

export type AssistEventType = "END_OF_UTTERANCE" | "EVENT_TYPE_UNSPECIFIED";

export type MicrophoneMode =
  | "DIALOG_FOLLOW_ON"
  | "CLOSE_MICROPHONE"
  | "MICROPHONE_MODE_UNSPECIFIED";

export type ScreenMode = "PLAYING";

export interface AudioInConfig {
  encoding: AudioEncoding;
  sampleRateHertz: number;
}

export interface AudioOutConfig {
  encoding: AudioEncoding;
  sampleRateHertz: number;
  volumePercentage: number;
}

export interface DialogStateIn {
  languageCode: string;
  /** Continuation token from the previous turn; omitted on the wire when absent. */
  conversationState?: Buffer;
  isNewConversation: boolean;
}

export interface DeviceConfig {
  deviceId: string;
  deviceModelId: string;
}

export interface AssistConfig {
  audioInConfig: AudioInConfig;
  audioOutConfig: AudioOutConfig;
  dialogStateIn: DialogStateIn;
  deviceConfig: DeviceConfig;
  screenOutConfig?: { screenMode: ScreenMode };
}

export interface ConfigRequest {
  kind: "config";
  config: AssistConfig;
}

export interface AudioInRequest {
  kind: "audio";
  audioIn: Buffer;
}

/**
 * Outbound messages of a turn: one {@link ConfigRequest} first, then audio.
 */
export type OutboundMessage = ConfigRequest | AudioInRequest;

export interface SpeechRecognitionResult {
  transcript: string;
  stability?: number;
}

export interface AudioOut {
  audioData: Buffer;
}

export interface DialogStateOut {
  conversationState?: Buffer;
  /** 0 means the service did not ask for a change. */
  volumePercentage?: number;
  microphoneMode?: MicrophoneMode;
  supplementalDisplayText?: string;
}

export interface DeviceAction {
  deviceRequestJson?: string;
}

export interface ScreenOut {
  format?: "HTML";
  data?: Buffer;
}

/**
 * One response from the assist service. Every field is optional and several
 * may be set on the same message.
 */
export interface InboundMessage {
  eventType?: AssistEventType;
  speechResults?: SpeechRecognitionResult[];
  audioOut?: AudioOut;
  dialogStateOut?: DialogStateOut;
  deviceAction?: DeviceAction;
  screenOut?: ScreenOut;
}
