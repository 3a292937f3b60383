/**
 * Immutable per-session parameters copied into every turn's config message.
 */
export interface TurnConfig {
  readonly languageCode: string;
  readonly deviceModelId: string;
  readonly deviceId: string;
  readonly sampleRate: number;
  readonly volumePercentage: number;
  readonly displayEnabled: boolean;
}

export interface ConversationStateSnapshot {
  continuationToken?: Buffer;
  isNewConversation: boolean;
}

export interface TurnOutcome {
  /** True when the service expects a follow-on turn without a new trigger. */
  continueConversation: boolean;
}

/**
 * Audio channel phases the response state machine walks through in one turn.
 */
export type TurnPhase =
  | "recording"
  | "recording-stopped"
  | "playing"
  | "playback-stopped";

export type TurnTransitionCause =
  | "end-of-utterance"
  | "audio-out"
  | "stream-complete";

export interface TurnTransitionEvent {
  type: "turn-transition";
  from: TurnPhase;
  to: TurnPhase;
  cause: TurnTransitionCause;
  timestamp: string;
}

export interface TranscriptEvent {
  type: "transcript";
  transcript: string;
  results: ReadonlyArray<{ transcript: string; stability?: number }>;
  timestamp: string;
}
