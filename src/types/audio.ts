export type AudioChannelMode = "idle" | "recording" | "playing";

/**
 * Bidirectional audio transport used by a conversation session.
 *
 * @remarks
 * The channel is in exactly one {@link AudioChannelMode} at a time. During a turn
 * only the response state machine changes modes; the session starts recording and
 * closes the channel.
 */
export interface AudioChannel {
  readonly sampleRate: number;
  readonly sampleWidth: number;
  volumePercentage: number;
  readonly mode: AudioChannelMode;
  readonly isRecording: boolean;
  readonly isPlaying: boolean;
  startRecording(): Promise<void>;
  /** Idempotent. */
  stopRecording(): Promise<void>;
  /**
   * Resolves with the next captured chunk, or `undefined` once recording has
   * stopped or the source is exhausted.
   */
  readChunk(): Promise<Buffer | undefined>;
  startPlayback(): Promise<void>;
  write(chunk: Buffer): Promise<void>;
  /** Idempotent. */
  stopPlayback(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Capture side of an audio channel.
 */
export interface AudioSource {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Returns up to `size` bytes, or `undefined` when no more audio is available. */
  read(size: number): Promise<Buffer | undefined>;
  close(): Promise<void>;
}

/**
 * Playback side of an audio channel.
 */
export interface AudioSink {
  start(): Promise<void>;
  write(chunk: Buffer): Promise<void>;
  flush(): Promise<void>;
  stop(): Promise<void>;
  close(): Promise<void>;
}
