import type { AudioChannel, AudioChannelMode, AudioSink, AudioSource } from "../types/audio";
import { alignToSampleWidth, scaleInt16, volumeFactor } from "./pcm-buffer";

export const DEFAULT_ITER_SIZE = 3200;
export const DEFAULT_VOLUME_PERCENTAGE = 50;

export interface ConversationStreamOptions {
  source: AudioSource;
  sink: AudioSink;
  sampleRate: number;
  /** Bytes per sample; only 16-bit PCM is supported. */
  sampleWidth?: number;
  /** Bytes read from the source per chunk. */
  iterSize?: number;
  volumePercentage?: number;
}

/**
 * {@link AudioChannel} over a separate capture source and playback sink.
 *
 * @remarks
 * Recording and playback are mutually exclusive; starting one while the other
 * is active is rejected. Stopping either is idempotent.
 */
export class ConversationStream implements AudioChannel {
  readonly sampleRate: number;
  readonly sampleWidth: number;
  readonly iterSize: number;
  volumePercentage: number;

  private readonly source: AudioSource;
  private readonly sink: AudioSink;
  private currentMode: AudioChannelMode = "idle";
  private closing: Promise<void> | undefined;

  constructor(options: ConversationStreamOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.sampleRate = options.sampleRate;
    this.sampleWidth = options.sampleWidth ?? 2;
    this.iterSize = options.iterSize ?? DEFAULT_ITER_SIZE;
    this.volumePercentage = options.volumePercentage ?? DEFAULT_VOLUME_PERCENTAGE;
    if (this.sampleWidth !== 2) {
      throw new RangeError(`Only 16-bit samples are supported, got width ${this.sampleWidth}`);
    }
  }

  get mode(): AudioChannelMode {
    return this.currentMode;
  }

  get isRecording(): boolean {
    return this.currentMode === "recording";
  }

  get isPlaying(): boolean {
    return this.currentMode === "playing";
  }

  async startRecording(): Promise<void> {
    this.ensureOpen();
    if (this.currentMode === "recording") {
      return;
    }
    if (this.currentMode === "playing") {
      throw new Error("Cannot start recording while playing");
    }
    await this.source.start();
    this.currentMode = "recording";
  }

  async stopRecording(): Promise<void> {
    if (this.currentMode !== "recording") {
      return;
    }
    this.currentMode = "idle";
    await this.source.stop();
  }

  async readChunk(): Promise<Buffer | undefined> {
    if (this.currentMode !== "recording") {
      return undefined;
    }
    const chunk = await this.source.read(this.iterSize);
    if (!chunk || chunk.length === 0) {
      return undefined;
    }
    return chunk;
  }

  async startPlayback(): Promise<void> {
    this.ensureOpen();
    if (this.currentMode === "playing") {
      return;
    }
    if (this.currentMode === "recording") {
      throw new Error("Cannot start playback while recording");
    }
    await this.sink.start();
    this.currentMode = "playing";
  }

  async write(chunk: Buffer): Promise<void> {
    if (this.currentMode !== "playing") {
      throw new Error("Cannot write audio while not playing");
    }
    const aligned = alignToSampleWidth(chunk, this.sampleWidth);
    await this.sink.write(scaleInt16(aligned, volumeFactor(this.volumePercentage)));
  }

  async stopPlayback(): Promise<void> {
    if (this.currentMode !== "playing") {
      return;
    }
    this.currentMode = "idle";
    await this.sink.flush();
    await this.sink.stop();
  }

  /**
   * Stops any activity and closes source and sink. Later calls return the same promise.
   */
  close(): Promise<void> {
    this.closing ??= this.closeOnce();
    return this.closing;
  }

  private async closeOnce(): Promise<void> {
    try {
      await this.stopRecording();
      await this.stopPlayback();
    } finally {
      await Promise.all([this.source.close(), this.sink.close()]);
    }
  }

  private ensureOpen(): void {
    if (this.closing) {
      throw new Error("Audio channel is closed");
    }
  }
}
