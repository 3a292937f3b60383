import { open, type FileHandle } from "fs/promises";
import type { AudioSink, AudioSource } from "../types/audio";

const defaultSleep = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface RawPcmFileSourceOptions {
  path: string;
  sampleRate: number;
  sampleWidth: number;
  /** Sleep after each read for the chunk's playing time, as a microphone would. */
  paced?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Headerless little-endian PCM read from a file.
 */
export class RawPcmFileSource implements AudioSource {
  private handle: FileHandle | undefined;
  private position = 0;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: RawPcmFileSourceOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async start(): Promise<void> {
    this.handle ??= await open(this.options.path, "r");
  }

  async stop(): Promise<void> {
    return;
  }

  async read(size: number): Promise<Buffer | undefined> {
    if (!this.handle) {
      return undefined;
    }
    const buffer = Buffer.alloc(size);
    const { bytesRead } = await this.handle.read(buffer, 0, size, this.position);
    if (bytesRead === 0) {
      return undefined;
    }
    this.position += bytesRead;
    if (this.options.paced) {
      await this.sleep((bytesRead / (this.options.sampleRate * this.options.sampleWidth)) * 1000);
    }
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}

/**
 * Appends played audio to a file as headerless PCM.
 */
export class RawPcmFileSink implements AudioSink {
  private handle: FileHandle | undefined;

  constructor(private readonly path: string) {}

  async start(): Promise<void> {
    this.handle ??= await open(this.path, "w");
  }

  async write(chunk: Buffer): Promise<void> {
    if (!this.handle) {
      throw new Error("PCM file sink has not been started");
    }
    await this.handle.write(chunk);
  }

  async flush(): Promise<void> {
    await this.handle?.sync();
  }

  async stop(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}
