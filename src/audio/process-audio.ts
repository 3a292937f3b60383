import { spawn, type ChildProcess } from "child_process";
import type { Logger } from "../core/logger";
import type { AudioSink, AudioSource } from "../types/audio";

/**
 * Replaces `{rate}` in each argument with the sample rate.
 */
export function expandAudioCommand(command: readonly string[], sampleRate: number): string[] {
  return command.map((part) => part.replace(/\{rate\}/g, String(sampleRate)));
}

/**
 * Captures raw PCM from the stdout of a recorder process such as `arecord`.
 * The process is spawned on {@link start} and killed on {@link stop}.
 */
export class ProcessAudioSource implements AudioSource {
  private child: ChildProcess | undefined;
  private buffered: Buffer[] = [];
  private bufferedBytes = 0;
  private ended = true;
  private waiter: (() => void) | undefined;

  constructor(
    private readonly command: readonly string[],
    private readonly logger: Logger,
  ) {
    if (command.length === 0) {
      throw new Error("Capture command must name an executable");
    }
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }
    const [file, ...args] = this.command;
    const child = spawn(file, args, { stdio: ["ignore", "pipe", "inherit"] });
    this.child = child;
    this.buffered = [];
    this.bufferedBytes = 0;
    this.ended = false;
    child.stdout?.on("data", (data: Buffer) => {
      this.buffered.push(data);
      this.bufferedBytes += data.length;
      this.wake();
    });
    child.once("error", (error) => {
      this.logger.error("Audio capture process failed", { file, error: error.message });
      this.finish(child);
    });
    child.once("close", () => this.finish(child));
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    this.finish(child);
    child.kill();
  }

  async read(size: number): Promise<Buffer | undefined> {
    while (this.bufferedBytes < size && !this.ended) {
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    if (this.bufferedBytes === 0) {
      return undefined;
    }
    const all = Buffer.concat(this.buffered);
    const chunk = all.subarray(0, size);
    const rest = all.subarray(chunk.length);
    this.buffered = rest.length > 0 ? [rest] : [];
    this.bufferedBytes = rest.length;
    return chunk;
  }

  async close(): Promise<void> {
    await this.stop();
  }

  private finish(child: ChildProcess): void {
    if (this.child !== child) {
      return;
    }
    this.child = undefined;
    this.ended = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}

/**
 * Plays raw PCM by writing it to the stdin of a player process such as `aplay`.
 */
export class ProcessAudioSink implements AudioSink {
  private child: ChildProcess | undefined;

  constructor(
    private readonly command: readonly string[],
    private readonly logger: Logger,
  ) {
    if (command.length === 0) {
      throw new Error("Playback command must name an executable");
    }
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }
    const [file, ...args] = this.command;
    const child = spawn(file, args, { stdio: ["pipe", "ignore", "inherit"] });
    child.once("error", (error) => {
      this.logger.error("Audio playback process failed", { file, error: error.message });
    });
    this.child = child;
  }

  async write(chunk: Buffer): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin) {
      throw new Error("Playback process is not running");
    }
    if (!stdin.write(chunk)) {
      await new Promise<void>((resolve) => stdin.once("drain", () => resolve()));
    }
  }

  async flush(): Promise<void> {
    return;
  }

  /**
   * Ends the player's input and waits for it to finish playing.
   */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    this.child = undefined;
    if (child.exitCode !== null || child.signalCode !== null) {
      return;
    }
    await new Promise<void>((resolve) => {
      child.once("close", () => resolve());
      child.stdin?.end();
    });
  }

  async close(): Promise<void> {
    await this.stop();
  }
}
