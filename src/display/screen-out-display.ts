import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Logger } from "../core/logger";
import { errorMessage } from "../core/errors";

/**
 * Receives screen payloads the service sends alongside a response.
 */
export interface ScreenOutDisplay {
  /** Must not block the caller; failures are the display's own concern. */
  show(data: Buffer, format?: string): void;
}

/**
 * Writes each payload to an HTML file in a private temp directory.
 */
export class HtmlFileDisplay implements ScreenOutDisplay {
  private directory: Promise<string> | undefined;
  private sequence = 0;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly logger: Logger,
    private readonly prefix = "assistant-screen-",
  ) {}

  show(data: Buffer): void {
    this.sequence += 1;
    const task = this.write(data, this.sequence)
      .catch((error: unknown) => {
        this.logger.warn("Failed to write screen output", { error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Resolves once every payload shown so far has been written.
   */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  private async write(data: Buffer, sequence: number): Promise<void> {
    this.directory ??= mkdtemp(join(tmpdir(), this.prefix));
    const file = join(await this.directory, `screen-${sequence}.html`);
    await writeFile(file, data);
    this.logger.info("Screen output written", { file });
  }
}
