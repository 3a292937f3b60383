import type { Disposable } from "../types/disposal";

/**
 * Supported log levels ordered from highest severity (`error`) to most verbose (`debug`).
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * Structured representation of a single log line emitted by the {@link Logger}.
 */
export interface LogEvent {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  data?: unknown;
}

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  appendLine(line: string): void;
  dispose?(): void;
}

/**
 * Writes each line to a Node writable stream, stderr by default so stdout
 * stays free for transcripts.
 */
export class StreamLogSink implements LogSink {
  constructor(
    private readonly stream: NodeJS.WritableStream = process.stderr,
  ) {}

  appendLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Collects lines in memory. Used when output must be inspected or discarded.
 */
export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }
}

/**
 * Structured logger with level-based filtering and JSON serialization of
 * metadata objects.
 *
 * @remarks
 * Logger instances share sinks by name. Most consumers should rely on the
 * default "AssistantTurn" sink to keep diagnostics consolidated.
 */
export class Logger {
  private static readonly sinkRegistry = new Map<
    string,
    { sink: LogSink; refCount: number }
  >();
  private static readonly logObservers = new Set<(entry: LogEvent) => void>();
  private static defaultLevel: LogLevel = "info";

  private readonly sinkName: string;
  private readonly sink: LogSink;
  private readonly levelOrder: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  };
  private currentLevel: LogLevel = Logger.defaultLevel;
  private disposed = false;

  /**
   * Creates a logger that writes to a shared sink.
   *
   * @param name - Sink name. Loggers with matching names share the same sink instance.
   * @param sink - Sink used when no sink is registered under `name` yet; defaults to stderr.
   */
  constructor(name = "AssistantTurn", sink?: LogSink) {
    this.sinkName = name;
    const registryEntry = Logger.sinkRegistry.get(name);
    if (registryEntry) {
      registryEntry.refCount += 1;
      this.sink = registryEntry.sink;
      return;
    }

    this.sink = sink ?? new StreamLogSink();
    Logger.sinkRegistry.set(name, { sink: this.sink, refCount: 1 });
  }

  /**
   * Subscribes to structured log events emitted by any {@link Logger} instance.
   */
  static onDidLog(listener: (entry: LogEvent) => void): Disposable {
    Logger.logObservers.add(listener);
    return {
      dispose: () => {
        Logger.logObservers.delete(listener);
      },
    };
  }

  /**
   * Level applied to loggers constructed afterwards.
   */
  static setDefaultLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
  }

  get name(): string {
    return this.sinkName;
  }

  setLevel(level: LogLevel) {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  error(message: string, data?: unknown) {
    this.log("error", message, data);
  }

  warn(message: string, data?: unknown) {
    this.log("warn", message, data);
  }

  info(message: string, data?: unknown) {
    this.log("info", message, data);
  }

  /**
   * Only emitted when the current level is `debug`.
   */
  debug(message: string, data?: unknown) {
    this.log("debug", message, data);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.levelOrder[level] <= this.levelOrder[this.currentLevel];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (this.disposed) {
      return;
    }
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      logger: this.sinkName,
      message,
      data,
    };
    const formatted = Logger.format(event);
    try {
      this.sink.appendLine(formatted);
    } catch (error) {
      console.warn("Logger failed to append to sink; falling back to console", error);
      console.error(formatted);
    }
    Logger.emitLogEvent(event);
  }

  /**
   * Formats a {@link LogEvent} into a string, including serialized metadata
   * when available. Fallback messaging is used if serialization fails.
   */
  static format(ev: LogEvent): string {
    const base = `[${ev.timestamp}] [${ev.level.toUpperCase()}] ${ev.message}`;
    if (ev.data !== undefined) {
      try {
        return `${base} :: ${JSON.stringify(ev.data)}`;
      } catch (err) {
        return `${base} [WARN: Failed to serialize data: ${err instanceof Error ? err.message : String(err)}]`;
      }
    }
    return base;
  }

  /**
   * Releases the shared sink once the last logger using it is disposed.
   */
  dispose() {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    const entry = Logger.sinkRegistry.get(this.sinkName);
    if (!entry) {
      return;
    }
    entry.refCount -= 1;
    if (entry.refCount <= 0) {
      Logger.sinkRegistry.delete(this.sinkName);
      try {
        entry.sink.dispose?.();
      } catch (error) {
        console.warn("Logger failed to dispose sink", error);
      }
    }
  }

  private static emitLogEvent(event: LogEvent): void {
    if (Logger.logObservers.size === 0) {
      return;
    }
    for (const listener of Array.from(Logger.logObservers)) {
      try {
        listener(event);
      } catch (error) {
        console.warn("Logger observer threw an error and will be ignored", error);
      }
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
