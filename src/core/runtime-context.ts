import { randomUUID } from "crypto";
import { Logger } from "./logger";

/**
 * Process-wide counters shared by every component of a client run.
 */
export interface RuntimeCounters {
  turnsStarted: number;
  turnsCompleted: number;
  turnsFailed: number;
  turnAttempts: number;
  transientFailures: number;
  deviceActionsDispatched: number;
  deviceActionFailures: number;
  malformedDeviceActions: number;
  unknownCommands: number;
}

export type RuntimeCounterName = keyof RuntimeCounters;

const createCounters = (): RuntimeCounters => ({
  turnsStarted: 0,
  turnsCompleted: 0,
  turnsFailed: 0,
  turnAttempts: 0,
  transientFailures: 0,
  deviceActionsDispatched: 0,
  deviceActionFailures: 0,
  malformedDeviceActions: 0,
  unknownCommands: 0,
});

/**
 * Explicit context handed to each component: the logging sink plus counters.
 */
export class RuntimeContext {
  readonly runId: string;
  private readonly counters: RuntimeCounters = createCounters();

  constructor(
    readonly logger: Logger,
    runId?: string,
  ) {
    this.runId = runId ?? randomUUID();
  }

  increment(name: RuntimeCounterName, by = 1): number {
    this.counters[name] += by;
    return this.counters[name];
  }

  count(name: RuntimeCounterName): number {
    return this.counters[name];
  }

  snapshot(): Readonly<RuntimeCounters> {
    return { ...this.counters };
  }

  dispose(): void {
    this.logger.dispose();
  }
}
