import { BoundedChannel, ChannelClosedError } from "../core/bounded-channel";
import { SessionError, TransportError, errorMessage, toError } from "../core/errors";
import type { Logger } from "../core/logger";
import { RetryPolicy } from "../core/retry/retry-policy";
import type { RuntimeContext } from "../core/runtime-context";
import { summarizeError, toAssistantError } from "../helpers/error/envelope";
import type { AssistantTransport } from "../transport/assistant-transport";
import type { OutboundMessage } from "../types/assist-messages";
import type { AudioChannel } from "../types/audio";
import type { TurnConfig, TurnOutcome } from "../types/conversation";
import type { DeviceActionDispatch } from "../types/device-action";
import { ConversationState } from "./conversation-state";
import { describeInbound, describeOutbound, logMessages } from "./message-logging";
import { RequestEncoder } from "./request-encoder";
import { ResponseStateMachine } from "./response-state-machine";

export const DEFAULT_DEADLINE_MS = 185_000;
export const DEFAULT_OUTBOUND_CAPACITY = 4;

export interface ConversationSessionOptions {
  turnConfig: TurnConfig;
  audio: AudioChannel;
  transport: AssistantTransport;
  dispatcher: DeviceActionDispatch;
  context: RuntimeContext;
  retryPolicy?: RetryPolicy;
  encoder?: RequestEncoder;
  stateMachine?: ResponseStateMachine;
  /** Per-attempt deadline of the duplex call. */
  deadlineMs?: number;
  /** Outbound messages buffered ahead of the transport. */
  outboundCapacity?: number;
}

export interface RunTurnOptions {
  signal?: AbortSignal;
}

/**
 * Runs assist turns over one audio channel, carrying dialog state from turn to turn.
 *
 * @remarks
 * Turns are serialized: calling {@link runTurn} while another turn is running
 * is rejected. Each attempt runs the request encoder as a producer feeding a
 * bounded channel, while the response state machine drains the transport's
 * responses.
 */
export class ConversationSession {
  readonly state = new ConversationState();
  readonly turnConfig: TurnConfig;
  readonly stateMachine: ResponseStateMachine;

  private readonly audio: AudioChannel;
  private readonly transport: AssistantTransport;
  private readonly dispatcher: DeviceActionDispatch;
  private readonly context: RuntimeContext;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly encoder: RequestEncoder;
  private readonly deadlineMs: number;
  private readonly outboundCapacity: number;
  private turnRunning = false;
  private closing: Promise<void> | undefined;

  constructor(options: ConversationSessionOptions) {
    this.turnConfig = Object.freeze({ ...options.turnConfig });
    this.audio = options.audio;
    this.transport = options.transport;
    this.dispatcher = options.dispatcher;
    this.context = options.context;
    this.logger = options.context.logger;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ logger: this.logger });
    this.encoder = options.encoder ?? new RequestEncoder();
    this.stateMachine = options.stateMachine ?? new ResponseStateMachine(options.context);
    this.deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
    this.outboundCapacity = options.outboundCapacity ?? DEFAULT_OUTBOUND_CAPACITY;
  }

  get isDisposed(): boolean {
    return this.closing !== undefined;
  }

  async runTurn(options: RunTurnOptions = {}): Promise<TurnOutcome> {
    if (this.closing) {
      throw new SessionError("SESSION_DISPOSED", "Conversation session has been disposed");
    }
    if (this.turnRunning) {
      throw new SessionError("TURN_IN_PROGRESS", "A turn is already running on this session");
    }
    this.turnRunning = true;
    this.context.increment("turnsStarted");
    const atTurnStart = this.state.snapshot();

    try {
      this.logger.info("Recording audio request");
      await this.audio.startRecording();
      const outcome = await this.retryPolicy.execute(
        (attempt) => this.runAttempt(attempt, options.signal),
        {
          onAttempt: async (attempt) => {
            this.context.increment("turnAttempts");
            if (attempt > 1) {
              this.state.restore(atTurnStart);
              await this.resetChannel();
            }
          },
          onRetryScheduled: (retryPlan, error) => {
            this.context.increment("transientFailures");
            const envelope = { ...toAssistantError(error, "transport"), retryPlan };
            this.logger.debug("Turn attempt failed", summarizeError(envelope));
          },
        },
      );
      this.context.increment("turnsCompleted");
      return outcome;
    } catch (error: unknown) {
      this.context.increment("turnsFailed");
      this.logger.error("Turn failed", { error: errorMessage(error) });
      await this.stopChannel();
      throw error;
    } finally {
      this.turnRunning = false;
    }
  }

  /**
   * Closes the audio channel. Later calls return the same promise.
   */
  dispose(): Promise<void> {
    this.closing ??= this.audio.close().then(() => {
      this.logger.debug("Conversation session disposed");
    });
    return this.closing;
  }

  private async runAttempt(attempt: number, signal: AbortSignal | undefined): Promise<TurnOutcome> {
    if (signal?.aborted) {
      throw new TransportError("cancelled", "Turn cancelled before the call started");
    }
    this.logger.debug("Starting assist call", { attempt, deadlineMs: this.deadlineMs });

    const outbound = new BoundedChannel<OutboundMessage>(this.outboundCapacity);
    const producer = this.produce(outbound);
    try {
      const responses = this.transport.assist(outbound, {
        deadlineMs: this.deadlineMs,
        signal,
      });
      return await this.stateMachine.processTurn(
        logMessages(responses, this.logger, "AssistResponse", describeInbound),
        this.audio,
        this.state,
        this.dispatcher,
        this.turnConfig.displayEnabled,
      );
    } finally {
      outbound.close();
      await producer;
    }
  }

  /**
   * Pumps the encoder into `outbound`. Never rejects: a failing encoder
   * closes the channel with its error so the transport sees it.
   */
  private async produce(outbound: BoundedChannel<OutboundMessage>): Promise<void> {
    try {
      const requests = this.encoder.encode(this.turnConfig, this.state, this.audio);
      for await (const request of logMessages(requests, this.logger, "AssistRequest", describeOutbound)) {
        await outbound.send(request);
      }
      outbound.close();
    } catch (error: unknown) {
      if (error instanceof ChannelClosedError) {
        return;
      }
      outbound.close(toError(error));
    }
  }

  private async resetChannel(): Promise<void> {
    if (this.audio.isPlaying) {
      await this.audio.stopPlayback();
    }
    if (!this.audio.isRecording) {
      await this.audio.startRecording();
    }
  }

  private async stopChannel(): Promise<void> {
    try {
      await this.audio.stopRecording();
      await this.audio.stopPlayback();
    } catch (error: unknown) {
      this.logger.warn("Failed to stop audio channel after turn failure", {
        error: errorMessage(error),
      });
    }
  }
}
