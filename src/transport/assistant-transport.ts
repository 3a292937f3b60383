import type { InboundMessage, OutboundMessage } from "../types/assist-messages";

export interface AssistCallOptions {
  /** Deadline for the whole duplex call, in milliseconds. */
  deadlineMs: number;
  signal?: AbortSignal;
}

/**
 * One duplex assist call per invocation.
 *
 * @remarks
 * The transport pulls `requests` only as fast as it can send them and yields
 * responses in arrival order. Failures surface as a `TransportError` from the
 * returned iterable.
 */
export interface AssistantTransport {
  assist(
    requests: AsyncIterable<OutboundMessage>,
    options: AssistCallOptions,
  ): AsyncIterable<InboundMessage>;
}
