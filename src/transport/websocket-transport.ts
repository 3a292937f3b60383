import type { IncomingMessage } from "http";
import WebSocket from "ws";
import { BoundedChannel } from "../core/bounded-channel";
import { TransportError, toError } from "../core/errors";
import type { Logger } from "../core/logger";
import type { InboundMessage, OutboundMessage } from "../types/assist-messages";
import type { AssistCallOptions, AssistantTransport } from "./assistant-transport";
import { statusFromCloseCode, statusFromHttp, transportErrorFromSocket } from "./transport-status";
import { END_OF_REQUESTS_FRAME, decodeFrame, encodeRequest } from "./wire-codec";

/** Responses buffered ahead of the state machine before the call is failed. */
export const INBOUND_CAPACITY = 1024;

export type AccessTokenProvider = () => Promise<string | undefined>;

export interface WebSocketTransportOptions {
  endpoint: string;
  logger: Logger;
  accessToken?: AccessTokenProvider;
}

/**
 * Assist calls over one WebSocket connection each.
 *
 * @remarks
 * The client sends a `config` frame, `audio` frames and an `end` frame; the
 * service answers with `response` frames and closes with code 1000 when the
 * turn is complete. Anything else ends the call with a {@link TransportError}.
 */
export class WebSocketAssistantTransport implements AssistantTransport {
  private readonly endpoint: string;
  private readonly logger: Logger;
  private readonly accessToken?: AccessTokenProvider;

  constructor(options: WebSocketTransportOptions) {
    this.endpoint = options.endpoint;
    this.logger = options.logger;
    this.accessToken = options.accessToken;
  }

  assist(
    requests: AsyncIterable<OutboundMessage>,
    options: AssistCallOptions,
  ): AsyncIterable<InboundMessage> {
    return this.call(requests, options);
  }

  private async *call(
    requests: AsyncIterable<OutboundMessage>,
    options: AssistCallOptions,
  ): AsyncGenerator<InboundMessage, void, undefined> {
    if (options.signal?.aborted) {
      throw new TransportError("cancelled", "Assist call cancelled before connecting");
    }

    const token = await this.accessToken?.();
    const inbound = new BoundedChannel<InboundMessage>(INBOUND_CAPACITY);
    const socket = new WebSocket(this.endpoint, {
      headers: token ? { Authorization: `Bearer ${token}` } : {},
    });

    const fail = (error: Error): void => {
      if (inbound.isClosed) {
        return;
      }
      this.logger.debug("Assist call failed", { error: error.message });
      inbound.close(error);
      socket.terminate();
    };

    const deadline = setTimeout(() => {
      fail(
        new TransportError("deadline-exceeded", `Assist call exceeded ${options.deadlineMs} ms`, {
          metadata: { deadlineMs: options.deadlineMs },
        }),
      );
    }, options.deadlineMs);
    const onAbort = () => fail(new TransportError("cancelled", "Assist call cancelled"));
    options.signal?.addEventListener("abort", onAbort, { once: true });

    socket.on("unexpected-response", (request, response: IncomingMessage) => {
      const status = statusFromHttp(response.statusCode);
      request.destroy();
      fail(
        new TransportError(status, `Service refused the connection with HTTP ${response.statusCode}`, {
          metadata: { httpStatus: response.statusCode },
        }),
      );
    });
    socket.on("error", (error: Error) => fail(transportErrorFromSocket(error, this.endpoint)));
    socket.on("open", () => {
      this.logger.debug("Assist connection open", { endpoint: this.endpoint });
      void this.pump(requests, socket, fail);
    });
    socket.on("message", (data: WebSocket.RawData) => {
      try {
        const frame = decodeFrame(frameText(data));
        if (frame.type === "status") {
          fail(new TransportError(frame.status, frame.message));
        } else if (!inbound.trySend(frame.response)) {
          fail(new TransportError("internal", "Too many unprocessed responses"));
        }
      } catch (error: unknown) {
        fail(toError(error));
      }
    });
    socket.on("close", (code: number, reason: Buffer) => {
      if (code === 1000) {
        inbound.close();
        return;
      }
      const text = reason.toString();
      fail(
        new TransportError(
          statusFromCloseCode(code),
          `Connection closed with code ${code}${text ? `: ${text}` : ""}`,
          { metadata: { closeCode: code } },
        ),
      );
    });

    try {
      for await (const message of inbound) {
        yield message;
      }
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", onAbort);
      inbound.close();
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000);
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
    }
  }

  /**
   * Sends every request followed by the end frame. Never rejects: failures go to `fail`.
   */
  private async pump(
    requests: AsyncIterable<OutboundMessage>,
    socket: WebSocket,
    fail: (error: Error) => void,
  ): Promise<void> {
    try {
      for await (const request of requests) {
        if (socket.readyState !== WebSocket.OPEN) {
          return;
        }
        await send(socket, encodeRequest(request));
      }
      if (socket.readyState === WebSocket.OPEN) {
        await send(socket, END_OF_REQUESTS_FRAME);
      }
    } catch (error: unknown) {
      if (error instanceof SendError) {
        fail(new TransportError("unavailable", `Failed to send request: ${error.reason.message}`, {
          cause: error.reason,
        }));
        return;
      }
      fail(toError(error));
    }
  }
}

class SendError extends Error {
  constructor(readonly reason: Error) {
    super(reason.message);
    this.name = "SendError";
  }
}

function frameText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.isBuffer(data) ? data.toString("utf8") : Buffer.from(data).toString("utf8");
}

function send(socket: WebSocket, frame: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.send(frame, (error?: Error) => {
      if (error) {
        reject(new SendError(error));
      } else {
        resolve();
      }
    });
  });
}
