import type { IncomingMessage } from "http";
import WebSocket, { WebSocketServer, type VerifyClientCallbackAsync } from "ws";
import { TransportError } from "../../../src/core/errors";
import { WebSocketAssistantTransport } from "../../../src/transport/websocket-transport";
import type { InboundMessage, OutboundMessage } from "../../../src/types/assist-messages";
import { expect } from "../../helpers/chai-setup";
import { createTestContext } from "../../helpers/fakes";
import { suite, teardown, test } from "../../mocha-globals";

type ConnectionHandler = (socket: WebSocket, request: IncomingMessage) => void;

interface TestServer {
  endpoint: string;
  port: number;
  close(): Promise<void>;
}

const servers: TestServer[] = [];

async function startServer(
  onConnection: ConnectionHandler,
  verifyClient?: VerifyClientCallbackAsync,
): Promise<TestServer> {
  const wss = new WebSocketServer({ port: 0, host: "127.0.0.1", ...(verifyClient ? { verifyClient } : {}) });
  wss.on("connection", onConnection);
  await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
  const address = wss.address();
  if (typeof address === "string") {
    throw new Error(`unexpected pipe address ${address}`);
  }
  const port = address.port;
  const server: TestServer = {
    endpoint: `ws://127.0.0.1:${port}/assist`,
    port,
    close: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => resolve());
      }),
  };
  servers.push(server);
  return server;
}

function text(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.isBuffer(data) ? data.toString("utf8") : Buffer.from(data).toString("utf8");
}

/** Replies once the client sent its end frame. */
function answerAfterEnd(frames: string[], replies: unknown[]): ConnectionHandler {
  return (socket) => {
    socket.on("message", (data) => {
      const frame = text(data);
      frames.push(frame);
      if (frame === '{"type":"end"}') {
        for (const reply of replies) {
          socket.send(JSON.stringify(reply));
        }
        socket.close(1000);
      }
    });
  };
}

async function* turnRequests(): AsyncGenerator<OutboundMessage> {
  yield {
    kind: "config",
    config: {
      audioInConfig: { encoding: "LINEAR16", sampleRateHertz: 16000 },
      audioOutConfig: { encoding: "LINEAR16", sampleRateHertz: 16000, volumePercentage: 50 },
      dialogStateIn: { languageCode: "en-US", isNewConversation: true },
      deviceConfig: { deviceId: "test-device", deviceModelId: "test-model" },
    },
  };
  yield { kind: "audio", audioIn: Buffer.from("ab") };
}

async function collect(responses: AsyncIterable<InboundMessage>): Promise<InboundMessage[]> {
  const received: InboundMessage[] = [];
  for await (const response of responses) {
    received.push(response);
  }
  return received;
}

async function failure(responses: AsyncIterable<InboundMessage>): Promise<TransportError> {
  try {
    await collect(responses);
  } catch (error: unknown) {
    if (error instanceof TransportError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the call to fail");
}

function transportFor(endpoint: string, token?: string): WebSocketAssistantTransport {
  return new WebSocketAssistantTransport({
    endpoint,
    logger: createTestContext().logger,
    ...(token ? { accessToken: async () => token } : {}),
  });
}

suite("Unit: WebSocketAssistantTransport", () => {
  teardown(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()));
  });

  test("sends config, audio and end frames then yields responses until a normal close", async () => {
    const frames: string[] = [];
    const server = await startServer(
      answerAfterEnd(frames, [
        { type: "response", response: { speechResults: [{ transcript: "hi" }] } },
        { type: "response", response: { eventType: "END_OF_UTTERANCE" } },
      ]),
    );

    const received = await collect(
      transportFor(server.endpoint).assist(turnRequests(), { deadlineMs: 5_000 }),
    );

    expect(received).to.deep.equal([
      { speechResults: [{ transcript: "hi" }] },
      { eventType: "END_OF_UTTERANCE" },
    ]);
    expect(frames).to.have.length(3);
    expect(JSON.parse(frames[0])).to.nested.include({
      type: "config",
      "config.deviceConfig.deviceId": "test-device",
    });
    expect(frames[1]).to.equal('{"type":"audio","audioIn":"YWI="}');
    expect(frames[2]).to.equal('{"type":"end"}');
  });

  test("presents the access token as a bearer header", async () => {
    const headers: Array<string | undefined> = [];
    const server = await startServer((socket, request) => {
      headers.push(request.headers.authorization);
      socket.close(1000);
    });

    await collect(transportFor(server.endpoint, "test-token").assist(turnRequests(), { deadlineMs: 5_000 }));

    expect(headers).to.deep.equal(["Bearer test-token"]);
  });

  test("a status frame fails the call with the named status", async () => {
    const server = await startServer((socket) => {
      socket.send(JSON.stringify({ type: "status", code: "UNAVAILABLE", message: "overloaded" }));
    });

    const error = await failure(transportFor(server.endpoint).assist(turnRequests(), { deadlineMs: 5_000 }));

    expect(error.status).to.equal("unavailable");
    expect(error.message).to.equal("overloaded");
  });

  test("an abnormal close fails the call with the mapped status", async () => {
    const server = await startServer((socket) => {
      socket.close(1011, "boom");
    });

    const error = await failure(transportFor(server.endpoint).assist(turnRequests(), { deadlineMs: 5_000 }));

    expect(error.status).to.equal("internal");
    expect(error.message).to.equal("Connection closed with code 1011: boom");
  });

  test("a refused upgrade maps the HTTP status", async () => {
    const server = await startServer(
      () => undefined,
      (_info, done) => done(false, 401, "Unauthorized"),
    );

    const error = await failure(transportFor(server.endpoint).assist(turnRequests(), { deadlineMs: 5_000 }));

    expect(error.status).to.equal("unauthenticated");
    expect(error.message).to.equal("Service refused the connection with HTTP 401");
  });

  test("a service that never answers hits the deadline", async () => {
    const server = await startServer(() => undefined);

    const error = await failure(transportFor(server.endpoint).assist(turnRequests(), { deadlineMs: 50 }));

    expect(error.status).to.equal("deadline-exceeded");
    expect(error.message).to.equal("Assist call exceeded 50 ms");
  });

  test("a connection that cannot be made is unavailable", async () => {
    const server = await startServer(() => undefined);
    const endpoint = server.endpoint;
    await server.close();

    const error = await failure(transportFor(endpoint).assist(turnRequests(), { deadlineMs: 5_000 }));

    expect(error.status).to.equal("unavailable");
  });

  test("an aborted signal cancels before connecting", async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await failure(
      transportFor("ws://127.0.0.1:1/assist").assist(turnRequests(), {
        deadlineMs: 5_000,
        signal: controller.signal,
      }),
    );

    expect(error.status).to.equal("cancelled");
  });

  test("aborting mid-call cancels it", async () => {
    const controller = new AbortController();
    const server = await startServer(() => {
      controller.abort();
    });

    const error = await failure(
      transportFor(server.endpoint).assist(turnRequests(), {
        deadlineMs: 5_000,
        signal: controller.signal,
      }),
    );

    expect(error.status).to.equal("cancelled");
    expect(error.message).to.equal("Assist call cancelled");
  });
});
