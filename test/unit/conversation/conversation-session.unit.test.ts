import { ConversationSession } from "../../../src/conversation/conversation-session";
import { ExhaustedRetriesError, SessionError, TransportError } from "../../../src/core/errors";
import { Logger, type LogEvent } from "../../../src/core/logger";
import { RetryPolicy } from "../../../src/core/retry/retry-policy";
import type { InboundMessage, OutboundMessage } from "../../../src/types/assist-messages";
import type { DeviceActionDispatch } from "../../../src/types/device-action";
import { expect } from "../../helpers/chai-setup";
import { FakeAudioChannel, FakeTransport, TEST_TURN_CONFIG, createTestContext, type ScriptedCall } from "../../helpers/fakes";
import { suite, test } from "../../mocha-globals";

const noDispatch: DeviceActionDispatch = {
  handle: () => [],
  handleRequest: () => [],
};

const CLOSING_REPLY: InboundMessage[] = [
  { eventType: "END_OF_UTTERANCE" },
  { audioOut: { audioData: Buffer.from("AB") } },
  { dialogStateOut: { microphoneMode: "CLOSE_MICROPHONE" } },
];

function createSession(scripts: ScriptedCall[], audio = new FakeAudioChannel()) {
  const harness = createTestContext();
  const transport = new FakeTransport(scripts);
  const noWait = { now: () => 0, wait: async () => undefined };
  const session = new ConversationSession({
    turnConfig: TEST_TURN_CONFIG,
    audio,
    transport,
    dispatcher: noDispatch,
    context: harness.context,
    retryPolicy: new RetryPolicy({ clock: noWait, logger: harness.logger }),
  });
  return { session, transport, audio, harness };
}

function configOf(requests: OutboundMessage[]) {
  const [first] = requests;
  if (!first || first.kind !== "config") {
    throw new Error("first request is not a config message");
  }
  return first.config;
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

suite("Unit: ConversationSession", () => {
  test("runs a turn and streams the config followed by captured audio", async () => {
    const audio = new FakeAudioChannel({ chunks: [Buffer.from("c1"), Buffer.from("c2")], holdWhenEmpty: true });
    const { session, transport } = createSession([{ responses: CLOSING_REPLY, awaitRequests: 3 }], audio);

    const outcome = await session.runTurn();
    await transport.settled();

    expect(outcome).to.deep.equal({ continueConversation: false });
    const sent = transport.requests[0];
    expect(sent.map((request) => request.kind)).to.deep.equal(["config", "audio", "audio"]);
    expect(configOf(sent).dialogStateIn).to.deep.equal({ languageCode: "en-US", isNewConversation: true });
    expect(audio.calls).to.deep.equal(["startRecording", "stopRecording", "startPlayback", "write:AB", "stopPlayback"]);
  });

  test("forwards the continuation token to the next turn", async () => {
    const { session, transport } = createSession([
      {
        responses: [
          { eventType: "END_OF_UTTERANCE" },
          { dialogStateOut: { conversationState: Buffer.from("state-1"), microphoneMode: "DIALOG_FOLLOW_ON" } },
        ],
      },
      { responses: CLOSING_REPLY },
    ]);

    const first = await session.runTurn();
    const second = await session.runTurn();
    await transport.settled();

    expect(first.continueConversation).to.equal(true);
    expect(second.continueConversation).to.equal(false);
    const followUp = configOf(transport.requests[1]).dialogStateIn;
    expect(followUp.isNewConversation).to.equal(false);
    expect(followUp.conversationState?.toString()).to.equal("state-1");
  });

  test("retries an unavailable service and repeats the same config", async () => {
    const { session, transport, harness } = createSession([
      { error: new TransportError("unavailable", "connection refused"), awaitRequests: 1 },
      { responses: CLOSING_REPLY },
    ]);

    const outcome = await session.runTurn();
    await transport.settled();

    expect(outcome.continueConversation).to.equal(false);
    expect(transport.callCount).to.equal(2);
    expect(configOf(transport.requests[0]).dialogStateIn.isNewConversation).to.equal(true);
    expect(configOf(transport.requests[1]).dialogStateIn.isNewConversation).to.equal(true);
    expect(harness.context.count("turnAttempts")).to.equal(2);
    expect(harness.context.count("transientFailures")).to.equal(1);
    expect(harness.context.count("turnsCompleted")).to.equal(1);
  });

  test("logs the retry plan of a failed attempt", async () => {
    const { session, harness } = createSession([
      { error: new TransportError("unavailable", "connection refused"), awaitRequests: 1 },
      { responses: CLOSING_REPLY },
    ]);
    const events: LogEvent[] = [];
    const subscription = Logger.onDidLog((event) => {
      if (event.logger === harness.logger.name && event.message === "Turn attempt failed") {
        events.push(event);
      }
    });

    try {
      await session.runTurn();
    } finally {
      subscription.dispose();
    }

    expect(events).to.have.length(1);
    expect(events[0].data).to.deep.include({
      domain: "transport",
      code: "TRANSPORT_UNAVAILABLE",
      message: "connection refused",
      retryPlan: { policy: "immediate", attempt: 1, maxAttempts: 3, delayMs: 0, nextAttemptAt: new Date(0) },
    });
  });

  test("a token received by a failed attempt is not sent on the retry", async () => {
    const { session, transport } = createSession([
      {
        responses: [
          { eventType: "END_OF_UTTERANCE" },
          { dialogStateOut: { conversationState: Buffer.from("state-1"), microphoneMode: "DIALOG_FOLLOW_ON" } },
        ],
      },
      {
        responses: [{ dialogStateOut: { conversationState: Buffer.from("from-failed") } }],
        error: new TransportError("unavailable", "reset by peer"),
        awaitRequests: 1,
      },
      { responses: CLOSING_REPLY },
    ]);

    await session.runTurn();
    await session.runTurn();
    await transport.settled();

    expect(transport.callCount).to.equal(3);
    const retried = configOf(transport.requests[2]).dialogStateIn;
    expect(retried.conversationState?.toString()).to.equal("state-1");
    expect(retried.isNewConversation).to.equal(false);
  });

  test("an empty continuation token does not replace the stored one", async () => {
    const { session, transport } = createSession([
      {
        responses: [
          { eventType: "END_OF_UTTERANCE" },
          { dialogStateOut: { conversationState: Buffer.from("tok"), microphoneMode: "DIALOG_FOLLOW_ON" } },
        ],
      },
      {
        responses: [
          { eventType: "END_OF_UTTERANCE" },
          { dialogStateOut: { conversationState: Buffer.alloc(0), microphoneMode: "DIALOG_FOLLOW_ON" } },
        ],
      },
      { responses: CLOSING_REPLY },
    ]);

    await session.runTurn();
    await session.runTurn();
    await session.runTurn();
    await transport.settled();

    expect(configOf(transport.requests[2]).dialogStateIn.conversationState?.toString()).to.equal("tok");
  });

  test("a retry after playback started resets the channel to recording", async () => {
    const { session, audio } = createSession([
      {
        responses: [{ eventType: "END_OF_UTTERANCE" }, { audioOut: { audioData: Buffer.from("AB") } }],
        error: new TransportError("unavailable", "reset by peer"),
      },
      { responses: CLOSING_REPLY },
    ]);

    await session.runTurn();

    expect(audio.calls).to.deep.equal([
      "startRecording",
      "stopRecording",
      "startPlayback",
      "write:AB",
      "stopPlayback",
      "startRecording",
      "stopRecording",
      "startPlayback",
      "write:AB",
      "stopPlayback",
    ]);
  });

  test("fatal errors are not retried and leave the channel stopped", async () => {
    const { session, transport, audio, harness } = createSession([
      { error: new TransportError("unauthenticated", "token expired") },
    ]);

    const error = await rejectionOf(session.runTurn());

    expect(error).to.be.instanceOf(TransportError);
    expect(error instanceof TransportError && error.status).to.equal("unauthenticated");
    expect(transport.callCount).to.equal(1);
    expect(audio.mode).to.equal("idle");
    expect(harness.context.count("turnsFailed")).to.equal(1);
  });

  test("gives up after the configured number of attempts", async () => {
    const unavailable = (): ScriptedCall => ({ error: new TransportError("unavailable", "down") });
    const { session, transport } = createSession([unavailable(), unavailable(), unavailable()]);

    const error = await rejectionOf(session.runTurn());

    expect(error).to.be.instanceOf(ExhaustedRetriesError);
    expect(error instanceof ExhaustedRetriesError && error.attempts).to.equal(3);
    expect(transport.callCount).to.equal(3);
  });

  test("rejects a second turn while one is running", async () => {
    const audio = new FakeAudioChannel({ chunks: [Buffer.from("c1")] });
    const { session } = createSession([{ responses: CLOSING_REPLY, awaitRequests: 2 }], audio);

    const running = session.runTurn();
    const error = await rejectionOf(session.runTurn());
    await running;

    expect(error).to.be.instanceOf(SessionError);
    expect(error instanceof SessionError && error.code).to.equal("TURN_IN_PROGRESS");
  });

  test("an aborted signal cancels the turn before any call is made", async () => {
    const { session, transport } = createSession([{ responses: CLOSING_REPLY }]);
    const controller = new AbortController();
    controller.abort();

    const error = await rejectionOf(session.runTurn({ signal: controller.signal }));

    expect(error instanceof TransportError && error.status).to.equal("cancelled");
    expect(transport.callCount).to.equal(0);
  });

  test("passes the deadline to the transport", async () => {
    const { session, transport } = createSession([{ responses: CLOSING_REPLY }]);

    await session.runTurn();

    expect(transport.options[0].deadlineMs).to.equal(185_000);
  });

  test("dispose closes the audio channel once and blocks further turns", async () => {
    const { session, audio } = createSession([]);

    const first = session.dispose();
    const second = session.dispose();
    await first;

    expect(second).to.equal(first);
    expect(audio.closeCount).to.equal(1);
    expect(session.isDisposed).to.equal(true);
    const error = await rejectionOf(session.runTurn());
    expect(error instanceof SessionError && error.code).to.equal("SESSION_DISPOSED");
  });
});
