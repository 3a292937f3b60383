import { ConversationState } from "../../../src/conversation/conversation-state";
import { ResponseStateMachine } from "../../../src/conversation/response-state-machine";
import type { ScreenOutDisplay } from "../../../src/display/screen-out-display";
import type { InboundMessage } from "../../../src/types/assist-messages";
import type { TurnTransitionEvent } from "../../../src/types/conversation";
import type { DeviceActionDispatch, PendingAction, PendingActionResult } from "../../../src/types/device-action";
import { expect } from "../../helpers/chai-setup";
import { FakeAudioChannel, createTestContext } from "../../helpers/fakes";
import { suite, test } from "../../mocha-globals";

async function* stream(messages: InboundMessage[]): AsyncGenerator<InboundMessage, void, undefined> {
  for (const message of messages) {
    yield message;
  }
}

class RecordingDispatch implements DeviceActionDispatch {
  readonly requests: string[] = [];

  constructor(private readonly results: PendingActionResult[] = []) {}

  handle(): PendingAction[] {
    return [];
  }

  handleRequest(json: string): PendingAction[] {
    this.requests.push(json);
    return this.results.map((result) => ({
      id: result.actionId,
      command: result.command,
      wait: async () => result,
    }));
  }
}

async function setup(displayEnabled = false, display?: ScreenOutDisplay) {
  const harness = createTestContext();
  const machine = new ResponseStateMachine(harness.context, { display });
  const transitions: Array<Pick<TurnTransitionEvent, "from" | "to" | "cause">> = [];
  machine.onTransition((event) => transitions.push({ from: event.from, to: event.to, cause: event.cause }));
  const audio = new FakeAudioChannel();
  await audio.startRecording();
  const state = new ConversationState();
  const dispatch = new RecordingDispatch();
  return {
    harness,
    machine,
    transitions,
    audio,
    state,
    dispatch,
    run: (messages: InboundMessage[], target: DeviceActionDispatch = dispatch) =>
      machine.processTurn(stream(messages), audio, state, target, displayEnabled),
  };
}

suite("Unit: ResponseStateMachine", () => {
  test("stops recording, plays the reply and closes the microphone", async () => {
    const { audio, run, transitions } = await setup();

    const outcome = await run([
      { eventType: "END_OF_UTTERANCE" },
      { audioOut: { audioData: Buffer.from("AB") } },
      { dialogStateOut: { microphoneMode: "CLOSE_MICROPHONE" } },
    ]);

    expect(outcome).to.deep.equal({ continueConversation: false });
    expect(audio.calls).to.deep.equal(["startRecording", "stopRecording", "startPlayback", "write:AB", "stopPlayback"]);
    expect(transitions).to.deep.equal([
      { from: "recording", to: "recording-stopped", cause: "end-of-utterance" },
      { from: "recording-stopped", to: "playing", cause: "audio-out" },
      { from: "playing", to: "playback-stopped", cause: "stream-complete" },
    ]);
  });

  test("audio arriving before the end of utterance stops recording first", async () => {
    const { audio, run, transitions } = await setup();

    await run([{ audioOut: { audioData: Buffer.from("x1") } }, { audioOut: { audioData: Buffer.from("x2") } }]);

    expect(audio.calls).to.deep.equal([
      "startRecording",
      "stopRecording",
      "startPlayback",
      "write:x1",
      "write:x2",
      "stopPlayback",
    ]);
    expect(transitions.map((event) => event.cause)).to.deep.equal(["audio-out", "audio-out", "stream-complete"]);
  });

  test("a follow-on microphone mode continues the conversation", async () => {
    const { run } = await setup();

    const outcome = await run([{ dialogStateOut: { microphoneMode: "DIALOG_FOLLOW_ON" } }]);

    expect(outcome.continueConversation).to.equal(true);
  });

  test("the last microphone mode wins", async () => {
    const { run } = await setup();

    const outcome = await run([
      { dialogStateOut: { microphoneMode: "DIALOG_FOLLOW_ON" } },
      { dialogStateOut: { microphoneMode: "CLOSE_MICROPHONE" } },
    ]);

    expect(outcome.continueConversation).to.equal(false);
  });

  test("stores the continuation token and applies non-zero volume changes", async () => {
    const { audio, run, state } = await setup();

    await run([
      { dialogStateOut: { conversationState: Buffer.from("next"), volumePercentage: 75 } },
      { dialogStateOut: { volumePercentage: 0 } },
    ]);

    expect(state.continuationToken?.toString()).to.equal("next");
    expect(audio.volumePercentage).to.equal(75);
  });

  test("an empty continuation token keeps the stored one", async () => {
    const { run, state } = await setup();
    state.updateContinuationToken(Buffer.from("tok"));

    await run([{ dialogStateOut: { conversationState: Buffer.alloc(0) } }]);

    expect(state.continuationToken?.toString()).to.equal("tok");
  });

  test("every concern of a single message is applied", async () => {
    const { audio, run, state, dispatch } = await setup();

    const outcome = await run([
      {
        eventType: "END_OF_UTTERANCE",
        audioOut: { audioData: Buffer.from("AB") },
        dialogStateOut: { conversationState: Buffer.from("t"), microphoneMode: "DIALOG_FOLLOW_ON" },
        deviceAction: { deviceRequestJson: "{}" },
      },
    ]);

    expect(outcome.continueConversation).to.equal(true);
    expect(state.continuationToken?.toString()).to.equal("t");
    expect(dispatch.requests).to.deep.equal(["{}"]);
    expect(audio.calls).to.deep.equal(["startRecording", "stopRecording", "startPlayback", "write:AB", "stopPlayback"]);
  });

  test("an empty stream still ends the turn", async () => {
    const { audio, run, transitions } = await setup();

    const outcome = await run([]);

    expect(outcome.continueConversation).to.equal(false);
    expect(audio.calls).to.deep.equal(["startRecording"]);
    expect(transitions).to.deep.equal([{ from: "recording", to: "playback-stopped", cause: "stream-complete" }]);
  });

  test("emits the joined transcript", async () => {
    const { machine, run } = await setup();
    const transcripts: string[] = [];
    machine.onTranscript((event) => transcripts.push(event.transcript));

    await run([{ speechResults: [{ transcript: "turn on", stability: 0.9 }, { transcript: "the light" }] }]);

    expect(transcripts).to.deep.equal(["turn on the light"]);
  });

  test("disposed listeners are not called", async () => {
    const { machine, run } = await setup();
    const transcripts: string[] = [];
    const subscription = machine.onTranscript((event) => transcripts.push(event.transcript));
    subscription.dispose();

    await run([{ speechResults: [{ transcript: "hello" }] }]);

    expect(transcripts).to.deep.equal([]);
  });

  test("waits for device actions and logs failed ones without failing the turn", async () => {
    const { run, harness } = await setup();
    const dispatch = new RecordingDispatch([
      { actionId: "a-1", command: "action.devices.commands.OnOff", status: "completed", durationMs: 1 },
      {
        actionId: "a-2",
        command: "action.devices.commands.OnOff",
        status: "failed",
        durationMs: 1,
        error: new Error("relay stuck"),
      },
    ]);

    const outcome = await run([{ deviceAction: { deviceRequestJson: "{\"x\":1}" } }], dispatch);

    expect(outcome.continueConversation).to.equal(false);
    expect(harness.entries()).to.deep.include({ level: "warn", message: "Device actions failed during turn" });
  });

  test("forwards screen output only when display is enabled", async () => {
    const shown: string[] = [];
    const display: ScreenOutDisplay = {
      show: (data, format) => shown.push(`${format ?? "none"}:${data.toString()}`),
    };
    const message: InboundMessage = { screenOut: { format: "HTML", data: Buffer.from("<p>hi</p>") } };

    const disabled = await setup(false, display);
    await disabled.run([message]);
    const enabled = await setup(true, display);
    await enabled.run([message]);

    expect(shown).to.deep.equal(["HTML:<p>hi</p>"]);
  });
});
