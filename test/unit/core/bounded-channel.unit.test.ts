import { BoundedChannel, ChannelClosedError } from "../../../src/core/bounded-channel";
import { expect } from "../../helpers/chai-setup";
import { tick } from "../../helpers/fakes";
import { suite, test } from "../../mocha-globals";

suite("Unit: BoundedChannel", () => {
  test("rejects a capacity below one", () => {
    expect(() => new BoundedChannel<number>(0)).to.throw(RangeError);
    expect(() => new BoundedChannel<number>(1.5)).to.throw(RangeError);
  });

  test("delivers items in order and ends after a normal close", async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    await channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item);
    }

    expect(received).to.deep.equal([1, 2]);
  });

  test("send suspends while the buffer is full", async () => {
    const channel = new BoundedChannel<string>(1);
    await channel.send("a");
    let accepted = false;
    const pending = channel.send("b").then(() => {
      accepted = true;
    });

    await tick();
    expect(accepted).to.equal(false);
    expect(channel.size).to.equal(1);

    const first = await channel.receive();
    await pending;

    expect(first).to.deep.equal({ value: "a", done: false });
    expect(accepted).to.equal(true);
    expect(await channel.receive()).to.deep.equal({ value: "b", done: false });
  });

  test("trySend refuses when full or closed", () => {
    const channel = new BoundedChannel<number>(1);

    expect(channel.trySend(1)).to.equal(true);
    expect(channel.trySend(2)).to.equal(false);
    channel.close();
    expect(channel.trySend(3)).to.equal(false);
  });

  test("a waiting receiver gets the next item directly", async () => {
    const channel = new BoundedChannel<number>(1);
    const next = channel.receive();

    await channel.send(7);

    expect(await next).to.deep.equal({ value: 7, done: false });
    expect(channel.size).to.equal(0);
  });

  test("closing rejects suspended and later senders", async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const suspended = channel.send(2);

    channel.close();

    let suspendedError: unknown;
    try {
      await suspended;
    } catch (error: unknown) {
      suspendedError = error;
    }
    expect(suspendedError).to.be.instanceOf(ChannelClosedError);
    let lateError: unknown;
    try {
      await channel.send(3);
    } catch (error: unknown) {
      lateError = error;
    }
    expect(lateError).to.be.instanceOf(ChannelClosedError);
  });

  test("closing with an error drops buffered items and fails receivers", async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.send(1);
    const failure = new Error("producer failed");

    channel.close(failure);

    let caught: unknown;
    try {
      await channel.receive();
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).to.equal(failure);
    expect(channel.size).to.equal(0);
  });

  test("close is idempotent", async () => {
    const channel = new BoundedChannel<number>(1);
    channel.close();
    channel.close(new Error("late"));

    expect(channel.isClosed).to.equal(true);
    expect(await channel.receive()).to.deep.equal({ value: undefined, done: true });
  });
});
