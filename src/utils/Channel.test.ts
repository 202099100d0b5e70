import { describe, expect, it } from "vitest";
import { Channel } from "./Channel";

describe("Channel", () => {
  it("should deliver buffered messages in send order", async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    channel.send(3);

    expect(channel.size).toBe(3);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
    expect(await channel.receive()).toBe(3);
    expect(channel.size).toBe(0);
  });

  it("should drain a large burst in order", async () => {
    const channel = new Channel<number>();
    for (let i = 0; i < 20_000; i++) {
      channel.send(i);
    }

    let next = 0;
    while (channel.size > 0) {
      expect(await channel.receive()).toBe(next++);
    }
    expect(next).toBe(20_000);
  });

  it("should hand a message straight to a waiting receiver", async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    channel.send("hello");

    await expect(pending).resolves.toBe("hello");
    expect(channel.size).toBe(0);
  });

  it("should serve waiting receivers first-come first-served", async () => {
    const channel = new Channel<string>();
    const first = channel.receive();
    const second = channel.receive();

    channel.send("a");
    channel.send("b");

    await expect(first).resolves.toBe("a");
    await expect(second).resolves.toBe("b");
  });

  it("should reject sends after close", () => {
    const channel = new Channel<number>();
    channel.close();
    expect(() => channel.send(1)).toThrow("Cannot send on a closed channel");
  });

  it("should drain buffered messages after close and then reject", async () => {
    const channel = new Channel<number>();
    channel.send(7);
    channel.close();

    await expect(channel.receive()).resolves.toBe(7);
    await expect(channel.receive()).rejects.toThrow("Channel is closed");
  });

  it("should reject receivers waiting when the channel closes", async () => {
    const channel = new Channel<number>();
    const pending = channel.receive();
    channel.close();

    await expect(pending).rejects.toThrow("Channel is closed");
  });
});
