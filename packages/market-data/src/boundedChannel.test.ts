import { describe, expect, it } from "vitest";
import { BoundedChannel, ChannelClosedError } from "./boundedChannel";

describe("BoundedChannel", () => {
	it("delivers items in send order", async () => {
		const channel = new BoundedChannel<number>(3);
		await channel.send(1);
		await channel.send(2);
		await channel.send(3);
		expect(await channel.receive()).toEqual({ done: false, value: 1 });
		expect(await channel.receive()).toEqual({ done: false, value: 2 });
		expect(await channel.receive()).toEqual({ done: false, value: 3 });
	});

	it("makes senders wait while the buffer is full", async () => {
		const channel = new BoundedChannel<string>(1);
		await channel.send("a");
		expect(channel.trySend("x")).toBe(false);

		let delivered = false;
		const pending = channel.send("b").then(() => {
			delivered = true;
		});
		await Promise.resolve();
		expect(delivered).toBe(false);

		expect(await channel.receive()).toEqual({ done: false, value: "a" });
		await pending;
		expect(delivered).toBe(true);
		expect(await channel.receive()).toEqual({ done: false, value: "b" });
	});

	it("hands items straight to a waiting receiver", async () => {
		const channel = new BoundedChannel<number>(1);
		const waiting = channel.receive();
		expect(channel.trySend(7)).toBe(true);
		expect(await waiting).toEqual({ done: false, value: 7 });
		expect(channel.size).toBe(0);
	});

	it("drains buffered items after close and rejects waiting senders", async () => {
		const channel = new BoundedChannel<number>(1);
		await channel.send(1);
		const blocked = channel.send(2);
		channel.close();

		await expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
		await expect(channel.send(3)).rejects.toBeInstanceOf(ChannelClosedError);
		expect(channel.trySend(4)).toBe(false);

		const received: number[] = [];
		for await (const value of channel) {
			received.push(value);
		}
		expect(received).toEqual([1]);
	});

	it("wakes pending receivers on close", async () => {
		const channel = new BoundedChannel<number>(2);
		const waiting = channel.receive();
		channel.close();
		expect(await waiting).toEqual({ done: true, value: undefined });
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new BoundedChannel(0)).toThrow(
			"Channel capacity must be a positive integer, got 0"
		);
	});
});
