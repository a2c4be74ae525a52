import { describe, expect, it } from "vitest";
import { createDefaultRegistry } from "@tickforge/strategy-runtime";
import { readTraderOptions } from "./traderArgs";

const registry = createDefaultRegistry();

describe("readTraderOptions", () => {
	it("reads the trader flags", () => {
		expect(
			readTraderOptions(
				[
					"--strategy=RSI_Reversal",
					"--symbol",
					"solusdt",
					"--timeframe",
					"5m",
					"--mode",
					"LIVE",
					"--feed",
					"poll",
					"--clockMs",
					"250",
				],
				registry
			)
		).toEqual({
			strategyId: "rsi_reversal",
			strategyProfile: undefined,
			accountProfile: undefined,
			symbol: "solusdt",
			timeframe: "5m",
			mode: "live",
			feed: "poll",
			clockIntervalMs: 250,
			configDir: undefined,
			envPath: undefined,
		});
	});

	it("defaults to the WebSocket feed and the env mode", () => {
		const options = readTraderOptions(["--strategy", "sma_crossover"], registry);
		expect(options.feed).toBe("ws");
		expect(options.mode).toBeUndefined();
	});

	it("requires a known strategy", () => {
		expect(() => readTraderOptions(["--mode", "paper"], registry)).toThrow(
			"Missing required --strategy flag."
		);
		expect(() => readTraderOptions(["--strategy", "nope"], registry)).toThrow(
			'Invalid strategy id: "nope"'
		);
	});

	it("rejects unknown modes and feeds", () => {
		expect(() =>
			readTraderOptions(["--strategy", "sma_crossover", "--mode", "demo"], registry)
		).toThrow('Invalid --mode value: demo. Expected "paper" or "live"');
		expect(() =>
			readTraderOptions(["--strategy", "sma_crossover", "--feed", "fix"], registry)
		).toThrow('Invalid --feed value: fix. Expected "ws" or "poll"');
	});
});
