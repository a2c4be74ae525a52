import { describe, expect, it, vi } from "vitest";
import { StateConflictError, type ExecutionMode } from "@tickforge/core";
import { StrategySupervisor } from "@tickforge/strategy-runtime";
import type { RuntimeConfig } from "./loadRuntimeConfig";
import { startTrader } from "./startTrader";
import {
	FakeFeed,
	InstantFillSink,
	observation,
	scriptedDefinition,
} from "./testSupport";

const runtimeConfig = (mode: ExecutionMode = "paper"): RuntimeConfig => ({
	env: {
		executionMode: mode,
		exchangeId: "binance",
		apiKey: "test-key",
		apiSecret: "test-secret",
		sandbox: true,
		defaultSymbol: "BTC/USDT",
		defaultTimeframe: "1m",
	},
	account: {
		startingBalance: 1000,
		commissionRate: 0.001,
		allowShort: false,
		defaultQuantity: 1,
	},
	mode,
	strategyId: "scripted",
	symbol: "BTC/USDT",
	timeframe: "1m",
	params: {},
	profiles: { account: mode },
});

describe("LiveTrader", () => {
	it("processes the feed in order and stops itself when it ends", async () => {
		const feed = new FakeFeed([
			observation(0, 100),
			observation(60_000, 110),
			observation(120_000, 120),
		]);
		const { trader, ledger } = await startTrader(runtimeConfig(), {
			source: feed,
			definition: scriptedDefinition(["BUY", "SELL"]),
			clockIntervalMs: 0,
		});

		await trader.wait();
		expect(trader.state).toBe("STOPPED");
		expect(trader.eventsProcessed).toBe(3);
		expect(trader.pipeline.strategyState).toBe("STOPPED");
		expect(ledger.getBalance()).toBeCloseTo(1000 - 100 * 1.001 + 110 * 0.999, 10);
	});

	it("seals a quiet bar on a clock event and stops on request", async () => {
		const feed = new FakeFeed([observation(0, 100)], true);
		const { trader } = await startTrader(runtimeConfig(), {
			source: feed,
			definition: scriptedDefinition([]),
			clockIntervalMs: 0,
		});

		await vi.waitFor(() => expect(trader.eventsProcessed).toBe(1));
		expect(trader.tick(60_000)).toBe(true);
		await vi.waitFor(() => expect(trader.eventsProcessed).toBe(2));
		expect(trader.pipeline.aggregator.history().map((bar) => bar.close)).toEqual([100]);

		await trader.stop();
		expect(trader.state).toBe("STOPPED");
		expect(trader.pipeline.strategyState).toBe("STOPPED");
		await expect(trader.wait()).resolves.toBeUndefined();
	});

	it("routes live orders and books them on reconcile", async () => {
		const sink = new InstantFillSink(100.5);
		const feed = new FakeFeed([observation(0, 100), observation(60_000, 101)], true);
		const { trader, ledger, router } = await startTrader(runtimeConfig("live"), {
			source: feed,
			sink,
			definition: scriptedDefinition(["BUY"]),
			clockIntervalMs: 0,
		});

		await vi.waitFor(() => expect(sink.placed).toHaveLength(1));
		expect(ledger.position("BTC/USDT")).toBeNull();

		trader.tick(90_000);
		await vi.waitFor(() => expect(ledger.position("BTC/USDT")?.entryPrice).toBe(100.5));
		expect(router?.pending()).toEqual([]);

		await trader.stop();
		expect(sink.placed).toEqual([{ symbol: "BTC/USDT", side: "BUY", quantity: 1 }]);
	});

	it("requires an order sink in live mode", async () => {
		await expect(
			startTrader(runtimeConfig("live"), {
				source: new FakeFeed([]),
				definition: scriptedDefinition([]),
			})
		).rejects.toThrow("Live mode requires an order sink");
	});

	it("refuses a second trader for the same mode and symbol", async () => {
		const supervisor = new StrategySupervisor();
		const first = await startTrader(runtimeConfig(), {
			source: new FakeFeed([], true),
			definition: scriptedDefinition([]),
			supervisor,
			clockIntervalMs: 0,
		});

		await expect(
			startTrader(runtimeConfig(), {
				source: new FakeFeed([], true),
				definition: scriptedDefinition([]),
				supervisor,
				clockIntervalMs: 0,
			})
		).rejects.toBeInstanceOf(StateConflictError);
		expect(first.trader.state).toBe("RUNNING");

		await first.trader.stop();
		expect(supervisor.get("paper", "BTC/USDT")).toBeUndefined();
	});
});
