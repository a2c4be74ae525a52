import { describe, expect, it, vi } from "vitest";
import { HistoryFetchError, StateConflictError } from "@tickforge/core";
import { StrategySupervisor, smaCrossoverDefinition } from "@tickforge/strategy-runtime";
import { FakeHistorySource, makeBars, scriptedDefinition } from "../testSupport";
import { BacktestSession } from "./BacktestSession";
import { runBacktest } from "./backtestRunner";
import type { BacktestConfig } from "./backtestTypes";

const baseConfig = (overrides: Partial<BacktestConfig> = {}): BacktestConfig => ({
	symbol: "BTC/USDT",
	timeframe: "1m",
	startTime: 0,
	endTime: 600_000,
	definition: scriptedDefinition(["BUY", "HOLD", "SELL", "HOLD"]),
	account: { startingBalance: 1000, commissionRate: 0.001 },
	...overrides,
});

const noSleep = () => Promise.resolve();

describe("BacktestSession", () => {
	it("replays the range and reports the final ledger", async () => {
		const source = new FakeHistorySource(makeBars([105, 103, 110, 98]));
		const session = await BacktestSession.load(baseConfig(), { source });
		expect(session.state).toBe("LOADED");
		expect(source.requests).toEqual([
			{ symbol: "BTC/USDT", timeframe: "1m", start: 0, end: 600_000 },
		]);

		await expect(session.run()).resolves.toBe("FINISHED");
		const result = session.result();
		expect(result.barsProcessed).toBe(4);
		expect(result.ledger.balance).toBeCloseTo(1000 - 105 * 1.001 + 110 * 0.999, 10);
		expect(result.performance.totalTrades).toBe(1);
		expect(result.performance.winRatePct).toBe(100);
		expect(result.performance.totalReturnPct).toBeCloseTo(0.4785, 10);
		expect(result.fault).toBeUndefined();
	});

	it("produces byte-identical results for identical inputs", async () => {
		const closes = Array.from({ length: 80 }, (_, i) => 100 + 10 * Math.sin(i / 3));
		const config = baseConfig({
			definition: smaCrossoverDefinition,
			params: { fast: 2, slow: 4 },
		});
		const first = await runBacktest(config, {
			source: new FakeHistorySource(makeBars(closes)),
		});
		const second = await runBacktest(config, {
			source: new FakeHistorySource(makeBars(closes)),
		});
		expect(first.performance.totalTrades).toBeGreaterThan(0);
		expect(JSON.stringify(second)).toBe(JSON.stringify(first));
	});

	it("throttles between bars according to the playback rate", async () => {
		const sleep = vi.fn(noSleep);
		const session = await BacktestSession.load(baseConfig({ playbackRate: 2 }), {
			source: new FakeHistorySource(makeBars([1, 2, 3])),
			sleep,
		});
		await session.run();
		expect(sleep.mock.calls).toEqual([[30_000], [30_000]]);
	});

	it("pauses, navigates forward and resumes", async () => {
		const closes = [10, 11, 12, 13, 14, 15, 16, 17];
		let session: BacktestSession | undefined;
		const sleep = vi.fn(async () => {
			session?.pause();
		});
		session = await BacktestSession.load(
			baseConfig({ playbackRate: 1_000, definition: scriptedDefinition([]) }),
			{ source: new FakeHistorySource(makeBars(closes)), sleep }
		);

		await expect(session.run()).resolves.toBe("PAUSED");
		expect(session.cursor).toBe(1);

		await expect(session.skip(2)).resolves.toBe(2);
		expect(session.cursor).toBe(3);
		await expect(session.seek(60_000)).rejects.toBeInstanceOf(StateConflictError);
		await expect(session.seek(5 * 60_000)).resolves.toBe(2);
		expect(session.nextBarTime).toBe(5 * 60_000);

		sleep.mockImplementation(noSleep);
		await expect(session.resume()).resolves.toBe("FINISHED");
		expect(session.result().barsProcessed).toBe(closes.length);
	});

	it("only navigates while paused or finished", async () => {
		const session = await BacktestSession.load(baseConfig(), {
			source: new FakeHistorySource(makeBars([1, 2])),
		});
		await expect(session.skip(1)).rejects.toThrow(
			"Cannot skip while the backtest is LOADED"
		);
		expect(() => session.result()).toThrow(StateConflictError);
		expect(() => session.resume()).toThrow(StateConflictError);
	});

	it("finishes when skipping past the last bar", async () => {
		const session = await BacktestSession.load(baseConfig({ playbackRate: 1_000 }), {
			source: new FakeHistorySource(makeBars([105, 103, 110, 98])),
			sleep: async () => session.pause(),
		});
		await session.run();
		await expect(session.skip(10)).resolves.toBe(3);
		expect(session.state).toBe("FINISHED");
		expect(session.result().ledger.balance).toBeCloseTo(1004.785, 10);
	});

	it("ends the session when the strategy faults", async () => {
		const session = await BacktestSession.load(
			baseConfig({ definition: scriptedDefinition(["BUY", "HOLD", "THROW"]) }),
			{ source: new FakeHistorySource(makeBars([100, 101, 102, 103, 104])) }
		);
		await expect(session.run()).resolves.toBe("FINISHED");
		const result = session.result();
		expect(result.barsProcessed).toBe(3);
		expect(result.fault).toEqual({
			phase: "onBar",
			message: "Strategy scripted faulted in onBar: scripted failure at 120000",
		});
		expect(result.ledger.positions).toHaveLength(1);
	});

	it("finishes and frees the strategy slot when a bar cannot be processed", async () => {
		const supervisor = new StrategySupervisor();
		const session = await BacktestSession.load(
			baseConfig({ definition: scriptedDefinition(["HOLD", "BUY"]) }),
			{ source: new FakeHistorySource(makeBars([100, 0, 101])), supervisor }
		);
		expect(supervisor.get("paper", "BTC/USDT")?.state).toBe("RUNNING");

		await expect(session.run()).resolves.toBe("FINISHED");
		const result = session.result();
		expect(result.barsProcessed).toBe(2);
		expect(result.error).toBe("Invalid fill price 0 for BTC/USDT");
		expect(result.fault).toBeUndefined();
		expect(result.ledger.balance).toBe(1000);
		expect(supervisor.get("paper", "BTC/USDT")).toBeUndefined();
	});

	it("raises HistoryFetchError when history cannot be loaded", async () => {
		await expect(
			BacktestSession.load(baseConfig(), {
				source: new FakeHistorySource(new Error("rate limited")),
			})
		).rejects.toThrow("Failed to fetch history for BTC/USDT 1m: rate limited");

		await expect(
			BacktestSession.load(baseConfig(), { source: new FakeHistorySource([]) })
		).rejects.toBeInstanceOf(HistoryFetchError);

		const unordered = makeBars([1, 2]).reverse();
		await expect(
			BacktestSession.load(baseConfig(), { source: new FakeHistorySource(unordered) })
		).rejects.toThrow("History for BTC/USDT is not strictly ascending at 0");

		await expect(
			BacktestSession.load(baseConfig({ startTime: 10, endTime: 10 }), {
				source: new FakeHistorySource(makeBars([1])),
			})
		).rejects.toBeInstanceOf(HistoryFetchError);
	});

	it("rejects a non-positive playback rate before fetching", async () => {
		const source = new FakeHistorySource(makeBars([1]));
		await expect(
			BacktestSession.load(baseConfig({ playbackRate: 0 }), { source })
		).rejects.toThrow("playbackRate must be positive, got 0");
		expect(source.requests).toEqual([]);
	});
});
