import { describe, expect, it } from "vitest";
import type { SealedBar } from "@tickforge/core";
import { IndicatorEngine } from "./engine";
import { indicatorKey } from "./factory";
import { SmaIndicator } from "./sma";

const bar = (index: number, close: number): SealedBar =>
	Object.freeze({
		symbol: "ETH/USDT",
		timeframe: "1m",
		openTime: 1_700_000_000_000 + index * 60_000,
		open: close,
		high: close,
		low: close,
		close,
		volume: 2,
	});

describe("IndicatorEngine", () => {
	it("names keys after the indicator and its parameters", () => {
		const engine = new IndicatorEngine();
		expect(engine.registerSpec({ kind: "sma", period: 20 })).toEqual([
			"sma_20",
		]);
		expect(
			engine.registerSpec({ kind: "macd", fast: 12, slow: 26, signal: 9 })
		).toEqual([
			"macd_12_26_9.macd",
			"macd_12_26_9.signal",
			"macd_12_26_9.histogram",
		]);
		expect(
			indicatorKey({ kind: "bollinger", period: 20, stdDev: 2 }, "upper")
		).toBe("bollinger_20_2.upper");
	});

	it("keeps every series as long as the number of processed bars", () => {
		const engine = new IndicatorEngine();
		engine.registerSpec({ kind: "sma", period: 2 });
		engine.registerSpec({ kind: "rsi", period: 14 });
		const snapshots = [10, 12, 14].map((close, index) =>
			engine.onBar(bar(index, close))
		);

		expect(snapshots[2]).toEqual({ sma_2: 13, rsi_14: undefined });
		expect(engine.series("sma_2")).toEqual([undefined, 11, 13]);
		expect(engine.series("rsi_14")).toHaveLength(3);
		expect(engine.barCount).toBe(3);
	});

	it("back-fills indicators registered after bars were processed", () => {
		const engine = new IndicatorEngine();
		engine.registerSpec({ kind: "sma", period: 1 });
		engine.onBar(bar(0, 5));
		engine.onBar(bar(1, 6));
		engine.registerSpec({ kind: "ema", period: 1 });
		engine.onBar(bar(2, 7));

		expect(engine.series("ema_1")).toEqual([undefined, undefined, 7]);
		expect(engine.series("sma_1")).toEqual([5, 6, 7]);
	});

	it("does not register the same spec twice", () => {
		const engine = new IndicatorEngine();
		engine.registerSpec({ kind: "sma", period: 3 });
		engine.registerSpec({ kind: "sma", period: 3 });
		expect(engine.keys()).toEqual(["sma_3"]);
		expect(() => engine.register(new SmaIndicator(3))).toThrow(
			"Indicator key already registered: sma_3"
		);
	});

	it("rejects bars that do not move forward in time", () => {
		const engine = new IndicatorEngine();
		engine.onBar(bar(1, 5));
		expect(() => engine.onBar(bar(1, 6))).toThrow(/Bar out of order/);
		expect(() => engine.onBar(bar(0, 6))).toThrow(/Bar out of order/);
	});

	it("returns frozen snapshots", () => {
		const engine = new IndicatorEngine();
		engine.registerSpec({ kind: "sma", period: 1 });
		const snapshot = engine.onBar(bar(0, 3));
		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(engine.latest()).toBe(snapshot);
	});

	it("throws on unknown series keys", () => {
		expect(() => new IndicatorEngine().series("sma_99")).toThrow(
			"Unknown indicator key: sma_99"
		);
	});
});
