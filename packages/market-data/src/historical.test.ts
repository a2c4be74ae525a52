import { describe, expect, it } from "vitest";
import type { Bar } from "@tickforge/core";
import { fetchHistoricalBars, type OhlcvPageClient } from "./historical";

const bars: Bar[] = Array.from({ length: 10 }, (_, index) => ({
	symbol: "BTC/USDT",
	timeframe: "1m",
	openTime: index * 60_000,
	open: 100 + index,
	high: 101 + index,
	low: 99 + index,
	close: 100 + index,
	volume: 1,
}));

const pagedClient = (): OhlcvPageClient & { calls: number[] } => {
	const calls: number[] = [];
	return {
		calls,
		async fetchOHLCV(_symbol, _timeframe, limit, since) {
			calls.push(since);
			return bars.filter((bar) => bar.openTime >= since).slice(0, limit);
		},
	};
};

describe("fetchHistoricalBars", () => {
	it("pages until the end of the range and excludes the end bar", async () => {
		const client = pagedClient();
		const result = await fetchHistoricalBars({
			client,
			symbol: "BTC/USDT",
			timeframe: "1m",
			startTime: 60_000,
			endTime: 540_000,
			batchSize: 4,
		});

		expect(result.map((bar) => bar.openTime)).toEqual([
			60_000, 120_000, 180_000, 240_000, 300_000, 360_000, 420_000, 480_000,
		]);
		expect(client.calls).toEqual([60_000, 300_000]);
	});

	it("stops on an empty page", async () => {
		const client = pagedClient();
		const result = await fetchHistoricalBars({
			client,
			symbol: "BTC/USDT",
			timeframe: "1m",
			startTime: 480_000,
			endTime: 10_000_000,
			batchSize: 5,
		});
		expect(result.map((bar) => bar.openTime)).toEqual([480_000, 540_000]);
		expect(client.calls).toEqual([480_000, 600_000]);
	});

	it("drops duplicates when pages overlap", async () => {
		const overlapping: OhlcvPageClient = {
			async fetchOHLCV(_symbol, _timeframe, _limit, since) {
				return since === 0 ? [bars[0], bars[1]] : [bars[1], bars[2]];
			},
		};
		const result = await fetchHistoricalBars({
			client: overlapping,
			symbol: "BTC/USDT",
			timeframe: "1m",
			startTime: 0,
			endTime: 180_000,
			maxIterations: 2,
		});
		expect(result.map((bar) => bar.openTime)).toEqual([0, 60_000, 120_000]);
	});
});
