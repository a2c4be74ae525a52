import { describe, expect, it } from "vitest";
import type { ClosedTrade } from "@tickforge/core";
import type { LedgerSnapshot } from "@tickforge/execution-engine";
import { summarizePerformance } from "./performance";

const trade = (realizedPnl: number): ClosedTrade => ({
	symbol: "BTC/USDT",
	side: "LONG",
	quantity: 1,
	entryPrice: 100,
	exitPrice: 100 + realizedPnl,
	commission: 0,
	realizedPnl,
	profitPct: realizedPnl,
	openedAt: 0,
	closedAt: 60_000,
});

const snapshot = (trades: ClosedTrade[], equity: number): LedgerSnapshot => ({
	startingBalance: 1000,
	balance: equity,
	realizedPnl: trades.reduce((sum, item) => sum + item.realizedPnl, 0),
	equity,
	maxEquity: 1030,
	maxDrawdown: 25,
	maxDrawdownPct: 2.5,
	positions: [],
	trades: {
		total: trades.length,
		wins: trades.filter((item) => item.realizedPnl > 0).length,
		losses: trades.filter((item) => item.realizedPnl < 0).length,
		breakeven: trades.filter((item) => item.realizedPnl === 0).length,
	},
	closedTrades: trades,
	fills: [],
});

describe("summarizePerformance", () => {
	it("derives return, win rate and profit factor", () => {
		const summary = summarizePerformance(
			snapshot([trade(30), trade(-10), trade(0), trade(20)], 1040)
		);
		expect(summary).toEqual({
			startingBalance: 1000,
			finalBalance: 1040,
			finalEquity: 1040,
			netPnl: 40,
			totalReturnPct: 4,
			totalTrades: 4,
			wins: 2,
			losses: 1,
			breakeven: 1,
			winRatePct: 50,
			averageTradePnl: 10,
			profitFactor: 5,
			bestTradePnl: 30,
			worstTradePnl: -10,
			maxDrawdown: 25,
			maxDrawdownPct: 2.5,
		});
	});

	it("handles a session without trades", () => {
		const summary = summarizePerformance(snapshot([], 1000));
		expect(summary.winRatePct).toBe(0);
		expect(summary.profitFactor).toBeNull();
		expect(summary.bestTradePnl).toBeNull();
		expect(summary.totalReturnPct).toBe(0);
	});

	it("finds the best and worst trade in a very long trade log", () => {
		const trades = Array.from({ length: 200_000 }, (_, index) =>
			trade(index === 123_456 ? 50 : (index % 7) - 3)
		);
		const summary = summarizePerformance(snapshot(trades, 1000));
		expect(summary.totalTrades).toBe(200_000);
		expect(summary.bestTradePnl).toBe(50);
		expect(summary.worstTradePnl).toBe(-3);
	});
});
