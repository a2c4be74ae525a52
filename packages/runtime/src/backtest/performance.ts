import type { LedgerSnapshot } from "@tickforge/execution-engine";

export interface PerformanceSummary {
	startingBalance: number;
	finalBalance: number;
	finalEquity: number;
	netPnl: number;
	totalReturnPct: number;
	totalTrades: number;
	wins: number;
	losses: number;
	breakeven: number;
	winRatePct: number;
	averageTradePnl: number;
	/** Gross profit over gross loss; null when there were no losing trades. */
	profitFactor: number | null;
	bestTradePnl: number | null;
	worstTradePnl: number | null;
	maxDrawdown: number;
	maxDrawdownPct: number;
}

export const summarizePerformance = (
	snapshot: LedgerSnapshot
): PerformanceSummary => {
	let grossProfit = 0;
	let grossLoss = 0;
	let best: number | null = null;
	let worst: number | null = null;
	for (const { realizedPnl } of snapshot.closedTrades) {
		if (realizedPnl > 0) {
			grossProfit += realizedPnl;
		} else if (realizedPnl < 0) {
			grossLoss -= realizedPnl;
		}
		best = best === null || realizedPnl > best ? realizedPnl : best;
		worst = worst === null || realizedPnl < worst ? realizedPnl : worst;
	}
	const netPnl = snapshot.equity - snapshot.startingBalance;
	const { total, wins, losses, breakeven } = snapshot.trades;

	return {
		startingBalance: snapshot.startingBalance,
		finalBalance: snapshot.balance,
		finalEquity: snapshot.equity,
		netPnl,
		totalReturnPct:
			snapshot.startingBalance > 0 ? (netPnl / snapshot.startingBalance) * 100 : 0,
		totalTrades: total,
		wins,
		losses,
		breakeven,
		winRatePct: total > 0 ? (wins / total) * 100 : 0,
		averageTradePnl: total > 0 ? snapshot.realizedPnl / total : 0,
		profitFactor: grossLoss > 0 ? grossProfit / grossLoss : null,
		bestTradePnl: best,
		worstTradePnl: worst,
		maxDrawdown: snapshot.maxDrawdown,
		maxDrawdownPct: snapshot.maxDrawdownPct,
	};
};
