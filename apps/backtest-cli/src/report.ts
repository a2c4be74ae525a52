import type { BacktestResult } from "@tickforge/runtime";

const formatUsd = (value: number): string =>
	value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`;

const formatPct = (value: number): string => `${value.toFixed(2)}%`;

export const formatBacktestSummary = (result: BacktestResult): string[] => {
	const { performance } = result;
	const lines = [
		"---- Summary ----",
		`Strategy: ${result.strategyId} (${result.symbol} ${result.timeframe})`,
		`Range: ${new Date(result.startTime).toISOString()} -> ${new Date(result.endTime).toISOString()}`,
		`Bars processed: ${result.barsProcessed}`,
		`Trades: ${performance.totalTrades} (${performance.wins} won, ${performance.losses} lost)`,
		`Win rate: ${formatPct(performance.winRatePct)}`,
		`Starting balance: ${formatUsd(performance.startingBalance)}`,
		`Final equity: ${formatUsd(performance.finalEquity)}`,
		`Net PnL: ${formatUsd(performance.netPnl)} (${formatPct(performance.totalReturnPct)})`,
		`Max drawdown: ${formatUsd(performance.maxDrawdown)} (${formatPct(performance.maxDrawdownPct)})`,
	];
	if (result.ledger.positions.length) {
		lines.push(
			`Open positions: ${result.ledger.positions
				.map((position) => `${position.side} ${position.quantity} ${position.symbol} @ ${position.entryPrice}`)
				.join(", ")}`
		);
	}
	if (result.fault) {
		lines.push(`Strategy fault (${result.fault.phase}): ${result.fault.message}`);
	}
	if (result.error) {
		lines.push(`Replay stopped early: ${result.error}`);
	}
	return lines;
};
