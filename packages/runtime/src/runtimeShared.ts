import { createLogger, type SealedBar, type Signal } from "@tickforge/core";
import type { ExecutionResult, LedgerSnapshot } from "@tickforge/execution-engine";

export const runtimeLogger = createLogger("runtime");

export const logStrategyDecision = (bar: SealedBar, signal: Signal): void => {
	if (signal.action === "HOLD") {
		runtimeLogger.debug("signal_emitted", {
			symbol: bar.symbol,
			openTime: bar.openTime,
			action: signal.action,
			reason: signal.reason,
		});
		return;
	}
	runtimeLogger.info("signal_emitted", {
		symbol: bar.symbol,
		openTime: bar.openTime,
		close: bar.close,
		action: signal.action,
		quantity: signal.quantity,
		reason: signal.reason,
	});
};

export const logExecutionResult = (result: ExecutionResult): void => {
	if (result.status === "skipped") {
		return;
	}
	runtimeLogger.info("execution_result", {
		symbol: result.symbol,
		status: result.status,
		side: result.side,
		quantity: result.quantity,
		price: result.price,
		reason: result.reason,
		orderId: result.orderId,
		realizedPnl: result.trade?.realizedPnl,
	});
};

export const logLedgerSnapshot = (
	label: string,
	snapshot: LedgerSnapshot
): void => {
	runtimeLogger.info("ledger_snapshot", {
		label,
		balance: snapshot.balance,
		equity: snapshot.equity,
		realizedPnl: snapshot.realizedPnl,
		openPositions: snapshot.positions.length,
		trades: snapshot.trades.total,
		fills: snapshot.fills.length,
		maxDrawdown: snapshot.maxDrawdown,
	});
};
