import type { MarketDataSource, StrategyPhase } from "@tickforge/core";
import type { LedgerSnapshot } from "@tickforge/execution-engine";
import type {
	StrategyDefinition,
	StrategyParams,
	StrategySupervisor,
} from "@tickforge/strategy-runtime";
import type { PerformanceSummary } from "./performance";

export type BacktestState = "LOADED" | "RUNNING" | "PAUSED" | "FINISHED";

export interface BacktestAccount {
	startingBalance: number;
	commissionRate?: number;
	allowShort?: boolean;
	defaultQuantity?: number;
}

export interface BacktestConfig {
	symbol: string;
	timeframe: string;
	startTime: number;
	endTime: number;
	definition: StrategyDefinition;
	params?: unknown;
	account: BacktestAccount;
	/**
	 * Bars replayed per bar interval of wall time. `Infinity` (the default)
	 * runs without waiting.
	 */
	playbackRate?: number;
}

export interface BacktestDependencies {
	source: Pick<MarketDataSource, "fetchHistory">;
	supervisor?: StrategySupervisor;
	sleep?: (ms: number) => Promise<void>;
}

export interface BacktestFault {
	phase: StrategyPhase;
	message: string;
}

export interface BacktestResult {
	strategyId: string;
	symbol: string;
	timeframe: string;
	startTime: number;
	endTime: number;
	params: StrategyParams;
	barsProcessed: number;
	ledger: LedgerSnapshot;
	performance: PerformanceSummary;
	fault?: BacktestFault;
	/** A failure outside the strategy that ended the replay early. */
	error?: string;
}
