import {
	HistoryFetchError,
	StateConflictError,
	describeError,
	sleep as defaultSleep,
	timeframeToMs,
	toCanonicalSymbol,
	type Bar,
	type SealedBar,
} from "@tickforge/core";
import { ExecutionEngine, WalletLedger } from "@tickforge/execution-engine";
import { TradingPipeline } from "../loop/TradingPipeline";
import { logLedgerSnapshot, runtimeLogger } from "../runtimeShared";
import type {
	BacktestConfig,
	BacktestDependencies,
	BacktestResult,
	BacktestState,
} from "./backtestTypes";
import { summarizePerformance } from "./performance";

/**
 * Checks the fetched range and returns frozen copies under the session's
 * symbol. Bars must be strictly ascending with no duplicates.
 */
const prepareBars = (
	bars: readonly Bar[],
	symbol: string,
	timeframe: string
): SealedBar[] => {
	const prepared: SealedBar[] = [];
	let previous: number | undefined;
	for (const bar of bars) {
		if (toCanonicalSymbol(bar.symbol) !== symbol) {
			throw new HistoryFetchError(
				`History for ${symbol} contained a bar for ${bar.symbol}`
			);
		}
		if (previous !== undefined && bar.openTime <= previous) {
			throw new HistoryFetchError(
				`History for ${symbol} is not strictly ascending at ${bar.openTime}`
			);
		}
		previous = bar.openTime;
		prepared.push(Object.freeze({ ...bar, symbol, timeframe }));
	}
	return prepared;
};

const stepDelayFor = (config: BacktestConfig): number => {
	const rate = config.playbackRate ?? Number.POSITIVE_INFINITY;
	if (Number.isNaN(rate) || rate <= 0) {
		throw new Error(`playbackRate must be positive, got ${rate}`);
	}
	return Number.isFinite(rate) ? timeframeToMs(config.timeframe) / rate : 0;
};

/**
 * Deterministic replay of a fetched bar range through a trading pipeline.
 * Bars skip the aggregator; everything downstream runs as in live mode.
 */
export class BacktestSession {
	private stateValue: BacktestState = "LOADED";
	private cursorValue = 0;
	private pauseRequested = false;
	private resultValue: BacktestResult | null = null;
	private replayError: Error | null = null;
	private readonly sleep: (ms: number) => Promise<void>;

	private constructor(
		readonly config: BacktestConfig,
		private readonly bars: readonly SealedBar[],
		private readonly pipeline: TradingPipeline,
		private readonly stepDelayMs: number,
		dependencies: BacktestDependencies
	) {
		this.sleep = dependencies.sleep ?? defaultSleep;
	}

	/**
	 * Fetches the whole range once and starts the strategy. Fetch failures
	 * and empty ranges raise HistoryFetchError.
	 */
	static async load(
		config: BacktestConfig,
		dependencies: BacktestDependencies
	): Promise<BacktestSession> {
		if (config.startTime >= config.endTime) {
			throw new HistoryFetchError(
				`Backtest start ${config.startTime} must be before end ${config.endTime}`
			);
		}
		const stepDelayMs = stepDelayFor(config);
		const symbol = toCanonicalSymbol(config.symbol);

		let fetched: Bar[];
		try {
			fetched = await dependencies.source.fetchHistory(
				symbol,
				config.timeframe,
				config.startTime,
				config.endTime
			);
		} catch (error) {
			if (error instanceof HistoryFetchError) {
				throw error;
			}
			throw new HistoryFetchError(
				`Failed to fetch history for ${symbol} ${config.timeframe}: ${
					error instanceof Error ? error.message : String(error)
				}`,
				error
			);
		}
		if (!fetched.length) {
			throw new HistoryFetchError(
				`No history for ${symbol} ${config.timeframe} between ${config.startTime} and ${config.endTime}`
			);
		}
		const bars = prepareBars(fetched, symbol, config.timeframe);

		const ledger = new WalletLedger({
			startingBalance: config.account.startingBalance,
			enforceBalance: true,
		});
		const execution = new ExecutionEngine({
			mode: "paper",
			ledger,
			commissionRate: config.account.commissionRate,
			allowShort: config.account.allowShort,
			defaultQuantity: config.account.defaultQuantity,
		});
		const pipeline = await TradingPipeline.start({
			symbol,
			timeframe: config.timeframe,
			mode: "paper",
			definition: config.definition,
			params: config.params,
			ledger,
			execution,
			supervisor: dependencies.supervisor,
		});

		runtimeLogger.info("backtest_loaded", {
			strategyId: config.definition.id,
			symbol,
			timeframe: config.timeframe,
			bars: bars.length,
			startTime: config.startTime,
			endTime: config.endTime,
		});
		return new BacktestSession(config, bars, pipeline, stepDelayMs, dependencies);
	}

	get state(): BacktestState {
		return this.stateValue;
	}

	get cursor(): number {
		return this.cursorValue;
	}

	get length(): number {
		return this.bars.length;
	}

	/** Open time of the next bar to replay, or null when exhausted. */
	get nextBarTime(): number | null {
		return this.cursorValue < this.bars.length
			? this.bars[this.cursorValue].openTime
			: null;
	}

	/**
	 * Replays from the cursor until the bars run out or `pause` is called.
	 * Resolves with the state the session stopped in.
	 */
	async run(): Promise<BacktestState> {
		if (this.stateValue !== "LOADED" && this.stateValue !== "PAUSED") {
			throw new StateConflictError(`Cannot run a backtest that is ${this.stateValue}`);
		}
		this.stateValue = "RUNNING";
		this.pauseRequested = false;

		let first = true;
		while (this.cursorValue < this.bars.length) {
			if (this.pauseRequested) {
				this.stateValue = "PAUSED";
				runtimeLogger.info("backtest_paused", { cursor: this.cursorValue });
				return this.stateValue;
			}
			if (!first && this.stepDelayMs > 0) {
				await this.sleep(this.stepDelayMs);
				if (this.pauseRequested) {
					continue;
				}
			}
			first = false;
			if (!(await this.step())) {
				break;
			}
		}
		await this.finish();
		return this.stateValue;
	}

	/** Takes effect after the bar being processed. */
	pause(): void {
		if (this.stateValue === "RUNNING") {
			this.pauseRequested = true;
		}
	}

	resume(): Promise<BacktestState> {
		if (this.stateValue !== "PAUSED") {
			throw new StateConflictError(`Cannot resume a backtest that is ${this.stateValue}`);
		}
		return this.run();
	}

	/** Replays the next `count` bars without pacing. Returns how many ran. */
	async skip(count: number): Promise<number> {
		this.assertNavigable("skip");
		if (!Number.isInteger(count) || count < 0) {
			throw new Error(`skip count must be a non-negative integer, got ${count}`);
		}
		let processed = 0;
		while (processed < count && this.cursorValue < this.bars.length) {
			if (!(await this.step())) {
				break;
			}
			processed += 1;
		}
		await this.finishIfExhausted();
		return processed;
	}

	/**
	 * Replays every bar opening before `time`. The cursor never moves back.
	 */
	async seek(time: number): Promise<number> {
		this.assertNavigable("seek");
		if (this.cursorValue > 0) {
			const current = this.bars[this.cursorValue - 1].openTime;
			if (time <= current) {
				throw new StateConflictError(
					`Cannot seek backwards to ${time}; cursor is past ${current}`
				);
			}
		}
		let processed = 0;
		while (
			this.cursorValue < this.bars.length &&
			this.bars[this.cursorValue].openTime < time
		) {
			if (!(await this.step())) {
				break;
			}
			processed += 1;
		}
		await this.finishIfExhausted();
		return processed;
	}

	result(): BacktestResult {
		if (!this.resultValue) {
			throw new StateConflictError(
				`Backtest result is not available while ${this.stateValue}`
			);
		}
		return this.resultValue;
	}

	private assertNavigable(operation: string): void {
		if (this.stateValue !== "PAUSED" && this.stateValue !== "FINISHED") {
			throw new StateConflictError(
				`Cannot ${operation} while the backtest is ${this.stateValue}`
			);
		}
	}

	/** False once the strategy has faulted or the bar failed to process. */
	private async step(): Promise<boolean> {
		const bar = this.bars[this.cursorValue];
		this.cursorValue += 1;
		try {
			return (await this.pipeline.processBar(bar)) !== null;
		} catch (error) {
			this.replayError =
				error instanceof Error ? error : new Error(String(error));
			runtimeLogger.error("backtest_step_failed", {
				openTime: bar.openTime,
				error: describeError(error),
			});
			return false;
		}
	}

	private async finishIfExhausted(): Promise<void> {
		if (
			this.stateValue !== "FINISHED" &&
			(this.cursorValue >= this.bars.length ||
				this.pipeline.fault ||
				this.replayError)
		) {
			await this.finish();
		}
	}

	private async finish(): Promise<void> {
		this.stateValue = "FINISHED";
		try {
			await this.pipeline.stop();
		} finally {
			this.resultValue = this.buildResult();
		}
	}

	private buildResult(): BacktestResult {
		const ledger = this.pipeline.ledger.snapshot();
		const fault = this.pipeline.fault;
		const result: BacktestResult = {
			strategyId: this.config.definition.id,
			symbol: this.pipeline.symbol,
			timeframe: this.config.timeframe,
			startTime: this.config.startTime,
			endTime: this.config.endTime,
			params: this.pipeline.params,
			barsProcessed: this.cursorValue,
			ledger,
			performance: summarizePerformance(ledger),
			fault: fault ? { phase: fault.phase, message: fault.message } : undefined,
			error: this.replayError?.message,
		};

		logLedgerSnapshot("backtest_final", ledger);
		if (fault || this.replayError) {
			runtimeLogger.error("backtest_faulted", {
				cursor: this.cursorValue,
				error: describeError(fault ?? this.replayError),
			});
		} else {
			runtimeLogger.info("backtest_finished", {
				bars: this.cursorValue,
				totalReturnPct: result.performance.totalReturnPct,
			});
		}
		return result;
	}
}
