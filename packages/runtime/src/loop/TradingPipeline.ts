import {
	StrategyFaultError,
	describeError,
	toCanonicalSymbol,
	type ExecutionMode,
	type Observation,
	type SealedBar,
	type Signal,
} from "@tickforge/core";
import type { ExecutionEngine, ExecutionResult, WalletLedger } from "@tickforge/execution-engine";
import { IndicatorEngine, type IndicatorSnapshot } from "@tickforge/indicators";
import { OhlcAggregator } from "@tickforge/market-data";
import {
	StrategyRuntime,
	validateParameters,
	type StrategyContext,
	type StrategyDefinition,
	type StrategyParams,
	type StrategyState,
	type StrategySupervisor,
} from "@tickforge/strategy-runtime";
import {
	logExecutionResult,
	logStrategyDecision,
	runtimeLogger,
} from "../runtimeShared";

export interface PipelineStep {
	bar: SealedBar;
	indicators: IndicatorSnapshot;
	signal: Signal;
	execution: ExecutionResult;
}

export interface TradingPipelineOptions {
	symbol: string;
	timeframe: string;
	mode: ExecutionMode;
	definition: StrategyDefinition;
	params?: unknown;
	ledger: WalletLedger;
	execution: ExecutionEngine;
	/** When given, the strategy occupies the supervisor's (mode, symbol) slot. */
	supervisor?: StrategySupervisor;
	onStep?: (step: PipelineStep) => void;
}

/**
 * Aggregator -> indicators -> strategy -> execution for one symbol. Callers
 * must not overlap calls; the live trader and backtest session each feed a
 * pipeline from a single consumer.
 */
export class TradingPipeline {
	private faultValue: StrategyFaultError | null = null;

	private constructor(
		readonly symbol: string,
		readonly timeframe: string,
		readonly mode: ExecutionMode,
		readonly params: StrategyParams,
		readonly ledger: WalletLedger,
		readonly aggregator: OhlcAggregator,
		readonly indicators: IndicatorEngine,
		private readonly runtime: StrategyRuntime,
		private readonly execution: ExecutionEngine,
		private readonly supervisor: StrategySupervisor | undefined,
		private readonly onStep: ((step: PipelineStep) => void) | undefined
	) {}

	/**
	 * Validates params, registers the strategy's indicators and starts it.
	 * Throws InvalidParametersError or StateConflictError without side effects
	 * on the ledger.
	 */
	static async start(options: TradingPipelineOptions): Promise<TradingPipeline> {
		const symbol = toCanonicalSymbol(options.symbol);
		const params = validateParameters(options.definition, options.params);
		const indicators = new IndicatorEngine();
		for (const spec of options.definition.indicators(params)) {
			indicators.registerSpec(spec);
		}
		const context: StrategyContext = {
			symbol,
			timeframe: options.timeframe,
			mode: options.mode,
			position: () => options.ledger.position(symbol),
		};

		let runtime: StrategyRuntime;
		if (options.supervisor) {
			runtime = await options.supervisor.start({
				definition: options.definition,
				context,
				params,
			});
		} else {
			runtime = new StrategyRuntime(options.definition, context);
			await runtime.start(params);
		}

		return new TradingPipeline(
			symbol,
			options.timeframe,
			options.mode,
			params,
			options.ledger,
			new OhlcAggregator({ symbol, timeframe: options.timeframe }),
			indicators,
			runtime,
			options.execution,
			options.supervisor,
			options.onStep
		);
	}

	get strategyId(): string {
		return this.runtime.definition.id;
	}

	get strategyState(): StrategyState {
		return this.runtime.state;
	}

	get fault(): StrategyFaultError | null {
		return this.faultValue;
	}

	async processObservation(observation: Observation): Promise<PipelineStep[]> {
		const sealed = this.aggregator.ingest(observation);
		return sealed ? this.processSealed(sealed) : [];
	}

	/** Seals the open bar on a quiet feed once its window has passed. */
	async processClock(now: number): Promise<PipelineStep[]> {
		const sealed = this.aggregator.sealIfElapsed(now);
		return sealed ? this.processSealed(sealed) : [];
	}

	/**
	 * Runs one sealed bar through indicators, strategy and execution.
	 * Returns null once the strategy has faulted.
	 */
	async processBar(bar: SealedBar): Promise<PipelineStep | null> {
		if (this.faultValue) {
			return null;
		}
		const indicators = this.indicators.onBar(bar);
		this.ledger.markPrice(bar.symbol, bar.close);

		let signal: Signal;
		try {
			signal = await this.runtime.onBar(bar, indicators);
		} catch (error) {
			if (!(error instanceof StrategyFaultError)) {
				throw error;
			}
			this.faultValue = error;
			runtimeLogger.error("pipeline_strategy_fault", {
				symbol: this.symbol,
				openTime: bar.openTime,
				error: describeError(error),
			});
			return null;
		}
		logStrategyDecision(bar, signal);

		const execution = await this.execution.execute(signal, bar);
		logExecutionResult(execution);

		const step: PipelineStep = { bar, indicators, signal, execution };
		this.onStep?.(step);
		return step;
	}

	/** Stops the strategy after any in-flight bar and frees its slot. */
	async stop(): Promise<void> {
		if (this.supervisor) {
			await this.supervisor.stop(this.mode, this.symbol);
			return;
		}
		await this.runtime.stop();
	}

	private async processSealed(bar: SealedBar): Promise<PipelineStep[]> {
		const step = await this.processBar(bar);
		return step ? [step] : [];
	}
}
