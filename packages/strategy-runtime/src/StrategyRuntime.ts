import {
	HOLD,
	StrategyFaultError,
	createLogger,
	describeError,
	type ModuleLogger,
	type SealedBar,
	type Signal,
	type StrategyPhase,
} from "@tickforge/core";
import type { IndicatorSnapshot } from "@tickforge/indicators";
import { validateParameters } from "./options";
import type {
	Strategy,
	StrategyContext,
	StrategyDefinition,
	StrategyParams,
} from "./types";

const baseLogger = createLogger("strategy-runtime");

export type StrategyState = "IDLE" | "RUNNING" | "STOPPED";

const SIGNAL_ACTIONS = new Set(["BUY", "SELL", "HOLD"]);

let instanceCounter = 0;

/**
 * Owns one strategy instance. Bars are delivered one at a time: a call made
 * while another is in flight waits for it. A fault in any lifecycle hook
 * stops and discards the instance.
 */
export class StrategyRuntime {
	readonly instanceId: string;
	private readonly logger: ModuleLogger;
	private stateValue: StrategyState = "IDLE";
	private strategy: Strategy | null = null;
	private paramsValue: StrategyParams | null = null;
	private faultValue: StrategyFaultError | null = null;
	private stopRequested = false;
	private queue: Promise<unknown> = Promise.resolve();

	constructor(
		readonly definition: StrategyDefinition,
		readonly context: StrategyContext
	) {
		instanceCounter += 1;
		this.instanceId = `${definition.id}#${instanceCounter}`;
		this.logger = baseLogger.child({
			instanceId: this.instanceId,
			symbol: context.symbol,
		});
	}

	get state(): StrategyState {
		return this.stateValue;
	}

	get params(): StrategyParams | null {
		return this.paramsValue;
	}

	get fault(): StrategyFaultError | null {
		return this.faultValue;
	}

	/**
	 * Validates params and runs onStart. Invalid params leave the runtime
	 * IDLE and throw InvalidParametersError.
	 */
	async start(rawParams: unknown = {}): Promise<StrategyParams> {
		if (this.stateValue !== "IDLE") {
			throw new Error(
				`Strategy ${this.instanceId} cannot start from state ${this.stateValue}`
			);
		}
		const params = validateParameters(this.definition, rawParams);
		const strategy = this.definition.create(params);
		try {
			await strategy.onStart?.(params, this.context);
		} catch (error) {
			throw this.recordFault("onStart", error);
		}
		this.strategy = strategy;
		this.paramsValue = params;
		this.stateValue = "RUNNING";
		this.logger.info("strategy_started", {
			timeframe: this.context.timeframe,
			mode: this.context.mode,
			params,
		});
		return params;
	}

	onBar(bar: SealedBar, indicators: IndicatorSnapshot): Promise<Signal> {
		const result = this.queue.then(() => this.invokeOnBar(bar, indicators));
		this.queue = result.catch(() => undefined);
		return result;
	}

	/** Waits for the in-flight bar, then runs onStop. Safe to call twice. */
	async stop(): Promise<void> {
		if (this.stateValue === "STOPPED") {
			return;
		}
		if (this.stateValue === "IDLE") {
			this.stateValue = "STOPPED";
			return;
		}
		this.stopRequested = true;
		await this.queue;
		const strategy = this.strategy;
		if (this.stateValue !== "RUNNING" || !strategy) {
			return;
		}
		try {
			await strategy.onStop?.(this.context);
		} catch (error) {
			this.recordFault("onStop", error);
			return;
		}
		this.strategy = null;
		this.stateValue = "STOPPED";
		this.logger.info("strategy_stopped");
	}

	private async invokeOnBar(
		bar: SealedBar,
		indicators: IndicatorSnapshot
	): Promise<Signal> {
		const strategy = this.strategy;
		if (this.stateValue !== "RUNNING" || this.stopRequested || !strategy) {
			return HOLD(bar.symbol, "strategy_not_running");
		}
		let signal: Signal;
		try {
			signal = await strategy.onBar(bar, indicators, this.context);
		} catch (error) {
			throw this.recordFault("onBar", error);
		}
		if (typeof signal !== "object" || signal === null) {
			throw this.recordFault(
				"onBar",
				new Error(`Strategy returned ${String(signal)} instead of a signal`)
			);
		}
		if (signal.symbol !== this.context.symbol) {
			throw this.recordFault(
				"onBar",
				new Error(
					`Signal symbol ${String(signal.symbol)} does not match ${this.context.symbol}`
				)
			);
		}
		if (!SIGNAL_ACTIONS.has(signal.action)) {
			throw this.recordFault(
				"onBar",
				new Error(`Unknown signal action: ${String(signal.action)}`)
			);
		}
		if (
			signal.quantity !== undefined &&
			!(Number.isFinite(signal.quantity) && signal.quantity > 0)
		) {
			throw this.recordFault(
				"onBar",
				new Error(`Signal quantity must be positive, got ${signal.quantity}`)
			);
		}
		return signal;
	}

	private recordFault(phase: StrategyPhase, cause: unknown): StrategyFaultError {
		const fault = new StrategyFaultError(this.definition.id, phase, cause);
		this.faultValue = fault;
		this.strategy = null;
		this.stateValue = "STOPPED";
		this.logger.error("strategy_fault", {
			phase,
			error: describeError(cause),
		});
		return fault;
	}
}
