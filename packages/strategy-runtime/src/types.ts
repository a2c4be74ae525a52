import type {
	ExecutionMode,
	ParameterIssue,
	Position,
	SealedBar,
	Signal,
} from "@tickforge/core";
import type { IndicatorSnapshot, IndicatorSpec } from "@tickforge/indicators";

export type OptionType = "integer" | "number" | "boolean" | "string";
export type OptionValue = number | boolean | string;

export interface OptionConstraints {
	min?: number;
	max?: number;
	/** Exclusive lower bound. */
	greaterThan?: number;
	choices?: ReadonlyArray<string | number>;
}

export interface OptionSpec {
	name: string;
	type: OptionType;
	default: OptionValue;
	description?: string;
	constraints?: OptionConstraints;
}

export type StrategyParams = Readonly<Record<string, OptionValue>>;

export interface StrategyContext {
	readonly symbol: string;
	readonly timeframe: string;
	readonly mode: ExecutionMode;
	/** Open position for the symbol, or null when flat. */
	position(): Readonly<Position> | null;
}

export type MaybePromise<T> = T | Promise<T>;

export interface Strategy {
	onStart?(params: StrategyParams, context: StrategyContext): MaybePromise<void>;
	onBar(
		bar: SealedBar,
		indicators: IndicatorSnapshot,
		context: StrategyContext
	): MaybePromise<Signal>;
	onStop?(context: StrategyContext): MaybePromise<void>;
}

export interface StrategyDefinition<S extends Strategy = Strategy> {
	id: string;
	name: string;
	description: string;
	options: readonly OptionSpec[];
	/** Cross-field checks run after every option validated on its own. */
	refine?: (params: StrategyParams) => ParameterIssue[];
	indicators(params: StrategyParams): IndicatorSpec[];
	create(params: StrategyParams): S;
}

export interface StrategyDescription {
	id: string;
	name: string;
	description: string;
	defaults: StrategyParams;
	options: readonly OptionSpec[];
}
