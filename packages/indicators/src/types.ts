import type { SealedBar } from "@tickforge/core";

export type IndicatorValue = number | undefined;

/** Named outputs of a multi-value indicator (MACD, Bollinger, Stochastic). */
export type IndicatorValues = Readonly<Record<string, IndicatorValue>>;

/**
 * Incremental indicator. `update` is called exactly once per sealed bar and
 * returns `undefined` until enough bars have been seen.
 */
export interface Indicator {
	readonly name: string;
	readonly parameters: readonly number[];
	/** Output fields for indicators that return `IndicatorValues`. */
	readonly outputs?: readonly string[];
	update(bar: SealedBar): IndicatorValue | IndicatorValues;
}

export type IndicatorSpec =
	| { kind: "sma"; period: number }
	| { kind: "ema"; period: number }
	| { kind: "rsi"; period: number }
	| { kind: "macd"; fast: number; slow: number; signal: number }
	| { kind: "bollinger"; period: number; stdDev: number }
	| { kind: "atr"; period: number }
	| { kind: "stochastic"; kPeriod: number; dPeriod: number };

export type IndicatorKind = IndicatorSpec["kind"];

/** Latest value per output key, e.g. `sma_20` or `macd_12_26_9.signal`. */
export type IndicatorSnapshot = Readonly<Record<string, IndicatorValue>>;

export const assertPeriod = (period: number, label: string, min = 1): void => {
	if (!Number.isInteger(period) || period < min) {
		throw new Error(
			`${label} period must be an integer >= ${min}, got ${period}`
		);
	}
};
