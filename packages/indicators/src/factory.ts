import { AtrIndicator } from "./atr";
import { BollingerIndicator } from "./bollinger";
import { EmaIndicator } from "./ema";
import { MacdIndicator } from "./macd";
import { RsiIndicator } from "./rsi";
import { SmaIndicator } from "./sma";
import { StochasticIndicator } from "./stochastic";
import type { Indicator, IndicatorSpec } from "./types";

export const createIndicator = (spec: IndicatorSpec): Indicator => {
	switch (spec.kind) {
		case "sma":
			return new SmaIndicator(spec.period);
		case "ema":
			return new EmaIndicator(spec.period);
		case "rsi":
			return new RsiIndicator(spec.period);
		case "macd":
			return new MacdIndicator(spec.fast, spec.slow, spec.signal);
		case "bollinger":
			return new BollingerIndicator(spec.period, spec.stdDev);
		case "atr":
			return new AtrIndicator(spec.period);
		case "stochastic":
			return new StochasticIndicator(spec.kPeriod, spec.dPeriod);
	}
};

const specParameters = (spec: IndicatorSpec): number[] => {
	switch (spec.kind) {
		case "sma":
		case "ema":
		case "rsi":
		case "atr":
			return [spec.period];
		case "macd":
			return [spec.fast, spec.slow, spec.signal];
		case "bollinger":
			return [spec.period, spec.stdDev];
		case "stochastic":
			return [spec.kPeriod, spec.dPeriod];
	}
};

export const formatIndicatorKey = (
	name: string,
	parameters: readonly number[],
	field?: string
): string => {
	const base = [name, ...parameters.map((value) => String(value))].join("_");
	return field ? `${base}.${field}` : base;
};

/**
 * Snapshot key for a spec, e.g. `indicatorKey({ kind: "macd", fast: 12,
 * slow: 26, signal: 9 }, "signal")` is `macd_12_26_9.signal`.
 */
export const indicatorKey = (spec: IndicatorSpec, field?: string): string =>
	formatIndicatorKey(spec.kind, specParameters(spec), field);
