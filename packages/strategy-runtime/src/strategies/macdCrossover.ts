import { HOLD } from "@tickforge/core";
import type { ParameterIssue, SealedBar, Signal } from "@tickforge/core";
import { indicatorKey } from "@tickforge/indicators";
import type { IndicatorSnapshot, IndicatorSpec } from "@tickforge/indicators";
import { numberParam } from "../options";
import type {
	Strategy,
	StrategyContext,
	StrategyDefinition,
	StrategyParams,
} from "../types";
import { CrossTracker } from "./crossover";

export interface MacdCrossoverConfig {
	fast: number;
	slow: number;
	signal: number;
	quantity: number;
}

const readConfig = (params: StrategyParams): MacdCrossoverConfig => ({
	fast: numberParam(params, "fast"),
	slow: numberParam(params, "slow"),
	signal: numberParam(params, "signal"),
	quantity: numberParam(params, "quantity"),
});

const macdSpec = (config: MacdCrossoverConfig): IndicatorSpec => ({
	kind: "macd",
	fast: config.fast,
	slow: config.slow,
	signal: config.signal,
});

export class MacdCrossoverStrategy implements Strategy {
	private readonly macdKey: string;
	private readonly signalKey: string;
	private readonly cross = new CrossTracker();

	constructor(private readonly config: MacdCrossoverConfig) {
		const spec = macdSpec(config);
		this.macdKey = indicatorKey(spec, "macd");
		this.signalKey = indicatorKey(spec, "signal");
	}

	onStart(): void {
		this.cross.reset();
	}

	onBar(bar: SealedBar, indicators: IndicatorSnapshot, _context?: StrategyContext): Signal {
		const macd = indicators[this.macdKey];
		const signal = indicators[this.signalKey];
		if (macd === undefined || signal === undefined) {
			return HOLD(bar.symbol, "warming_up");
		}
		switch (this.cross.update(macd, signal)) {
			case "up":
				return {
					action: "BUY",
					symbol: bar.symbol,
					quantity: this.config.quantity,
					reason: "macd_crossed_above_signal",
				};
			case "down":
				return {
					action: "SELL",
					symbol: bar.symbol,
					quantity: this.config.quantity,
					reason: "macd_crossed_below_signal",
				};
			default:
				return HOLD(bar.symbol);
		}
	}
}

const refineMacdCrossover = (params: StrategyParams): ParameterIssue[] => {
	const { fast, slow } = params;
	if (typeof fast === "number" && typeof slow === "number" && fast >= slow) {
		return [{ path: "fast", message: "fast period must be below slow period" }];
	}
	return [];
};

export const macdCrossoverDefinition: StrategyDefinition<MacdCrossoverStrategy> = {
	id: "macd_crossover",
	name: "MACD Crossover",
	description:
		"Buys when the MACD line crosses above its signal line and sells when it crosses below.",
	options: [
		{ name: "fast", type: "integer", default: 12, description: "Fast EMA period", constraints: { min: 1 } },
		{ name: "slow", type: "integer", default: 26, description: "Slow EMA period", constraints: { min: 2 } },
		{ name: "signal", type: "integer", default: 9, description: "Signal EMA period", constraints: { min: 1 } },
		{
			name: "quantity",
			type: "number",
			default: 1,
			description: "Order quantity per signal",
			constraints: { greaterThan: 0 },
		},
	],
	refine: refineMacdCrossover,
	indicators: (params) => [macdSpec(readConfig(params))],
	create: (params) => new MacdCrossoverStrategy(readConfig(params)),
};
