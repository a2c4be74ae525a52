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

export interface SmaCrossoverConfig {
	fast: number;
	slow: number;
	quantity: number;
}

const readConfig = (params: StrategyParams): SmaCrossoverConfig => ({
	fast: numberParam(params, "fast"),
	slow: numberParam(params, "slow"),
	quantity: numberParam(params, "quantity"),
});

const specs = (config: SmaCrossoverConfig): [IndicatorSpec, IndicatorSpec] => [
	{ kind: "sma", period: config.fast },
	{ kind: "sma", period: config.slow },
];

export class SmaCrossoverStrategy implements Strategy {
	private readonly fastKey: string;
	private readonly slowKey: string;
	private readonly cross = new CrossTracker();

	constructor(private readonly config: SmaCrossoverConfig) {
		const [fast, slow] = specs(config);
		this.fastKey = indicatorKey(fast);
		this.slowKey = indicatorKey(slow);
	}

	onStart(): void {
		this.cross.reset();
	}

	onBar(bar: SealedBar, indicators: IndicatorSnapshot, _context?: StrategyContext): Signal {
		const fast = indicators[this.fastKey];
		const slow = indicators[this.slowKey];
		if (fast === undefined || slow === undefined) {
			return HOLD(bar.symbol, "warming_up");
		}
		const direction = this.cross.update(fast, slow);
		if (direction === "up") {
			return {
				action: "BUY",
				symbol: bar.symbol,
				quantity: this.config.quantity,
				reason: `sma_${this.config.fast}_crossed_above_sma_${this.config.slow}`,
			};
		}
		if (direction === "down") {
			return {
				action: "SELL",
				symbol: bar.symbol,
				quantity: this.config.quantity,
				reason: `sma_${this.config.fast}_crossed_below_sma_${this.config.slow}`,
			};
		}
		return HOLD(bar.symbol);
	}
}

const refineSmaCrossover = (params: StrategyParams): ParameterIssue[] => {
	const { fast, slow } = params;
	if (typeof fast === "number" && typeof slow === "number" && fast >= slow) {
		return [{ path: "fast", message: "fast period must be below slow period" }];
	}
	return [];
};

export const smaCrossoverDefinition: StrategyDefinition<SmaCrossoverStrategy> = {
	id: "sma_crossover",
	name: "SMA Crossover",
	description:
		"Buys when the fast simple moving average crosses above the slow one and sells on the opposite cross.",
	options: [
		{
			name: "fast",
			type: "integer",
			default: 20,
			description: "Fast SMA period",
			constraints: { min: 1 },
		},
		{
			name: "slow",
			type: "integer",
			default: 50,
			description: "Slow SMA period",
			constraints: { min: 2 },
		},
		{
			name: "quantity",
			type: "number",
			default: 1,
			description: "Order quantity per signal",
			constraints: { greaterThan: 0 },
		},
	],
	refine: refineSmaCrossover,
	indicators: (params) => specs(readConfig(params)),
	create: (params) => new SmaCrossoverStrategy(readConfig(params)),
};
