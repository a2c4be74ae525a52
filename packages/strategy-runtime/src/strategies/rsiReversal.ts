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

export interface RsiReversalConfig {
	period: number;
	oversold: number;
	overbought: number;
	quantity: number;
}

const readConfig = (params: StrategyParams): RsiReversalConfig => ({
	period: numberParam(params, "period"),
	oversold: numberParam(params, "oversold"),
	overbought: numberParam(params, "overbought"),
	quantity: numberParam(params, "quantity"),
});

const rsiSpec = (config: RsiReversalConfig): IndicatorSpec => ({
	kind: "rsi",
	period: config.period,
});

/**
 * Buys when RSI climbs back out of the oversold zone and sells when it
 * drops back out of the overbought zone.
 */
export class RsiReversalStrategy implements Strategy {
	private readonly rsiKey: string;
	private previous: number | null = null;

	constructor(private readonly config: RsiReversalConfig) {
		this.rsiKey = indicatorKey(rsiSpec(config));
	}

	onStart(): void {
		this.previous = null;
	}

	onBar(bar: SealedBar, indicators: IndicatorSnapshot, _context?: StrategyContext): Signal {
		const rsi = indicators[this.rsiKey];
		if (rsi === undefined) {
			return HOLD(bar.symbol, "warming_up");
		}
		const prev = this.previous;
		this.previous = rsi;
		if (prev === null) {
			return HOLD(bar.symbol);
		}

		const { oversold, overbought, quantity } = this.config;
		if (prev < oversold && rsi >= oversold) {
			return {
				action: "BUY",
				symbol: bar.symbol,
				quantity,
				reason: `rsi_exit_oversold_${rsi.toFixed(2)}`,
			};
		}
		if (prev > overbought && rsi <= overbought) {
			return {
				action: "SELL",
				symbol: bar.symbol,
				quantity,
				reason: `rsi_exit_overbought_${rsi.toFixed(2)}`,
			};
		}
		return HOLD(bar.symbol);
	}
}

const refineRsiReversal = (params: StrategyParams): ParameterIssue[] => {
	const { oversold, overbought } = params;
	if (
		typeof oversold === "number" &&
		typeof overbought === "number" &&
		oversold >= overbought
	) {
		return [
			{ path: "oversold", message: "oversold level must be below overbought level" },
		];
	}
	return [];
};

export const rsiReversalDefinition: StrategyDefinition<RsiReversalStrategy> = {
	id: "rsi_reversal",
	name: "RSI Reversal",
	description:
		"Trades RSI mean reversion: buys on recovery from oversold, sells on retreat from overbought.",
	options: [
		{
			name: "period",
			type: "integer",
			default: 14,
			description: "RSI lookback period",
			constraints: { min: 2 },
		},
		{
			name: "oversold",
			type: "number",
			default: 30,
			description: "Oversold threshold",
			constraints: { min: 0, max: 100 },
		},
		{
			name: "overbought",
			type: "number",
			default: 70,
			description: "Overbought threshold",
			constraints: { min: 0, max: 100 },
		},
		{
			name: "quantity",
			type: "number",
			default: 1,
			description: "Order quantity per signal",
			constraints: { greaterThan: 0 },
		},
	],
	refine: refineRsiReversal,
	indicators: (params) => [rsiSpec(readConfig(params))],
	create: (params) => new RsiReversalStrategy(readConfig(params)),
};
