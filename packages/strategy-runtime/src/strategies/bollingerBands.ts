import { HOLD } from "@tickforge/core";
import type { SealedBar, Signal } from "@tickforge/core";
import { indicatorKey } from "@tickforge/indicators";
import type { IndicatorSnapshot, IndicatorSpec } from "@tickforge/indicators";
import { numberParam } from "../options";
import type {
	Strategy,
	StrategyContext,
	StrategyDefinition,
	StrategyParams,
} from "../types";

export interface BollingerBandsConfig {
	period: number;
	stdDev: number;
	/** Distance to a band, in percent of close, that counts as a touch. */
	bandTouchPct: number;
	quantity: number;
}

const readConfig = (params: StrategyParams): BollingerBandsConfig => ({
	period: numberParam(params, "period"),
	stdDev: numberParam(params, "stdDev"),
	bandTouchPct: numberParam(params, "bandTouchPct"),
	quantity: numberParam(params, "quantity"),
});

const bandsSpec = (config: BollingerBandsConfig): IndicatorSpec => ({
	kind: "bollinger",
	period: config.period,
	stdDev: config.stdDev,
});

export class BollingerBandsStrategy implements Strategy {
	private readonly upperKey: string;
	private readonly lowerKey: string;

	constructor(private readonly config: BollingerBandsConfig) {
		const spec = bandsSpec(config);
		this.upperKey = indicatorKey(spec, "upper");
		this.lowerKey = indicatorKey(spec, "lower");
	}

	onBar(bar: SealedBar, indicators: IndicatorSnapshot, _context?: StrategyContext): Signal {
		const upper = indicators[this.upperKey];
		const lower = indicators[this.lowerKey];
		if (upper === undefined || lower === undefined) {
			return HOLD(bar.symbol, "warming_up");
		}
		if (bar.close <= 0) {
			return HOLD(bar.symbol, "non_positive_close");
		}

		const lowerDistance = ((bar.close - lower) / bar.close) * 100;
		if (lowerDistance <= this.config.bandTouchPct) {
			return {
				action: "BUY",
				symbol: bar.symbol,
				quantity: this.config.quantity,
				reason: `lower_band_touch_${lowerDistance.toFixed(2)}pct`,
			};
		}
		const upperDistance = ((upper - bar.close) / bar.close) * 100;
		if (upperDistance <= this.config.bandTouchPct) {
			return {
				action: "SELL",
				symbol: bar.symbol,
				quantity: this.config.quantity,
				reason: `upper_band_touch_${upperDistance.toFixed(2)}pct`,
			};
		}
		return HOLD(bar.symbol);
	}
}

export const bollingerBandsDefinition: StrategyDefinition<BollingerBandsStrategy> = {
	id: "bollinger_bands",
	name: "Bollinger Bands",
	description:
		"Buys when price presses against the lower band and sells when it presses against the upper band.",
	options: [
		{
			name: "period",
			type: "integer",
			default: 20,
			description: "Moving average period",
			constraints: { min: 2 },
		},
		{
			name: "stdDev",
			type: "number",
			default: 2,
			description: "Band width in standard deviations",
			constraints: { greaterThan: 0 },
		},
		{
			name: "bandTouchPct",
			type: "number",
			default: 0.5,
			description: "Max distance to a band, in percent of close, that counts as a touch",
			constraints: { min: 0 },
		},
		{
			name: "quantity",
			type: "number",
			default: 1,
			description: "Order quantity per signal",
			constraints: { greaterThan: 0 },
		},
	],
	indicators: (params) => [bandsSpec(readConfig(params))],
	create: (params) => new BollingerBandsStrategy(readConfig(params)),
};
