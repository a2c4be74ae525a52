import type { SealedBar } from "@tickforge/core";
import { RollingWindow } from "./rollingWindow";
import { assertPeriod, type Indicator, type IndicatorValues } from "./types";

export const BOLLINGER_OUTPUTS = ["upper", "middle", "lower"] as const;

/**
 * Bollinger Bands around the SMA using the sample standard deviation.
 */
export class BollingerIndicator implements Indicator {
	readonly name = "bollinger";
	readonly parameters: readonly number[];
	readonly outputs = BOLLINGER_OUTPUTS;
	private readonly window: RollingWindow;

	constructor(
		private readonly period: number,
		private readonly stdDev: number
	) {
		assertPeriod(period, "Bollinger", 2);
		if (!Number.isFinite(stdDev) || stdDev <= 0) {
			throw new Error(`Bollinger stdDev must be positive, got ${stdDev}`);
		}
		this.parameters = [period, stdDev];
		this.window = new RollingWindow(period);
	}

	update(bar: SealedBar): IndicatorValues {
		this.window.push(bar.close);
		if (!this.window.isFull()) {
			return { upper: undefined, middle: undefined, lower: undefined };
		}
		const n = this.period;
		const mean = this.window.sum / n;
		// running sums can drift slightly below zero on flat windows
		const variance = Math.max(
			0,
			(this.window.sumSquares - n * mean * mean) / (n - 1)
		);
		const band = Math.sqrt(variance) * this.stdDev;
		return { upper: mean + band, middle: mean, lower: mean - band };
	}
}
