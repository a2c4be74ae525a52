import type { SealedBar } from "@tickforge/core";
import { assertPeriod, type Indicator, type IndicatorValue } from "./types";

/**
 * Average true range with Wilder smoothing. True range needs the previous
 * close, so the first value lands on bar `period + 1`.
 */
export class AtrIndicator implements Indicator {
	readonly name = "atr";
	readonly parameters: readonly number[];
	private previousClose: number | undefined;
	private ranges = 0;
	private atr = 0;

	constructor(private readonly period: number) {
		assertPeriod(period, "ATR");
		this.parameters = [period];
	}

	update(bar: SealedBar): IndicatorValue {
		const previousClose = this.previousClose;
		this.previousClose = bar.close;
		if (previousClose === undefined) {
			return undefined;
		}

		const trueRange = Math.max(
			bar.high - bar.low,
			Math.abs(bar.high - previousClose),
			Math.abs(bar.low - previousClose)
		);

		if (this.ranges < this.period) {
			this.atr += trueRange;
			this.ranges += 1;
			if (this.ranges < this.period) {
				return undefined;
			}
			this.atr /= this.period;
			return this.atr;
		}

		this.atr = (this.atr * (this.period - 1) + trueRange) / this.period;
		return this.atr;
	}
}
