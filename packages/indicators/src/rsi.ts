import type { SealedBar } from "@tickforge/core";
import { assertPeriod, type Indicator, type IndicatorValue } from "./types";

/**
 * Wilder RSI. The first value appears once `period` price changes are
 * known, i.e. on bar `period + 1`. A window without losses reads 100.
 */
export class RsiIndicator implements Indicator {
	readonly name = "rsi";
	readonly parameters: readonly number[];
	private previousClose: number | undefined;
	private changes = 0;
	private avgGain = 0;
	private avgLoss = 0;

	constructor(private readonly period: number) {
		assertPeriod(period, "RSI");
		this.parameters = [period];
	}

	update(bar: SealedBar): IndicatorValue {
		const previous = this.previousClose;
		this.previousClose = bar.close;
		if (previous === undefined) {
			return undefined;
		}

		const change = bar.close - previous;
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);

		if (this.changes < this.period) {
			this.avgGain += gain;
			this.avgLoss += loss;
			this.changes += 1;
			if (this.changes < this.period) {
				return undefined;
			}
			this.avgGain /= this.period;
			this.avgLoss /= this.period;
		} else {
			this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period;
			this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period;
		}

		if (this.avgLoss === 0) {
			return 100;
		}
		const rs = this.avgGain / this.avgLoss;
		return Math.min(100, Math.max(0, 100 - 100 / (1 + rs)));
	}
}
