import type { SealedBar } from "@tickforge/core";
import { assertPeriod, type Indicator, type IndicatorValue } from "./types";

/**
 * Exponential average over a plain number stream, seeded with the SMA of
 * the first `length` values.
 */
export class EmaCalculator {
	private readonly multiplier: number;
	private seedSum = 0;
	private seen = 0;
	private value: number | undefined;

	constructor(private readonly length: number) {
		assertPeriod(length, "EMA");
		this.multiplier = 2 / (length + 1);
	}

	next(input: number): IndicatorValue {
		if (this.value === undefined) {
			this.seedSum += input;
			this.seen += 1;
			if (this.seen < this.length) {
				return undefined;
			}
			this.value = this.seedSum / this.length;
			return this.value;
		}
		this.value = (input - this.value) * this.multiplier + this.value;
		return this.value;
	}

	get current(): IndicatorValue {
		return this.value;
	}
}

export class EmaIndicator implements Indicator {
	readonly name = "ema";
	readonly parameters: readonly number[];
	private readonly ema: EmaCalculator;

	constructor(period: number) {
		this.ema = new EmaCalculator(period);
		this.parameters = [period];
	}

	update(bar: SealedBar): IndicatorValue {
		return this.ema.next(bar.close);
	}
}
