import type { SealedBar } from "@tickforge/core";
import { MonotonicDeque } from "./monotonicDeque";
import { RollingWindow } from "./rollingWindow";
import { assertPeriod, type Indicator, type IndicatorValues } from "./types";

export const STOCHASTIC_OUTPUTS = ["k", "d"] as const;

/**
 * Stochastic oscillator. %K reads 50 when the window has no range; %D is the
 * SMA of %K.
 */
export class StochasticIndicator implements Indicator {
	readonly name = "stochastic";
	readonly parameters: readonly number[];
	readonly outputs = STOCHASTIC_OUTPUTS;
	private readonly highs = new MonotonicDeque((a, b) => a >= b);
	private readonly lows = new MonotonicDeque((a, b) => a <= b);
	private readonly kWindow: RollingWindow;
	private index = 0;

	constructor(
		private readonly kPeriod: number,
		private readonly dPeriod: number
	) {
		assertPeriod(kPeriod, "Stochastic %K");
		assertPeriod(dPeriod, "Stochastic %D");
		this.parameters = [kPeriod, dPeriod];
		this.kWindow = new RollingWindow(dPeriod);
	}

	update(bar: SealedBar): IndicatorValues {
		const index = this.index;
		this.index += 1;
		this.highs.push(index, bar.high);
		this.lows.push(index, bar.low);
		const windowStart = index - this.kPeriod + 1;
		this.highs.expire(windowStart);
		this.lows.expire(windowStart);

		if (windowStart < 0) {
			return { k: undefined, d: undefined };
		}

		const highest = this.highs.peek() ?? bar.high;
		const lowest = this.lows.peek() ?? bar.low;
		const range = highest - lowest;
		const k = range === 0 ? 50 : ((bar.close - lowest) / range) * 100;
		this.kWindow.push(k);
		return {
			k,
			d: this.kWindow.isFull() ? this.kWindow.sum / this.dPeriod : undefined,
		};
	}
}
