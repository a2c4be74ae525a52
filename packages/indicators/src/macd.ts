import type { SealedBar } from "@tickforge/core";
import { EmaCalculator } from "./ema";
import { assertPeriod, type Indicator, type IndicatorValues } from "./types";

export const MACD_OUTPUTS = ["macd", "signal", "histogram"] as const;

export class MacdIndicator implements Indicator {
	readonly name = "macd";
	readonly parameters: readonly number[];
	readonly outputs = MACD_OUTPUTS;
	private readonly fastEma: EmaCalculator;
	private readonly slowEma: EmaCalculator;
	private readonly signalEma: EmaCalculator;

	constructor(fast: number, slow: number, signal: number) {
		assertPeriod(fast, "MACD fast");
		assertPeriod(slow, "MACD slow");
		assertPeriod(signal, "MACD signal");
		if (fast >= slow) {
			throw new Error(
				`MACD fast period must be below slow period, got ${fast}/${slow}`
			);
		}
		this.parameters = [fast, slow, signal];
		this.fastEma = new EmaCalculator(fast);
		this.slowEma = new EmaCalculator(slow);
		this.signalEma = new EmaCalculator(signal);
	}

	update(bar: SealedBar): IndicatorValues {
		const fast = this.fastEma.next(bar.close);
		const slow = this.slowEma.next(bar.close);
		if (fast === undefined || slow === undefined) {
			return { macd: undefined, signal: undefined, histogram: undefined };
		}
		const macd = fast - slow;
		const signal = this.signalEma.next(macd);
		return {
			macd,
			signal,
			histogram: signal === undefined ? undefined : macd - signal,
		};
	}
}
