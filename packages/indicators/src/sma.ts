import type { SealedBar } from "@tickforge/core";
import { RollingWindow } from "./rollingWindow";
import { assertPeriod, type Indicator, type IndicatorValue } from "./types";

/**
 * Simple moving average of closes. Undefined for the first `period - 1`
 * bars.
 */
export class SmaIndicator implements Indicator {
	readonly name = "sma";
	readonly parameters: readonly number[];
	private readonly window: RollingWindow;

	constructor(private readonly period: number) {
		assertPeriod(period, "SMA");
		this.parameters = [period];
		this.window = new RollingWindow(period);
	}

	update(bar: SealedBar): IndicatorValue {
		this.window.push(bar.close);
		if (!this.window.isFull()) {
			return undefined;
		}
		return this.window.sum / this.period;
	}
}
