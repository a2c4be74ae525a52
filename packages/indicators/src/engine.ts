import { createLogger, type SealedBar } from "@tickforge/core";
import { createIndicator, formatIndicatorKey } from "./factory";
import type {
	Indicator,
	IndicatorSnapshot,
	IndicatorSpec,
	IndicatorValue,
	IndicatorValues,
} from "./types";

const logger = createLogger("indicator-engine");

interface RegisteredIndicator {
	indicator: Indicator;
	baseKey: string;
	keys: string[];
}

const isIndicatorValues = (
	value: IndicatorValue | IndicatorValues
): value is IndicatorValues => typeof value === "object";

/**
 * Runs every registered indicator once per sealed bar and keeps one series
 * entry per bar for each output key, `undefined` while warming up.
 */
export class IndicatorEngine {
	private readonly registered: RegisteredIndicator[] = [];
	private readonly seriesByKey = new Map<string, IndicatorValue[]>();
	private lastOpenTime: number | undefined;
	private processed = 0;
	private snapshot: IndicatorSnapshot = {};

	/** Returns the output keys the indicator writes. */
	register(indicator: Indicator): string[] {
		const baseKey = formatIndicatorKey(indicator.name, indicator.parameters);
		const keys = indicator.outputs
			? indicator.outputs.map((field) =>
					formatIndicatorKey(indicator.name, indicator.parameters, field)
				)
			: [baseKey];
		const clash = keys.find((key) => this.seriesByKey.has(key));
		if (clash) {
			throw new Error(`Indicator key already registered: ${clash}`);
		}
		for (const key of keys) {
			this.seriesByKey.set(key, new Array<IndicatorValue>(this.processed).fill(undefined));
		}
		this.registered.push({ indicator, baseKey, keys });
		logger.debug("indicator_registered", { keys, backfilled: this.processed });
		return keys;
	}

	/** Idempotent: a spec whose keys already exist is not registered twice. */
	registerSpec(spec: IndicatorSpec): string[] {
		const indicator = createIndicator(spec);
		const baseKey = formatIndicatorKey(indicator.name, indicator.parameters);
		const existing = this.registered.find((entry) => entry.baseKey === baseKey);
		if (existing) {
			return existing.keys;
		}
		return this.register(indicator);
	}

	onBar(bar: SealedBar): IndicatorSnapshot {
		if (this.lastOpenTime !== undefined && bar.openTime <= this.lastOpenTime) {
			throw new Error(
				`Bar out of order: openTime ${bar.openTime} after ${this.lastOpenTime}`
			);
		}
		this.lastOpenTime = bar.openTime;

		const next: Record<string, IndicatorValue> = {};
		for (const entry of this.registered) {
			const result = entry.indicator.update(bar);
			if (isIndicatorValues(result)) {
				entry.indicator.outputs?.forEach((field, index) => {
					next[entry.keys[index]] = result[field];
				});
			} else {
				next[entry.baseKey] = result;
			}
		}

		for (const [key, series] of this.seriesByKey) {
			series.push(next[key]);
		}
		this.processed += 1;
		this.snapshot = Object.freeze(next);
		return this.snapshot;
	}

	latest(): IndicatorSnapshot {
		return this.snapshot;
	}

	series(key: string): readonly IndicatorValue[] {
		const series = this.seriesByKey.get(key);
		if (!series) {
			throw new Error(`Unknown indicator key: ${key}`);
		}
		return series;
	}

	keys(): string[] {
		return Array.from(this.seriesByKey.keys());
	}

	get barCount(): number {
		return this.processed;
	}
}
