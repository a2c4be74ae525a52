import {
	StaleObservationError,
	bucketTimestamp,
	createLogger,
	timeframeToMs,
	toCanonicalSymbol,
	type Bar,
	type Observation,
	type SealedBar,
} from "@tickforge/core";

const logger = createLogger("ohlc-aggregator");

export interface OhlcAggregatorOptions {
	symbol: string;
	timeframe: string;
}

/**
 * Folds observations for one symbol into fixed-width OHLCV bars. A bar is
 * sealed when an observation for a later window arrives or, on quiet
 * feeds, when `sealIfElapsed` sees its window has passed.
 */
export class OhlcAggregator {
	readonly symbol: string;
	readonly timeframe: string;
	private readonly timeframeMs: number;
	private open: Bar | null = null;
	/** Earliest window start still accepted. */
	private floor = 0;
	private readonly sealed: SealedBar[] = [];
	private readonly seenInWindow = new Set<string>();
	private staleCount = 0;
	private duplicateCount = 0;

	constructor(options: OhlcAggregatorOptions) {
		this.symbol = toCanonicalSymbol(options.symbol);
		this.timeframe = options.timeframe;
		this.timeframeMs = timeframeToMs(options.timeframe);
	}

	/**
	 * Returns the bar sealed by this observation, if any. Stale,
	 * repeated-tradeId and foreign-symbol observations return null and leave the
	 * open bar untouched.
	 */
	ingest(observation: Observation): SealedBar | null {
		if (observation.symbol !== this.symbol) {
			logger.warn("observation_symbol_mismatch", {
				expected: this.symbol,
				received: observation.symbol,
			});
			return null;
		}

		const windowStart = bucketTimestamp(observation.timestamp, this.timeframeMs);
		if (windowStart < this.floor) {
			this.staleCount += 1;
			const error = new StaleObservationError(
				this.symbol,
				observation.timestamp,
				this.open?.openTime ?? this.floor
			);
			logger.warn("observation_stale", {
				symbol: this.symbol,
				timestamp: observation.timestamp,
				windowStart: error.windowStart,
				code: error.code,
			});
			return null;
		}

		let sealed: SealedBar | null = null;
		if (this.open && windowStart > this.open.openTime) {
			sealed = this.seal();
		}

		// Only a trade id identifies a repeat; id-less ticks always count.
		const tradeId = observation.tradeId;

		if (!this.open) {
			this.openBar(windowStart, observation);
			if (tradeId) {
				this.seenInWindow.add(tradeId);
			}
			return sealed;
		}

		if (tradeId) {
			if (this.seenInWindow.has(tradeId)) {
				this.duplicateCount += 1;
				logger.debug("observation_duplicate", {
					symbol: this.symbol,
					tradeId,
				});
				return sealed;
			}
			this.seenInWindow.add(tradeId);
		}

		const bar = this.open;
		bar.high = Math.max(bar.high, observation.price);
		bar.low = Math.min(bar.low, observation.price);
		bar.close = observation.price;
		bar.volume += observation.quantity;
		return sealed;
	}

	/** Seals the open bar once `now` is at or past its window end. */
	sealIfElapsed(now: number): SealedBar | null {
		if (!this.open || now < this.open.openTime + this.timeframeMs) {
			return null;
		}
		return this.seal();
	}

	current(): Bar | null {
		return this.open ? { ...this.open } : null;
	}

	history(): readonly SealedBar[] {
		return this.sealed;
	}

	getStaleCount(): number {
		return this.staleCount;
	}

	getDuplicateCount(): number {
		return this.duplicateCount;
	}

	private openBar(windowStart: number, observation: Observation): void {
		this.open = {
			symbol: this.symbol,
			timeframe: this.timeframe,
			openTime: windowStart,
			open: observation.price,
			high: observation.price,
			low: observation.price,
			close: observation.price,
			volume: observation.quantity,
		};
		this.floor = windowStart;
	}

	private seal(): SealedBar | null {
		const bar = this.open;
		if (!bar) {
			return null;
		}
		const sealed: SealedBar = Object.freeze({ ...bar });
		this.sealed.push(sealed);
		this.open = null;
		this.floor = bar.openTime + this.timeframeMs;
		this.seenInWindow.clear();
		logger.debug("bar_sealed", { ...sealed });
		return sealed;
	}
}
