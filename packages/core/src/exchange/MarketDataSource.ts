import type { Bar, Observation } from "../types";

/**
 * Supplier of raw market data. Live observations arrive through
 * `subscribe`; historical bars through `fetchHistory`.
 */
export interface MarketDataSource {
	/**
	 * Stream observations for a symbol until the signal aborts or the
	 * source ends. Implementations reconnect on their own; a reconnect gap
	 * simply yields no observations.
	 */
	subscribe(symbol: string, signal?: AbortSignal): AsyncIterable<Observation>;

	/**
	 * Fetch closed bars with `startTime <= openTime < endTime`, ascending.
	 * Sources page through the venue's limits themselves.
	 */
	fetchHistory(
		symbol: string,
		timeframe: string,
		startTime: number,
		endTime: number
	): Promise<Bar[]>;
}
