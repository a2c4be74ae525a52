import {
	createLogger,
	timeframeToMs,
	type Bar,
	type ModuleLogger,
} from "@tickforge/core";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

/** Anything that can return one page of bars starting at `since`. */
export interface OhlcvPageClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit: number,
		since: number
	): Promise<Bar[]>;
}

export interface HistoricalFetchOptions {
	client: OhlcvPageClient;
	symbol: string;
	timeframe: string;
	startTime: number;
	endTime: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: ModuleLogger;
}

/**
 * Pages through `fetchOHLCV` until `endTime`, returning bars with
 * `startTime <= openTime < endTime` in ascending order without duplicates.
 */
export const fetchHistoricalBars = async (
	options: HistoricalFetchOptions
): Promise<Bar[]> => {
	const logger = options.logger ?? createLogger("historical");
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(options.timeframe);

	const result: Bar[] = [];
	const seenOpenTimes = new Set<number>();
	let since = Math.max(0, options.startTime);
	let iterations = 0;

	while (since < options.endTime && iterations < maxIterations) {
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			options.timeframe,
			batchSize,
			since
		);
		iterations += 1;

		if (!batch.length) {
			break;
		}

		let reachedEnd = false;
		for (const bar of batch) {
			if (bar.openTime >= options.endTime) {
				reachedEnd = true;
				break;
			}
			if (bar.openTime < options.startTime || seenOpenTimes.has(bar.openTime)) {
				continue;
			}
			seenOpenTimes.add(bar.openTime);
			result.push(bar);
		}
		if (reachedEnd) {
			break;
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.openTime + timeframeMs, since + timeframeMs);
	}

	if (iterations >= maxIterations && since < options.endTime) {
		logger.warn("historical_fetch_iterations_exceeded", {
			symbol: options.symbol,
			timeframe: options.timeframe,
			startTime: options.startTime,
			endTime: options.endTime,
			iterations,
		});
	}

	result.sort((a, b) => a.openTime - b.openTime);
	logger.info("historical_bars_loaded", {
		symbol: options.symbol,
		timeframe: options.timeframe,
		bars: result.length,
		pages: iterations,
	});
	return result;
};
