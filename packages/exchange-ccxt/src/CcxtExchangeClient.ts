import {
	createLogger,
	sleep,
	toCanonicalSymbol,
	type AccountInfo,
	type Bar,
	type ExchangeTrade,
	type MarketDataSource,
	type Observation,
	type OrderAck,
	type OrderSide,
	type OrderSink,
	type OrderStatusReport,
	type OrderType,
} from "@tickforge/core";
import { Normalizer, fetchHistoricalBars } from "@tickforge/market-data";
import {
	balanceResponseSchema,
	mapBalance,
	mapMyTrade,
	mapOhlcvRow,
	mapOrderReport,
	myTradeSchema,
	ohlcvResponseSchema,
	orderResponseSchema,
	tradeListSchema,
} from "./ccxtMapper";

const logger = createLogger("exchange:ccxt");

/**
 * The ccxt `Exchange` methods this client calls. Responses are validated
 * here rather than trusted.
 */
export interface CcxtExchangeApi {
	readonly id: string;
	loadMarkets(): Promise<unknown>;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<unknown>;
	fetchTrades(symbol: string, since?: number, limit?: number): Promise<unknown>;
	createOrder(
		symbol: string,
		type: string,
		side: string,
		amount: number
	): Promise<unknown>;
	fetchOrder(id: string, symbol?: string): Promise<unknown>;
	cancelOrder(id: string, symbol?: string): Promise<unknown>;
	fetchBalance(): Promise<unknown>;
	fetchMyTrades(
		symbol?: string,
		since?: number,
		limit?: number
	): Promise<unknown>;
}

export interface CcxtExchangeClientOptions {
	pollIntervalMs?: number;
	historyBatchSize?: number;
	tradesPerPoll?: number;
	normalizer?: Normalizer;
	now?: () => number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const abortableSleep = (ms: number, signal?: AbortSignal): Promise<void> => {
	if (!signal) {
		return sleep(ms);
	}
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		signal.addEventListener("abort", onAbort, { once: true });
	});
};

/**
 * Market data and order routing on top of any ccxt exchange: paged
 * `fetchOHLCV` for history, polled `fetchTrades` for live observations and
 * the unified order API for execution.
 */
export class CcxtExchangeClient implements MarketDataSource, OrderSink {
	private readonly pollIntervalMs: number;
	private readonly historyBatchSize: number;
	private readonly tradesPerPoll: number;
	private readonly normalizer: Normalizer;
	private readonly now: () => number;
	private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
	private marketsLoaded = false;

	constructor(
		private readonly exchange: CcxtExchangeApi,
		options: CcxtExchangeClientOptions = {}
	) {
		this.pollIntervalMs = Math.max(options.pollIntervalMs ?? 2_000, 0);
		this.historyBatchSize = Math.max(options.historyBatchSize ?? 500, 1);
		this.tradesPerPoll = Math.max(options.tradesPerPoll ?? 100, 1);
		this.normalizer = options.normalizer ?? new Normalizer();
		this.now = options.now ?? Date.now;
		this.wait = options.sleep ?? abortableSleep;
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit: number,
		since: number
	): Promise<Bar[]> {
		await this.ensureMarketsLoaded();
		const raw = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		const rows = ohlcvResponseSchema.parse(raw);
		const canonical = toCanonicalSymbol(symbol);
		return rows.map((row) => mapOhlcvRow(row, canonical, timeframe));
	}

	fetchHistory(
		symbol: string,
		timeframe: string,
		startTime: number,
		endTime: number
	): Promise<Bar[]> {
		return fetchHistoricalBars({
			client: this,
			symbol,
			timeframe,
			startTime,
			endTime,
			batchSize: this.historyBatchSize,
			logger,
		});
	}

	/**
	 * Polls public trades. Each poll asks for trades since the newest
	 * timestamp seen; ids already emitted at that timestamp are skipped.
	 */
	async *subscribe(
		symbol: string,
		signal?: AbortSignal
	): AsyncGenerator<Observation> {
		const canonical = toCanonicalSymbol(symbol);
		let since: number | undefined;
		let emittedAtSince = new Set<string>();

		while (!signal?.aborted) {
			let trades: unknown[] = [];
			try {
				await this.ensureMarketsLoaded();
				trades = tradeListSchema.parse(
					await this.exchange.fetchTrades(symbol, since, this.tradesPerPoll)
				);
			} catch (error) {
				logger.error("trade_poll_failed", {
					exchange: this.exchange.id,
					symbol: canonical,
					message: error instanceof Error ? error.message : String(error),
				});
			}

			for (const trade of trades) {
				const observation = this.normalizer.normalize(trade);
				if (!observation || observation.symbol !== canonical) {
					continue;
				}
				if (since !== undefined && observation.timestamp < since) {
					continue;
				}
				const key =
					observation.tradeId ??
					`${observation.timestamp}:${observation.price}:${observation.quantity}`;
				if (observation.timestamp === since && emittedAtSince.has(key)) {
					continue;
				}
				if (since === undefined || observation.timestamp > since) {
					since = observation.timestamp;
					emittedAtSince = new Set<string>();
				}
				emittedAtSince.add(key);
				yield observation;
				if (signal?.aborted) {
					return;
				}
			}

			await this.wait(this.pollIntervalMs, signal);
		}
	}

	async placeOrder(
		symbol: string,
		side: OrderSide,
		type: OrderType,
		quantity: number
	): Promise<OrderAck> {
		if (type !== "MARKET") {
			throw new Error(
				`Unsupported order type ${type}: only MARKET orders are routed`
			);
		}
		await this.ensureMarketsLoaded();
		const raw = await this.exchange.createOrder(
			symbol,
			"market",
			side.toLowerCase(),
			quantity
		);
		const report = mapOrderReport(orderResponseSchema.parse(raw), {
			symbol: toCanonicalSymbol(symbol),
			side,
			now: this.now(),
		});
		logger.info("order_placed", {
			exchange: this.exchange.id,
			symbol: report.symbol,
			side,
			quantity,
			orderId: report.orderId,
			status: report.status,
		});
		return { orderId: report.orderId, status: report.status };
	}

	async getOrderStatus(
		orderId: string,
		symbol?: string
	): Promise<OrderStatusReport> {
		const raw = await this.exchange.fetchOrder(orderId, symbol);
		const report = mapOrderReport(orderResponseSchema.parse(raw), {
			symbol: symbol ? toCanonicalSymbol(symbol) : "",
			now: this.now(),
		});
		return { ...report, symbol: toCanonicalSymbol(report.symbol) };
	}

	async cancelOrder(orderId: string, symbol?: string): Promise<void> {
		await this.exchange.cancelOrder(orderId, symbol);
		logger.info("order_cancelled", { exchange: this.exchange.id, orderId });
	}

	async getAccountInfo(): Promise<AccountInfo> {
		const raw = await this.exchange.fetchBalance();
		return mapBalance(balanceResponseSchema.parse(raw));
	}

	async getTradeHistory(symbol: string): Promise<ExchangeTrade[]> {
		const raw = await this.exchange.fetchMyTrades(symbol);
		return tradeListSchema.parse(raw).map((entry) => {
			const trade = mapMyTrade(myTradeSchema.parse(entry));
			return { ...trade, symbol: toCanonicalSymbol(trade.symbol) };
		});
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
