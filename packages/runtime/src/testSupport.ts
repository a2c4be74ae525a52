import type {
	AccountInfo,
	Bar,
	ExchangeTrade,
	MarketDataSource,
	Observation,
	OrderAck,
	OrderSink,
	OrderStatusReport,
	SealedBar,
} from "@tickforge/core";
import type { StrategyDefinition } from "@tickforge/strategy-runtime";

export type ScriptedAction = "BUY" | "SELL" | "HOLD" | "THROW";

/** Emits one scripted action per bar, then HOLD. */
export const scriptedDefinition = (
	actions: readonly ScriptedAction[],
	id = "scripted"
): StrategyDefinition => ({
	id,
	name: "Scripted",
	description: "Replays a fixed list of actions",
	options: [{ name: "quantity", type: "number", default: 1 }],
	indicators: () => [{ kind: "sma", period: 2 }],
	create: (params) => {
		let index = 0;
		return {
			onBar(bar) {
				const action = actions[index] ?? "HOLD";
				index += 1;
				if (action === "THROW") {
					throw new Error(`scripted failure at ${bar.openTime}`);
				}
				if (action === "HOLD") {
					return { action, symbol: bar.symbol, reason: "scripted_hold" };
				}
				const quantity = params.quantity;
				return {
					action,
					symbol: bar.symbol,
					quantity: typeof quantity === "number" ? quantity : 1,
					reason: `scripted_${action.toLowerCase()}`,
				};
			},
		};
	},
});

export const makeBars = (closes: readonly number[], timeframe = "1m"): Bar[] =>
	closes.map((close, index) => ({
		symbol: "BTC/USDT",
		timeframe,
		openTime: index * 60_000,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	}));

export const sealed = (bar: Bar): SealedBar => Object.freeze({ ...bar });

export class FakeHistorySource implements Pick<MarketDataSource, "fetchHistory"> {
	readonly requests: Array<{ symbol: string; timeframe: string; start: number; end: number }> = [];

	constructor(private readonly result: Bar[] | Error) {}

	async fetchHistory(
		symbol: string,
		timeframe: string,
		startTime: number,
		endTime: number
	): Promise<Bar[]> {
		this.requests.push({ symbol, timeframe, start: startTime, end: endTime });
		if (this.result instanceof Error) {
			throw this.result;
		}
		return this.result.map((bar) => ({ ...bar }));
	}
}

export const observation = (timestamp: number, price: number, quantity = 1): Observation => ({
	symbol: "BTC/USDT",
	price,
	quantity,
	timestamp,
});

/** Yields the given observations, then either ends or waits for abort. */
export class FakeFeed implements MarketDataSource {
	constructor(
		private readonly observations: readonly Observation[],
		private readonly holdOpen = false
	) {}

	async *subscribe(_symbol: string, signal?: AbortSignal): AsyncIterable<Observation> {
		for (const item of this.observations) {
			if (signal?.aborted) {
				return;
			}
			yield item;
		}
		if (this.holdOpen && signal && !signal.aborted) {
			await new Promise<void>((resolve) => {
				signal.addEventListener("abort", () => resolve(), { once: true });
			});
		}
	}

	async fetchHistory(): Promise<Bar[]> {
		return [];
	}
}

/** Fills every order in full at a fixed price once its status is queried. */
export class InstantFillSink implements OrderSink {
	readonly placed: Array<{ symbol: string; side: "BUY" | "SELL"; quantity: number }> = [];

	constructor(private readonly fillPrice: number) {}

	async placeOrder(
		symbol: string,
		side: "BUY" | "SELL",
		_type: "MARKET" | "LIMIT",
		quantity: number
	): Promise<OrderAck> {
		this.placed.push({ symbol, side, quantity });
		return { orderId: `order-${this.placed.length}`, status: "NEW" };
	}

	async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
		const index = Number(orderId.replace("order-", "")) - 1;
		const order = this.placed[index];
		return {
			orderId,
			symbol: order.symbol,
			side: order.side,
			status: "FILLED",
			filledQuantity: order.quantity,
			averagePrice: this.fillPrice,
			commission: 0,
			updatedAt: 0,
		};
	}

	async cancelOrder(): Promise<void> {}

	async getAccountInfo(): Promise<AccountInfo> {
		return { balances: [] };
	}

	async getTradeHistory(): Promise<ExchangeTrade[]> {
		return [];
	}
}
