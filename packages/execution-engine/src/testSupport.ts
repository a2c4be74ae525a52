import type {
	AccountInfo,
	ExchangeTrade,
	OrderAck,
	OrderSide,
	OrderSink,
	OrderStatusReport,
	OrderType,
	SealedBar,
} from "@tickforge/core";

export const makeBar = (index: number, close: number, timeframe = "1m"): SealedBar =>
	Object.freeze({
		symbol: "BTC/USDT",
		timeframe,
		openTime: index * 60_000,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	});

export interface PlacedOrder {
	symbol: string;
	side: OrderSide;
	type: OrderType;
	quantity: number;
}

/** In-memory order sink; tests script the status reports it returns. */
export class FakeOrderSink implements OrderSink {
	readonly placed: PlacedOrder[] = [];
	readonly cancelled: string[] = [];
	readonly reports = new Map<string, OrderStatusReport>();
	placeError: Error | null = null;
	statusError: Error | null = null;
	ackStatus: OrderAck["status"] = "NEW";
	private nextId = 1;

	async placeOrder(
		symbol: string,
		side: OrderSide,
		type: OrderType,
		quantity: number
	): Promise<OrderAck> {
		if (this.placeError) {
			throw this.placeError;
		}
		this.placed.push({ symbol, side, type, quantity });
		const orderId = `order-${this.nextId}`;
		this.nextId += 1;
		return { orderId, status: this.ackStatus };
	}

	async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
		if (this.statusError) {
			throw this.statusError;
		}
		const report = this.reports.get(orderId);
		if (!report) {
			throw new Error(`unknown order ${orderId}`);
		}
		return report;
	}

	async cancelOrder(orderId: string): Promise<void> {
		this.cancelled.push(orderId);
		const report = this.reports.get(orderId);
		if (report) {
			this.reports.set(orderId, { ...report, status: "CANCELED" });
		}
	}

	async getAccountInfo(): Promise<AccountInfo> {
		return { balances: [] };
	}

	async getTradeHistory(): Promise<ExchangeTrade[]> {
		return [];
	}

	report(
		orderId: string,
		update: Partial<OrderStatusReport> & Pick<OrderStatusReport, "status">
	): void {
		this.reports.set(orderId, {
			orderId,
			symbol: "BTC/USDT",
			side: "BUY",
			filledQuantity: 0,
			averagePrice: null,
			commission: 0,
			updatedAt: 1_000,
			...update,
		});
	}
}
