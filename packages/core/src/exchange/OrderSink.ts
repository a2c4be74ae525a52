import type { OrderSide, OrderType } from "../types";

export type OrderStatus =
	| "NEW"
	| "PARTIALLY_FILLED"
	| "FILLED"
	| "CANCELED"
	| "REJECTED";

export interface OrderAck {
	orderId: string;
	status: OrderStatus;
}

export interface OrderStatusReport {
	orderId: string;
	symbol: string;
	side: OrderSide;
	status: OrderStatus;
	filledQuantity: number;
	averagePrice: number | null;
	commission: number;
	updatedAt: number;
}

export interface AccountBalance {
	asset: string;
	free: number;
	locked: number;
}

export interface AccountInfo {
	balances: AccountBalance[];
}

export interface ExchangeTrade {
	id: string;
	orderId?: string;
	symbol: string;
	side: OrderSide;
	price: number;
	quantity: number;
	commission: number;
	timestamp: number;
}

/**
 * Destination for live orders. Rejections surface as thrown errors, which
 * callers wrap in `OrderSinkError`.
 */
export interface OrderSink {
	placeOrder(
		symbol: string,
		side: OrderSide,
		type: OrderType,
		quantity: number
	): Promise<OrderAck>;
	getOrderStatus(orderId: string, symbol?: string): Promise<OrderStatusReport>;
	cancelOrder(orderId: string, symbol?: string): Promise<void>;
	getAccountInfo(): Promise<AccountInfo>;
	getTradeHistory(symbol: string): Promise<ExchangeTrade[]>;
}
