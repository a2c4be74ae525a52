/**
 * A single normalized price print. Produced by the normalizer, consumed once
 * by the aggregator.
 */
export interface Observation {
	readonly symbol: string;
	readonly price: number;
	readonly quantity: number;
	readonly timestamp: number;
	readonly tradeId?: string;
}

export interface Bar {
	symbol: string;
	timeframe: string;
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/** Bars leave the aggregator frozen; nothing downstream may alter them. */
export type SealedBar = Readonly<Bar>;

export type SignalAction = "BUY" | "SELL" | "HOLD";

export interface Signal {
	action: SignalAction;
	symbol: string;
	quantity?: number;
	reason: string;
}

export type ActivePositionSide = "LONG" | "SHORT";
export type PositionSide = ActivePositionSide | "FLAT";

export interface Position {
	symbol: string;
	side: PositionSide;
	entryPrice: number;
	quantity: number;
	openedAt: number;
	entryCommission: number;
}

export type OrderSide = "BUY" | "SELL";
export type OrderType = "MARKET" | "LIMIT";

/**
 * An executed trade applied to the ledger. Paper fills come from the
 * simulator; live fills are reconciled from the order sink.
 */
export interface Fill {
	symbol: string;
	side: OrderSide;
	price: number;
	quantity: number;
	commission: number;
	timestamp: number;
	orderId?: string;
}

export interface ClosedTrade {
	symbol: string;
	side: ActivePositionSide;
	quantity: number;
	entryPrice: number;
	exitPrice: number;
	commission: number;
	realizedPnl: number;
	profitPct: number;
	openedAt: number;
	closedAt: number;
}

export type ExecutionMode = "paper" | "live";

export const HOLD = (symbol: string, reason = "no_signal"): Signal => ({
	action: "HOLD",
	symbol,
	reason,
});
