import { z } from "zod";
import type {
	AccountInfo,
	Bar,
	ExchangeTrade,
	OrderSide,
	OrderStatus,
	OrderStatusReport,
} from "@tickforge/core";

const num = z.number().finite();
const optionalNum = num.nullable().optional();

const ohlcvRowSchema = z
	.tuple([num, num, num, num, num, optionalNum])
	.rest(z.unknown());

export const ohlcvResponseSchema = z.array(ohlcvRowSchema);

const feeSchema = z
	.object({ cost: optionalNum })
	.passthrough()
	.nullable()
	.optional();

const idSchema = z
	.union([z.string().min(1), z.number()])
	.transform((value) => String(value));

const sideSchema = z
	.string()
	.transform((value) => value.toUpperCase())
	.pipe(z.enum(["BUY", "SELL"]));

export const orderResponseSchema = z
	.object({
		id: idSchema,
		symbol: z.string().optional(),
		side: sideSchema.optional(),
		status: z.string().nullable().optional(),
		filled: optionalNum,
		average: optionalNum,
		price: optionalNum,
		fee: feeSchema,
		timestamp: optionalNum,
		lastTradeTimestamp: optionalNum,
	})
	.passthrough();

export type CcxtOrder = z.infer<typeof orderResponseSchema>;

export const tradeListSchema = z.array(z.unknown());

export const myTradeSchema = z
	.object({
		id: idSchema,
		order: idSchema.nullable().optional(),
		symbol: z.string(),
		side: sideSchema,
		price: num,
		amount: num,
		fee: feeSchema,
		timestamp: num,
	})
	.passthrough();

export const balanceResponseSchema = z
	.object({
		free: z.record(optionalNum).optional(),
		used: z.record(optionalNum).optional(),
	})
	.passthrough();

export const mapOhlcvRow = (
	row: z.infer<typeof ohlcvRowSchema>,
	symbol: string,
	timeframe: string
): Bar => {
	const [openTime, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		openTime,
		open,
		high,
		low,
		close,
		volume: volume ?? 0,
	};
};

export const mapOrderStatus = (
	status: string | null | undefined,
	filled: number
): OrderStatus => {
	switch (status?.toLowerCase()) {
		case "closed":
			return "FILLED";
		case "canceled":
		case "cancelled":
			return "CANCELED";
		case "rejected":
		case "expired":
			return "REJECTED";
		default:
			return filled > 0 ? "PARTIALLY_FILLED" : "NEW";
	}
};

export const mapOrderReport = (
	order: CcxtOrder,
	fallback: { symbol: string; side?: OrderSide; now: number }
): OrderStatusReport => {
	const filledQuantity = order.filled ?? 0;
	return {
		orderId: order.id,
		symbol: order.symbol ?? fallback.symbol,
		side: order.side ?? fallback.side ?? "BUY",
		status: mapOrderStatus(order.status, filledQuantity),
		filledQuantity,
		averagePrice: order.average ?? order.price ?? null,
		commission: order.fee?.cost ?? 0,
		updatedAt: order.lastTradeTimestamp ?? order.timestamp ?? fallback.now,
	};
};

export const mapMyTrade = (
	trade: z.infer<typeof myTradeSchema>
): ExchangeTrade => ({
	id: trade.id,
	...(trade.order ? { orderId: trade.order } : {}),
	symbol: trade.symbol,
	side: trade.side,
	price: trade.price,
	quantity: trade.amount,
	commission: trade.fee?.cost ?? 0,
	timestamp: trade.timestamp,
});

export const mapBalance = (
	balance: z.infer<typeof balanceResponseSchema>
): AccountInfo => {
	const free = balance.free ?? {};
	const used = balance.used ?? {};
	const assets = Array.from(
		new Set([...Object.keys(free), ...Object.keys(used)])
	).sort();
	return {
		balances: assets
			.map((asset) => ({
				asset,
				free: free[asset] ?? 0,
				locked: used[asset] ?? 0,
			}))
			.filter((entry) => entry.free !== 0 || entry.locked !== 0),
	};
};
