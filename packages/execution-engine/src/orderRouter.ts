import {
	OrderSinkError,
	createLogger,
	describeError,
	type Fill,
	type OrderAck,
	type OrderSide,
	type OrderSink,
	type OrderStatusReport,
} from "@tickforge/core";
import type { WalletLedger } from "./walletLedger";

const logger = createLogger("order-router");

export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	quantity: number;
	reason?: string;
}

export interface PendingOrder {
	orderId: string;
	symbol: string;
	side: OrderSide;
	quantity: number;
	submittedAt: number;
	filledQuantity: number;
	filledNotional: number;
	commission: number;
}

export interface OrderRouterOptions {
	sink: OrderSink;
	ledger: WalletLedger;
	now?: () => number;
}

const TERMINAL_STATUSES = new Set(["FILLED", "CANCELED", "REJECTED"]);

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Routes live orders to an order sink. The ledger is only touched by
 * `reconcile`, from fills the sink reports.
 */
export class OrderRouter {
	private readonly sink: OrderSink;
	private readonly ledger: WalletLedger;
	private readonly now: () => number;
	private readonly pendingOrders = new Map<string, PendingOrder>();

	constructor(options: OrderRouterOptions) {
		this.sink = options.sink;
		this.ledger = options.ledger;
		this.now = options.now ?? Date.now;
	}

	pending(): PendingOrder[] {
		return Array.from(this.pendingOrders.values()).map((order) => ({ ...order }));
	}

	hasPending(symbol: string): boolean {
		for (const order of this.pendingOrders.values()) {
			if (order.symbol === symbol) {
				return true;
			}
		}
		return false;
	}

	async submit(request: OrderRequest): Promise<PendingOrder> {
		let ack: OrderAck;
		try {
			ack = await this.sink.placeOrder(
				request.symbol,
				request.side,
				"MARKET",
				request.quantity
			);
		} catch (error) {
			throw new OrderSinkError(
				`placeOrder failed for ${request.symbol}: ${errorMessage(error)}`,
				"placeOrder",
				error
			);
		}
		if (ack.status === "REJECTED") {
			throw new OrderSinkError(
				`Order ${ack.orderId} for ${request.symbol} was rejected`,
				"placeOrder"
			);
		}

		const order: PendingOrder = {
			orderId: ack.orderId,
			symbol: request.symbol,
			side: request.side,
			quantity: request.quantity,
			submittedAt: this.now(),
			filledQuantity: 0,
			filledNotional: 0,
			commission: 0,
		};
		this.pendingOrders.set(order.orderId, order);
		logger.info("order_submitted", {
			orderId: order.orderId,
			symbol: order.symbol,
			side: order.side,
			quantity: order.quantity,
			reason: request.reason,
		});
		return { ...order };
	}

	/**
	 * Polls every pending order once and applies newly reported fill
	 * quantity to the ledger. Orders in a terminal state are dropped.
	 */
	async reconcile(): Promise<Fill[]> {
		const applied: Fill[] = [];
		for (const order of Array.from(this.pendingOrders.values())) {
			let report: OrderStatusReport;
			try {
				report = await this.sink.getOrderStatus(order.orderId, order.symbol);
			} catch (error) {
				const failure = new OrderSinkError(
					`getOrderStatus failed for ${order.orderId}: ${errorMessage(error)}`,
					"getOrderStatus",
					error
				);
				logger.warn("order_status_unavailable", {
					orderId: order.orderId,
					error: describeError(failure),
				});
				continue;
			}

			const fill = this.nextFill(order, report);
			if (fill) {
				try {
					this.ledger.applyFill(fill);
					applied.push(fill);
				} catch (error) {
					logger.error("reconcile_fill_failed", {
						orderId: order.orderId,
						error: describeError(error),
					});
					this.pendingOrders.delete(order.orderId);
					continue;
				}
			}

			if (TERMINAL_STATUSES.has(report.status)) {
				this.pendingOrders.delete(order.orderId);
				logger.log(report.status === "FILLED" ? "info" : "warn", "order_closed", {
					orderId: order.orderId,
					status: report.status,
					filledQuantity: order.filledQuantity,
				});
			}
		}
		return applied;
	}

	/** Cancels every pending order, then reconciles to pick up partial fills. */
	async cancelPending(): Promise<void> {
		for (const order of Array.from(this.pendingOrders.values())) {
			try {
				await this.sink.cancelOrder(order.orderId, order.symbol);
				logger.info("order_cancel_requested", { orderId: order.orderId });
			} catch (error) {
				logger.warn("order_cancel_failed", {
					orderId: order.orderId,
					error: describeError(
						new OrderSinkError(
							`cancelOrder failed for ${order.orderId}: ${errorMessage(error)}`,
							"cancelOrder",
							error
						)
					),
				});
			}
		}
		await this.reconcile();
	}

	private nextFill(order: PendingOrder, report: OrderStatusReport): Fill | null {
		const quantity = report.filledQuantity - order.filledQuantity;
		if (quantity <= 0 || report.averagePrice === null) {
			return null;
		}
		const notional = report.averagePrice * report.filledQuantity;
		const fill: Fill = {
			symbol: order.symbol,
			side: order.side,
			price: (notional - order.filledNotional) / quantity,
			quantity,
			commission: Math.max(0, report.commission - order.commission),
			timestamp: report.updatedAt,
			orderId: order.orderId,
		};
		order.filledQuantity = report.filledQuantity;
		order.filledNotional = notional;
		order.commission = report.commission;
		return fill;
	}
}
