import {
	InsufficientBalanceError,
	OrderSinkError,
	createLogger,
	describeError,
	timeframeToMs,
	type ClosedTrade,
	type ExecutionMode,
	type Fill,
	type OrderSide,
	type Position,
	type SealedBar,
	type Signal,
} from "@tickforge/core";
import type { OrderRouter } from "./orderRouter";
import type { WalletLedger } from "./walletLedger";

const logger = createLogger("execution-engine");

export const DEFAULT_COMMISSION_RATE = 0.001;

export interface ExecutionEngineOptions {
	mode: ExecutionMode;
	ledger: WalletLedger;
	/** Required in live mode. */
	router?: OrderRouter;
	commissionRate?: number;
	allowShort?: boolean;
	/** Used when a signal carries no quantity. */
	defaultQuantity?: number;
}

export type ExecutionStatus =
	| "filled"
	| "submitted"
	| "skipped"
	| "rejected"
	| "failed";

export interface ExecutionResult {
	status: ExecutionStatus;
	mode: ExecutionMode;
	symbol: string;
	side?: OrderSide;
	quantity: number;
	price: number | null;
	reason?: string;
	fill?: Fill;
	trade?: ClosedTrade;
	orderId?: string;
}

interface OrderPlan {
	side: OrderSide;
	quantity: number;
	closing: boolean;
}

type PlanDecision = { plan: OrderPlan } | { skip: string };

/**
 * Turns signals into fills. Paper mode fills at the bar close against the
 * ledger; live mode hands the order to the router and leaves the ledger to
 * reconciliation. One signal produces at most one order.
 */
export class ExecutionEngine {
	readonly mode: ExecutionMode;
	private readonly ledger: WalletLedger;
	private readonly router?: OrderRouter;
	private readonly commissionRate: number;
	private readonly allowShort: boolean;
	private readonly defaultQuantity: number;

	constructor(options: ExecutionEngineOptions) {
		const commissionRate = options.commissionRate ?? DEFAULT_COMMISSION_RATE;
		if (!Number.isFinite(commissionRate) || commissionRate < 0) {
			throw new Error(`Commission rate must be non-negative, got ${commissionRate}`);
		}
		if (options.mode === "live" && !options.router) {
			throw new Error("Live execution requires an order router");
		}
		this.mode = options.mode;
		this.ledger = options.ledger;
		this.router = options.router;
		this.commissionRate = commissionRate;
		this.allowShort = options.allowShort ?? false;
		this.defaultQuantity = options.defaultQuantity ?? 1;
	}

	getPosition(symbol: string): Readonly<Position> | null {
		return this.ledger.position(symbol);
	}

	async execute(signal: Signal, bar: SealedBar): Promise<ExecutionResult> {
		if (signal.action === "HOLD") {
			return this.skipped(signal.symbol, "hold", bar.close);
		}
		if (this.router?.hasPending(signal.symbol)) {
			return this.skipped(signal.symbol, "order_pending", bar.close);
		}

		const decision = this.plan(signal);
		if ("skip" in decision) {
			logger.info("signal_skipped", {
				symbol: signal.symbol,
				action: signal.action,
				reason: decision.skip,
			});
			return this.skipped(signal.symbol, decision.skip, bar.close);
		}

		if (this.mode === "paper") {
			return this.fillPaper(signal, decision.plan, bar);
		}
		return this.submitLive(signal, decision.plan, bar);
	}

	private plan(signal: Signal): PlanDecision {
		const side: OrderSide = signal.action === "BUY" ? "BUY" : "SELL";
		const position = this.ledger.position(signal.symbol);
		if (position) {
			const opposing =
				(position.side === "LONG" && side === "SELL") ||
				(position.side === "SHORT" && side === "BUY");
			if (!opposing) {
				return {
					skip: position.side === "LONG" ? "position_already_long" : "position_already_short",
				};
			}
			return { plan: { side, quantity: position.quantity, closing: true } };
		}
		if (side === "SELL" && !this.allowShort) {
			return { skip: "short_selling_disabled" };
		}
		const quantity = signal.quantity ?? this.defaultQuantity;
		if (!Number.isFinite(quantity) || quantity <= 0) {
			return { skip: "invalid_quantity" };
		}
		return { plan: { side, quantity, closing: false } };
	}

	private fillPaper(
		signal: Signal,
		plan: OrderPlan,
		bar: SealedBar
	): ExecutionResult {
		const price = bar.close;
		const fill: Fill = {
			symbol: signal.symbol,
			side: plan.side,
			price,
			quantity: plan.quantity,
			commission: price * plan.quantity * this.commissionRate,
			timestamp: bar.openTime + timeframeToMs(bar.timeframe),
		};

		try {
			const outcome = this.ledger.applyFill(fill);
			logger.info("paper_fill", {
				symbol: fill.symbol,
				side: fill.side,
				price,
				quantity: fill.quantity,
				commission: fill.commission,
				closing: plan.closing,
				reason: signal.reason,
				balance: this.ledger.getBalance(),
			});
			return {
				status: "filled",
				mode: this.mode,
				symbol: fill.symbol,
				side: fill.side,
				quantity: fill.quantity,
				price,
				reason: signal.reason,
				fill,
				trade: outcome.kind === "closed" ? outcome.trade : undefined,
			};
		} catch (error) {
			if (!(error instanceof InsufficientBalanceError)) {
				throw error;
			}
			logger.warn("signal_rejected", {
				symbol: fill.symbol,
				side: fill.side,
				error: describeError(error),
				required: error.required,
				available: error.available,
			});
			return {
				status: "rejected",
				mode: this.mode,
				symbol: fill.symbol,
				side: fill.side,
				quantity: 0,
				price,
				reason: "insufficient_balance",
			};
		}
	}

	private async submitLive(
		signal: Signal,
		plan: OrderPlan,
		bar: SealedBar
	): Promise<ExecutionResult> {
		const router = this.router;
		if (!router) {
			throw new Error("Live execution requires an order router");
		}
		try {
			const order = await router.submit({
				symbol: signal.symbol,
				side: plan.side,
				quantity: plan.quantity,
				reason: signal.reason,
			});
			return {
				status: "submitted",
				mode: this.mode,
				symbol: order.symbol,
				side: order.side,
				quantity: order.quantity,
				price: bar.close,
				reason: signal.reason,
				orderId: order.orderId,
			};
		} catch (error) {
			if (!(error instanceof OrderSinkError)) {
				throw error;
			}
			logger.error("order_submit_failed", {
				symbol: signal.symbol,
				side: plan.side,
				error: describeError(error),
			});
			return {
				status: "failed",
				mode: this.mode,
				symbol: signal.symbol,
				side: plan.side,
				quantity: 0,
				price: bar.close,
				reason: error.message,
			};
		}
	}

	private skipped(symbol: string, reason: string, price: number): ExecutionResult {
		return {
			status: "skipped",
			mode: this.mode,
			symbol,
			quantity: 0,
			price,
			reason,
		};
	}
}
