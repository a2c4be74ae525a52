import {
	InsufficientBalanceError,
	createLogger,
	type ActivePositionSide,
	type ClosedTrade,
	type Fill,
	type Position,
} from "@tickforge/core";

const logger = createLogger("wallet-ledger");

const QUANTITY_EPSILON = 1e-12;

export interface WalletLedgerOptions {
	startingBalance: number;
	/** Paper accounts refuse fills that would take the balance below zero. */
	enforceBalance?: boolean;
}

export interface TradeStats {
	total: number;
	wins: number;
	losses: number;
	breakeven: number;
}

export interface LedgerSnapshot {
	startingBalance: number;
	balance: number;
	realizedPnl: number;
	equity: number;
	maxEquity: number;
	maxDrawdown: number;
	maxDrawdownPct: number;
	positions: Position[];
	trades: TradeStats;
	closedTrades: ClosedTrade[];
	lastTrade?: ClosedTrade;
	/** Every applied fill, oldest first. */
	fills: Fill[];
}

export type FillOutcome =
	| { kind: "opened"; position: Readonly<Position> }
	| { kind: "increased"; position: Readonly<Position> }
	| { kind: "closed"; trade: ClosedTrade; position: Readonly<Position> | null };

interface OpenPosition extends Position {
	side: ActivePositionSide;
	markPrice: number;
}

const assertFill = (fill: Fill): void => {
	if (!Number.isFinite(fill.price) || fill.price <= 0) {
		throw new Error(`Invalid fill price ${fill.price} for ${fill.symbol}`);
	}
	if (!Number.isFinite(fill.quantity) || fill.quantity <= 0) {
		throw new Error(`Invalid fill quantity ${fill.quantity} for ${fill.symbol}`);
	}
	if (!Number.isFinite(fill.commission) || fill.commission < 0) {
		throw new Error(`Invalid fill commission ${fill.commission} for ${fill.symbol}`);
	}
};

/**
 * Balance and position book for one account. `applyFill` is the only way
 * balances and positions change; a rejected fill leaves everything as it was.
 */
export class WalletLedger {
	private readonly startingBalance: number;
	private readonly enforceBalance: boolean;
	private balance: number;
	private realizedPnl = 0;
	private maxEquity: number;
	private maxDrawdown = 0;
	private maxDrawdownPct = 0;
	private readonly positions = new Map<string, OpenPosition>();
	private readonly closedTrades: ClosedTrade[] = [];
	private readonly fills: Fill[] = [];
	private readonly trades: TradeStats = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};

	constructor(options: WalletLedgerOptions) {
		if (!Number.isFinite(options.startingBalance) || options.startingBalance < 0) {
			throw new Error(
				`Starting balance must be a non-negative number, got ${options.startingBalance}`
			);
		}
		this.startingBalance = options.startingBalance;
		this.enforceBalance = options.enforceBalance ?? true;
		this.balance = options.startingBalance;
		this.maxEquity = options.startingBalance;
	}

	getBalance(): number {
		return this.balance;
	}

	position(symbol: string): Readonly<Position> | null {
		const position = this.positions.get(symbol);
		return position ? this.toPosition(position) : null;
	}

	applyFill(fill: Fill): FillOutcome {
		assertFill(fill);
		const current = this.positions.get(fill.symbol);
		const outcome = !current
			? this.open(fill)
			: (current.side === "LONG") === (fill.side === "BUY")
				? this.increase(current, fill)
				: this.reduce(current, fill);
		this.fills.push({ ...fill });
		this.updateEquity();
		logger.debug("fill_applied", {
			symbol: fill.symbol,
			side: fill.side,
			price: fill.price,
			quantity: fill.quantity,
			commission: fill.commission,
			outcome: outcome.kind,
			balance: this.balance,
		});
		return outcome;
	}

	/** Revalues the open position and tracks peak equity and drawdown. */
	markPrice(symbol: string, price: number): void {
		const position = this.positions.get(symbol);
		if (!position || !Number.isFinite(price) || price <= 0) {
			return;
		}
		position.markPrice = price;
		this.updateEquity();
	}

	equity(): number {
		let equity = this.balance;
		for (const position of this.positions.values()) {
			const value = position.markPrice * position.quantity;
			equity += position.side === "LONG" ? value : -value;
		}
		return equity;
	}

	snapshot(): LedgerSnapshot {
		const positions = Array.from(this.positions.values())
			.sort((a, b) => a.symbol.localeCompare(b.symbol))
			.map((position) => this.toPosition(position));
		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			realizedPnl: this.realizedPnl,
			equity: this.equity(),
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxDrawdown,
			maxDrawdownPct: this.maxDrawdownPct,
			positions,
			trades: { ...this.trades },
			closedTrades: this.closedTrades.map((trade) => ({ ...trade })),
			lastTrade: this.closedTrades.length
				? { ...this.closedTrades[this.closedTrades.length - 1] }
				: undefined,
			fills: this.fills.map((item) => ({ ...item })),
		};
	}

	private open(fill: Fill): FillOutcome {
		const notional = fill.price * fill.quantity;
		const side: ActivePositionSide = fill.side === "BUY" ? "LONG" : "SHORT";
		const delta =
			side === "LONG" ? -(notional + fill.commission) : notional - fill.commission;
		this.ensureAffordable(delta);
		this.balance += delta;
		const position: OpenPosition = {
			symbol: fill.symbol,
			side,
			entryPrice: fill.price,
			quantity: fill.quantity,
			openedAt: fill.timestamp,
			entryCommission: fill.commission,
			markPrice: fill.price,
		};
		this.positions.set(fill.symbol, position);
		return { kind: "opened", position: this.toPosition(position) };
	}

	private increase(position: OpenPosition, fill: Fill): FillOutcome {
		const notional = fill.price * fill.quantity;
		const delta =
			position.side === "LONG"
				? -(notional + fill.commission)
				: notional - fill.commission;
		this.ensureAffordable(delta);
		this.balance += delta;
		const quantity = position.quantity + fill.quantity;
		position.entryPrice =
			(position.entryPrice * position.quantity + notional) / quantity;
		position.quantity = quantity;
		position.entryCommission += fill.commission;
		position.markPrice = fill.price;
		return { kind: "increased", position: this.toPosition(position) };
	}

	private reduce(position: OpenPosition, fill: Fill): FillOutcome {
		if (fill.quantity > position.quantity + QUANTITY_EPSILON) {
			throw new Error(
				`Fill quantity ${fill.quantity} exceeds open ${position.side} position of ${position.quantity} ${fill.symbol}`
			);
		}
		const quantity = Math.min(fill.quantity, position.quantity);
		const notional = fill.price * quantity;
		const delta =
			position.side === "LONG"
				? notional - fill.commission
				: -(notional + fill.commission);
		this.ensureAffordable(delta);

		const share = quantity / position.quantity;
		const entryCommission = position.entryCommission * share;
		const commission = entryCommission + fill.commission;
		const gross =
			position.side === "LONG"
				? (fill.price - position.entryPrice) * quantity
				: (position.entryPrice - fill.price) * quantity;
		const realizedPnl = gross - commission;
		const trade: ClosedTrade = {
			symbol: fill.symbol,
			side: position.side,
			quantity,
			entryPrice: position.entryPrice,
			exitPrice: fill.price,
			commission,
			realizedPnl,
			profitPct: (realizedPnl / (position.entryPrice * quantity)) * 100,
			openedAt: position.openedAt,
			closedAt: fill.timestamp,
		};

		this.balance += delta;
		this.realizedPnl += realizedPnl;
		this.recordTrade(trade);

		const remaining = position.quantity - quantity;
		if (remaining <= QUANTITY_EPSILON) {
			this.positions.delete(fill.symbol);
			return { kind: "closed", trade, position: null };
		}
		position.quantity = remaining;
		position.entryCommission -= entryCommission;
		position.markPrice = fill.price;
		return { kind: "closed", trade, position: this.toPosition(position) };
	}

	private ensureAffordable(delta: number): void {
		if (this.enforceBalance && this.balance + delta < 0) {
			throw new InsufficientBalanceError(-delta, this.balance);
		}
	}

	private recordTrade(trade: ClosedTrade): void {
		this.closedTrades.push(trade);
		this.trades.total += 1;
		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}
	}

	private updateEquity(): void {
		const equity = this.equity();
		if (equity > this.maxEquity) {
			this.maxEquity = equity;
		}
		const drawdown = this.maxEquity - equity;
		if (drawdown > this.maxDrawdown) {
			this.maxDrawdown = drawdown;
		}
		const drawdownPct = this.maxEquity > 0 ? (drawdown / this.maxEquity) * 100 : 0;
		if (drawdownPct > this.maxDrawdownPct) {
			this.maxDrawdownPct = drawdownPct;
		}
	}

	private toPosition(position: OpenPosition): Readonly<Position> {
		return Object.freeze({
			symbol: position.symbol,
			side: position.side,
			entryPrice: position.entryPrice,
			quantity: position.quantity,
			openedAt: position.openedAt,
			entryCommission: position.entryCommission,
		});
	}
}
