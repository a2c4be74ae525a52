export type TradingEngineErrorCode =
	| "STALE_OBSERVATION"
	| "INVALID_PARAMETERS"
	| "STRATEGY_FAULT"
	| "INSUFFICIENT_BALANCE"
	| "ORDER_SINK"
	| "HISTORY_FETCH"
	| "STATE_CONFLICT";

export class TradingEngineError extends Error {
	public readonly code: TradingEngineErrorCode;

	constructor(
		message: string,
		code: TradingEngineErrorCode,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.code = code;
		this.name = "TradingEngineError";
	}
}

/**
 * Observation older than the aggregator's open window. Dropped, never fatal.
 */
export class StaleObservationError extends TradingEngineError {
	constructor(
		public readonly symbol: string,
		public readonly timestamp: number,
		public readonly windowStart: number
	) {
		super(
			`Observation for ${symbol} at ${timestamp} precedes open window ${windowStart}`,
			"STALE_OBSERVATION"
		);
		this.name = "StaleObservationError";
	}
}

export interface ParameterIssue {
	path: string;
	message: string;
}

export class InvalidParametersError extends TradingEngineError {
	constructor(
		public readonly strategyId: string,
		public readonly issues: ParameterIssue[]
	) {
		super(
			`Invalid parameters for ${strategyId}: ${issues
				.map((issue) => `${issue.path || "<root>"}: ${issue.message}`)
				.join("; ")}`,
			"INVALID_PARAMETERS"
		);
		this.name = "InvalidParametersError";
	}
}

export type StrategyPhase = "onStart" | "onBar" | "onStop";

export class StrategyFaultError extends TradingEngineError {
	constructor(
		public readonly strategyId: string,
		public readonly phase: StrategyPhase,
		cause: unknown
	) {
		super(
			`Strategy ${strategyId} faulted in ${phase}: ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			"STRATEGY_FAULT",
			{ cause }
		);
		this.name = "StrategyFaultError";
	}
}

export class InsufficientBalanceError extends TradingEngineError {
	constructor(
		public readonly required: number,
		public readonly available: number
	) {
		super(
			`Insufficient balance: required ${required}, available ${available}`,
			"INSUFFICIENT_BALANCE"
		);
		this.name = "InsufficientBalanceError";
	}
}

export class OrderSinkError extends TradingEngineError {
	constructor(
		message: string,
		public readonly operation: string,
		cause?: unknown
	) {
		super(message, "ORDER_SINK", { cause });
		this.name = "OrderSinkError";
	}
}

export class HistoryFetchError extends TradingEngineError {
	constructor(message: string, cause?: unknown) {
		super(message, "HISTORY_FETCH", { cause });
		this.name = "HistoryFetchError";
	}
}

export class StateConflictError extends TradingEngineError {
	constructor(message: string) {
		super(message, "STATE_CONFLICT");
		this.name = "StateConflictError";
	}
}

export const isTradingEngineError = (
	value: unknown
): value is TradingEngineError => value instanceof TradingEngineError;
