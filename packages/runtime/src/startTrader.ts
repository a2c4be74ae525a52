import {
	describeError,
	type MarketDataSource,
	type Observation,
	type OrderSink,
} from "@tickforge/core";
import {
	ExecutionEngine,
	OrderRouter,
	WalletLedger,
	type LedgerSnapshot,
} from "@tickforge/execution-engine";
import { BoundedChannel, ChannelClosedError } from "@tickforge/market-data";
import type {
	StrategyDefinition,
	StrategySupervisor,
} from "@tickforge/strategy-runtime";
import { TradingPipeline } from "./loop/TradingPipeline";
import { logLedgerSnapshot, runtimeLogger } from "./runtimeShared";
import type { RuntimeConfig } from "./loadRuntimeConfig";

export const DEFAULT_CLOCK_INTERVAL_MS = 1_000;
export const DEFAULT_EVENT_BUFFER = 1_024;

export type LiveEvent =
	| { kind: "observation"; observation: Observation }
	| { kind: "clock"; now: number };

export type LiveTraderState = "IDLE" | "RUNNING" | "STOPPING" | "STOPPED";

export interface LiveTraderOptions {
	source: MarketDataSource;
	pipeline: TradingPipeline;
	/** Live mode only; reconciled on every clock event and drained on stop. */
	router?: OrderRouter;
	/** 0 disables the timer; `tick` still posts clock events. */
	clockIntervalMs?: number;
	bufferSize?: number;
	now?: () => number;
}

/**
 * One symbol's live loop. A pump copies the feed into a bounded channel, a
 * timer posts clock events into the same channel, and a single consumer
 * handles events strictly in arrival order.
 */
export class LiveTrader {
	private stateValue: LiveTraderState = "IDLE";
	private readonly channel: BoundedChannel<LiveEvent>;
	private readonly abort = new AbortController();
	private readonly now: () => number;
	private clockTimer: ReturnType<typeof setInterval> | null = null;
	private pumpTask: Promise<void> = Promise.resolve();
	private consumerTask: Promise<void> = Promise.resolve();
	private doneTask: Promise<void> = Promise.resolve();
	private stopTask: Promise<void> | null = null;
	private processed = 0;

	constructor(private readonly options: LiveTraderOptions) {
		this.channel = new BoundedChannel<LiveEvent>(
			options.bufferSize ?? DEFAULT_EVENT_BUFFER
		);
		this.now = options.now ?? Date.now;
	}

	get state(): LiveTraderState {
		return this.stateValue;
	}

	get eventsProcessed(): number {
		return this.processed;
	}

	get pipeline(): TradingPipeline {
		return this.options.pipeline;
	}

	start(): void {
		if (this.stateValue !== "IDLE") {
			throw new Error(`LiveTrader cannot start from state ${this.stateValue}`);
		}
		this.stateValue = "RUNNING";
		this.consumerTask = this.consume();
		this.pumpTask = this.pump();
		this.doneTask = this.consumerTask.then(() => this.stop());

		const interval = this.options.clockIntervalMs ?? DEFAULT_CLOCK_INTERVAL_MS;
		if (interval > 0) {
			this.clockTimer = setInterval(() => this.tick(), interval);
		}
		runtimeLogger.info("live_trader_started", {
			symbol: this.pipeline.symbol,
			timeframe: this.pipeline.timeframe,
			mode: this.pipeline.mode,
			strategyId: this.pipeline.strategyId,
		});
	}

	/** Posts a clock event; dropped when the channel is full. */
	tick(now = this.now()): boolean {
		const accepted = this.channel.trySend({ kind: "clock", now });
		if (!accepted && this.stateValue === "RUNNING") {
			runtimeLogger.debug("clock_event_dropped", { now });
		}
		return accepted;
	}

	/** Resolves once the trader has stopped, whether asked to or not. */
	wait(): Promise<void> {
		return this.doneTask;
	}

	/**
	 * Lets the in-flight event finish, then cancels pending live orders and
	 * stops the strategy. Events still buffered are discarded.
	 */
	stop(): Promise<void> {
		if (!this.stopTask) {
			this.stopTask = this.shutdown();
		}
		return this.stopTask;
	}

	private async shutdown(): Promise<void> {
		if (this.stateValue === "IDLE") {
			this.stateValue = "STOPPED";
			return;
		}
		this.stateValue = "STOPPING";
		if (this.clockTimer) {
			clearInterval(this.clockTimer);
			this.clockTimer = null;
		}
		this.abort.abort();
		const discarded = this.channel.size;
		this.channel.close();
		await this.consumerTask;
		await this.pumpTask;

		if (this.options.router) {
			await this.options.router.cancelPending();
		}
		await this.pipeline.stop();
		logLedgerSnapshot("live_final", this.pipeline.ledger.snapshot());
		this.stateValue = "STOPPED";
		runtimeLogger.info("live_trader_stopped", {
			symbol: this.pipeline.symbol,
			eventsProcessed: this.processed,
			eventsDiscarded: discarded,
		});
	}

	private async pump(): Promise<void> {
		try {
			for await (const observation of this.options.source.subscribe(
				this.pipeline.symbol,
				this.abort.signal
			)) {
				await this.channel.send({ kind: "observation", observation });
			}
			if (this.stateValue === "RUNNING") {
				runtimeLogger.warn("live_feed_ended", { symbol: this.pipeline.symbol });
			}
		} catch (error) {
			if (!(error instanceof ChannelClosedError)) {
				runtimeLogger.error("live_feed_failed", {
					symbol: this.pipeline.symbol,
					error: describeError(error),
				});
			}
		} finally {
			this.channel.close();
		}
	}

	private async consume(): Promise<void> {
		for await (const event of this.channel) {
			if (this.stateValue !== "RUNNING") {
				break;
			}
			try {
				await this.handle(event);
			} catch (error) {
				runtimeLogger.error("live_event_failed", {
					symbol: this.pipeline.symbol,
					kind: event.kind,
					error: describeError(error),
				});
			}
			this.processed += 1;
			if (this.pipeline.fault) {
				break;
			}
		}
	}

	private async handle(event: LiveEvent): Promise<void> {
		if (event.kind === "observation") {
			await this.pipeline.processObservation(event.observation);
			return;
		}
		if (this.options.router) {
			await this.options.router.reconcile();
		}
		await this.pipeline.processClock(event.now);
	}
}

export interface StartTraderDependencies {
	source: MarketDataSource;
	definition: StrategyDefinition;
	/** Required when the config selects live mode. */
	sink?: OrderSink;
	supervisor?: StrategySupervisor;
	clockIntervalMs?: number;
	now?: () => number;
}

export interface StartedTrader {
	trader: LiveTrader;
	ledger: WalletLedger;
	router?: OrderRouter;
	snapshot(): LedgerSnapshot;
}

/** Wires ledger, execution, pipeline and trader from a resolved config. */
export const startTrader = async (
	config: RuntimeConfig,
	dependencies: StartTraderDependencies
): Promise<StartedTrader> => {
	if (config.mode === "live" && !dependencies.sink) {
		throw new Error("Live mode requires an order sink");
	}
	const ledger = new WalletLedger({
		startingBalance: config.account.startingBalance,
		enforceBalance: config.mode === "paper",
	});
	const router =
		config.mode === "live" && dependencies.sink
			? new OrderRouter({ sink: dependencies.sink, ledger, now: dependencies.now })
			: undefined;
	const execution = new ExecutionEngine({
		mode: config.mode,
		ledger,
		router,
		commissionRate: config.account.commissionRate,
		allowShort: config.account.allowShort,
		defaultQuantity: config.account.defaultQuantity,
	});
	const pipeline = await TradingPipeline.start({
		symbol: config.symbol,
		timeframe: config.timeframe,
		mode: config.mode,
		definition: dependencies.definition,
		params: config.params,
		ledger,
		execution,
		supervisor: dependencies.supervisor,
	});

	const trader = new LiveTrader({
		source: dependencies.source,
		pipeline,
		router,
		clockIntervalMs: dependencies.clockIntervalMs,
		now: dependencies.now,
	});
	trader.start();
	return { trader, ledger, router, snapshot: () => ledger.snapshot() };
};
