import {
	StateConflictError,
	createLogger,
	type ExecutionMode,
} from "@tickforge/core";
import { StrategyRuntime } from "./StrategyRuntime";
import type { StrategyContext, StrategyDefinition } from "./types";

const logger = createLogger("strategy-supervisor");

export interface StartStrategyOptions {
	definition: StrategyDefinition;
	context: StrategyContext;
	params?: unknown;
}

export const slotKey = (mode: ExecutionMode, symbol: string): string =>
	`${mode}:${symbol}`;

/**
 * At most one live strategy per (mode, symbol). A slot is claimed before
 * onStart runs and released if start fails.
 */
export class StrategySupervisor {
	private readonly slots = new Map<string, StrategyRuntime>();

	async start(options: StartStrategyOptions): Promise<StrategyRuntime> {
		const key = slotKey(options.context.mode, options.context.symbol);
		const existing = this.slots.get(key);
		if (existing && existing.state !== "STOPPED") {
			throw new StateConflictError(
				`Strategy ${existing.instanceId} already active for ${key}`
			);
		}

		const runtime = new StrategyRuntime(options.definition, options.context);
		this.slots.set(key, runtime);
		try {
			await runtime.start(options.params);
		} catch (error) {
			if (this.slots.get(key) === runtime) {
				this.slots.delete(key);
			}
			throw error;
		}
		logger.debug("slot_claimed", { key, instanceId: runtime.instanceId });
		return runtime;
	}

	get(mode: ExecutionMode, symbol: string): StrategyRuntime | undefined {
		return this.slots.get(slotKey(mode, symbol));
	}

	active(): StrategyRuntime[] {
		return Array.from(this.slots.values()).filter(
			(runtime) => runtime.state === "RUNNING"
		);
	}

	async stop(mode: ExecutionMode, symbol: string): Promise<void> {
		const key = slotKey(mode, symbol);
		const runtime = this.slots.get(key);
		if (!runtime) {
			return;
		}
		try {
			await runtime.stop();
		} finally {
			if (this.slots.get(key) === runtime) {
				this.slots.delete(key);
			}
		}
	}

	async stopAll(): Promise<void> {
		const keys = Array.from(this.slots.values()).map((runtime) => runtime.context);
		await Promise.all(keys.map((context) => this.stop(context.mode, context.symbol)));
	}
}
