import { describe, expect, it, vi } from "vitest";
import {
	InvalidParametersError,
	StateConflictError,
	StrategyFaultError,
	type SealedBar,
	type Signal,
} from "@tickforge/core";
import { StrategyRuntime } from "./StrategyRuntime";
import { StrategySupervisor } from "./StrategySupervisor";
import { smaCrossoverDefinition } from "./strategies/smaCrossover";
import type { Strategy, StrategyContext, StrategyDefinition } from "./types";

const context = (
	symbol = "BTC/USDT",
	mode: StrategyContext["mode"] = "paper"
): StrategyContext => ({
	symbol,
	timeframe: "1m",
	mode,
	position: () => null,
});

const bar = (openTime: number): SealedBar =>
	Object.freeze({
		symbol: "BTC/USDT",
		timeframe: "1m",
		openTime,
		open: 1,
		high: 1,
		low: 1,
		close: 1,
		volume: 1,
	});

const deferred = () => {
	let resolve: () => void = () => undefined;
	const promise = new Promise<void>((done) => {
		resolve = done;
	});
	return { promise, resolve };
};

const definitionFor = (strategy: Strategy): StrategyDefinition => ({
	id: "test_strategy",
	name: "Test",
	description: "test double",
	options: [{ name: "size", type: "number", default: 1, constraints: { greaterThan: 0 } }],
	indicators: () => [],
	create: () => strategy,
});

const hold = (bar: SealedBar): Signal => ({
	action: "HOLD",
	symbol: bar.symbol,
	reason: "test",
});

describe("StrategyRuntime", () => {
	it("moves IDLE -> RUNNING -> STOPPED and calls the lifecycle hooks", async () => {
		const onStart = vi.fn();
		const onStop = vi.fn();
		const runtime = new StrategyRuntime(
			definitionFor({ onStart, onBar: hold, onStop }),
			context()
		);
		expect(runtime.state).toBe("IDLE");

		const params = await runtime.start({ size: 2 });
		expect(params).toEqual({ size: 2 });
		expect(onStart).toHaveBeenCalledWith({ size: 2 }, runtime.context);
		expect(runtime.state).toBe("RUNNING");

		await runtime.stop();
		expect(onStop).toHaveBeenCalledTimes(1);
		expect(runtime.state).toBe("STOPPED");
		await runtime.stop();
		expect(onStop).toHaveBeenCalledTimes(1);
	});

	it("stays IDLE when params are invalid", async () => {
		const runtime = new StrategyRuntime(smaCrossoverDefinition, context());
		await expect(runtime.start({ fast: 0 })).rejects.toBeInstanceOf(
			InvalidParametersError
		);
		expect(runtime.state).toBe("IDLE");
	});

	it("never runs two onBar calls at once", async () => {
		const gate = deferred();
		const events: string[] = [];
		const runtime = new StrategyRuntime(
			definitionFor({
				async onBar(current) {
					events.push(`start:${current.openTime}`);
					if (current.openTime === 0) {
						await gate.promise;
					}
					events.push(`end:${current.openTime}`);
					return hold(current);
				},
			}),
			context()
		);
		await runtime.start();

		const first = runtime.onBar(bar(0), {});
		const second = runtime.onBar(bar(60_000), {});
		await Promise.resolve();
		expect(events).toEqual(["start:0"]);

		gate.resolve();
		await Promise.all([first, second]);
		expect(events).toEqual(["start:0", "end:0", "start:60000", "end:60000"]);
	});

	it("discards the instance after an onBar fault", async () => {
		const onBar = vi.fn((current: SealedBar): Signal => {
			if (current.openTime === 0) {
				throw new Error("boom");
			}
			return hold(current);
		});
		const runtime = new StrategyRuntime(definitionFor({ onBar }), context());
		await runtime.start();

		await expect(runtime.onBar(bar(0), {})).rejects.toThrow(
			"Strategy test_strategy faulted in onBar: boom"
		);
		expect(runtime.state).toBe("STOPPED");
		expect(runtime.fault).toBeInstanceOf(StrategyFaultError);

		await expect(runtime.onBar(bar(60_000), {})).resolves.toEqual({
			action: "HOLD",
			symbol: "BTC/USDT",
			reason: "strategy_not_running",
		});
		expect(onBar).toHaveBeenCalledTimes(1);
	});

	it("faults on a signal with a non-positive quantity", async () => {
		const runtime = new StrategyRuntime(
			definitionFor({
				onBar: (current) => ({
					action: "BUY",
					symbol: current.symbol,
					quantity: -1,
					reason: "bad",
				}),
			}),
			context()
		);
		await runtime.start();
		await expect(runtime.onBar(bar(0), {})).rejects.toBeInstanceOf(
			StrategyFaultError
		);
	});

	it("faults on a signal for another symbol", async () => {
		const runtime = new StrategyRuntime(
			definitionFor({
				onBar: () => ({
					action: "BUY",
					symbol: "ETH/USDT",
					quantity: 1,
					reason: "wrong_market",
				}),
			}),
			context()
		);
		await runtime.start();
		await expect(runtime.onBar(bar(0), {})).rejects.toThrow(
			"Strategy test_strategy faulted in onBar: Signal symbol ETH/USDT does not match BTC/USDT"
		);
		expect(runtime.state).toBe("STOPPED");
	});

	it("faults when a strategy returns no signal", async () => {
		const runtime = new StrategyRuntime(
			definitionFor({ onBar: () => JSON.parse("null") }),
			context()
		);
		await runtime.start();
		await expect(runtime.onBar(bar(0), {})).rejects.toThrow(
			"Strategy test_strategy faulted in onBar: Strategy returned null instead of a signal"
		);
	});

	it("stop waits for the in-flight bar and drops queued ones", async () => {
		const gate = deferred();
		const onStop = vi.fn();
		const runtime = new StrategyRuntime(
			definitionFor({
				async onBar(current) {
					await gate.promise;
					return { action: "BUY", symbol: current.symbol, reason: "late" };
				},
				onStop,
			}),
			context()
		);
		await runtime.start();

		const inFlight = runtime.onBar(bar(0), {});
		await Promise.resolve();
		const stopping = runtime.stop();
		const queued = runtime.onBar(bar(60_000), {});
		expect(onStop).not.toHaveBeenCalled();

		gate.resolve();
		await stopping;
		expect(onStop).toHaveBeenCalledTimes(1);
		await expect(inFlight).resolves.toMatchObject({ action: "BUY" });
		await expect(queued).resolves.toMatchObject({ reason: "strategy_not_running" });
	});

	it("records an onStart fault and stops", async () => {
		const runtime = new StrategyRuntime(
			definitionFor({
				onStart: () => {
					throw new Error("no warmup data");
				},
				onBar: hold,
			}),
			context()
		);
		await expect(runtime.start()).rejects.toThrow(
			"Strategy test_strategy faulted in onStart: no warmup data"
		);
		expect(runtime.state).toBe("STOPPED");
	});
});

describe("StrategySupervisor", () => {
	const definition = definitionFor({ onBar: hold });

	it("allows one active strategy per mode and symbol", async () => {
		const supervisor = new StrategySupervisor();
		await supervisor.start({ definition, context: context() });

		await expect(
			supervisor.start({ definition, context: context() })
		).rejects.toBeInstanceOf(StateConflictError);

		await supervisor.start({ definition, context: context("BTC/USDT", "live") });
		await supervisor.start({ definition, context: context("ETH/USDT") });
		expect(supervisor.active()).toHaveLength(3);

		await supervisor.stopAll();
		expect(supervisor.active()).toHaveLength(0);
	});

	it("frees the slot after stop or a failed start", async () => {
		const supervisor = new StrategySupervisor();
		await expect(
			supervisor.start({ definition, context: context(), params: { size: 0 } })
		).rejects.toBeInstanceOf(InvalidParametersError);
		expect(supervisor.get("paper", "BTC/USDT")).toBeUndefined();

		await supervisor.start({ definition, context: context() });
		await supervisor.stop("paper", "BTC/USDT");
		const restarted = await supervisor.start({ definition, context: context() });
		expect(restarted.state).toBe("RUNNING");
	});

	it("rejects a concurrent start while the first is still starting", async () => {
		const gate = deferred();
		const slow = definitionFor({
			onStart: () => gate.promise,
			onBar: hold,
		});
		const supervisor = new StrategySupervisor();
		const first = supervisor.start({ definition: slow, context: context() });
		await expect(
			supervisor.start({ definition: slow, context: context() })
		).rejects.toBeInstanceOf(StateConflictError);
		gate.resolve();
		await expect(first).resolves.toMatchObject({ state: "RUNNING" });
	});
});
