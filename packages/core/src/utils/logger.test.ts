import { afterEach, describe, expect, it, vi } from "vitest";
import {
	createLogger,
	describeError,
	resolveLoggerSettings,
	sanitizeLogValue,
} from "./logger";

describe("logger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("prints error records as JSON lines", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const logger = createLogger("test-module");
		logger.error("boom", { ts: "2024-01-01T00:00:00.000Z", value: 3 });

		expect(spy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
			ts: "2024-01-01T00:00:00.000Z",
			level: "error",
			event: "boom",
			module: "test-module",
			value: 3,
		});
	});

	it("merges bound context without letting it replace core fields", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const logger = createLogger("test-module", { symbol: "BTC/USDT" }).child({
			instanceId: "sma_crossover#1",
			event: "shadowed",
		});
		logger.error("strategy_fault", { ts: "2024-01-01T00:00:00.000Z", symbol: "ETH/USDT" });

		expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
			ts: "2024-01-01T00:00:00.000Z",
			level: "error",
			event: "strategy_fault",
			module: "test-module",
			symbol: "ETH/USDT",
			instanceId: "sma_crossover#1",
		});
	});

	it("suppresses records below LOG_LEVEL", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		createLogger("test-module").debug("noise");
		expect(spy).not.toHaveBeenCalled();
	});

	it("resolves settings from the environment", () => {
		expect(resolveLoggerSettings({})).toEqual({
			minLevel: "info",
			modules: null,
			pretty: false,
			json: true,
		});
		expect(
			resolveLoggerSettings({
				LOG_LEVEL: " WARN ",
				LOG_MODULE: "order-router, wallet-ledger,",
				NODE_ENV: "development",
			})
		).toEqual({
			minLevel: "warn",
			modules: new Set(["order-router", "wallet-ledger"]),
			pretty: true,
			json: false,
		});
		expect(resolveLoggerSettings({ LOG_LEVEL: "verbose", LOG_PRETTY: "true", LOG_JSON: "true" })).toEqual({
			minLevel: "info",
			modules: null,
			pretty: true,
			json: true,
		});
	});

	it("sanitizes values JSON cannot carry", () => {
		const circular: Record<string, unknown> = { a: 1 };
		circular.self = circular;
		expect(
			sanitizeLogValue({
				big: 10n,
				fn: () => 1,
				inf: Infinity,
				when: new Date(0),
				circular,
			})
		).toEqual({
			big: "10",
			fn: "[function]",
			inf: "Infinity",
			when: "1970-01-01T00:00:00.000Z",
			circular: { a: 1, self: "[circular]" },
		});
	});

	it("describes caught values", () => {
		const err = Object.assign(new Error("nope"), { code: "E_TEST" });
		expect(describeError(err)).toEqual({
			name: "Error",
			message: "nope",
			code: "E_TEST",
		});
		expect(describeError("plain")).toEqual({ message: "plain" });
	});
});
