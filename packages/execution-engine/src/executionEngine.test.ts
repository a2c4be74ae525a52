import { describe, expect, it } from "vitest";
import { HOLD, type Signal } from "@tickforge/core";
import { ExecutionEngine, type ExecutionResult } from "./executionEngine";
import { OrderRouter } from "./orderRouter";
import { FakeOrderSink, makeBar } from "./testSupport";
import { WalletLedger } from "./walletLedger";

const buy = (quantity?: number): Signal => ({
	action: "BUY",
	symbol: "BTC/USDT",
	quantity,
	reason: "test_buy",
});

const sell = (quantity?: number): Signal => ({
	action: "SELL",
	symbol: "BTC/USDT",
	quantity,
	reason: "test_sell",
});

const paperEngine = (startingBalance = 1000, allowShort = false) => {
	const ledger = new WalletLedger({ startingBalance });
	const engine = new ExecutionEngine({
		mode: "paper",
		ledger,
		commissionRate: 0.001,
		allowShort,
	});
	return { ledger, engine };
};

describe("ExecutionEngine paper mode", () => {
	it("fills at the bar close and settles the round trip", async () => {
		const { ledger, engine } = paperEngine();
		const closes = [105, 103, 110, 98];
		const signals = [buy(1), HOLD("BTC/USDT"), sell(1), HOLD("BTC/USDT")];

		const results: ExecutionResult[] = [];
		for (const [index, close] of closes.entries()) {
			results.push(await engine.execute(signals[index], makeBar(index, close)));
		}

		expect(results.map((result) => result.status)).toEqual([
			"filled",
			"skipped",
			"filled",
			"skipped",
		]);
		expect(results[0].fill).toEqual({
			symbol: "BTC/USDT",
			side: "BUY",
			price: 105,
			quantity: 1,
			commission: 105 * 0.001,
			timestamp: 60_000,
		});
		expect(results[2].trade?.realizedPnl).toBeCloseTo(4.785, 10);
		expect(ledger.getBalance()).toBeCloseTo(1000 - 105 * 1.001 + 110 * 0.999, 10);
		expect(ledger.position("BTC/USDT")).toBeNull();
	});

	it("skips a same-direction signal while a position is open", async () => {
		const { engine } = paperEngine();
		await engine.execute(buy(1), makeBar(0, 100));
		const result = await engine.execute(buy(1), makeBar(1, 101));
		expect(result).toMatchObject({ status: "skipped", reason: "position_already_long" });
		expect(engine.getPosition("BTC/USDT")?.quantity).toBe(1);
	});

	it("closes the whole position on an opposing signal regardless of its quantity", async () => {
		const { engine } = paperEngine();
		await engine.execute(buy(2), makeBar(0, 100));
		const result = await engine.execute(sell(5), makeBar(1, 100));
		expect(result.quantity).toBe(2);
		expect(engine.getPosition("BTC/USDT")).toBeNull();
	});

	it("only opens shorts when shorting is allowed", async () => {
		const flat = paperEngine();
		await expect(flat.engine.execute(sell(1), makeBar(0, 100))).resolves.toMatchObject({
			status: "skipped",
			reason: "short_selling_disabled",
		});

		const shorting = paperEngine(1000, true);
		const result = await shorting.engine.execute(sell(1), makeBar(0, 100));
		expect(result.status).toBe("filled");
		expect(shorting.ledger.position("BTC/USDT")?.side).toBe("SHORT");
	});

	it("rejects a signal the balance cannot cover and keeps going", async () => {
		const { ledger, engine } = paperEngine(50);
		const rejected = await engine.execute(buy(1), makeBar(0, 100));
		expect(rejected).toMatchObject({
			status: "rejected",
			reason: "insufficient_balance",
			quantity: 0,
		});
		expect(ledger.getBalance()).toBe(50);

		const affordable = await engine.execute(buy(0.1), makeBar(1, 100));
		expect(affordable.status).toBe("filled");
	});

	it("uses the default quantity when the signal has none", async () => {
		const ledger = new WalletLedger({ startingBalance: 1000 });
		const engine = new ExecutionEngine({
			mode: "paper",
			ledger,
			commissionRate: 0.002,
			defaultQuantity: 2,
		});
		await engine.execute(buy(), makeBar(0, 100));
		expect(ledger.getBalance()).toBeCloseTo(799.6, 10);
	});

	it("refuses a negative commission rate", () => {
		expect(
			() =>
				new ExecutionEngine({
					mode: "paper",
					ledger: new WalletLedger({ startingBalance: 1 }),
					commissionRate: -0.1,
				})
		).toThrow("Commission rate must be non-negative, got -0.1");
	});
});

describe("ExecutionEngine live mode", () => {
	const liveEngine = () => {
		const sink = new FakeOrderSink();
		const ledger = new WalletLedger({ startingBalance: 1000, enforceBalance: false });
		const router = new OrderRouter({ sink, ledger, now: () => 5 });
		const engine = new ExecutionEngine({ mode: "live", ledger, router });
		return { sink, ledger, router, engine };
	};

	it("requires a router", () => {
		expect(
			() =>
				new ExecutionEngine({
					mode: "live",
					ledger: new WalletLedger({ startingBalance: 1 }),
				})
		).toThrow("Live execution requires an order router");
	});

	it("submits a market order and leaves the ledger to reconciliation", async () => {
		const { sink, ledger, router, engine } = liveEngine();
		const result = await engine.execute(buy(1), makeBar(0, 100));
		expect(result).toMatchObject({ status: "submitted", orderId: "order-1" });
		expect(sink.placed).toEqual([
			{ symbol: "BTC/USDT", side: "BUY", type: "MARKET", quantity: 1 },
		]);
		expect(ledger.getBalance()).toBe(1000);

		const duplicate = await engine.execute(buy(1), makeBar(1, 100));
		expect(duplicate.reason).toBe("order_pending");

		sink.report("order-1", {
			status: "FILLED",
			filledQuantity: 1,
			averagePrice: 100,
			commission: 0.1,
		});
		await router.reconcile();
		expect(ledger.getBalance()).toBeCloseTo(899.9, 10);
		expect(ledger.position("BTC/USDT")?.side).toBe("LONG");
		expect(router.pending()).toEqual([]);
	});

	it("reports a failed submission without touching the ledger", async () => {
		const { sink, ledger, engine } = liveEngine();
		sink.placeError = new Error("exchange unavailable");
		const result = await engine.execute(buy(1), makeBar(0, 100));
		expect(result).toMatchObject({
			status: "failed",
			reason: "placeOrder failed for BTC/USDT: exchange unavailable",
		});
		expect(ledger.getBalance()).toBe(1000);
	});
});
