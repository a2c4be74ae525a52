import { describe, expect, it } from "vitest";
import { getFlag, getNumberArg, getStringArg, parseCliArgs } from "./cliArgs";

describe("parseCliArgs", () => {
	it("reads space, equals and bare flags", () => {
		expect(
			parseCliArgs(["--symbol", "BTC/USDT", "--mode=live", "--json", "--speed", "5"])
		).toEqual({ symbol: "BTC/USDT", mode: "live", json: true, speed: "5" });
	});

	it("treats the first two positionals as start and end", () => {
		expect(parseCliArgs(["2024-01-01", "2024-02-01", "--json"])).toEqual({
			start: "2024-01-01",
			end: "2024-02-01",
			json: true,
		});
		expect(parseCliArgs(["2024-01-01", "--start", "2023-12-01"]).start).toBe("2023-12-01");
	});
});

describe("arg accessors", () => {
	const args = parseCliArgs(["--symbol", "", "--json", "--size", "2.5", "--bad", "x"]);

	it("ignores empty and boolean values for strings", () => {
		expect(getStringArg(args, "symbol")).toBeUndefined();
		expect(getStringArg(args, "json")).toBeUndefined();
		expect(getFlag(args, "json")).toBe(true);
		expect(getFlag(args, "missing")).toBe(false);
	});

	it("parses numbers and rejects garbage", () => {
		expect(getNumberArg(args, "size")).toBe(2.5);
		expect(getNumberArg(args, "missing")).toBeUndefined();
		expect(() => getNumberArg(args, "bad")).toThrow("Invalid numeric value for --bad: x");
	});
});
