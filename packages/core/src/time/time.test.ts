import { describe, it, expect } from "vitest";
import {
	timeframeToMs,
	parseTimeframe,
	bucketTimestamp,
	parseTimestamp,
} from "./time";

describe("time utilities", () => {
	describe("timeframeToMs", () => {
		it("should parse second and minute timeframes", () => {
			expect(timeframeToMs("1s")).toBe(1_000);
			expect(timeframeToMs("1m")).toBe(60_000);
			expect(timeframeToMs("5m")).toBe(300_000);
			expect(timeframeToMs("15m")).toBe(900_000);
		});

		it("should parse hour, day and week timeframes", () => {
			expect(timeframeToMs("4h")).toBe(14_400_000);
			expect(timeframeToMs("1d")).toBe(86_400_000);
			expect(timeframeToMs("1w")).toBe(604_800_000);
		});

		it("should be case-insensitive and trim whitespace", () => {
			expect(timeframeToMs("1H")).toBe(3_600_000);
			expect(timeframeToMs(" 5m ")).toBe(300_000);
		});

		it("should throw on invalid format", () => {
			expect(() => timeframeToMs("")).toThrow();
			expect(() => timeframeToMs("5")).toThrow("Invalid timeframe format");
			expect(() => timeframeToMs("m5")).toThrow("Invalid timeframe format");
			expect(() => timeframeToMs("5x")).toThrow("Invalid timeframe format");
		});

		it("should throw on zero periods", () => {
			expect(() => timeframeToMs("0m")).toThrow(
				"period must be positive, got 0"
			);
		});
	});

	describe("parseTimeframe", () => {
		it("should return structured format", () => {
			expect(parseTimeframe("5m")).toEqual({ unit: "m", n: 5, ms: 300_000 });
			expect(parseTimeframe("2w")).toEqual({
				unit: "w",
				n: 2,
				ms: 1_209_600_000,
			});
		});
	});

	describe("bucketTimestamp", () => {
		it("should floor to the bucket start", () => {
			expect(bucketTimestamp(1735690261234, 60_000)).toBe(1735690260000);
			expect(bucketTimestamp(299_999, 300_000)).toBe(0);
			expect(bucketTimestamp(300_000, 300_000)).toBe(300_000);
		});

		it("should reject invalid inputs", () => {
			expect(() => bucketTimestamp(-1, 60_000)).toThrow("Invalid timestamp");
			expect(() => bucketTimestamp(1, 0)).toThrow("Invalid timeframe ms");
		});
	});

	describe("parseTimestamp", () => {
		it("should accept ISO strings and epoch milliseconds", () => {
			expect(parseTimestamp("2024-01-01T00:00:00Z")).toBe(
				Date.UTC(2024, 0, 1)
			);
			expect(parseTimestamp("1704067200000")).toBe(1704067200000);
		});

		it("should throw on garbage", () => {
			expect(() => parseTimestamp("yesterday-ish")).toThrow(
				'Invalid timestamp: "yesterday-ish"'
			);
		});
	});
});
