import {
	getNumberArg,
	getStringArg,
	parseCliArgs,
	type ExecutionMode,
} from "@tickforge/core";
import { parseStrategyArg } from "@tickforge/runtime";
import type { StrategyRegistry } from "@tickforge/strategy-runtime";

export type FeedKind = "ws" | "poll";

export interface TraderCliOptions {
	strategyId: string;
	strategyProfile?: string;
	accountProfile?: string;
	symbol?: string;
	timeframe?: string;
	/** Falls back to EXECUTION_MODE when absent. */
	mode?: ExecutionMode;
	feed: FeedKind;
	clockIntervalMs?: number;
	configDir?: string;
	envPath?: string;
}

const parseMode = (raw: string | undefined): ExecutionMode | undefined => {
	if (raw === undefined) {
		return undefined;
	}
	const mode = raw.toLowerCase();
	if (mode === "paper" || mode === "live") {
		return mode;
	}
	throw new Error(`Invalid --mode value: ${raw}. Expected "paper" or "live"`);
};

const parseFeed = (raw: string | undefined): FeedKind => {
	if (raw === undefined || raw === "ws") {
		return "ws";
	}
	if (raw === "poll") {
		return "poll";
	}
	throw new Error(`Invalid --feed value: ${raw}. Expected "ws" or "poll"`);
};

export const readTraderOptions = (
	argv: string[],
	registry: StrategyRegistry
): TraderCliOptions => {
	const args = parseCliArgs(argv);
	const clockIntervalMs = getNumberArg(args, "clockMs");
	if (clockIntervalMs !== undefined && clockIntervalMs < 0) {
		throw new Error(`Invalid --clockMs value: ${clockIntervalMs}`);
	}
	return {
		strategyId: parseStrategyArg(argv, registry),
		strategyProfile: getStringArg(args, "strategyProfile"),
		accountProfile: getStringArg(args, "accountProfile"),
		symbol: getStringArg(args, "symbol"),
		timeframe: getStringArg(args, "timeframe"),
		mode: parseMode(getStringArg(args, "mode")),
		feed: parseFeed(getStringArg(args, "feed")),
		clockIntervalMs,
		configDir: getStringArg(args, "configDir"),
		envPath: getStringArg(args, "envPath"),
	};
};
