import {
	getFlag,
	getNumberArg,
	getStringArg,
	parseTimestamp,
	type ArgMap,
} from "@tickforge/core";

export const getTimestampArg = (args: ArgMap, key: string): number => {
	const raw = getStringArg(args, key);
	if (!raw) {
		throw new Error(`Missing required --${key} <iso>`);
	}
	return parseTimestamp(raw);
};

/** `max` (or no flag) replays without waiting. */
export const parseSpeed = (raw: string | undefined): number => {
	if (raw === undefined || raw.toLowerCase() === "max") {
		return Number.POSITIVE_INFINITY;
	}
	const value = Number(raw);
	if (!(value > 0)) {
		throw new Error(`Invalid --speed value: ${raw}. Expected a positive number or "max"`);
	}
	return value;
};

export interface BacktestCliOptions {
	strategyId?: string;
	strategyProfile?: string;
	accountProfile?: string;
	symbol?: string;
	timeframe?: string;
	startTime: number;
	endTime: number;
	playbackRate: number;
	initialBalance?: number;
	commissionRate?: number;
	json: boolean;
	configDir?: string;
	envPath?: string;
}

export const readBacktestOptions = (args: ArgMap): BacktestCliOptions => {
	const startTime = getTimestampArg(args, "start");
	const endTime = getTimestampArg(args, "end");
	if (startTime >= endTime) {
		throw new Error("--start must be before --end");
	}
	return {
		strategyId: getStringArg(args, "strategy") ?? getStringArg(args, "strategyId"),
		strategyProfile: getStringArg(args, "strategyProfile"),
		accountProfile: getStringArg(args, "accountProfile"),
		symbol: getStringArg(args, "symbol"),
		timeframe: getStringArg(args, "timeframe"),
		startTime,
		endTime,
		playbackRate: parseSpeed(getStringArg(args, "speed")),
		initialBalance: getNumberArg(args, "initialBalance"),
		commissionRate: getNumberArg(args, "commission"),
		json: getFlag(args, "json"),
		configDir: getStringArg(args, "configDir"),
		envPath: getStringArg(args, "envPath") ?? getStringArg(args, "env"),
	};
};
