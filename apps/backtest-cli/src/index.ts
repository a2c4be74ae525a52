#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import process from "node:process";
import { parseCliArgs } from "@tickforge/core";
import {
	CcxtExchangeClient,
	createCcxtExchange,
} from "@tickforge/exchange-ccxt";
import {
	loadRuntimeConfig,
	runBacktest,
	type BacktestResult,
	type RuntimeConfig,
} from "@tickforge/runtime";
import { createDefaultRegistry } from "@tickforge/strategy-runtime";
import { readBacktestOptions } from "./cliArgs";
import { formatBacktestSummary } from "./report";

const USAGE = `Usage:
  npm run backtest -- --start <iso> --end <iso> [options]

Options (all optional unless noted):
  --start <iso>            ISO timestamp of the first bar (required)
  --end <iso>              ISO timestamp the range ends before (required)
  --strategy <id>          Strategy id (alias --strategyId)
  --strategyProfile <id>   Strategy profile under config/strategies
  --symbol <symbol>        Trading pair (defaults to the profile, then .env)
  --timeframe <tf>         Bar timeframe (defaults to the profile, then .env)
  --speed <rate|max>       Bars per bar interval of wall time (default max)
  --initialBalance <usd>   Override starting balance
  --commission <rate>      Override commission rate, e.g. 0.001
  --accountProfile <id>    Account profile under config/account (default paper)
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --json                   Print the full JSON result
  --help                   Show this message
`;

const persistBacktestResult = (
	result: BacktestResult,
	config: RuntimeConfig
): string => {
	const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
	const safeSymbol = result.symbol.replace(/[\\/]/g, "");
	const fileName = `${result.strategyId}-${safeSymbol}-${result.timeframe}-${timestamp}.json`;
	const outputDir = path.resolve(process.cwd(), "output", "backtests");
	fs.mkdirSync(outputDir, { recursive: true });
	const fingerprint = createHash("sha1")
		.update(
			JSON.stringify({
				strategyId: result.strategyId,
				symbol: result.symbol,
				timeframe: result.timeframe,
				params: result.params,
				account: config.account,
			})
		)
		.digest("hex")
		.slice(0, 12);
	const payload = {
		...result,
		metadata: {
			start: new Date(result.startTime).toISOString(),
			end: new Date(result.endTime).toISOString(),
			profiles: config.profiles,
			configFingerprint: fingerprint,
		},
	};
	const outputPath = path.join(outputDir, fileName);
	fs.writeFileSync(outputPath, JSON.stringify(payload, null, 2));
	console.log(`Backtest saved to ${path.relative(process.cwd(), outputPath) || outputPath}`);
	return outputPath;
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help) {
		console.log(USAGE);
		return;
	}
	const options = readBacktestOptions(args);
	const registry = createDefaultRegistry();

	const config = loadRuntimeConfig({
		configDir: options.configDir,
		envPath: options.envPath,
		accountProfile: options.accountProfile,
		strategyProfile: options.strategyProfile,
		strategyId: options.strategyId,
		symbol: options.symbol,
		timeframe: options.timeframe,
		mode: "paper",
		startingBalance: options.initialBalance,
		commissionRate: options.commissionRate,
		registry,
	});

	const client = new CcxtExchangeClient(
		createCcxtExchange({
			exchangeId: config.env.exchangeId,
			sandbox: config.env.sandbox,
		})
	);

	console.log(
		`Running backtest for ${config.symbol} ${config.timeframe} (${config.strategyId})...`
	);
	const result = await runBacktest(
		{
			symbol: config.symbol,
			timeframe: config.timeframe,
			startTime: options.startTime,
			endTime: options.endTime,
			definition: registry.get(config.strategyId),
			params: config.params,
			account: config.account,
			playbackRate: options.playbackRate,
		},
		{ source: client }
	);

	if (options.json) {
		console.log(JSON.stringify(result, null, 2));
	} else {
		formatBacktestSummary(result).forEach((line) => console.log(line));
	}
	persistBacktestResult(result, config);
	if (result.fault || result.error) {
		process.exitCode = 2;
	}
};

main().catch((error: unknown) => {
	console.error("Backtest failed:", error instanceof Error ? error.message : String(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
