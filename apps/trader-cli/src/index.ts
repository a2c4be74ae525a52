#!/usr/bin/env node

import process from "node:process";
import { createLogger, describeError, parseCliArgs } from "@tickforge/core";
import {
	CcxtExchangeClient,
	createCcxtExchange,
} from "@tickforge/exchange-ccxt";
import { WebSocketObservationSource } from "@tickforge/market-data";
import { loadRuntimeConfig, startTrader } from "@tickforge/runtime";
import { createDefaultRegistry } from "@tickforge/strategy-runtime";
import { readTraderOptions } from "./traderArgs";

const logger = createLogger("trader-cli");

const USAGE = `Usage:
  npm run trader -- --strategy <id> [options]

Options:
  --strategy <id>          Strategy id (required, alias --strategyId)
  --symbol <symbol>        Trading pair (defaults to the profile, then .env)
  --timeframe <tf>         Bar timeframe (defaults to the profile, then .env)
  --mode <paper|live>      Execution mode (defaults to EXECUTION_MODE)
  --feed <ws|poll>         WebSocket trade stream or polled REST trades (default ws)
  --clockMs <ms>           Bar-sealing clock interval, 0 disables (default 1000)
  --strategyProfile <id>   Strategy profile under config/strategies
  --accountProfile <id>    Account profile under config/account
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --help                   Show this message
`;

const main = async (): Promise<void> => {
	const argv = process.argv.slice(2);
	if (parseCliArgs(argv).help) {
		console.log(USAGE);
		return;
	}
	const registry = createDefaultRegistry();
	const options = readTraderOptions(argv, registry);
	const config = loadRuntimeConfig({
		configDir: options.configDir,
		envPath: options.envPath,
		accountProfile: options.accountProfile,
		strategyProfile: options.strategyProfile,
		strategyId: options.strategyId,
		symbol: options.symbol,
		timeframe: options.timeframe,
		mode: options.mode,
		registry,
	});
	if (config.mode === "live" && (!config.env.apiKey || !config.env.apiSecret)) {
		throw new Error(
			"Live mode requires EXCHANGE_API_KEY and EXCHANGE_API_SECRET"
		);
	}

	const client = new CcxtExchangeClient(
		createCcxtExchange({
			exchangeId: config.env.exchangeId,
			apiKey: config.env.apiKey,
			secret: config.env.apiSecret,
			sandbox: config.env.sandbox,
		})
	);
	const source =
		options.feed === "poll"
			? client
			: new WebSocketObservationSource({ history: client });

	logger.info("cli_starting", {
		strategyId: config.strategyId,
		symbol: config.symbol,
		timeframe: config.timeframe,
		mode: config.mode,
		feed: options.feed,
		exchange: config.env.exchangeId,
		sandbox: config.env.sandbox,
		profiles: config.profiles,
	});

	const { trader, snapshot } = await startTrader(config, {
		source,
		definition: registry.get(config.strategyId),
		sink: config.mode === "live" ? client : undefined,
		clockIntervalMs: options.clockIntervalMs,
	});

	const shutdown = (signal: NodeJS.Signals): void => {
		logger.info("cli_shutdown_requested", { signal });
		void trader.stop().catch((error: unknown) =>
			logger.error("cli_shutdown_failed", { error: describeError(error) })
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	await trader.wait();
	const final = snapshot();
	logger.info("cli_stopped", {
		balance: final.balance,
		equity: final.equity,
		realizedPnl: final.realizedPnl,
		trades: final.trades.total,
		fault: trader.pipeline.fault?.message ?? null,
	});
};

main().catch((error: unknown) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
