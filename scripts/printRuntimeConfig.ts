#!/usr/bin/env node
import process from "node:process";
import { getStringArg, parseCliArgs } from "@tickforge/core";
import { loadRuntimeConfig, parseStrategyArg } from "@tickforge/runtime";
import {
	createDefaultRegistry,
	validateParameters,
} from "@tickforge/strategy-runtime";

const USAGE = `Usage:
  npm run runtime:print-config -- --strategy=<id> [options]

Options:
  --strategy <id>          Strategy id (required)
  --strategyProfile <id>   Strategy profile under config/strategies
  --accountProfile <id>    Account profile under config/account
  --mode <paper|live>      Execution mode (defaults to EXECUTION_MODE)
  --symbol <symbol>        Override runtime symbol
  --timeframe <tf>         Override runtime timeframe
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --help                   Show this message`;

const mask = (secret: string): string =>
	secret ? `${secret.slice(0, 3)}***` : "";

const main = (): void => {
	const argv = process.argv.slice(2);
	const args = parseCliArgs(argv);
	if (args.help || argv.length === 0) {
		console.log(USAGE);
		return;
	}

	const registry = createDefaultRegistry();
	const mode = getStringArg(args, "mode");
	const config = loadRuntimeConfig({
		strategyId: parseStrategyArg(argv, registry),
		strategyProfile: getStringArg(args, "strategyProfile"),
		accountProfile: getStringArg(args, "accountProfile"),
		symbol: getStringArg(args, "symbol"),
		timeframe: getStringArg(args, "timeframe"),
		mode: mode === "live" || mode === "paper" ? mode : undefined,
		envPath: getStringArg(args, "envPath"),
		configDir: getStringArg(args, "configDir"),
		registry,
	});
	const definition = registry.get(config.strategyId);
	const resolvedParams = validateParameters(definition, config.params);

	console.log(
		JSON.stringify(
			{
				...config,
				env: {
					...config.env,
					apiKey: mask(config.env.apiKey),
					apiSecret: mask(config.env.apiSecret),
				},
				resolvedParams,
				indicators: definition.indicators(resolvedParams),
			},
			null,
			2
		)
	);
};

try {
	main();
} catch (error) {
	console.error(
		"runtime:print-config failed:",
		error instanceof Error ? error.message : error
	);
	process.exitCode = 1;
}
