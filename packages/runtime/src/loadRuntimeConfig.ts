import fs from "node:fs";
import path from "node:path";
import {
	getConfigMetadata,
	getDefaultConfigDir,
	loadAccountConfig,
	loadEnvConfig,
	loadStrategyProfile,
	parseTimeframe,
	toCanonicalSymbol,
	type AccountConfig,
	type EnvConfig,
	type ExecutionMode,
	type StrategyProfile,
} from "@tickforge/core";
import {
	createDefaultRegistry,
	type StrategyRegistry,
} from "@tickforge/strategy-runtime";

export interface RuntimeProfileMetadata {
	account: string;
	accountPath?: string;
	strategy?: string;
	strategyPath?: string;
}

export interface RuntimeConfig {
	env: EnvConfig;
	account: AccountConfig;
	mode: ExecutionMode;
	strategyId: string;
	symbol: string;
	timeframe: string;
	params: Record<string, unknown>;
	profiles: RuntimeProfileMetadata;
}

export interface LoadRuntimeConfigOptions {
	configDir?: string;
	envPath?: string;
	/** Defaults to the execution mode: `account/paper.json` or `account/live.json`. */
	accountProfile?: string;
	/**
	 * Strategy profile under `strategies/`. Without one, a profile named
	 * after the strategy id is used when it exists.
	 */
	strategyProfile?: string;
	strategyId?: string;
	symbol?: string;
	timeframe?: string;
	mode?: ExecutionMode;
	startingBalance?: number;
	commissionRate?: number;
	params?: Record<string, unknown>;
	registry?: StrategyRegistry;
}

const findDefaultProfile = (
	configDir: string,
	strategyId: string
): StrategyProfile | null => {
	const candidate = path.join(configDir, "strategies", `${strategyId}.json`);
	return fs.existsSync(candidate)
		? loadStrategyProfile(configDir, strategyId)
		: null;
};

const applyAccountOverrides = (
	account: AccountConfig,
	options: LoadRuntimeConfigOptions
): AccountConfig => {
	const { startingBalance, commissionRate } = options;
	if (
		startingBalance !== undefined &&
		(!Number.isFinite(startingBalance) || startingBalance < 0)
	) {
		throw new Error(`Starting balance must be non-negative, got ${startingBalance}`);
	}
	if (
		commissionRate !== undefined &&
		(!Number.isFinite(commissionRate) || commissionRate < 0 || commissionRate > 1)
	) {
		throw new Error(`Commission rate must be between 0 and 1, got ${commissionRate}`);
	}
	return {
		...account,
		startingBalance: startingBalance ?? account.startingBalance,
		commissionRate: commissionRate ?? account.commissionRate,
	};
};

/**
 * Resolves what to run. Explicit options win over the strategy profile,
 * which wins over `.env` defaults.
 */
export const loadRuntimeConfig = (
	options: LoadRuntimeConfigOptions = {}
): RuntimeConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = loadEnvConfig(options.envPath);
	const mode = options.mode ?? env.executionMode;
	const registry = options.registry ?? createDefaultRegistry();

	const explicitProfile = options.strategyProfile
		? loadStrategyProfile(configDir, options.strategyProfile)
		: null;
	const strategyId = (options.strategyId ?? explicitProfile?.strategyId)
		?.trim()
		.toLowerCase();
	if (!strategyId) {
		throw new Error(
			`No strategy selected. Pass --strategy or a strategy profile. Available: ${registry
				.ids()
				.join(", ")}`
		);
	}
	registry.get(strategyId);

	const profile =
		explicitProfile && explicitProfile.strategyId === strategyId
			? explicitProfile
			: findDefaultProfile(configDir, strategyId);

	const timeframe =
		options.timeframe ?? profile?.timeframe ?? env.defaultTimeframe;
	parseTimeframe(timeframe);

	const accountProfile = options.accountProfile ?? mode;
	const loadedAccount = loadAccountConfig(configDir, accountProfile);
	const account = applyAccountOverrides(loadedAccount, options);

	return {
		env,
		account,
		mode,
		strategyId,
		symbol: toCanonicalSymbol(options.symbol ?? profile?.symbol ?? env.defaultSymbol),
		timeframe,
		params: { ...(profile?.params ?? {}), ...(options.params ?? {}) },
		profiles: {
			account: accountProfile,
			accountPath: getConfigMetadata(loadedAccount)?.path,
			strategy: profile ? getConfigMetadata(profile)?.profile : undefined,
			strategyPath: profile ? getConfigMetadata(profile)?.path : undefined,
		},
	};
};
