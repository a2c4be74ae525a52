import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import type { ExecutionMode } from "./types";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config) ?? {};
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	return configMetadata.get(config) ?? null;
};

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".env.example", ".git"];

export interface EnvConfig {
	executionMode: ExecutionMode;
	exchangeId: string;
	apiKey: string;
	apiSecret: string;
	sandbox: boolean;
	defaultSymbol: string;
	defaultTimeframe: string;
}

const accountConfigSchema = z
	.object({
		startingBalance: z.number().nonnegative(),
		commissionRate: z.number().min(0).max(1).default(0.001),
		allowShort: z.boolean().default(false),
		defaultQuantity: z.number().positive().default(1),
	})
	.strict();

export type AccountConfig = z.infer<typeof accountConfigSchema>;

const strategyProfileSchema = z
	.object({
		strategyId: z.string().min(1),
		symbol: z.string().min(1).optional(),
		timeframe: z.string().min(1).optional(),
		params: z.record(z.unknown()).default({}),
	})
	.strict();

export type StrategyProfile = z.infer<typeof strategyProfileSchema>;

export const findWorkspaceRoot = (start = process.cwd()): string => {
	if (cachedWorkspaceRoot && start === process.cwd()) {
		return cachedWorkspaceRoot;
	}

	let current = start;

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	if (start === process.cwd()) {
		cachedWorkspaceRoot = current;
	}
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const getEnvVar = (key: string, fallback: string): string => {
	const value = process.env[key];
	if (value !== undefined && value.trim() !== "") {
		return value.trim();
	}
	return fallback;
};

const normalizeExecutionMode = (value: string): ExecutionMode => {
	return value.toLowerCase() === "live" ? "live" : "paper";
};

const parseBoolean = (value: string): boolean =>
	["1", "true", "yes", "on"].includes(value.toLowerCase());

export const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Invalid JSON in ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

const parseConfigFile = <T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	filePath: string
): T => {
	const result = schema.safeParse(readJsonFile(filePath));
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid config at ${filePath}: ${details}`);
	}
	return result.data;
};

/**
 * Reads `.env` once per path and resolves the runtime environment. Values
 * already present in `process.env` win over the file.
 */
export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		executionMode: normalizeExecutionMode(getEnvVar("EXECUTION_MODE", "paper")),
		exchangeId: getEnvVar("EXCHANGE_ID", "binance").toLowerCase(),
		apiKey: getEnvVar("EXCHANGE_API_KEY", ""),
		apiSecret: getEnvVar("EXCHANGE_API_SECRET", ""),
		sandbox: parseBoolean(getEnvVar("EXCHANGE_SANDBOX", "false")),
		defaultSymbol: getEnvVar("DEFAULT_SYMBOL", "BTC/USDT"),
		defaultTimeframe: getEnvVar("DEFAULT_TIMEFRAME", "1m"),
	};
};

export const loadAccountConfig = (
	configDir = getDefaultConfigDir(),
	accountProfile = "paper"
): AccountConfig => {
	const accountPath = path.join(configDir, "account", `${accountProfile}.json`);
	return withConfigMetadata(parseConfigFile(accountConfigSchema, accountPath), {
		source: "file",
		path: accountPath,
		profile: accountProfile,
	});
};

export const resolveStrategyProfilePath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "strategies", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Strategy config not found. Looked for ${candidates.join(", ")}`
	);
};

/**
 * Loads a strategy profile. Parameter values are validated later against
 * the strategy's declared options, not here.
 */
export const loadStrategyProfile = (
	configDir = getDefaultConfigDir(),
	profile: string
): StrategyProfile => {
	const profilePath = resolveStrategyProfilePath(configDir, profile);
	return withConfigMetadata(parseConfigFile(strategyProfileSchema, profilePath), {
		source: "file",
		path: profilePath,
		profile,
	});
};
