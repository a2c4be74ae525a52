import {
	createDefaultRegistry,
	type StrategyRegistry,
} from "@tickforge/strategy-runtime";

const STRATEGY_FLAGS = ["--strategy", "--strategyId"];

const formatIds = (registry: StrategyRegistry): string =>
	registry
		.ids()
		.map((id) => `  - ${id}`)
		.join("\n");

/**
 * Reads `--strategy=<id>` or `--strategy <id>` (alias `--strategyId`) from
 * argv and checks it against the registry. Ids are matched lowercased.
 */
export const parseStrategyArg = (
	argv: string[],
	registry: StrategyRegistry = createDefaultRegistry()
): string => {
	let value: string | undefined;

	for (let i = 0; i < argv.length && value === undefined; i++) {
		const arg = argv[i];
		for (const flag of STRATEGY_FLAGS) {
			if (arg.startsWith(`${flag}=`)) {
				value = arg.slice(flag.length + 1);
			} else if (arg === flag && i + 1 < argv.length) {
				value = argv[i + 1];
			}
		}
	}

	if (!value) {
		throw new Error(
			`Missing required --strategy flag.\n\nUsage:\n  --strategy=<id>\n\nAvailable strategy ids:\n${formatIds(registry)}`
		);
	}

	const normalized = value.trim().toLowerCase();
	if (!registry.has(normalized)) {
		throw new Error(
			`Invalid strategy id: "${value}"\n\nAvailable strategy ids:\n${formatIds(registry)}`
		);
	}
	return normalized;
};
