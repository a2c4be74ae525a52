import { BacktestSession } from "./BacktestSession";
import type {
	BacktestConfig,
	BacktestDependencies,
	BacktestResult,
} from "./backtestTypes";

/** Loads and replays a range to the end in one call. */
export const runBacktest = async (
	config: BacktestConfig,
	dependencies: BacktestDependencies
): Promise<BacktestResult> => {
	const session = await BacktestSession.load(config, dependencies);
	await session.run();
	return session.result();
};
