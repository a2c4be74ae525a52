import { bollingerBandsDefinition } from "./strategies/bollingerBands";
import { macdCrossoverDefinition } from "./strategies/macdCrossover";
import { rsiReversalDefinition } from "./strategies/rsiReversal";
import { smaCrossoverDefinition } from "./strategies/smaCrossover";
import { defaultParameters, validateParameters } from "./options";
import type { StrategyDefinition, StrategyDescription } from "./types";

export class StrategyRegistry {
	private readonly definitions = new Map<string, StrategyDefinition>();

	/** Rejects duplicate ids and definitions whose defaults fail their own options. */
	register(definition: StrategyDefinition): void {
		if (this.definitions.has(definition.id)) {
			throw new Error(`Strategy already registered: ${definition.id}`);
		}
		validateParameters(definition, {});
		this.definitions.set(definition.id, definition);
	}

	has(id: string): boolean {
		return this.definitions.has(id);
	}

	get(id: string): StrategyDefinition {
		const definition = this.definitions.get(id);
		if (!definition) {
			throw new Error(
				`Unknown strategy id: ${id}. Available: ${this.ids().join(", ")}`
			);
		}
		return definition;
	}

	ids(): string[] {
		return Array.from(this.definitions.keys()).sort();
	}

	list(): StrategyDescription[] {
		return this.ids().map((id) => this.describe(id));
	}

	describe(id: string): StrategyDescription {
		const definition = this.get(id);
		return {
			id: definition.id,
			name: definition.name,
			description: definition.description,
			defaults: defaultParameters(definition),
			options: definition.options,
		};
	}
}

export const BUILTIN_STRATEGIES: readonly StrategyDefinition[] = [
	smaCrossoverDefinition,
	rsiReversalDefinition,
	macdCrossoverDefinition,
	bollingerBandsDefinition,
];

export const createDefaultRegistry = (): StrategyRegistry => {
	const registry = new StrategyRegistry();
	for (const definition of BUILTIN_STRATEGIES) {
		registry.register(definition);
	}
	return registry;
};

const defaultRegistry = createDefaultRegistry();

export const listStrategies = (): StrategyDescription[] => defaultRegistry.list();

export const describeStrategy = (id: string): StrategyDescription =>
	defaultRegistry.describe(id);

export const getStrategyDefinition = (id: string): StrategyDefinition =>
	defaultRegistry.get(id);
