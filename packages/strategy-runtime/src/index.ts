export * from "./types";
export * from "./options";
export * from "./registry";
export * from "./StrategyRuntime";
export * from "./StrategySupervisor";
export * from "./strategies/crossover";
export * from "./strategies/smaCrossover";
export * from "./strategies/rsiReversal";
export * from "./strategies/macdCrossover";
export * from "./strategies/bollingerBands";
