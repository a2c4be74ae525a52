/**
 * Shared contracts for every pipeline stage: domain types, time helpers,
 * errors, logging, configuration and the external venue interfaces.
 */
export * from "./types";
export * from "./time";
export * from "./errors";
export * from "./symbols";
export * from "./config";
export * from "./exchange";
export * from "./utils/logger";
export * from "./utils/cliArgs";
