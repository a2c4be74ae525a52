export * from "./walletLedger";
export * from "./orderRouter";
export * from "./executionEngine";
