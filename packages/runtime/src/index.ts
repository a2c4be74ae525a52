export * from "./runtimeShared";
export * from "./loop/TradingPipeline";
export * from "./backtest/backtestTypes";
export * from "./backtest/performance";
export * from "./backtest/BacktestSession";
export * from "./backtest/backtestRunner";
export * from "./startTrader";
export * from "./loadRuntimeConfig";
export * from "./parseStrategyArg";
