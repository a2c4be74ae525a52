export * from "./MarketDataSource";
export * from "./OrderSink";
