export * from "./boundedChannel";
export * from "./normalizer";
export * from "./ohlcAggregator";
export * from "./historical";
export * from "./WebSocketObservationSource";
