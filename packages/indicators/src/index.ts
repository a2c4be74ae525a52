export * from "./types";
export * from "./rollingWindow";
export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./macd";
export * from "./bollinger";
export * from "./atr";
export * from "./stochastic";
export * from "./factory";
export * from "./engine";
