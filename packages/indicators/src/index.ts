export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./macd";
export * from "./atr";
export * from "./vwap";
export * from "./extended";
export * from "./providers";
export * from "./IndicatorCache";
