export * from "./TradeLifecycle";
export * from "./KeyedLock";
export * from "./keys";
export * from "./tradeCodec";
