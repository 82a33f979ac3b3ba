export * from "./ccxtExchangeClient";
export * from "./utils/ccxtMapper";
