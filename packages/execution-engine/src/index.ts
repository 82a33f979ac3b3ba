export * from "./tradeExecutor";
export * from "./budgetManager";
export * from "./paperOrderGateway";
export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot, PaperFill } from "./paperAccount";
