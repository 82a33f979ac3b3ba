export * from "./calcPerformance";
export type * from "./metricsSchema";
