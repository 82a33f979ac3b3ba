export * from "./types";
export * from "./periodicTask";
export * from "./monitoringLoop";
export * from "./reconciliationScheduler";
export * from "./startMonitor";
