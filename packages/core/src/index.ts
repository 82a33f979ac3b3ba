/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the monorepo should depend on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./time";
export * from "./exchange";
export * from "./utils/logger";
