export * from "./types";
export * from "./normalizeCandidateTrade";
export * from "./ReconciliationEngine";
export * from "./RuleBasedSuggestionService";
export * from "./notifiers";
