export { RuleCleaner } from "./rule-cleaner";
export type { GroupDedupResult, RemovalFailure, RemovalSummary, RuleCleanerOptions } from "./rule-cleaner";
