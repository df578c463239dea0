/**
 * @portwarden/core
 *
 * Rule reconciliation engine: decides whether a caller already has inbound
 * access to a target's remote-management port and, if not, adds the missing
 * rule to every security group on the path.
 */

export * from "./types";
export * from "./constants";
export * from "./config";
export * from "./errors";
export type { IResourceProvider, ITcpProbe, IRemediationPrompt } from "./interfaces";
export * from "./classifier";
export * from "./matcher";
export * from "./dedup";
export * from "./priority";
export * from "./topology";
export * from "./planner";
export * from "./verifier";
export * from "./cleanup";
export * from "./batch";
export * from "./utils";
