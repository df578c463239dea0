export { GrantHandler, createGrantHandler } from "./grant.handler";
export type { GrantOptions, GrantOutcome } from "./grant.handler";
