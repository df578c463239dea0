export { RemoveRulesHandler, createRemoveRulesHandler, CONFIRMATION_WORD } from "./remove-rules.handler";
export type { RemoveRulesOptions } from "./remove-rules.handler";
