export {
  isTargetResourceId,
  parseResourceId,
  segmentName,
  nameFromId,
} from "./resource-id";
export type { ParsedResourceId } from "./resource-id";
export {
  timestampToken,
  autoGroupName,
  sanitizeAddress,
  accessRuleName,
} from "./naming";
export type { TokenSource } from "./naming";
export { parseSelection } from "./selection";
export type { SelectionResult } from "./selection";
export { sleep } from "./sleep";
