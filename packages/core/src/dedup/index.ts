export { ruleSignature, findDuplicates } from "./rule-signature";
