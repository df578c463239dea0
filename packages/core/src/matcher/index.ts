export { portCovers, sourceCovers, isCustomRule, findCoveringRule } from "./matcher";
