export { AccessPlanner, buildAccessRule, planAccess } from "./access-planner";
export type { AccessPlannerOptions } from "./access-planner";
