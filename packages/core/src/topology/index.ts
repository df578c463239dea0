export { TopologyResolver } from "./topology-resolver";
export type { TopologyResolverOptions } from "./topology-resolver";
