export { runBatch } from "./batch-runner";
export type { BatchItem } from "./batch-runner";
