export { CleanupHandler, createCleanupHandler } from "./cleanup.handler";
export type { CleanupOptions } from "./cleanup.handler";
