export { nextFreePriority } from "./priority-allocator";
