export * from "./target";
export * from "./network";
export * from "./rule";
export * from "./service";
export * from "./logging";
export * from "./verification";
export * from "./report";
