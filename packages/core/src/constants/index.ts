/**
 * Constants Module
 *
 * Re-exports engine defaults and resource labels.
 */

export * from "./defaults";
export * from "./labels";
