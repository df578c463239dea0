export { TestHandler, createTestHandler } from "./test.handler";
export type { TestOptions } from "./test.handler";
