/**
 * Logging Type Definitions
 */

export type LogLevel = "info" | "success" | "warn" | "error" | "detail";

/**
 * Log sink handed to engine components.
 * Level is optional and defaults to "info".
 */
export type LogCallback = (message: string, level?: LogLevel) => void;

/**
 * Sink that drops every message.
 */
export const noopLog: LogCallback = () => undefined;
