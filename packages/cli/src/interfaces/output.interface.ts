/**
 * Output Service Interface
 *
 * Terminal rendering used by command handlers.
 */

import type { LogCallback } from "@portwarden/core";

export interface IOutputService {
  header(title: string, icon?: string): void;
  section(title: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Indented secondary line */
  detail(message: string): void;
  dim(message: string): void;
  newline(): void;
  table(headers: string[], rows: string[][]): void;

  startSpinner(text: string): void;
  stopSpinner(): void;

  /**
   * Log sink for engine components, routed to the level methods above.
   */
  readonly log: LogCallback;
}
