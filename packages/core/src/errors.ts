/**
 * Error types shared by the engine and resource providers.
 */

/**
 * Failure categories a resource provider reports.
 */
export enum ProviderErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  UNKNOWN = "UNKNOWN",
}

/**
 * Structured error for resource provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly originalError?: Error,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/**
 * Failure categories raised by the reconciliation engine itself.
 */
export enum ReconcileErrorType {
  /** Provider call failed; fatal to the current target or group */
  PROVIDER = "PROVIDER",
  /** No free priority left in the custom range */
  ALLOCATION_EXHAUSTED = "ALLOCATION_EXHAUSTED",
  /** A group was created but could not be attached; left for the next run */
  PARTIAL_PROVISIONING = "PARTIAL_PROVISIONING",
  INVALID_INPUT = "INVALID_INPUT",
}

export interface ReconcileErrorContext {
  targetId?: string;
  groupId?: string;
  groupName?: string;
}

export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly type: ReconcileErrorType,
    public readonly context: ReconcileErrorContext = {},
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ReconcileError";
  }
}

/**
 * Render any thrown value as a single human-readable line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
