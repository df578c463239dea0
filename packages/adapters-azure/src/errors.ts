/**
 * Azure error normalisation
 *
 * Maps REST and transport failures from the Azure SDK onto ProviderError.
 */

import { ProviderError, ProviderErrorType } from "@portwarden/core";

export interface AzureErrorDetails {
  statusCode?: number;
  code: string;
  message: string;
}

function readField(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * Pull status code, error code and message out of whatever the SDK threw.
 */
export function getErrorDetails(error: unknown): AzureErrorDetails {
  const statusCode = readField(error, "statusCode");
  const code = readField(error, "code");
  const message = readField(error, "message");
  return {
    statusCode: typeof statusCode === "number" ? statusCode : undefined,
    code: typeof code === "string" ? code : "",
    message: typeof message === "string" ? message : String(error),
  };
}

export function isNotFoundError(error: unknown): boolean {
  const { statusCode, code } = getErrorDetails(error);
  return statusCode === 404 || code === "ResourceNotFound" || code === "NotFound";
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"];

/**
 * Convert an SDK failure into a ProviderError with suggestions.
 *
 * @param operation - Human description of the failed call, e.g. "list rules of NSG 'web-nsg'"
 */
export function parseAzureError(error: unknown, operation: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const { statusCode, code, message } = getErrorDetails(error);
  const original = error instanceof Error ? error : undefined;
  const detail = `Failed to ${operation}: ${message}`;

  if (
    statusCode === 401 ||
    code === "CredentialUnavailableError" ||
    readField(error, "name") === "CredentialUnavailableError" ||
    readField(error, "name") === "AuthenticationError"
  ) {
    return new ProviderError(detail, ProviderErrorType.AUTHENTICATION, original, [
      "Run 'az login' to sign in",
      "Check AZURE_CLIENT_ID, AZURE_TENANT_ID and AZURE_CLIENT_SECRET if using a service principal",
    ]);
  }

  if (statusCode === 403 || code === "AuthorizationFailed") {
    return new ProviderError(detail, ProviderErrorType.AUTHORIZATION, original, [
      "Network Contributor on the target resource groups is required to change NSGs",
      "Virtual Machine Contributor is required to start VMs",
    ]);
  }

  if (isNotFoundError(error)) {
    return new ProviderError(detail, ProviderErrorType.NOT_FOUND, original, [
      "Check that the resource ID is correct",
      "Verify the subscription with AZURE_SUBSCRIPTION_ID",
    ]);
  }

  if (statusCode === 409 || code === "Conflict" || code === "SecurityRuleConflict") {
    return new ProviderError(detail, ProviderErrorType.ALREADY_EXISTS, original, [
      "Another operation may be modifying the same resource; retry shortly",
    ]);
  }

  if (statusCode === 429 || code === "QuotaExceeded" || code.includes("Throttl")) {
    return new ProviderError(detail, ProviderErrorType.QUOTA_EXCEEDED, original, [
      "Wait a few minutes and retry",
    ]);
  }

  if (NETWORK_CODES.includes(code)) {
    return new ProviderError(detail, ProviderErrorType.NETWORK, original, [
      "Check your internet connection",
      "Check proxy settings (HTTPS_PROXY)",
    ]);
  }

  return new ProviderError(detail, ProviderErrorType.UNKNOWN, original);
}
