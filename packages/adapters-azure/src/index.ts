/**
 * @portwarden/adapters-azure
 *
 * Azure implementation of the portwarden resource provider.
 */

// Provider
export { AzureResourceProvider } from "./provider/azure-resource-provider";
export { createAzureResourceProvider } from "./azure-provider-factory";
export type { AzureProviderConfig } from "./azure-provider-factory";

// Services
export { ComputeService } from "./compute/compute-service";
export { NetworkService } from "./network/network-service";

// Errors & retry
export { getErrorDetails, isNotFoundError, parseAzureError } from "./errors";
export type { AzureErrorDetails } from "./errors";
export { DEFAULT_RETRY_CONFIG, isRetryableError, withRetry } from "./retry";
export type { RetryConfig } from "./retry";
