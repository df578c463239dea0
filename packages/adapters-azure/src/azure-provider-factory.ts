/**
 * Azure Provider Factory
 *
 * Creates the SDK clients and wires them into an AzureResourceProvider.
 */

import { ComputeManagementClient } from "@azure/arm-compute";
import { NetworkManagementClient } from "@azure/arm-network";
import { DefaultAzureCredential, type TokenCredential } from "@azure/identity";
import { noopLog, type LogCallback } from "@portwarden/core";
import { ComputeService } from "./compute/compute-service";
import { NetworkService } from "./network/network-service";
import { AzureResourceProvider } from "./provider/azure-resource-provider";
import type { RetryConfig } from "./retry";

/**
 * Configuration for the Azure provider factory.
 */
export interface AzureProviderConfig {
  /** Azure subscription ID */
  subscriptionId: string;
  /** Azure credentials (optional, uses DefaultAzureCredential if not provided) */
  credential?: TokenCredential;
  log?: LogCallback;
  retry?: Partial<RetryConfig>;
}

export function createAzureResourceProvider(config: AzureProviderConfig): AzureResourceProvider {
  const credential = config.credential ?? new DefaultAzureCredential();
  const log = config.log ?? noopLog;

  const networkClient = new NetworkManagementClient(credential, config.subscriptionId);
  const computeClient = new ComputeManagementClient(credential, config.subscriptionId);

  return new AzureResourceProvider(
    new NetworkService(networkClient, log),
    new ComputeService(computeClient, log),
    config.retry
  );
}
