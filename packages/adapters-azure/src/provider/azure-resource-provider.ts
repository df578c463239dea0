/**
 * Azure Resource Provider
 *
 * IResourceProvider over the network and compute services. Every call is
 * retried on transient failures and surfaces as a ProviderError.
 */

import type {
  IResourceProvider,
  NetworkInterface,
  PowerState,
  Rule,
  RuleFields,
  SecurityGroup,
  Subnet,
  Target,
  TargetSummary,
} from "@portwarden/core";
import type { ComputeService } from "../compute/compute-service";
import { parseAzureError } from "../errors";
import type { NetworkService } from "../network/network-service";
import { withRetry, type RetryConfig } from "../retry";

export class AzureResourceProvider implements IResourceProvider {
  constructor(
    private readonly network: NetworkService,
    private readonly compute: ComputeService,
    private readonly retry: Partial<RetryConfig> = {}
  ) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, this.retry);
    } catch (error: unknown) {
      throw parseAzureError(error, operation);
    }
  }

  getTarget(id: string): Promise<Target> {
    return this.call(`get VM '${id}'`, () => this.compute.getVm(id));
  }

  listTargets(): Promise<TargetSummary[]> {
    return this.call("list VMs", () => this.compute.listVms());
  }

  getInterface(id: string): Promise<NetworkInterface> {
    return this.call(`get network interface '${id}'`, () => this.network.getInterface(id));
  }

  getSubnet(id: string): Promise<Subnet> {
    return this.call(`get subnet '${id}'`, () => this.network.getSubnet(id));
  }

  getGroup(id: string): Promise<SecurityGroup> {
    return this.call(`get NSG '${id}'`, () => this.network.getGroup(id));
  }

  createGroup(name: string, resourceGroup: string, location: string): Promise<SecurityGroup> {
    return this.call(`create NSG '${name}'`, () => this.network.createGroup(name, resourceGroup, location));
  }

  attachGroupToInterface(interfaceId: string, groupId: string): Promise<void> {
    return this.call(`attach NSG to network interface '${interfaceId}'`, () =>
      this.network.attachGroupToInterface(interfaceId, groupId)
    );
  }

  attachGroupToSubnet(subnetId: string, groupId: string): Promise<void> {
    return this.call(`attach NSG to subnet '${subnetId}'`, () => this.network.attachGroupToSubnet(subnetId, groupId));
  }

  listRules(groupName: string, resourceGroup: string): Promise<Rule[]> {
    return this.call(`list rules of NSG '${groupName}'`, () => this.network.listRules(groupName, resourceGroup));
  }

  createRule(groupName: string, resourceGroup: string, rule: RuleFields): Promise<Rule> {
    return this.call(`create rule '${rule.name}' in NSG '${groupName}'`, () =>
      this.network.createRule(groupName, resourceGroup, rule)
    );
  }

  deleteRule(groupName: string, resourceGroup: string, ruleName: string): Promise<void> {
    return this.call(`delete rule '${ruleName}' from NSG '${groupName}'`, () =>
      this.network.deleteRule(groupName, resourceGroup, ruleName)
    );
  }

  getPowerState(id: string): Promise<PowerState> {
    return this.call(`get power state of VM '${id}'`, () => this.compute.getPowerState(id));
  }

  startTarget(id: string): Promise<void> {
    return this.call(`start VM '${id}'`, () => this.compute.startVm(id));
  }

  getPublicAddress(publicIpId: string): Promise<string | undefined> {
    return this.call(`get public IP '${publicIpId}'`, () => this.network.getPublicAddress(publicIpId));
  }

  /**
   * Public addresses in the VM's resource group bound to any of its interfaces.
   */
  async getTargetPublicAddresses(id: string): Promise<string[]> {
    const target = await this.getTarget(id);
    return this.call(`list public IPs of VM '${target.name}'`, () =>
      this.network.listPublicAddressesForInterfaces(target.networkInterfaceIds)
    );
  }
}
