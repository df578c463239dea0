/**
 * Azure Network Service
 *
 * NSG, rule, interface, subnet and public IP operations addressed by
 * resource ID. Returns engine records, not SDK models.
 */

import type { NetworkManagementClient } from "@azure/arm-network";
import {
  MANAGED_BY_TAG,
  MANAGED_BY_VALUE,
  noopLog,
  parseResourceId,
  segmentName,
  type LogCallback,
  type NetworkInterface,
  type Rule,
  type RuleFields,
  type SecurityGroup,
  type Subnet,
} from "@portwarden/core";
import { fromRuleFields, toNetworkInterface, toRule, toSecurityGroup, toSubnet } from "../mappers";

interface SubnetPath {
  resourceGroup: string;
  vnetName: string;
  subnetName: string;
}

function subnetPath(subnetId: string): SubnetPath {
  const parsed = parseResourceId(subnetId);
  const vnetName = segmentName(parsed, "virtualNetworks");
  const subnetName = segmentName(parsed, "subnets");
  if (!vnetName || !subnetName) {
    throw new Error(`Not a subnet resource ID: ${subnetId}`);
  }
  return { resourceGroup: parsed.resourceGroup, vnetName, subnetName };
}

export class NetworkService {
  constructor(
    private readonly networkClient: NetworkManagementClient,
    private readonly log: LogCallback = noopLog
  ) {}

  async getInterface(interfaceId: string): Promise<NetworkInterface> {
    const { resourceGroup, name } = parseResourceId(interfaceId);
    const nic = await this.networkClient.networkInterfaces.get(resourceGroup, name);
    return toNetworkInterface(nic);
  }

  async getSubnet(subnetId: string): Promise<Subnet> {
    const path = subnetPath(subnetId);
    const subnet = await this.networkClient.subnets.get(path.resourceGroup, path.vnetName, path.subnetName);
    return toSubnet(subnet);
  }

  async getGroup(groupId: string): Promise<SecurityGroup> {
    const { resourceGroup, name } = parseResourceId(groupId);
    const nsg = await this.networkClient.networkSecurityGroups.get(resourceGroup, name);
    return toSecurityGroup(nsg);
  }

  /**
   * Create an empty NSG. Azure adds its default rules (65000+) itself.
   */
  async createGroup(name: string, resourceGroup: string, location: string): Promise<SecurityGroup> {
    this.log(`Creating NSG: ${name}`, "detail");
    const nsg = await this.networkClient.networkSecurityGroups.beginCreateOrUpdateAndWait(resourceGroup, name, {
      location,
      tags: {
        [MANAGED_BY_TAG]: MANAGED_BY_VALUE,
      },
    });
    return toSecurityGroup(nsg);
  }

  async attachGroupToInterface(interfaceId: string, groupId: string): Promise<void> {
    const { resourceGroup, name } = parseResourceId(interfaceId);
    const nic = await this.networkClient.networkInterfaces.get(resourceGroup, name);
    await this.networkClient.networkInterfaces.beginCreateOrUpdateAndWait(resourceGroup, name, {
      ...nic,
      networkSecurityGroup: { id: groupId },
    });
  }

  async attachGroupToSubnet(subnetId: string, groupId: string): Promise<void> {
    const path = subnetPath(subnetId);
    const subnet = await this.networkClient.subnets.get(path.resourceGroup, path.vnetName, path.subnetName);
    await this.networkClient.subnets.beginCreateOrUpdateAndWait(
      path.resourceGroup,
      path.vnetName,
      path.subnetName,
      {
        ...subnet,
        networkSecurityGroup: { id: groupId },
      }
    );
  }

  /**
   * List the custom rules of an NSG. Default rules are not part of this listing.
   */
  async listRules(groupName: string, resourceGroup: string): Promise<Rule[]> {
    const rules: Rule[] = [];
    for await (const rule of this.networkClient.securityRules.list(resourceGroup, groupName)) {
      rules.push(toRule(rule));
    }
    return rules;
  }

  async createRule(groupName: string, resourceGroup: string, fields: RuleFields): Promise<Rule> {
    const created = await this.networkClient.securityRules.beginCreateOrUpdateAndWait(
      resourceGroup,
      groupName,
      fields.name,
      fromRuleFields(fields)
    );
    return toRule({ ...created, name: created.name ?? fields.name });
  }

  async deleteRule(groupName: string, resourceGroup: string, ruleName: string): Promise<void> {
    await this.networkClient.securityRules.beginDeleteAndWait(resourceGroup, groupName, ruleName);
  }

  /**
   * @returns The allocated address, or undefined for a dynamic IP that is not bound
   */
  async getPublicAddress(publicIpId: string): Promise<string | undefined> {
    const { resourceGroup, name } = parseResourceId(publicIpId);
    const pip = await this.networkClient.publicIPAddresses.get(resourceGroup, name);
    return pip.ipAddress || undefined;
  }

  /**
   * Addresses of every public IP in the subscription bound to one of the given interfaces.
   */
  async listPublicAddressesForInterfaces(interfaceIds: string[]): Promise<string[]> {
    const prefixes = interfaceIds.map((id) => `${id.toLowerCase()}/`);
    const addresses: string[] = [];

    for await (const pip of this.networkClient.publicIPAddresses.listAll()) {
      const configId = pip.ipConfiguration?.id?.toLowerCase();
      if (!configId || !pip.ipAddress) continue;
      if (prefixes.some((prefix) => configId.startsWith(prefix))) {
        addresses.push(pip.ipAddress);
      }
    }
    return addresses;
  }
}
