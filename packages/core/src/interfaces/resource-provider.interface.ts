/**
 * Resource Provider Interface
 *
 * Boundary between the engine and the cloud control plane. Implementations
 * return empty lists for "no data" and throw ProviderError for transport,
 * auth and not-found failures.
 */

import type {
  NetworkInterface,
  PowerState,
  Rule,
  RuleFields,
  SecurityGroup,
  Subnet,
  Target,
  TargetSummary,
} from "../types";

export interface IResourceProvider {
  /**
   * Fetch a full target snapshot.
   *
   * @param id - Target resource ID
   */
  getTarget(id: string): Promise<Target>;

  /**
   * List every target visible to the caller.
   */
  listTargets(): Promise<TargetSummary[]>;

  getInterface(id: string): Promise<NetworkInterface>;

  getSubnet(id: string): Promise<Subnet>;

  getGroup(id: string): Promise<SecurityGroup>;

  /**
   * Create an empty security group.
   *
   * @param name - Group name
   * @param resourceGroup - Resource group to create it in
   * @param location - Region, matching the target
   */
  createGroup(name: string, resourceGroup: string, location: string): Promise<SecurityGroup>;

  attachGroupToInterface(interfaceId: string, groupId: string): Promise<void>;

  attachGroupToSubnet(subnetId: string, groupId: string): Promise<void>;

  /**
   * List custom rules of a group. Provider default rules are not included.
   */
  listRules(groupName: string, resourceGroup: string): Promise<Rule[]>;

  createRule(groupName: string, resourceGroup: string, rule: RuleFields): Promise<Rule>;

  deleteRule(groupName: string, resourceGroup: string, ruleName: string): Promise<void>;

  getPowerState(id: string): Promise<PowerState>;

  /**
   * Start a target and wait for the start operation to complete.
   */
  startTarget(id: string): Promise<void>;

  /**
   * Resolve a public IP resource to its address.
   *
   * @returns The address, or undefined when none is allocated
   */
  getPublicAddress(publicIpId: string): Promise<string | undefined>;

  /**
   * Aggregate lookup of public addresses bound to any of the target's interfaces.
   */
  getTargetPublicAddresses(id: string): Promise<string[]>;
}
