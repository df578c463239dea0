/**
 * Network Topology Type Definitions
 */

/**
 * One IP configuration on a network interface.
 */
export interface IpConfiguration {
  name: string;
  primary: boolean;
  subnetId?: string;
  publicIpAddressId?: string;
}

/**
 * A network interface attached to a target.
 */
export interface NetworkInterface {
  id: string;
  name: string;
  resourceGroup: string;
  primary: boolean;
  /** Directly attached security group, if any */
  networkSecurityGroupId?: string;
  ipConfigurations: IpConfiguration[];
}

/**
 * A subnet referenced by an interface's IP configuration.
 */
export interface Subnet {
  id: string;
  name: string;
  vnetName: string;
  resourceGroup: string;
  networkSecurityGroupId?: string;
}

/**
 * A named container of ordered rules, scoped to a resource group and region.
 */
export interface SecurityGroup {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
}

export type GroupAttachment = "nic" | "subnet";

/**
 * A security group together with the path it guards.
 */
export interface GuardingGroup extends SecurityGroup {
  attachment: GroupAttachment;
  /** Name of the interface or subnet the group was reached through */
  via: string;
  /** True when the group was provisioned during this run */
  autoCreated: boolean;
}
