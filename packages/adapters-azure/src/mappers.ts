/**
 * Mappers from Azure SDK models to engine records.
 *
 * SDK models mark nearly every field optional; absent values are defaulted
 * here so the engine never sees undefined where it expects a value.
 */

import type { InstanceViewStatus, VirtualMachine } from "@azure/arm-compute";
import type {
  NetworkInterface as AzureNetworkInterface,
  NetworkSecurityGroup,
  SecurityRule,
  Subnet as AzureSubnet,
} from "@azure/arm-network";
import {
  nameFromId,
  parseResourceId,
  segmentName,
  type NetworkInterface,
  type PowerState,
  type Rule,
  type RuleFields,
  type SecurityGroup,
  type Subnet,
  type Target,
  type TargetSummary,
} from "@portwarden/core";

function resourceGroupOf(id: string): string {
  try {
    return parseResourceId(id).resourceGroup;
  } catch {
    return "";
  }
}

function vnetOf(id: string): string {
  try {
    return segmentName(parseResourceId(id), "virtualNetworks") ?? "";
  } catch {
    return "";
  }
}

/**
 * Merge an SDK single-value field with its list counterpart.
 */
export function mergeField(single: string | undefined, list: string[] | undefined): string[] {
  const values = [...(list ?? [])];
  if (single) {
    values.unshift(single);
  }
  return values;
}

export function toTarget(vm: VirtualMachine): Target {
  const id = vm.id ?? "";
  const osProfile = vm.osProfile;
  const image = vm.storageProfile?.imageReference;
  const nics = [...(vm.networkProfile?.networkInterfaces ?? [])].sort(
    (a, b) => Number(b.primary ?? false) - Number(a.primary ?? false)
  );

  return {
    id,
    name: vm.name ?? nameFromId(id),
    resourceGroup: resourceGroupOf(id),
    location: vm.location,
    ...(osProfile
      ? {
          osProfile: {
            windows: osProfile.windowsConfiguration !== undefined,
            linux: osProfile.linuxConfiguration !== undefined,
          },
        }
      : {}),
    ...(vm.storageProfile?.osDisk?.osType ? { osDiskType: vm.storageProfile.osDisk.osType } : {}),
    ...(image ? { imageReference: { publisher: image.publisher, offer: image.offer, sku: image.sku } } : {}),
    networkInterfaceIds: nics.map((nic) => nic.id).filter((nicId): nicId is string => Boolean(nicId)),
  };
}

export function toTargetSummary(vm: VirtualMachine): TargetSummary {
  const id = vm.id ?? "";
  return { id, name: vm.name ?? nameFromId(id), resourceGroup: resourceGroupOf(id) };
}

export function toNetworkInterface(nic: AzureNetworkInterface): NetworkInterface {
  const id = nic.id ?? "";
  return {
    id,
    name: nic.name ?? nameFromId(id),
    resourceGroup: resourceGroupOf(id),
    primary: nic.primary ?? false,
    ...(nic.networkSecurityGroup?.id ? { networkSecurityGroupId: nic.networkSecurityGroup.id } : {}),
    ipConfigurations: (nic.ipConfigurations ?? []).map((config) => ({
      name: config.name ?? "",
      primary: config.primary ?? false,
      ...(config.subnet?.id ? { subnetId: config.subnet.id } : {}),
      ...(config.publicIPAddress?.id ? { publicIpAddressId: config.publicIPAddress.id } : {}),
    })),
  };
}

export function toSubnet(subnet: AzureSubnet): Subnet {
  const id = subnet.id ?? "";
  return {
    id,
    name: subnet.name ?? nameFromId(id),
    vnetName: vnetOf(id),
    resourceGroup: resourceGroupOf(id),
    ...(subnet.networkSecurityGroup?.id ? { networkSecurityGroupId: subnet.networkSecurityGroup.id } : {}),
  };
}

export function toSecurityGroup(nsg: NetworkSecurityGroup): SecurityGroup {
  const id = nsg.id ?? "";
  return {
    id,
    name: nsg.name ?? nameFromId(id),
    resourceGroup: resourceGroupOf(id),
    location: nsg.location ?? "",
  };
}

/**
 * Normalise an SDK rule. Missing priority maps to the top of the range so an
 * incomplete rule is never treated as the decisive one.
 */
export function toRule(rule: SecurityRule): Rule {
  return {
    name: rule.name ?? "",
    priority: rule.priority ?? Number.MAX_SAFE_INTEGER,
    direction: (rule.direction ?? "").toLowerCase() === "inbound" ? "Inbound" : "Outbound",
    access: (rule.access ?? "").toLowerCase() === "allow" ? "Allow" : "Deny",
    protocol: rule.protocol ?? "",
    sourceAddressPrefixes: mergeField(rule.sourceAddressPrefix, rule.sourceAddressPrefixes),
    sourcePortRanges: mergeField(rule.sourcePortRange, rule.sourcePortRanges),
    destinationAddressPrefixes: mergeField(rule.destinationAddressPrefix, rule.destinationAddressPrefixes),
    destinationPortRanges: mergeField(rule.destinationPortRange, rule.destinationPortRanges),
    ...(rule.description ? { description: rule.description } : {}),
  };
}

// Azure rejects a rule that sets both the single and list form of a field.
function splitField(values: string[]): { single?: string; list?: string[] } {
  return values.length === 1 ? { single: values[0] } : { list: values };
}

export function fromRuleFields(fields: RuleFields): SecurityRule {
  const sources = splitField(fields.sourceAddressPrefixes);
  const sourcePorts = splitField(fields.sourcePortRanges);
  const destinations = splitField(fields.destinationAddressPrefixes);
  const destinationPorts = splitField(fields.destinationPortRanges);

  return {
    priority: fields.priority,
    direction: fields.direction,
    access: fields.access,
    protocol: fields.protocol,
    sourceAddressPrefix: sources.single,
    sourceAddressPrefixes: sources.list,
    sourcePortRange: sourcePorts.single,
    sourcePortRanges: sourcePorts.list,
    destinationAddressPrefix: destinations.single,
    destinationAddressPrefixes: destinations.list,
    destinationPortRange: destinationPorts.single,
    destinationPortRanges: destinationPorts.list,
    description: fields.description,
  };
}

/**
 * Map instance view statuses to a power state. Transitional states other
 * than starting are reported as unknown.
 */
export function toPowerState(statuses: InstanceViewStatus[] | undefined): PowerState {
  const code = statuses?.find((s) => s.code?.startsWith("PowerState/"))?.code ?? "";

  switch (code) {
    case "PowerState/running":
      return "running";
    case "PowerState/stopped":
      return "stopped";
    case "PowerState/deallocated":
      return "deallocated";
    case "PowerState/starting":
      return "starting";
    default:
      return "unknown";
  }
}
