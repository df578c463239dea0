import type { IRemediationPrompt, IResourceProvider, ITcpProbe } from "../interfaces";
import type { GuardingGroup, NetworkInterface, Rule, Subnet, Target } from "../types";

export const SUB = "/subscriptions/sub-123/resourceGroups/test-rg/providers";

export function vmId(name: string): string {
  return `${SUB}/Microsoft.Compute/virtualMachines/${name}`;
}

export function nicId(name: string): string {
  return `${SUB}/Microsoft.Network/networkInterfaces/${name}`;
}

export function subnetId(vnet: string, name: string): string {
  return `${SUB}/Microsoft.Network/virtualNetworks/${vnet}/subnets/${name}`;
}

export function nsgId(name: string): string {
  return `${SUB}/Microsoft.Network/networkSecurityGroups/${name}`;
}

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    name: "rule",
    priority: 100,
    direction: "Inbound",
    access: "Allow",
    protocol: "Tcp",
    sourceAddressPrefixes: ["*"],
    sourcePortRanges: ["*"],
    destinationAddressPrefixes: ["*"],
    destinationPortRanges: ["22"],
    ...overrides,
  };
}

export function makeTarget(overrides: Partial<Target> = {}): Target {
  return {
    id: vmId("web01"),
    name: "web01",
    resourceGroup: "test-rg",
    location: "eastus",
    osProfile: { windows: false, linux: true },
    networkInterfaceIds: [nicId("web01-nic")],
    ...overrides,
  };
}

export function makeInterface(overrides: Partial<NetworkInterface> = {}): NetworkInterface {
  return {
    id: nicId("web01-nic"),
    name: "web01-nic",
    resourceGroup: "test-rg",
    primary: true,
    ipConfigurations: [{ name: "ipconfig1", primary: true, subnetId: subnetId("vnet1", "default") }],
    ...overrides,
  };
}

export function makeSubnet(overrides: Partial<Subnet> = {}): Subnet {
  return {
    id: subnetId("vnet1", "default"),
    name: "default",
    vnetName: "vnet1",
    resourceGroup: "test-rg",
    ...overrides,
  };
}

export function makeGroup(name: string, overrides: Partial<GuardingGroup> = {}): GuardingGroup {
  return {
    id: nsgId(name),
    name,
    resourceGroup: "test-rg",
    location: "eastus",
    attachment: "nic",
    via: "web01-nic",
    autoCreated: false,
    ...overrides,
  };
}

// ── Mock collaborators ───────────────────────────────────────────────────

export function createMockProvider(): jest.Mocked<IResourceProvider> {
  return {
    getTarget: jest.fn(),
    listTargets: jest.fn(),
    getInterface: jest.fn(),
    getSubnet: jest.fn(),
    getGroup: jest.fn(),
    createGroup: jest.fn(),
    attachGroupToInterface: jest.fn(),
    attachGroupToSubnet: jest.fn(),
    listRules: jest.fn(),
    createRule: jest.fn(),
    deleteRule: jest.fn(),
    getPowerState: jest.fn(),
    startTarget: jest.fn(),
    getPublicAddress: jest.fn(),
    getTargetPublicAddresses: jest.fn(),
  };
}

export function createMockProbe(): jest.Mocked<ITcpProbe> {
  return { connect: jest.fn() };
}

export function createMockPrompt(): jest.Mocked<IRemediationPrompt> {
  return { askYesNo: jest.fn() };
}
