import type { IResourceProvider, ITcpProbe, Target } from "@portwarden/core";
import type { CommandContext } from "../commands/command-context";
import type { CliConfig } from "../config";
import type { IOutputService, IPromptService } from "../interfaces";

export const RG = "/subscriptions/sub-123/resourceGroups/test-rg/providers";
export const vmId = (name: string) => `${RG}/Microsoft.Compute/virtualMachines/${name}`;
export const nicId = (name: string) => `${RG}/Microsoft.Network/networkInterfaces/${name}`;
export const nsgId = (name: string) => `${RG}/Microsoft.Network/networkSecurityGroups/${name}`;

export function makeTarget(name = "web01", overrides: Partial<Target> = {}): Target {
  return {
    id: vmId(name),
    name,
    resourceGroup: "test-rg",
    location: "eastus",
    osProfile: { windows: false, linux: true },
    networkInterfaceIds: [nicId(`${name}-nic`)],
    ...overrides,
  };
}

export function createMockOutput(): jest.Mocked<IOutputService> {
  return {
    header: jest.fn(),
    section: jest.fn(),
    info: jest.fn(),
    success: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    detail: jest.fn(),
    dim: jest.fn(),
    newline: jest.fn(),
    table: jest.fn(),
    startSpinner: jest.fn(),
    stopSpinner: jest.fn(),
    log: jest.fn(),
  };
}

export function createMockPrompt(): jest.Mocked<IPromptService> {
  return {
    askYesNo: jest.fn(),
    askSelection: jest.fn(),
    askTypedConfirmation: jest.fn(),
  };
}

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

export const TEST_CONFIG: CliConfig = {
  subscriptionId: "sub-123",
  ports: { sshPort: 22, rdpPort: 3389 },
  verifier: { probeTimeoutSeconds: 5, startSettleMs: 0, startAttempts: 1 },
};

export interface MockContext extends CommandContext {
  output: jest.Mocked<IOutputService>;
  prompt: jest.Mocked<IPromptService>;
  provider: jest.Mocked<IResourceProvider>;
  probe: jest.Mocked<ITcpProbe>;
}

export function createMockContext(config: CliConfig = TEST_CONFIG): MockContext {
  return {
    output: createMockOutput(),
    prompt: createMockPrompt(),
    provider: createMockProvider(),
    probe: createMockProbe(),
    config,
  };
}

/**
 * Wire a single VM whose NIC carries one NSG and no subnet.
 */
export function stubSingleGroupTopology(provider: jest.Mocked<IResourceProvider>, target: Target): void {
  provider.getTarget.mockResolvedValue(target);
  provider.getInterface.mockResolvedValue({
    id: nicId(`${target.name}-nic`),
    name: `${target.name}-nic`,
    resourceGroup: "test-rg",
    primary: true,
    networkSecurityGroupId: nsgId(`${target.name}-nsg`),
    ipConfigurations: [{ name: "ipconfig1", primary: true }],
  });
  provider.getGroup.mockResolvedValue({
    id: nsgId(`${target.name}-nsg`),
    name: `${target.name}-nsg`,
    resourceGroup: "test-rg",
    location: "eastus",
  });
}
