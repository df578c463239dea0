import { ProviderError, ProviderErrorType } from "@portwarden/core";
import { createMockComputeClient, createMockNetworkClient, pages, RG_ID } from "../__tests__/mock-clients";
import { ComputeService } from "../compute/compute-service";
import { NetworkService } from "../network/network-service";
import { AzureResourceProvider } from "./azure-resource-provider";

const VM_ID = `${RG_ID}/Microsoft.Compute/virtualMachines/web01`;
const NIC_ID = `${RG_ID}/Microsoft.Network/networkInterfaces/web01-nic`;

function createProvider() {
  const networkClient = createMockNetworkClient();
  const computeClient = createMockComputeClient();
  const provider = new AzureResourceProvider(
    new NetworkService(networkClient as never),
    new ComputeService(computeClient as never),
    { delayMs: 0 }
  );
  return { provider, networkClient, computeClient };
}

describe("AzureResourceProvider", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should retry throttled calls", async () => {
    const { provider, computeClient } = createProvider();
    computeClient.virtualMachines.instanceView
      .mockRejectedValueOnce({ statusCode: 429, message: "Too many requests" })
      .mockResolvedValueOnce({ statusCode: 200, statuses: [{ code: "PowerState/running" }] });

    await expect(provider.getPowerState(VM_ID)).resolves.toBe("running");
    expect(computeClient.virtualMachines.instanceView).toHaveBeenCalledTimes(2);
  });

  it("should surface failures as ProviderError", async () => {
    const { provider, networkClient } = createProvider();
    networkClient.securityRules.list.mockImplementation(() => {
      throw { statusCode: 403, code: "AuthorizationFailed", message: "no access" };
    });

    const promise = provider.listRules("web-nsg", "test-rg");

    await expect(promise).rejects.toBeInstanceOf(ProviderError);
    await expect(promise).rejects.toMatchObject({
      type: ProviderErrorType.AUTHORIZATION,
      message: "Failed to list rules of NSG 'web-nsg': no access",
    });
  });

  it("should collect public addresses bound to the VM's interfaces", async () => {
    const { provider, computeClient, networkClient } = createProvider();
    computeClient.virtualMachines.get.mockResolvedValue({
      id: VM_ID,
      name: "web01",
      location: "eastus",
      networkProfile: { networkInterfaces: [{ id: NIC_ID, primary: true }] },
    });
    networkClient.publicIPAddresses.listAll.mockReturnValue(
      pages([{ ipAddress: "203.0.113.10", ipConfiguration: { id: `${NIC_ID}/ipConfigurations/ipconfig1` } }])
    );

    await expect(provider.getTargetPublicAddresses(VM_ID)).resolves.toEqual(["203.0.113.10"]);
    expect(networkClient.publicIPAddresses.listAll).toHaveBeenCalledTimes(1);
  });
});
