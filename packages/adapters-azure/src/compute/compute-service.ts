/**
 * Azure Compute Service
 *
 * Virtual machine lookups, power state and start.
 */

import type { ComputeManagementClient } from "@azure/arm-compute";
import {
  noopLog,
  parseResourceId,
  type LogCallback,
  type PowerState,
  type Target,
  type TargetSummary,
} from "@portwarden/core";
import { toPowerState, toTarget, toTargetSummary } from "../mappers";

export class ComputeService {
  constructor(
    private readonly computeClient: ComputeManagementClient,
    private readonly log: LogCallback = noopLog
  ) {}

  async getVm(vmId: string): Promise<Target> {
    const { resourceGroup, name } = parseResourceId(vmId);
    const vm = await this.computeClient.virtualMachines.get(resourceGroup, name);
    return toTarget(vm);
  }

  /**
   * List every VM in the subscription, sorted by resource group then name.
   */
  async listVms(): Promise<TargetSummary[]> {
    const vms: TargetSummary[] = [];
    for await (const vm of this.computeClient.virtualMachines.listAll()) {
      vms.push(toTargetSummary(vm));
    }
    return vms.sort(
      (a, b) => a.resourceGroup.localeCompare(b.resourceGroup) || a.name.localeCompare(b.name)
    );
  }

  async getPowerState(vmId: string): Promise<PowerState> {
    const { resourceGroup, name } = parseResourceId(vmId);
    const instanceView = await this.computeClient.virtualMachines.instanceView(resourceGroup, name);
    return toPowerState(instanceView.statuses);
  }

  /**
   * Start a VM and wait for the operation to complete.
   */
  async startVm(vmId: string): Promise<void> {
    const { resourceGroup, name } = parseResourceId(vmId);
    this.log(`Starting VM: ${name}`, "detail");
    await this.computeClient.virtualMachines.beginStartAndWait(resourceGroup, name);
  }
}
