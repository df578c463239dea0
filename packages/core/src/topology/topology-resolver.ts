/**
 * Topology Resolver
 *
 * Maps a target to the security groups guarding its network path: groups
 * attached directly to each interface and groups attached to each subnet the
 * interface's IP configurations live in.
 */

import { describeError, ReconcileError, ReconcileErrorType } from "../errors";
import type { IResourceProvider } from "../interfaces";
import type { GroupAttachment, GuardingGroup, LogCallback, SecurityGroup, Target } from "../types";
import { noopLog } from "../types";
import { autoGroupName, timestampToken, type TokenSource } from "../utils";

export interface TopologyResolverOptions {
  log?: LogCallback;
  /** Uniqueness token for auto-created group names */
  token?: TokenSource;
}

interface MissingGroup {
  attachment: GroupAttachment;
  /** Interface or subnet ID to attach the new group to */
  pathId: string;
  pathName: string;
  /** Target name for interfaces, subnet name for subnets */
  owner: string;
  resourceGroup: string;
}

export class TopologyResolver {
  private readonly log: LogCallback;
  private readonly token: TokenSource;

  constructor(
    private readonly provider: IResourceProvider,
    options: TopologyResolverOptions = {}
  ) {
    this.log = options.log ?? noopLog;
    this.token = options.token ?? timestampToken;
  }

  /**
   * Return every group guarding the target, creating and attaching a group
   * wherever an interface or subnet has none.
   *
   * A group that was created but could not be attached is not rolled back;
   * the failure is raised as PARTIAL_PROVISIONING and the next run completes it.
   */
  async resolveGuardingGroups(target: Target): Promise<GuardingGroup[]> {
    return this.walk(target, (missing) => this.provision(target, missing));
  }

  /**
   * Read-only variant of resolveGuardingGroups. Paths without a group are skipped.
   */
  async discoverGuardingGroups(target: Target): Promise<GuardingGroup[]> {
    return this.walk(target, async () => undefined);
  }

  private async walk(
    target: Target,
    onMissing: (missing: MissingGroup) => Promise<GuardingGroup | undefined>
  ): Promise<GuardingGroup[]> {
    const groups = new Map<string, GuardingGroup>();
    const seenSubnets = new Set<string>();

    const add = (group: GuardingGroup | undefined) => {
      if (group && !groups.has(group.id.toLowerCase())) {
        groups.set(group.id.toLowerCase(), group);
      }
    };

    if (target.networkInterfaceIds.length === 0) {
      this.log(`No network interfaces found for VM '${target.name}'.`, "warn");
    }

    for (const nicId of target.networkInterfaceIds) {
      const nic = await this.provider.getInterface(nicId);

      if (nic.networkSecurityGroupId) {
        add(await this.existing(nic.networkSecurityGroupId, "nic", nic.name));
      } else {
        this.log(`No NSG found on NIC '${nic.name}'.`, "warn");
        add(
          await onMissing({
            attachment: "nic",
            pathId: nic.id,
            pathName: nic.name,
            owner: target.name,
            resourceGroup: nic.resourceGroup,
          })
        );
      }

      for (const config of nic.ipConfigurations) {
        if (!config.subnetId) continue;

        const subnetKey = config.subnetId.toLowerCase();
        if (seenSubnets.has(subnetKey)) continue;
        seenSubnets.add(subnetKey);

        const subnet = await this.provider.getSubnet(config.subnetId);
        if (subnet.networkSecurityGroupId) {
          add(await this.existing(subnet.networkSecurityGroupId, "subnet", subnet.name));
        } else {
          this.log(`No NSG found on subnet '${subnet.name}'.`, "warn");
          add(
            await onMissing({
              attachment: "subnet",
              pathId: subnet.id,
              pathName: subnet.name,
              owner: subnet.name,
              resourceGroup: subnet.resourceGroup,
            })
          );
        }
      }
    }

    return Array.from(groups.values());
  }

  private async existing(groupId: string, attachment: GroupAttachment, via: string): Promise<GuardingGroup> {
    const group = await this.provider.getGroup(groupId);
    return { ...group, attachment, via, autoCreated: false };
  }

  private async provision(target: Target, missing: MissingGroup): Promise<GuardingGroup> {
    const name = autoGroupName(missing.owner, missing.attachment, this.token());
    this.log(`Creating NSG '${name}' in RG '${missing.resourceGroup}' (${target.location})`);

    let group: SecurityGroup;
    try {
      group = await this.provider.createGroup(name, missing.resourceGroup, target.location);
    } catch (error: unknown) {
      throw new ReconcileError(
        `Failed to create NSG '${name}' for ${missing.attachment} '${missing.pathName}': ${describeError(error)}`,
        ReconcileErrorType.PROVIDER,
        { targetId: target.id, groupName: name },
        error
      );
    }

    try {
      if (missing.attachment === "nic") {
        await this.provider.attachGroupToInterface(missing.pathId, group.id);
      } else {
        await this.provider.attachGroupToSubnet(missing.pathId, group.id);
      }
    } catch (error: unknown) {
      throw new ReconcileError(
        `NSG '${group.name}' was created but could not be attached to ${missing.attachment} ` +
          `'${missing.pathName}': ${describeError(error)}. The orphaned group was left in place.`,
        ReconcileErrorType.PARTIAL_PROVISIONING,
        { targetId: target.id, groupId: group.id, groupName: group.name },
        error
      );
    }

    this.log(`NSG '${group.name}' attached to ${missing.attachment} '${missing.pathName}'.`, "success");
    return { ...group, attachment: missing.attachment, via: missing.pathName, autoCreated: true };
  }
}
