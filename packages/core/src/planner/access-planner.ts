/**
 * Access Planner
 *
 * Per-group "ensure access" operation: deduplicate, check coverage, and
 * create a rule only when no existing rule grants the request.
 */

import { classifyService } from "../classifier";
import type { PortConfig } from "../config";
import { findDuplicates } from "../dedup";
import { describeError, ReconcileError, ReconcileErrorType } from "../errors";
import type { IResourceProvider } from "../interfaces";
import { findCoveringRule } from "../matcher";
import { nextFreePriority } from "../priority";
import { TopologyResolver } from "../topology";
import type {
  AccessGrant,
  DedupOutcome,
  EnsureAccessOutcome,
  GroupResult,
  LogCallback,
  Rule,
  RuleFields,
  SecurityGroup,
  ServiceSpec,
  Target,
  TargetReport,
} from "../types";
import { noopLog } from "../types";
import { accessRuleName, timestampToken, type TokenSource } from "../utils";

export interface AccessPlannerOptions {
  log?: LogCallback;
  /** Uniqueness token for generated rule and group names */
  token?: TokenSource;
  topology?: TopologyResolver;
}

/**
 * Build the fields of a rule granting `sourceAddress` access to the service port.
 */
export function buildAccessRule(
  sourceAddress: string,
  service: ServiceSpec,
  priority: number,
  targetName: string,
  token: string
): RuleFields {
  return {
    name: accessRuleName(service.service, sourceAddress, token),
    priority,
    direction: "Inbound",
    access: "Allow",
    protocol: service.protocol,
    sourceAddressPrefixes: [`${sourceAddress}/32`],
    sourcePortRanges: ["*"],
    destinationAddressPrefixes: ["*"],
    destinationPortRanges: [String(service.port)],
    description:
      `Allow ${service.service} from ${sourceAddress} to ${service.osType} VM '${targetName}' ` +
      `(port ${service.port}) - auto-added`,
  };
}

/**
 * Decide whether `rules` already grant access, or which rule must be added.
 *
 * @throws ReconcileError ALLOCATION_EXHAUSTED when no priority is free
 */
export function planAccess(
  rules: Rule[],
  sourceAddress: string,
  service: ServiceSpec,
  targetName: string,
  token: string
): AccessGrant {
  const coverage = findCoveringRule(rules, sourceAddress, service.port);
  if (coverage.kind === "satisfied") {
    return { kind: "satisfied", rule: coverage.rule };
  }

  const fields = buildAccessRule(sourceAddress, service, nextFreePriority(rules), targetName, token);
  return coverage.kind === "blocked"
    ? { kind: "required", fields, blockedBy: coverage.rule }
    : { kind: "required", fields };
}

export class AccessPlanner {
  private readonly log: LogCallback;
  private readonly token: TokenSource;
  private readonly topology: TopologyResolver;

  constructor(
    private readonly provider: IResourceProvider,
    options: AccessPlannerOptions = {}
  ) {
    this.log = options.log ?? noopLog;
    this.token = options.token ?? timestampToken;
    this.topology =
      options.topology ?? new TopologyResolver(provider, { log: this.log, token: this.token });
  }

  /**
   * Remove functional duplicates from a group. Deletion is best-effort:
   * a failed delete is recorded and the remaining deletions continue.
   */
  async removeDuplicates(group: SecurityGroup): Promise<DedupOutcome> {
    const rules = await this.provider.listRules(group.name, group.resourceGroup);
    const duplicates = findDuplicates(rules);
    const outcome: DedupOutcome = { removed: [], failures: [] };

    if (duplicates.length === 0) {
      this.log(`No duplicate rules in NSG '${group.name}'`);
      return outcome;
    }

    this.log(`Found ${duplicates.length} duplicate rule(s) in '${group.name}':`, "warn");
    for (const duplicate of duplicates) {
      const { removed, keptInstead } = duplicate;
      this.log(
        `'${removed.name}' (pri ${removed.priority}) <- dup of '${keptInstead.name}' (pri ${keptInstead.priority})`,
        "detail"
      );
    }

    for (const duplicate of duplicates) {
      try {
        await this.provider.deleteRule(group.name, group.resourceGroup, duplicate.removed.name);
        outcome.removed.push(duplicate);
      } catch (error: unknown) {
        const reason = describeError(error);
        this.log(`Failed to delete duplicate '${duplicate.removed.name}' from '${group.name}': ${reason}`, "error");
        outcome.failures.push({ duplicate, reason });
      }
    }

    if (outcome.removed.length > 0) {
      this.log(`Removed ${outcome.removed.length} duplicate rule(s) from '${group.name}'.`, "success");
    }
    return outcome;
  }

  /**
   * Ensure `sourceAddress` can reach the service port through one group.
   */
  async ensureAccess(
    group: SecurityGroup,
    sourceAddress: string,
    service: ServiceSpec,
    targetName: string = "unknown"
  ): Promise<EnsureAccessOutcome> {
    const dedup = await this.removeDuplicates(group);

    const rules = await this.provider.listRules(group.name, group.resourceGroup);
    let plan: AccessGrant;
    try {
      plan = planAccess(rules, sourceAddress, service, targetName, this.token());
    } catch (error: unknown) {
      if (error instanceof ReconcileError) {
        throw new ReconcileError(
          `${error.message} in NSG '${group.name}'`,
          error.type,
          { groupId: group.id, groupName: group.name },
          error
        );
      }
      throw error;
    }

    if (plan.kind === "satisfied") {
      const rule = plan.rule;
      this.log(`${service.service} access already allowed by existing rule:`, "info");
      this.log(`Rule: '${rule.name}' (priority ${rule.priority})`, "detail");
      this.log(
        `Source: ${rule.sourceAddressPrefixes.join(", ") || "?"} -> Port: ${rule.destinationPortRanges.join(", ") || "?"}`,
        "detail"
      );
      return { skipped: true, coveringRule: rule, dedup };
    }

    if (plan.blockedBy) {
      this.log(
        `Rule '${plan.blockedBy.name}' (priority ${plan.blockedBy.priority}) denies ${sourceAddress}:${service.port}`,
        "warn"
      );
    }

    const fields = plan.fields;
    this.log(`Adding rule '${fields.name}'`);
    this.log(`Priority: ${fields.priority}  |  Source: ${sourceAddress}/32  |  Port: ${service.port}`, "detail");

    let created: Rule;
    try {
      created = await this.provider.createRule(group.name, group.resourceGroup, fields);
    } catch (error: unknown) {
      throw new ReconcileError(
        `Failed to create rule '${fields.name}' in NSG '${group.name}': ${describeError(error)}`,
        ReconcileErrorType.PROVIDER,
        { groupId: group.id, groupName: group.name },
        error
      );
    }

    this.log(`${service.service} rule added to '${group.name}' for ${sourceAddress}:${service.port}`, "success");
    return {
      skipped: false,
      ruleCreated: created,
      ...(plan.blockedBy ? { blockedBy: plan.blockedBy } : {}),
      dedup,
    };
  }

  /**
   * Classify a target, resolve (and provision) its guarding groups, and ensure
   * access on each one. A failing group is reported without stopping its siblings.
   */
  async ensureAccessForTarget(target: Target, sourceAddress: string, ports: PortConfig): Promise<TargetReport> {
    const service = classifyService(target, ports, this.log);
    this.log(`OS: ${service.osType}  |  Service: ${service.service}  |  Port: ${service.port}`);

    const groups = await this.topology.resolveGuardingGroups(target);
    if (groups.length === 0) {
      throw new ReconcileError(
        `No NSGs found or created for VM '${target.name}'`,
        ReconcileErrorType.PROVIDER,
        { targetId: target.id }
      );
    }

    const results: GroupResult[] = [];
    for (const group of groups) {
      this.log(`NSG: ${group.name} (via ${group.attachment === "nic" ? "NIC" : "Subnet"} ${group.via})`);
      try {
        const outcome = await this.ensureAccess(group, sourceAddress, service, target.name);
        results.push({ group, ok: true, outcome });
      } catch (error: unknown) {
        const reason = describeError(error);
        this.log(`NSG '${group.name}': ${reason}`, "error");
        results.push({ group, ok: false, reason });
      }
    }

    return { targetId: target.id, targetName: target.name, service, groups: results };
  }
}
