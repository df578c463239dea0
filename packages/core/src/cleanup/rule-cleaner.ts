/**
 * Rule Cleaner
 *
 * Maintenance operations over the groups already guarding a target.
 * Nothing here creates groups or rules.
 */

import { describeError } from "../errors";
import type { IResourceProvider } from "../interfaces";
import { isCustomRule } from "../matcher";
import { AccessPlanner } from "../planner";
import { TopologyResolver } from "../topology";
import type { DedupOutcome, GuardingGroup, LogCallback, Target } from "../types";
import { noopLog } from "../types";

export interface GroupDedupResult {
  group: GuardingGroup;
  outcome: DedupOutcome;
}

export interface RemovalFailure {
  groupName: string;
  ruleName: string;
  reason: string;
}

export interface RemovalSummary {
  groups: number;
  deleted: number;
  failures: RemovalFailure[];
}

export interface RuleCleanerOptions {
  log?: LogCallback;
}

export class RuleCleaner {
  private readonly log: LogCallback;
  private readonly topology: TopologyResolver;
  private readonly planner: AccessPlanner;

  constructor(
    private readonly provider: IResourceProvider,
    options: RuleCleanerOptions = {}
  ) {
    this.log = options.log ?? noopLog;
    this.topology = new TopologyResolver(provider, { log: this.log });
    this.planner = new AccessPlanner(provider, { log: this.log, topology: this.topology });
  }

  /**
   * Remove functional duplicates from every group guarding the target.
   */
  async cleanupDuplicates(target: Target): Promise<GroupDedupResult[]> {
    const groups = await this.topology.discoverGuardingGroups(target);
    if (groups.length === 0) {
      this.log(`No NSGs attached to VM '${target.name}'`, "warn");
      return [];
    }

    const results: GroupDedupResult[] = [];
    for (const group of groups) {
      results.push({ group, outcome: await this.planner.removeDuplicates(group) });
    }
    return results;
  }

  /**
   * Delete every custom rule from every group guarding the target.
   * Deletion continues past individual failures.
   */
  async removeAllCustomRules(target: Target): Promise<RemovalSummary> {
    const groups = await this.topology.discoverGuardingGroups(target);
    const summary: RemovalSummary = { groups: groups.length, deleted: 0, failures: [] };

    for (const group of groups) {
      const rules = (await this.provider.listRules(group.name, group.resourceGroup)).filter(isCustomRule);
      if (rules.length === 0) {
        this.log(`NSG '${group.name}' has no custom rules`);
        continue;
      }

      this.log(`Removing ${rules.length} custom rule(s) from '${group.name}'`);
      for (const rule of rules) {
        try {
          await this.provider.deleteRule(group.name, group.resourceGroup, rule.name);
          summary.deleted++;
          this.log(`Deleted '${rule.name}' (priority ${rule.priority})`, "detail");
        } catch (error: unknown) {
          const reason = describeError(error);
          this.log(`Failed to delete '${rule.name}' from '${group.name}': ${reason}`, "error");
          summary.failures.push({ groupName: group.name, ruleName: rule.name, reason });
        }
      }
    }

    return summary;
  }
}
