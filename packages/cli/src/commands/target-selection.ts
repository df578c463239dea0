/**
 * Target selection shared by all commands: a single resource ID, every VM in
 * the subscription, or an interactive pick from a table.
 */

import {
  isTargetResourceId,
  parseResourceId,
  parseSelection,
  ReconcileError,
  ReconcileErrorType,
  type TargetSummary,
} from "@portwarden/core";
import type { CommandContext, TargetOptions } from "./command-context";

const MAX_NAME = 30;

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

export function targetFromResourceId(resourceId: string): TargetSummary {
  if (!isTargetResourceId(resourceId)) {
    throw new ReconcileError(
      `Invalid resource ID '${resourceId}'. Expected /subscriptions/<id>/resourceGroups/<rg>/providers/Microsoft.Compute/virtualMachines/<name>`,
      ReconcileErrorType.INVALID_INPUT
    );
  }
  const parsed = parseResourceId(resourceId);
  return { id: resourceId, name: parsed.name, resourceGroup: parsed.resourceGroup };
}

export function renderTargetTable(ctx: Pick<CommandContext, "output">, targets: TargetSummary[]): void {
  ctx.output.table(
    ["#", "VM Name", "Resource Group"],
    targets.map((t, i) => [`[${i + 1}]`, truncate(t.name, MAX_NAME), t.resourceGroup])
  );
  ctx.output.dim(`Total: ${targets.length} VM(s)`);
}

async function pickInteractively(ctx: CommandContext, targets: TargetSummary[], actionLabel: string) {
  renderTargetTable(ctx, targets);
  ctx.output.newline();
  ctx.output.dim("Select VMs: 1 | 1,3,5 | 1-3 | 1,3-5,7 | all");

  for (;;) {
    const { indices, warnings } = parseSelection(await ctx.prompt.askSelection("Enter your selection:"), targets.length);
    for (const warning of warnings) {
      ctx.output.warn(warning);
    }
    if (indices.length === 0) {
      ctx.output.warn("No valid VMs selected. Please try again.");
      continue;
    }

    const selected = indices.map((i) => targets[i]);
    ctx.output.section(`Selected ${selected.length} VM(s)`);
    for (const target of selected) {
      ctx.output.detail(`${target.name} (RG: ${target.resourceGroup})`);
    }

    if (await ctx.prompt.askYesNo(`${actionLabel} with these ${selected.length} VM(s)?`)) {
      return selected;
    }
    ctx.output.info("Selection cancelled. Please select again.");
  }
}

/**
 * Resolve the targets a command should act on.
 */
export async function selectTargets(
  ctx: CommandContext,
  options: TargetOptions,
  actionLabel: string
): Promise<TargetSummary[]> {
  if (options.resourceId) {
    return [targetFromResourceId(options.resourceId)];
  }

  ctx.output.startSpinner("Fetching VMs in subscription...");
  const targets = await ctx.provider.listTargets();
  ctx.output.stopSpinner();

  if (targets.length === 0) {
    ctx.output.warn("No VMs found in the current subscription.");
    return [];
  }

  if (options.all) {
    ctx.output.info(`Found ${targets.length} VM(s)`);
    return targets;
  }

  return pickInteractively(ctx, targets, actionLabel);
}
