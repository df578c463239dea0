/**
 * Cleanup Command Handler
 *
 * Removes functionally duplicate rules from every NSG guarding the selected VMs.
 */

import {
  ReconcileError,
  ReconcileErrorType,
  RuleCleaner,
  runBatch,
  type GroupDedupResult,
} from "@portwarden/core";
import { printBatchSummary } from "../batch-summary";
import type { CommandContext, TargetOptions } from "../command-context";
import { selectTargets } from "../target-selection";

export type CleanupOptions = TargetOptions;

export class CleanupHandler {
  constructor(private readonly ctx: CommandContext) {}

  /**
   * @returns Process exit code
   */
  async execute(options: CleanupOptions = {}): Promise<number> {
    const { output, provider } = this.ctx;
    if (!options.resourceId && !options.all) {
      throw new ReconcileError("cleanup requires --resource-id or --all", ReconcileErrorType.INVALID_INPUT);
    }

    output.header("Duplicate Rule Cleanup", "🧹");
    output.newline();

    const targets = await selectTargets(this.ctx, options, "Clean up duplicates");
    if (targets.length === 0) {
      return 0;
    }

    const cleaner = new RuleCleaner(provider, { log: output.log });
    let removed = 0;

    const batch = await runBatch(
      targets.map((t) => ({ id: t.id, label: t.name })),
      async (item, index): Promise<GroupDedupResult[]> => {
        output.section(`[${index + 1}/${targets.length}] VM '${item.label}'`);
        const target = await provider.getTarget(item.id);
        const results = await cleaner.cleanupDuplicates(target);

        removed += results.reduce((sum, r) => sum + r.outcome.removed.length, 0);
        const failures = results.reduce((sum, r) => sum + r.outcome.failures.length, 0);
        if (failures > 0) {
          throw new Error(`${failures} duplicate rule(s) could not be deleted`);
        }
        return results;
      }
    );

    output.newline();
    output.dim(`Duplicate rules removed: ${removed}`);
    return printBatchSummary(output, batch);
  }
}

export function createCleanupHandler(ctx: CommandContext): CleanupHandler {
  return new CleanupHandler(ctx);
}
