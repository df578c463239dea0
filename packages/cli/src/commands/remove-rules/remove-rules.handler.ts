/**
 * Remove-Rules Command Handler
 *
 * Deletes every custom rule from the NSGs guarding the selected VMs.
 */

import { RuleCleaner, runBatch, type RemovalSummary } from "@portwarden/core";
import { printBatchSummary } from "../batch-summary";
import type { CommandContext, TargetOptions } from "../command-context";
import { selectTargets } from "../target-selection";

export const CONFIRMATION_WORD = "DELETE";

export interface RemoveRulesOptions extends TargetOptions {
  /** Skip the typed confirmation */
  yes?: boolean;
}

export class RemoveRulesHandler {
  constructor(private readonly ctx: CommandContext) {}

  /**
   * @returns Process exit code
   */
  async execute(options: RemoveRulesOptions = {}): Promise<number> {
    const { output, provider, prompt } = this.ctx;

    output.header("Remove Custom Rules", "🗑️");
    output.newline();

    const targets = await selectTargets(this.ctx, options, "Remove all custom rules");
    if (targets.length === 0) {
      return 0;
    }

    if (!options.yes) {
      output.warn(`This deletes ALL custom rules from every NSG guarding ${targets.length} VM(s).`);
      const confirmed = await prompt.askTypedConfirmation("This cannot be undone.", CONFIRMATION_WORD);
      if (!confirmed) {
        output.info("Aborted. No rules were removed.");
        return 1;
      }
    }

    const cleaner = new RuleCleaner(provider, { log: output.log });
    let deleted = 0;

    const batch = await runBatch(
      targets.map((t) => ({ id: t.id, label: t.name })),
      async (item, index): Promise<RemovalSummary> => {
        output.section(`[${index + 1}/${targets.length}] VM '${item.label}'`);
        const target = await provider.getTarget(item.id);
        const summary = await cleaner.removeAllCustomRules(target);

        deleted += summary.deleted;
        if (summary.failures.length > 0) {
          throw new Error(`${summary.failures.length} rule(s) could not be deleted`);
        }
        return summary;
      }
    );

    output.newline();
    output.dim(`Rules deleted: ${deleted}`);
    return printBatchSummary(output, batch);
  }
}

export function createRemoveRulesHandler(ctx: CommandContext): RemoveRulesHandler {
  return new RemoveRulesHandler(ctx);
}
