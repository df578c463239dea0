/**
 * Grant Command Handler
 *
 * Ensures the caller's address can reach SSH/RDP on each selected VM,
 * optionally verifying the port afterwards.
 */

import { isIP } from "net";
import {
  AccessPlanner,
  ConnectivityVerifier,
  ReconcileError,
  ReconcileErrorType,
  runBatch,
  type TargetReport,
  type VerificationResult,
} from "@portwarden/core";
import type { IPublicIpService } from "../../interfaces";
import { printBatchSummary } from "../batch-summary";
import type { CommandContext, TargetOptions } from "../command-context";
import { selectTargets } from "../target-selection";

export interface GrantOptions extends TargetOptions {
  ip?: string;
  test?: boolean;
}

export interface GrantOutcome {
  report: TargetReport;
  verification?: VerificationResult;
}

export class GrantHandler {
  constructor(
    private readonly ctx: CommandContext,
    private readonly publicIp: IPublicIpService
  ) {}

  /**
   * Execute the grant command.
   *
   * @returns Process exit code
   */
  async execute(options: GrantOptions = {}): Promise<number> {
    const { output, provider, config } = this.ctx;

    output.header("Remote Access", "🔓");
    output.newline();

    const sourceAddress = await this.resolveSourceAddress(options.ip);
    output.info(`Source IP: ${sourceAddress}`);

    const targets = await selectTargets(this.ctx, options, "Grant access");
    if (targets.length === 0) {
      return 0;
    }

    const planner = new AccessPlanner(provider, { log: output.log });
    const verifier = new ConnectivityVerifier(provider, this.ctx.probe, this.ctx.prompt, {
      config: config.verifier,
      log: output.log,
    });

    const batch = await runBatch(
      targets.map((t) => ({ id: t.id, label: t.name })),
      async (item, index): Promise<GrantOutcome> => {
        output.section(`[${index + 1}/${targets.length}] VM '${item.label}'`);
        const target = await provider.getTarget(item.id);
        const report = await planner.ensureAccessForTarget(target, sourceAddress, config.ports);

        let verification: VerificationResult | undefined;
        if (options.test) {
          output.newline();
          verification = await verifier.verify(target, report.service);
        }

        const failed = report.groups.filter((g) => !g.ok).length;
        if (failed > 0) {
          throw new Error(`${failed} of ${report.groups.length} NSG(s) failed`);
        }
        return { report, verification };
      }
    );

    return printBatchSummary(output, batch);
  }

  private async resolveSourceAddress(ip: string | undefined): Promise<string> {
    if (ip !== undefined) {
      if (isIP(ip) !== 4) {
        throw new ReconcileError(`Invalid IPv4 address '${ip}'`, ReconcileErrorType.INVALID_INPUT);
      }
      return ip;
    }

    this.ctx.output.startSpinner("Detecting public IP...");
    try {
      return await this.publicIp.detect();
    } finally {
      this.ctx.output.stopSpinner();
    }
  }
}

/**
 * Factory function for creating a grant handler.
 */
export function createGrantHandler(ctx: CommandContext, publicIp: IPublicIpService): GrantHandler {
  return new GrantHandler(ctx, publicIp);
}
