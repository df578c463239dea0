#!/usr/bin/env node

import chalk from "chalk";
import { Command, CommanderError } from "commander";
import { createAzureResourceProvider } from "@portwarden/adapters-azure";
import { PORTWARDEN_VERSION, ReconcileError, ReconcileErrorType } from "@portwarden/core";
import { createCleanupHandler, type CleanupOptions } from "./commands/cleanup";
import type { CommandContext } from "./commands/command-context";
import { createGrantHandler, type GrantOptions } from "./commands/grant";
import { createRemoveRulesHandler, type RemoveRulesOptions } from "./commands/remove-rules";
import { createTestHandler, type TestOptions } from "./commands/test";
import { loadConfig, type ConfigFlags } from "./config";
import { OutputService } from "./services/output.service";
import { PromptService } from "./services/prompt.service";
import { PublicIpService } from "./services/public-ip.service";
import { TcpProbeService } from "./services/tcp-probe.service";

const output = new OutputService();

async function createContext(flags: ConfigFlags): Promise<CommandContext> {
  const config = await loadConfig(flags);
  if (!config.subscriptionId) {
    throw new ReconcileError(
      "No subscription configured. Pass --subscription or set AZURE_SUBSCRIPTION_ID.",
      ReconcileErrorType.INVALID_INPUT
    );
  }

  return {
    output,
    prompt: new PromptService(),
    provider: createAzureResourceProvider({ subscriptionId: config.subscriptionId, log: output.log }),
    probe: new TcpProbeService(),
    config,
  };
}

const program = new Command();
program.exitOverride();

program
  .name("portwarden")
  .description("Open SSH/RDP on Azure VMs for your current public IP")
  .version(PORTWARDEN_VERSION)
  .option("--no-color", "Disable coloured output")
  .hook("preAction", (command) => {
    if (command.opts<{ color: boolean }>().color === false) {
      chalk.level = 0;
    }
  });

function withTargetOptions(command: Command): Command {
  return command
    .option("-s, --subscription <id>", "Subscription ID")
    .option("--resource-id <id>", "Full resource ID of a single VM")
    .option("--all", "Process every VM in the subscription");
}

withTargetOptions(program.command("grant", { isDefault: true }))
  .description("Allow your IP on the SSH/RDP port of the selected VMs")
  .option("--ip <address>", "Source IPv4 address (detected when omitted)")
  .option("--ssh-port <port>", "SSH port override")
  .option("--rdp-port <port>", "RDP port override")
  .option("-t, --test", "Test connectivity after granting access")
  .action(async (options: GrantOptions & ConfigFlags) => {
    const ctx = await createContext(options);
    process.exitCode = await createGrantHandler(ctx, new PublicIpService(fetch, output.log)).execute(options);
  });

withTargetOptions(program.command("test"))
  .description("Test SSH/RDP connectivity without changing rules")
  .option("--ssh-port <port>", "SSH port override")
  .option("--rdp-port <port>", "RDP port override")
  .action(async (options: TestOptions & ConfigFlags) => {
    const ctx = await createContext(options);
    process.exitCode = await createTestHandler(ctx).execute(options);
  });

withTargetOptions(program.command("cleanup"))
  .description("Remove duplicate rules from the NSGs guarding the selected VMs")
  .action(async (options: CleanupOptions & ConfigFlags) => {
    const ctx = await createContext(options);
    process.exitCode = await createCleanupHandler(ctx).execute(options);
  });

withTargetOptions(program.command("remove-rules"))
  .description("Remove ALL custom rules from the NSGs guarding the selected VMs")
  .option("-y, --yes", "Skip the typed confirmation")
  .action(async (options: RemoveRulesOptions & ConfigFlags) => {
    const ctx = await createContext(options);
    process.exitCode = await createRemoveRulesHandler(ctx).execute(options);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    output.stopSpinner();
    // commander has already printed its own message
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    output.error(error instanceof Error ? error.message : String(error));
    if (process.env.DEBUG === "1" && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exitCode = 1;
  }
}

void main();
