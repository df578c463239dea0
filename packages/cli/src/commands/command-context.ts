import type { IResourceProvider, ITcpProbe } from "@portwarden/core";
import type { CliConfig } from "../config";
import type { IOutputService, IPromptService } from "../interfaces";

/**
 * Services shared by every command handler.
 */
export interface CommandContext {
  output: IOutputService;
  prompt: IPromptService;
  provider: IResourceProvider;
  probe: ITcpProbe;
  config: CliConfig;
}

export interface TargetOptions {
  resourceId?: string;
  all?: boolean;
}
