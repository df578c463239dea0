/**
 * CLI configuration
 *
 * Precedence, highest first: command-line flags, environment, the config
 * file (~/.portwarden/config.json), built-in defaults.
 */

import fs from "fs-extra";
import os from "os";
import path from "path";
import { z } from "zod";
import {
  buildPortConfig,
  PortNumber,
  ReconcileError,
  ReconcileErrorType,
  validatePort,
  VerifierConfigSchema,
  type PortConfig,
  type VerifierConfig,
} from "@portwarden/core";

export const PORTWARDEN_DIR = path.join(os.homedir(), ".portwarden");
export const CONFIG_FILE = path.join(PORTWARDEN_DIR, "config.json");

export const FileConfigSchema = z
  .object({
    subscriptionId: z.string().min(1).optional(),
    sshPort: PortNumber.optional(),
    rdpPort: PortNumber.optional(),
    probeTimeoutSeconds: z.number().positive().max(120).optional(),
    startSettleSeconds: z.number().min(0).max(600).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ConfigFlags {
  subscription?: string;
  sshPort?: string;
  rdpPort?: string;
}

export interface CliConfig {
  subscriptionId?: string;
  ports: PortConfig;
  verifier: VerifierConfig;
}

/**
 * Read and validate the config file. A missing file is an empty config.
 */
export async function readConfigFile(configPath: string = CONFIG_FILE): Promise<FileConfig> {
  if (!(await fs.pathExists(configPath))) {
    return {};
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error: unknown) {
    throw new ReconcileError(
      `Invalid JSON in ${configPath}`,
      ReconcileErrorType.INVALID_INPUT,
      {},
      error
    );
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ReconcileError(`Invalid config in ${configPath}: ${issues}`, ReconcileErrorType.INVALID_INPUT);
  }
  return parsed.data;
}

function resolvePort(
  label: string,
  candidates: Array<{ source: string; value: string | undefined }>,
  fileValue: number | undefined
): number | undefined {
  for (const { source, value } of candidates) {
    if (value === undefined || value.trim() === "") continue;
    const port = validatePort(value);
    if (port === undefined) {
      throw new ReconcileError(
        `Invalid ${label} port '${value}' from ${source}. Must be an integer between 1 and 65535.`,
        ReconcileErrorType.INVALID_INPUT
      );
    }
    return port;
  }
  return fileValue;
}

export async function loadConfig(
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = CONFIG_FILE
): Promise<CliConfig> {
  const file = await readConfigFile(configPath);

  const ports: PortConfig = buildPortConfig({
    sshPort: resolvePort(
      "SSH",
      [
        { source: "--ssh-port", value: flags.sshPort },
        { source: "PORTWARDEN_SSH_PORT", value: env.PORTWARDEN_SSH_PORT },
      ],
      file.sshPort
    ),
    rdpPort: resolvePort(
      "RDP",
      [
        { source: "--rdp-port", value: flags.rdpPort },
        { source: "PORTWARDEN_RDP_PORT", value: env.PORTWARDEN_RDP_PORT },
      ],
      file.rdpPort
    ),
  });

  const verifier = VerifierConfigSchema.parse({
    probeTimeoutSeconds: file.probeTimeoutSeconds,
    startSettleMs: file.startSettleSeconds === undefined ? undefined : Math.round(file.startSettleSeconds * 1000),
  });

  const subscriptionId = flags.subscription || env.AZURE_SUBSCRIPTION_ID || file.subscriptionId;

  return { ...(subscriptionId ? { subscriptionId } : {}), ports, verifier };
}
