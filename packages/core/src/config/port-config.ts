import { z } from "zod";
import {
  DEFAULT_PROBE_TIMEOUT_SECONDS,
  DEFAULT_RDP_PORT,
  DEFAULT_SSH_PORT,
  DEFAULT_START_ATTEMPTS,
  DEFAULT_START_SETTLE_MS,
} from "../constants";

export const PortNumber = z.coerce
  .number()
  .int("Port must be an integer")
  .min(1, "Port must be between 1 and 65535")
  .max(65535, "Port must be between 1 and 65535");

// Port overrides, passed explicitly through classification and planning
export const PortConfigSchema = z.object({
  sshPort: PortNumber.default(DEFAULT_SSH_PORT),
  rdpPort: PortNumber.default(DEFAULT_RDP_PORT),
});

export type PortConfig = z.infer<typeof PortConfigSchema>;

export const VerifierConfigSchema = z.object({
  probeTimeoutSeconds: z.number().positive().max(120).default(DEFAULT_PROBE_TIMEOUT_SECONDS),
  startSettleMs: z.number().int().min(0).default(DEFAULT_START_SETTLE_MS),
  // Restarts of the state machine after an accepted start
  startAttempts: z.number().int().min(0).max(3).default(DEFAULT_START_ATTEMPTS),
});

export type VerifierConfig = z.infer<typeof VerifierConfigSchema>;

export const DEFAULT_PORT_CONFIG: PortConfig = {
  sshPort: DEFAULT_SSH_PORT,
  rdpPort: DEFAULT_RDP_PORT,
};

/**
 * Build a port configuration, falling back to defaults for missing values.
 * Throws a ZodError when an override is out of range.
 */
export function buildPortConfig(overrides: { sshPort?: number | string; rdpPort?: number | string } = {}): PortConfig {
  return PortConfigSchema.parse({
    sshPort: emptyToUndefined(overrides.sshPort),
    rdpPort: emptyToUndefined(overrides.rdpPort),
  });
}

/**
 * Validate a user-supplied port string.
 *
 * @returns The port number, or undefined if it is not an integer in 1-65535
 */
export function validatePort(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const parsed = PortNumber.safeParse(trimmed);
  return parsed.success ? parsed.data : undefined;
}

function emptyToUndefined(value: number | string | undefined): number | string | undefined {
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  return value;
}
