/**
 * Connectivity Verification Type Definitions
 */

import type { PowerState } from "./target";

export type VerifierState =
  | "CheckingPower"
  | "NotRunning"
  | "ResolvingAddress"
  | "Probing"
  | "Reachable"
  | "Unreachable";

/**
 * What happened when a start was offered for a stopped target.
 */
export type RemediationOutcome =
  | "not-offered"
  | "declined"
  | "start-failed"
  | "still-not-running";

/**
 * Human cause of a failed probe.
 */
export type ProbeFailureCause =
  | "refused"
  | "timed-out"
  | "unreachable"
  | "host-down"
  | "dns-failure"
  | "other";

/**
 * Result of a single TCP handshake attempt.
 */
export interface ProbeResult {
  success: boolean;
  latencyMs?: number;
  failureCause?: ProbeFailureCause;
  failureReason?: string;
}

export type VerificationResult =
  | {
      state: "Reachable";
      address: string;
      port: number;
      latencyMs: number;
      trace: VerifierState[];
    }
  | {
      state: "Unreachable";
      address?: string;
      port: number;
      reason: string;
      cause?: ProbeFailureCause;
      trace: VerifierState[];
    }
  | {
      state: "NotRunning";
      powerState: PowerState;
      remediation: RemediationOutcome;
      reason: string;
      trace: VerifierState[];
    };
