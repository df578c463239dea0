/**
 * Connectivity Verifier
 *
 * Confirms a target is actually reachable on its service port:
 * CheckingPower -> NotRunning | ResolvingAddress -> Probing -> Reachable | Unreachable.
 * A stopped target can be started once, after which power is checked again.
 */

import { VerifierConfigSchema, type VerifierConfig } from "../config";
import { describeError } from "../errors";
import type { IRemediationPrompt, IResourceProvider, ITcpProbe } from "../interfaces";
import type {
  LogCallback,
  NetworkInterface,
  PowerState,
  ProbeFailureCause,
  RemediationOutcome,
  ServiceSpec,
  Target,
  VerificationResult,
  VerifierState,
} from "../types";
import { noopLog } from "../types";
import { sleep as defaultSleep } from "../utils";

export interface ConnectivityVerifierOptions {
  config?: Partial<VerifierConfig>;
  log?: LogCallback;
  /** Replaced in tests to skip the post-start settle delay */
  sleep?: (ms: number) => Promise<void>;
}

const CAUSE_DESCRIPTIONS: Record<ProbeFailureCause, string> = {
  refused: "Connection refused (port closed or service not running)",
  "timed-out": "Connection timed out (blocked by firewall or NSG)",
  unreachable: "No route to host",
  "host-down": "Host is down",
  "dns-failure": "DNS resolution failed",
  other: "Connection failed",
};

/**
 * Human description of a probe failure cause.
 */
export function describeProbeFailure(cause: ProbeFailureCause | undefined): string {
  return CAUSE_DESCRIPTIONS[cause ?? "other"];
}

function isStartable(state: PowerState): boolean {
  return state === "stopped" || state === "deallocated";
}

export class ConnectivityVerifier {
  private readonly config: VerifierConfig;
  private readonly log: LogCallback;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly provider: IResourceProvider,
    private readonly probe: ITcpProbe,
    private readonly prompt: IRemediationPrompt,
    options: ConnectivityVerifierOptions = {}
  ) {
    this.config = VerifierConfigSchema.parse(options.config ?? {});
    this.log = options.log ?? noopLog;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async verify(target: Target, service: ServiceSpec): Promise<VerificationResult> {
    const trace: VerifierState[] = [];
    let starts = 0;

    for (;;) {
      trace.push("CheckingPower");
      const powerState = await this.provider.getPowerState(target.id);
      if (powerState === "running") {
        break;
      }

      const notRunning = (remediation: RemediationOutcome, reason: string): VerificationResult => {
        trace.push("NotRunning");
        this.log(`VM '${target.name}': ${reason}`, "warn");
        return { state: "NotRunning", powerState, remediation, reason, trace };
      };

      if (starts > 0 && (starts >= this.config.startAttempts || !isStartable(powerState))) {
        return notRunning("still-not-running", `VM is still ${powerState} after start`);
      }
      if (!isStartable(powerState) || this.config.startAttempts === 0) {
        return notRunning("not-offered", `VM is ${powerState}`);
      }

      this.log(`VM '${target.name}' is ${powerState}.`, "warn");
      const accepted = await this.prompt.askYesNo(`Start VM '${target.name}' now?`);
      if (!accepted) {
        return notRunning("declined", `VM is ${powerState}; start declined`);
      }

      this.log(`Starting VM '${target.name}'...`);
      try {
        await this.provider.startTarget(target.id);
      } catch (error: unknown) {
        return notRunning("start-failed", `Failed to start VM: ${describeError(error)}`);
      }
      this.log(`VM '${target.name}' started. Waiting for it to settle...`, "success");
      await this.sleep(this.config.startSettleMs);
      starts++;
    }

    trace.push("ResolvingAddress");
    const address = await this.resolveAddress(target);
    if (!address) {
      trace.push("Unreachable");
      const reason = `No public IP address found for VM '${target.name}'`;
      this.log(reason, "warn");
      return { state: "Unreachable", port: service.port, reason, trace };
    }

    trace.push("Probing");
    this.log(`Testing ${service.service} to ${address}:${service.port}...`);
    const result = await this.probe.connect(address, service.port, this.config.probeTimeoutSeconds);

    if (result.success) {
      trace.push("Reachable");
      const latencyMs = result.latencyMs ?? 0;
      this.log(`${service.service} port ${service.port} is reachable on ${address} (${latencyMs} ms)`, "success");
      return { state: "Reachable", address, port: service.port, latencyMs, trace };
    }

    trace.push("Unreachable");
    const reason = result.failureReason ?? describeProbeFailure(result.failureCause);
    this.log(`${service.service} port ${service.port} is not reachable on ${address}: ${reason}`, "error");
    return {
      state: "Unreachable",
      address,
      port: service.port,
      reason,
      ...(result.failureCause ? { cause: result.failureCause } : {}),
      trace,
    };
  }

  /**
   * First public address found on the target's IP configurations, falling back
   * to an aggregate lookup across all public IPs bound to its interfaces.
   * Failed lookups are logged and skipped; none succeeding means no address.
   */
  private async resolveAddress(target: Target): Promise<string | undefined> {
    for (const interfaceId of target.networkInterfaceIds) {
      let nic: NetworkInterface;
      try {
        nic = await this.provider.getInterface(interfaceId);
      } catch (error: unknown) {
        this.log(`Could not read NIC '${interfaceId}': ${describeError(error)}`, "detail");
        continue;
      }

      for (const ipConfig of nic.ipConfigurations) {
        if (!ipConfig.publicIpAddressId) continue;
        try {
          const address = await this.provider.getPublicAddress(ipConfig.publicIpAddressId);
          if (address) {
            return address;
          }
        } catch (error: unknown) {
          this.log(`Could not read public IP of '${ipConfig.name}': ${describeError(error)}`, "detail");
        }
      }
    }

    try {
      const addresses = await this.provider.getTargetPublicAddresses(target.id);
      return addresses[0];
    } catch (error: unknown) {
      this.log(`Public IP lookup for VM '${target.name}' failed: ${describeError(error)}`, "detail");
      return undefined;
    }
  }
}
