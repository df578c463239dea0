/**
 * Service Classifier
 *
 * Maps a target's OS metadata to the service it must expose. Classification
 * never fails: a machine that cannot be identified is treated as Linux.
 */

import type { PortConfig } from "../config";
import { DEFAULT_RDP_PORT, DEFAULT_SSH_PORT, WINDOWS_IMAGE_KEYWORDS } from "../constants";
import type { LogCallback, OsType, ServiceSpec, Target } from "../types";
import { noopLog } from "../types";

/**
 * Detect the OS of a target, or undefined if no signal is present.
 * Order: OS profile marker, OS disk type, image keywords.
 */
export function detectOsType(target: Target): OsType | undefined {
  if (target.osProfile?.windows) return "Windows";
  if (target.osProfile?.linux) return "Linux";

  const diskType = (target.osDiskType ?? "").toLowerCase();
  if (diskType === "windows") return "Windows";
  if (diskType === "linux") return "Linux";

  const image = target.imageReference;
  const fields = [image?.publisher, image?.offer, image?.sku].map((f) => (f ?? "").toLowerCase());
  const isWindowsImage = fields.some((field) =>
    WINDOWS_IMAGE_KEYWORDS.some((keyword) => field.includes(keyword))
  );
  return isWindowsImage ? "Windows" : undefined;
}

export function serviceSpecFor(osType: OsType, ports: PortConfig): ServiceSpec {
  return osType === "Windows"
    ? { service: "RDP", port: ports.rdpPort, protocol: "Tcp", osType }
    : { service: "SSH", port: ports.sshPort, protocol: "Tcp", osType };
}

/**
 * Classify a target into {service, port, protocol}.
 */
export function classifyService(target: Target, ports: PortConfig, log: LogCallback = noopLog): ServiceSpec {
  let osType = detectOsType(target);
  if (!osType) {
    log(`Could not detect OS for VM '${target.name}'. Defaulting to Linux (SSH).`, "warn");
    osType = "Linux";
  }

  const spec = serviceSpecFor(osType, ports);
  const defaultPort = spec.service === "SSH" ? DEFAULT_SSH_PORT : DEFAULT_RDP_PORT;
  if (spec.port !== defaultPort) {
    log(`${spec.service} port override: ${defaultPort} -> ${spec.port}`);
  }
  return spec;
}
