/**
 * Target Type Definitions
 *
 * Read-only snapshots of compute resources, fetched fresh per operation.
 */

export type OsType = "Linux" | "Windows";

/**
 * Power state of a target, attached transiently during verification.
 */
export type PowerState = "running" | "stopped" | "deallocated" | "starting" | "unknown";

/**
 * OS image reference of a target.
 */
export interface ImageReference {
  publisher?: string;
  offer?: string;
  sku?: string;
}

/**
 * Which OS configuration blocks are present on the target's OS profile.
 */
export interface OsProfileMarkers {
  windows: boolean;
  linux: boolean;
}

/**
 * An addressable compute resource (a virtual machine).
 */
export interface Target {
  /** Full resource identifier */
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  /** Absent when the provider returned no OS profile */
  osProfile?: OsProfileMarkers;
  /** OS disk type as reported by the provider ("Linux", "Windows", ...) */
  osDiskType?: string;
  imageReference?: ImageReference;
  /** Attached network interface identifiers, primary first when known */
  networkInterfaceIds: string[];
}

/**
 * Lightweight listing entry used for selection.
 */
export interface TargetSummary {
  id: string;
  name: string;
  resourceGroup: string;
}
