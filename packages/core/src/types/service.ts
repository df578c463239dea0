/**
 * Service Type Definitions
 */

import type { OsType } from "./target";

export type ServiceName = "SSH" | "RDP";

/**
 * Service a target must expose, derived once per target.
 */
export interface ServiceSpec {
  readonly service: ServiceName;
  /** 1-65535 */
  readonly port: number;
  readonly protocol: "Tcp";
  readonly osType: OsType;
}
