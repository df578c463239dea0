/**
 * TCP Probe Interface
 */

import type { ProbeResult } from "../types";

export interface ITcpProbe {
  /**
   * Attempt one TCP handshake.
   *
   * @param host - Address or hostname
   * @param port - Destination port
   * @param timeoutSeconds - Connect timeout
   */
  connect(host: string, port: number, timeoutSeconds: number): Promise<ProbeResult>;
}
