/**
 * TCP Probe Service
 *
 * One TCP handshake per call; the socket is closed as soon as it connects.
 */

import { Socket } from "net";
import type { ITcpProbe, ProbeFailureCause, ProbeResult } from "@portwarden/core";

const CAUSES_BY_CODE: Record<string, ProbeFailureCause> = {
  ECONNREFUSED: "refused",
  ETIMEDOUT: "timed-out",
  EHOSTUNREACH: "unreachable",
  ENETUNREACH: "unreachable",
  EHOSTDOWN: "host-down",
  ENOTFOUND: "dns-failure",
  EAI_AGAIN: "dns-failure",
};

const REASONS: Record<ProbeFailureCause, string> = {
  refused: "Connection refused",
  "timed-out": "Connection timed out",
  unreachable: "No route to host",
  "host-down": "Host is down",
  "dns-failure": "DNS resolution failed",
  other: "Socket error",
};

export function causeFromCode(code: string | undefined): ProbeFailureCause {
  return (code && CAUSES_BY_CODE[code]) || "other";
}

export class TcpProbeService implements ITcpProbe {
  connect(host: string, port: number, timeoutSeconds: number): Promise<ProbeResult> {
    return new Promise((resolve) => {
      const socket = new Socket();
      const started = process.hrtime.bigint();
      const elapsedMs = () => Math.round(Number(process.hrtime.bigint() - started) / 1e5) / 10;

      const finish = (result: ProbeResult) => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(result);
      };

      socket.setTimeout(timeoutSeconds * 1000);

      socket.once("connect", () => {
        finish({ success: true, latencyMs: elapsedMs() });
      });

      socket.once("timeout", () => {
        finish({
          success: false,
          failureCause: "timed-out",
          failureReason: `Connection timed out after ${timeoutSeconds}s`,
        });
      });

      socket.once("error", (error: NodeJS.ErrnoException) => {
        const cause = causeFromCode(error.code);
        const latencyMs = elapsedMs();
        finish({
          success: false,
          latencyMs,
          failureCause: cause,
          failureReason: cause === "other" ? `${REASONS.other}: ${error.message}` : `${REASONS[cause]} (${latencyMs}ms)`,
        });
      });

      socket.connect(port, host);
    });
  }
}
