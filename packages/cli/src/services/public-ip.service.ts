/**
 * Public IP Service
 *
 * Detects the caller's public address by asking echo services in order.
 */

import { isIP } from "net";
import { describeError, type LogCallback, noopLog } from "@portwarden/core";
import type { IPublicIpService } from "../interfaces";

export const PUBLIC_IP_SERVICES = [
  "https://api.ipify.org",
  "https://ifconfig.me/ip",
  "https://checkip.amazonaws.com",
] as const;

const REQUEST_TIMEOUT_MS = 10_000;

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export class PublicIpService implements IPublicIpService {
  constructor(
    private readonly fetchFn: FetchLike = fetch,
    private readonly log: LogCallback = noopLog,
    private readonly services: readonly string[] = PUBLIC_IP_SERVICES,
    private readonly timeoutMs: number = REQUEST_TIMEOUT_MS
  ) {}

  /**
   * @throws Error when no service returns a valid address
   */
  async detect(): Promise<string> {
    for (const url of this.services) {
      try {
        const address = await this.query(url);
        if (isIP(address) === 4) {
          return address;
        }
        this.log(`${url} returned an invalid address`, "detail");
      } catch (error: unknown) {
        this.log(`${url}: ${describeError(error)}`, "detail");
      }
    }
    throw new Error("Failed to detect public IP address. Pass it with --ip.");
  }

  private async query(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: { "User-Agent": "portwarden" },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return (await response.text()).trim();
    } finally {
      clearTimeout(timer);
    }
  }
}
