import { AUTO_GROUP_PREFIX, RULE_NAME_PREFIX } from "../constants";
import type { GroupAttachment, ServiceName } from "../types";

/**
 * Produces the uniqueness token appended to generated names.
 */
export type TokenSource = () => string;

/** Unix timestamp in seconds */
export const timestampToken: TokenSource = () => String(Math.floor(Date.now() / 1000));

// Security group names: letters, digits, underscores, periods and hyphens, max 80
const MAX_GROUP_NAME = 80;
// Security rule names share the same character set
const MAX_RULE_NAME = 80;

function sanitizeResourceName(name: string, maxLength: number): string {
  return name
    .replace(/[^A-Za-z0-9._-]/g, "-")
    .replace(/-+/g, "-")
    .slice(0, maxLength);
}

/**
 * Name for an auto-created group, e.g. "nsg-web01-nic-1706300000".
 *
 * @param owner - Target name for interface groups, subnet name for subnet groups
 */
export function autoGroupName(owner: string, attachment: GroupAttachment, token: string): string {
  const suffix = `-${attachment}-${token}`;
  const head = sanitizeResourceName(`${AUTO_GROUP_PREFIX}-${owner}`, MAX_GROUP_NAME - suffix.length);
  return `${head}${suffix}`;
}

/**
 * Replace address separators so the address can appear in a resource name.
 */
export function sanitizeAddress(address: string): string {
  return address.replace(/[.:]/g, "-");
}

/**
 * Name for a generated access rule, e.g. "Allow-SSH-203-0-113-50-1706300000".
 */
export function accessRuleName(service: ServiceName, address: string, token: string): string {
  return sanitizeResourceName(`${RULE_NAME_PREFIX}-${service}-${sanitizeAddress(address)}-${token}`, MAX_RULE_NAME);
}
