/**
 * Helpers for Azure-style resource identifiers:
 * /subscriptions/{sub}/resourceGroups/{rg}/providers/{namespace}/{type}/{name}[/{childType}/{childName}]
 */

export interface ParsedResourceId {
  subscriptionId: string;
  resourceGroup: string;
  namespace: string;
  /** type/name pairs after the namespace, outermost first */
  segments: Array<{ type: string; name: string }>;
  /** Name of the innermost resource */
  name: string;
}

const TARGET_ID_PREFIX = "/subscriptions/";

/**
 * True if the value looks like a full subscription-scoped resource ID.
 */
export function isTargetResourceId(id: string): boolean {
  return id.startsWith(TARGET_ID_PREFIX);
}

/**
 * Parse a resource ID. Keys are matched case-insensitively.
 *
 * @throws Error if the ID lacks a resource group or provider section
 */
export function parseResourceId(id: string): ParsedResourceId {
  const parts = id.split("/").filter((p) => p.length > 0);
  const indexOf = (key: string) => parts.findIndex((p) => p.toLowerCase() === key.toLowerCase());

  const subIdx = indexOf("subscriptions");
  const rgIdx = indexOf("resourceGroups");
  const providerIdx = indexOf("providers");
  if (subIdx === -1 || rgIdx === -1 || providerIdx === -1 || providerIdx + 1 >= parts.length) {
    throw new Error(`Invalid resource ID: ${id}`);
  }

  const rest = parts.slice(providerIdx + 2);
  if (rest.length === 0 || rest.length % 2 !== 0) {
    throw new Error(`Invalid resource ID: ${id}`);
  }

  const segments: Array<{ type: string; name: string }> = [];
  for (let i = 0; i < rest.length; i += 2) {
    segments.push({ type: rest[i], name: rest[i + 1] });
  }

  return {
    subscriptionId: parts[subIdx + 1],
    resourceGroup: parts[rgIdx + 1],
    namespace: parts[providerIdx + 1],
    segments,
    name: segments[segments.length - 1].name,
  };
}

/**
 * Name of the resource segment of the given type (e.g. "virtualNetworks").
 */
export function segmentName(parsed: ParsedResourceId, type: string): string | undefined {
  return parsed.segments.find((s) => s.type.toLowerCase() === type.toLowerCase())?.name;
}

/**
 * Last path component of an ID, or the value itself if it has none.
 */
export function nameFromId(id: string): string {
  const parts = id.split("/").filter((p) => p.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : id;
}
