/**
 * Default values used by the reconciliation engine.
 */

// Service ports
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_RDP_PORT = 3389;

// Custom rule priority range (inclusive on both ends)
export const CUSTOM_PRIORITY_MIN = 100;
export const CUSTOM_PRIORITY_MAX = 4096;

// Provider default rules (AllowVnetInBound, DenyAllInBound, ...) live at or above this
export const SYSTEM_PRIORITY_FLOOR = 65000;

// Connectivity verification
export const DEFAULT_PROBE_TIMEOUT_SECONDS = 5;
export const DEFAULT_START_SETTLE_MS = 10_000;
export const DEFAULT_START_ATTEMPTS = 1;

// Source prefixes that match any address. Case-sensitive on purpose.
export const WILDCARD_SOURCES: ReadonlySet<string> = new Set(["*", "Internet", "Any"]);

// Substrings in image publisher/offer/sku that mark a Windows image
export const WINDOWS_IMAGE_KEYWORDS = [
  "windows",
  "windowsserver",
  "windowsdesktop",
  "microsoftwindows",
  "win",
] as const;
