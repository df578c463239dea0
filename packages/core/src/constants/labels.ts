/**
 * Naming and tagging for resources created by portwarden.
 */

export const MANAGED_BY_TAG = "managedBy";
export const MANAGED_BY_VALUE = "portwarden";

export const AUTO_GROUP_PREFIX = "nsg";
export const RULE_NAME_PREFIX = "Allow";

export const PORTWARDEN_VERSION = "0.1.0";
