export {
  PortNumber,
  PortConfigSchema,
  VerifierConfigSchema,
  DEFAULT_PORT_CONFIG,
  buildPortConfig,
  validatePort,
} from "./port-config";
export type { PortConfig, VerifierConfig } from "./port-config";
