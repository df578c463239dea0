export { CONFIG_FILE, FileConfigSchema, loadConfig, PORTWARDEN_DIR, readConfigFile } from "./cli-config";
export type { CliConfig, ConfigFlags, FileConfig } from "./cli-config";
