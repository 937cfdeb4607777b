export {
  DEFAULT_CONFIG_DIR,
  DEFAULT_CONFIG_PATH,
  CONFIG_FILE_NAME,
  CONFIG_DIR_ENV,
  HOST_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveConfigDir, resolveConfigPath } from "./paths.js";
export { resolveHost, entryUrl, type ResolvedHost } from "./hosts.js";
