import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "hashdrop");
export const CONFIG_FILE_NAME = "config.json";
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME);

/** Overrides the config directory. */
export const CONFIG_DIR_ENV = "HASHDROP_CONFIG";
/** Overrides `defaultHost` from the config file. */
export const HOST_ENV = "HASHDROP_HOST";
