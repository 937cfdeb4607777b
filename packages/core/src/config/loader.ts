import { readFile } from "node:fs/promises";
import { StoreConfigSchema, type StoreConfig } from "../schemas/store-config.js";
import { HOST_ENV } from "./defaults.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  /** Full path of the config file; takes precedence over configDir */
  configPath?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read and validate config.json. A missing file yields the defaults;
 * the file is never written.
 */
export async function loadConfig(options?: LoadConfigOptions): Promise<StoreConfig> {
  const env = options?.env ?? process.env;
  const configPath = options?.configPath ?? resolveConfigPath(options?.configDir, env);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = StoreConfigSchema.parse(parsed);

  const hostOverride = env[HOST_ENV];
  if (hostOverride) {
    return { ...config, defaultHost: hostOverride };
  }
  return config;
}
