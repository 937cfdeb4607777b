import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { CONFIG_DIR_ENV, CONFIG_FILE_NAME, DEFAULT_CONFIG_DIR } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the config directory: explicit input, then `HASHDROP_CONFIG`,
 * then the default under ~/.config.
 */
export function resolveConfigDir(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return resolve(expandHomePath(input ?? env[CONFIG_DIR_ENV] ?? DEFAULT_CONFIG_DIR));
}

export function resolveConfigPath(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return join(resolveConfigDir(input, env), CONFIG_FILE_NAME);
}
