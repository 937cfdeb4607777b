import {
  RemoteCommandFailureError,
  RemoteToolMissingError,
} from "../errors/catalog.js";
import type { CommandResult, RemoteSite } from "./interface.js";

/** Exit status the shell reports for a command it could not find. */
export const EXIT_COMMAND_NOT_FOUND = 127;

export interface RunCheckedOptions {
  /** Human readable name of what the command does, used in errors. */
  operation: string;
  /** Remote utility the command depends on, reported when missing. */
  tool?: string;
}

/**
 * Run a remote command and fail on any non-zero exit.
 * Exit 127 is reported as a missing remote tool.
 */
export async function runChecked(
  site: RemoteSite,
  command: string,
  options: RunCheckedOptions,
): Promise<CommandResult> {
  const result = await site.runCommand(command);

  if (result.exitCode === EXIT_COMMAND_NOT_FOUND) {
    throw new RemoteToolMissingError({
      tool: options.tool ?? options.operation,
      command,
    });
  }
  if (result.exitCode !== 0) {
    throw new RemoteCommandFailureError({
      operation: options.operation,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }

  return result;
}
