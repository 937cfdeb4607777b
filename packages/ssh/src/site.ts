/**
 * RemoteSite over the system OpenSSH client.
 *
 * Every operation spawns one `ssh` process; authentication (agent, keys,
 * ~/.ssh/config, interactive prompts) is left to the client.
 */

import { spawn } from "node:child_process";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";
import { RemoteCommandFailureError } from "@hashdrop/core/errors";
import {
  quoteShellArg,
  remotePath,
  runChecked,
  type CommandResult,
  type EntryStat,
  type RemoteSite,
} from "@hashdrop/core/remote";
import { buildSshArgs, type SshTarget } from "./args.js";

export interface SshRemoteSiteOptions extends SshTarget {
  /** Absolute store root on the remote machine */
  storeRoot: string;
  /** Client binary, `ssh` on the PATH by default */
  sshCommand?: string;
  logger?: Logger;
}

/** Exit status ssh uses for its own failures (connection, auth). */
export const SSH_ERROR_EXIT = 255;

/** Prints `<hash>/<file>` paths, oldest first; nothing for an empty store. */
export function listCommand(storeRoot: string): string {
  return (
    `cd ${quoteShellArg(storeRoot)} || exit 3; ` +
    'set -- */*; [ -e "$1" ] || exit 0; ls -1rtd -- "$@"'
  );
}

/** GNU stat first, BSD stat as fallback. Prints `<size> <mtime>`. */
export function statCommand(path: string): string {
  const quoted = quoteShellArg(path);
  return `stat -c '%s %Y' -- ${quoted} 2>/dev/null || stat -f '%z %m' -- ${quoted}`;
}

export function uploadCommand(path: string): string {
  return `umask 022 && cat > ${quoteShellArg(path)}`;
}

export class SshRemoteSite implements RemoteSite {
  readonly storeRoot: string;
  private readonly baseArgs: string[];
  private readonly sshCommand: string;
  private readonly logger?: Logger;

  constructor(options: SshRemoteSiteOptions) {
    this.storeRoot = options.storeRoot;
    this.baseArgs = buildSshArgs(options);
    this.sshCommand = options.sshCommand ?? "ssh";
    this.logger = options.logger;
  }

  async runCommand(command: string): Promise<CommandResult> {
    return this.exec(command);
  }

  async listStoreEntries(): Promise<string[]> {
    const result = await runChecked(this, listCommand(this.storeRoot), {
      operation: "Listing remote store",
      tool: "ls",
    });
    return result.stdout.split("\n").filter((line) => line !== "");
  }

  async statEntry(relativePath: string): Promise<EntryStat> {
    const result = await runChecked(
      this,
      statCommand(remotePath(this.storeRoot, relativePath)),
      { operation: `Stat of ${relativePath}`, tool: "stat" },
    );

    const match = /^(\d+) (\d+)\s*$/.exec(result.stdout);
    if (!match) {
      throw new RemoteCommandFailureError({
        operation: `Stat of ${relativePath} (unexpected output)`,
        exitCode: result.exitCode,
        stdout: result.stdout,
      });
    }
    return { size: Number(match[1]), mtime: Number(match[2]) };
  }

  async uploadFile(localPath: string, relativePath: string): Promise<void> {
    const command = uploadCommand(remotePath(this.storeRoot, relativePath));
    const result = await this.exec(command, createReadStream(localPath));
    if (result.exitCode !== 0) {
      throw new RemoteCommandFailureError({
        operation: `Uploading ${relativePath}`,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
  }

  private exec(command: string, input?: Readable): Promise<CommandResult> {
    this.logger?.trace({ command }, "Running remote command");

    return new Promise((resolve, reject) => {
      const proc = spawn(this.sshCommand, [...this.baseArgs, command], {
        stdio: [input ? "pipe" : "ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;
      let inputError: Error | undefined;

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        proc.kill();
        reject(err);
      };

      proc.stdout?.setEncoding("utf-8").on("data", (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr?.setEncoding("utf-8").on("data", (chunk: string) => {
        stderr += chunk;
      });

      proc.on("error", (err) => {
        fail(new Error(`Failed to start ${this.sshCommand}: ${err.message}`));
      });

      proc.on("close", (code) => {
        if (settled) return;
        settled = true;
        const exitCode = code ?? SSH_ERROR_EXIT;
        this.logger?.trace({ command, exitCode }, "Remote command finished");
        if (inputError && exitCode === 0) {
          reject(inputError);
          return;
        }
        resolve({ exitCode, stdout, stderr });
      });

      if (input && proc.stdin) {
        // A remote side that stops reading exits non-zero, which is reported instead
        pipeline(input, proc.stdin).catch((err: unknown) => {
          inputError = err instanceof Error ? err : new Error(String(err));
        });
      }
    });
  }
}
