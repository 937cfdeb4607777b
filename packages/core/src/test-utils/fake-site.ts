/**
 * In-memory RemoteSite for tests.
 *
 * Interprets the command strings the engine issues (hash batches, stat
 * probe and bulk scan, mkdir, rm, mv, chown) against a map of stored files,
 * so no remote shell is needed.
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { posix } from "node:path";
import { RemoteCommandFailureError } from "../errors/catalog.js";
import { hashLocal } from "../hash/engine.js";
import type { CommandResult, EntryStat, RemoteSite } from "../remote/interface.js";
import { BULK_STAT_PROBE, bulkStatCommand } from "../selection/stats.js";

export interface FakeFile {
  content: Buffer;
  mtime: number;
}

export interface FakeRemoteSiteOptions {
  storeRoot?: string;
  /** Whether the probe reports find/stat as available (default true) */
  hasBulkStat?: boolean;
  /** Utilities that exit 127 when invoked, e.g. `["sha512sum"]` */
  missingTools?: string[];
  /** First mtime handed out to uploads; later uploads count up from it */
  startTime?: number;
}

type CommandHandler = (command: string) => CommandResult | undefined;

const QUOTED_ARG = /'((?:[^']|'\\'')*)'/g;

/** Undo quoteShellArg for every quoted argument in a command. */
export function parseQuotedArgs(command: string): string[] {
  return [...command.matchAll(QUOTED_ARG)].map((m) => m[1].replace(/'\\''/g, "'"));
}

function ok(stdout = ""): CommandResult {
  return { exitCode: 0, stdout, stderr: "" };
}

function fail(exitCode: number, stderr: string): CommandResult {
  return { exitCode, stdout: "", stderr };
}

export class FakeRemoteSite implements RemoteSite {
  readonly storeRoot: string;
  /** Every command passed to runCommand, in order */
  readonly commands: string[] = [];
  /** Relative paths passed to statEntry, in order */
  readonly statCalls: string[] = [];
  /** Folder -> group set through chown */
  readonly groups = new Map<string, string>();

  hasBulkStat: boolean;
  readonly missingTools: Set<string>;

  private readonly files = new Map<string, FakeFile>();
  private readonly folders = new Set<string>();
  private readonly handlers: CommandHandler[] = [];
  private clock: number;

  constructor(options?: FakeRemoteSiteOptions) {
    this.storeRoot = options?.storeRoot ?? "/srv/store";
    this.hasBulkStat = options?.hasBulkStat ?? true;
    this.missingTools = new Set(options?.missingTools ?? []);
    this.clock = options?.startTime ?? 1_700_000_000;
  }

  // Test setup

  addFile(relativePath: string, content: string | Buffer, mtime?: number): void {
    this.files.set(relativePath, {
      content: Buffer.from(content),
      mtime: mtime ?? this.clock++,
    });
    this.folders.add(posix.dirname(relativePath));
  }

  /** Store content under its real hash folder, like an upload would. */
  async storeFile(
    fileName: string,
    content: string | Buffer,
    options: { prefixLength: number; mtime?: number },
  ): Promise<string> {
    const token = await hashLocal(Buffer.from(content), options.prefixLength);
    const relativePath = `${token}/${fileName}`;
    this.addFile(relativePath, content, options.mtime);
    return relativePath;
  }

  /** Overwrite content in place, keeping the folder name. */
  corrupt(relativePath: string, content: string | Buffer): void {
    const file = this.getFile(relativePath);
    file.content = Buffer.from(content);
  }

  /** Answer commands matching `match` with a fixed result. */
  respond(match: string | RegExp, result: CommandResult): void {
    this.handlers.push((command) => {
      const hit = typeof match === "string" ? command === match : match.test(command);
      return hit ? result : undefined;
    });
  }

  has(relativePath: string): boolean {
    return this.files.has(relativePath);
  }

  read(relativePath: string): Buffer {
    return this.getFile(relativePath).content;
  }

  paths(): string[] {
    return [...this.files.keys()];
  }

  private getFile(relativePath: string): FakeFile {
    const file = this.files.get(relativePath);
    if (!file) {
      throw new Error(`No such file in fake store: ${relativePath}`);
    }
    return file;
  }

  private relative(absolutePath: string): string {
    return posix.relative(this.storeRoot, absolutePath);
  }

  // RemoteSite

  async listStoreEntries(): Promise<string[]> {
    return [...this.files.entries()]
      .sort(([pathA, a], [pathB, b]) => a.mtime - b.mtime || pathA.localeCompare(pathB))
      .map(([path]) => path);
  }

  async statEntry(relativePath: string): Promise<EntryStat> {
    this.statCalls.push(relativePath);
    const file = this.files.get(relativePath);
    if (!file) {
      throw new RemoteCommandFailureError({
        operation: `stat ${relativePath}`,
        exitCode: 1,
        stderr: "No such file or directory",
      });
    }
    return { size: file.content.length, mtime: file.mtime };
  }

  async uploadFile(localPath: string, relativePath: string): Promise<void> {
    if (!this.folders.has(posix.dirname(relativePath))) {
      throw new RemoteCommandFailureError({
        operation: `Uploading ${relativePath}`,
        exitCode: 1,
        stderr: "No such file or directory",
      });
    }
    this.files.set(relativePath, {
      content: await readFile(localPath),
      mtime: this.clock++,
    });
  }

  async runCommand(command: string): Promise<CommandResult> {
    this.commands.push(command);

    for (const handler of this.handlers) {
      const result = handler(command);
      if (result) return result;
    }

    const tool = command.split(" ")[0];
    if (this.missingTools.has(tool)) {
      return fail(127, `sh: ${tool}: command not found`);
    }

    if (command === BULK_STAT_PROBE) {
      return this.hasBulkStat ? ok() : fail(1, "");
    }
    if (command === bulkStatCommand(this.storeRoot)) {
      return this.bulkStat();
    }

    const args = parseQuotedArgs(command);
    switch (tool) {
      case "sha256sum":
      case "sha512sum":
        return this.hashFiles(tool === "sha256sum" ? "sha256" : "sha512", args);
      case "mkdir":
        this.folders.add(this.relative(args[0]));
        return ok();
      case "rm":
        return this.removeFolder(this.relative(args[0]));
      case "mv":
        return this.move(this.relative(args[0]), this.relative(args[1]));
      case "chown":
        this.groups.set(this.relative(args[1]), args[0]);
        return ok();
      default:
        return fail(127, `sh: ${tool}: command not found`);
    }
  }

  private bulkStat(): CommandResult {
    if (!this.hasBulkStat) {
      return fail(127, "sh: find: command not found");
    }
    const lines = [...this.files.entries()].map(
      ([path, file]) => `${file.content.length} ${file.mtime} ./${path}\n`,
    );
    return ok(lines.join(""));
  }

  private hashFiles(algorithm: "sha256" | "sha512", absolutePaths: string[]): CommandResult {
    let stdout = "";
    let stderr = "";
    for (const absolutePath of absolutePaths) {
      const file = this.files.get(this.relative(absolutePath));
      if (!file) {
        stderr += `${algorithm}sum: ${absolutePath}: No such file or directory\n`;
        continue;
      }
      const hex = createHash(algorithm).update(file.content).digest("hex");
      stdout += `${hex}  ${absolutePath}\n`;
    }
    return { exitCode: stderr ? 1 : 0, stdout, stderr };
  }

  private removeFolder(folder: string): CommandResult {
    for (const path of this.files.keys()) {
      if (posix.dirname(path) === folder) this.files.delete(path);
    }
    this.folders.delete(folder);
    return ok();
  }

  private move(from: string, to: string): CommandResult {
    const file = this.files.get(from);
    if (!file) {
      return fail(1, `mv: cannot stat '${from}': No such file or directory`);
    }
    this.files.delete(from);
    this.files.set(to, file);
    return ok();
  }
}
