import { basename, parse } from "node:path";
import type { Logger } from "pino";
import { splitEntryPath } from "../catalog/catalog.js";
import { hashFile } from "../hash/engine.js";
import { runChecked } from "../remote/exec.js";
import type { RemoteSite } from "../remote/interface.js";
import { quoteShellArg, remotePath } from "../remote/shell.js";
import { assertVerified, verifyEntries } from "../verify/verifier.js";
import { removeEntry } from "./remove.js";

export interface FilenameAffixes {
  prefix?: string;
  suffix?: string;
}

/** `prefix + stem + suffix + ext`; only the last extension counts as one. */
export function transformFilename(path: string, affixes?: FilenameAffixes): string {
  const { name, ext } = parse(basename(path));
  return `${affixes?.prefix ?? ""}${name}${affixes?.suffix ?? ""}${ext}`;
}

export interface PushOptions {
  prefixLength: number;
  /** Name on the remote side. Defaults to the local file name. */
  targetName?: string;
  /** Re-hash the upload remotely and compare. */
  verify?: boolean;
  /** Group to hand the new folder to. */
  group?: string;
  batchSize?: number;
  logger?: Logger;
}

export interface PushResult {
  relativePath: string;
  token: string;
}

export async function pushFile(
  site: RemoteSite,
  localPath: string,
  options: PushOptions,
): Promise<PushResult> {
  const token = await hashFile(localPath, options.prefixLength);
  const targetName = options.targetName ?? basename(localPath);
  const relativePath = `${token}/${targetName}`;
  const entryPath = splitEntryPath(relativePath, "push");
  const folder = quoteShellArg(remotePath(site.storeRoot, token));

  await runChecked(site, `mkdir -p ${folder}`, {
    operation: "Creating remote folder",
    tool: "mkdir",
  });
  await site.uploadFile(localPath, relativePath);
  options.logger?.debug({ localPath, relativePath }, "Uploaded file");

  if (options.verify) {
    const report = await verifyEntries(
      site,
      [{ index: -1, relativePath, ...entryPath }],
      { batchSize: options.batchSize, logger: options.logger },
    );
    if (report.mismatches.length > 0) {
      await removeEntry(site, relativePath);
      assertVerified(report);
    }
    options.logger?.debug({ relativePath }, "Upload verified");
  }

  if (options.group !== undefined) {
    await runChecked(site, `chown -R :${quoteShellArg(options.group)} ${folder}`, {
      operation: "Adjusting group",
      tool: "chown",
    });
  }

  return { relativePath, token };
}
