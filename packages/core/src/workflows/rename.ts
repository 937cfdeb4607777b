import { splitEntryPath } from "../catalog/catalog.js";
import { InvalidRemotePathError } from "../errors/catalog.js";
import { runChecked } from "../remote/exec.js";
import type { RemoteSite } from "../remote/interface.js";
import { quoteShellArg, remotePath } from "../remote/shell.js";

/**
 * Rename the file inside its hash folder. The folder (and so the
 * content address) stays the same.
 * @returns the new relative path
 */
export async function renameEntry(
  site: RemoteSite,
  relativePath: string,
  newName: string,
): Promise<string> {
  const { prefix } = splitEntryPath(relativePath, "rename");
  const target = `${prefix}/${newName}`;
  splitEntryPath(target, "rename");
  if (target === relativePath) {
    throw new InvalidRemotePathError({ path: target, operation: "rename (unchanged name)" });
  }

  const from = quoteShellArg(remotePath(site.storeRoot, relativePath));
  const to = quoteShellArg(remotePath(site.storeRoot, target));
  await runChecked(site, `mv -- ${from} ${to}`, {
    operation: `Renaming ${relativePath}`,
    tool: "mv",
  });
  return target;
}
