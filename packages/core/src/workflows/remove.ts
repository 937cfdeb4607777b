import { splitEntryPath } from "../catalog/catalog.js";
import { runChecked } from "../remote/exec.js";
import type { RemoteSite } from "../remote/interface.js";
import { quoteShellArg, remotePath } from "../remote/shell.js";

/** Remove an entry together with its hash folder. */
export async function removeEntry(site: RemoteSite, relativePath: string): Promise<void> {
  const { prefix } = splitEntryPath(relativePath, "remove");
  await runChecked(site, `rm -rf -- ${quoteShellArg(remotePath(site.storeRoot, prefix))}`, {
    operation: `Removing ${relativePath}`,
    tool: "rm",
  });
}
