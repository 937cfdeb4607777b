import type { Logger } from "pino";
import { InvalidIndexError, InvalidRemotePathError } from "../errors/catalog.js";
import type { RemoteSite } from "../remote/interface.js";

/** One stored object: `{prefix}/{fileName}` below the store root. */
export interface Entry {
  /** Position in the listing; only valid for this snapshot */
  index: number;
  relativePath: string;
  /** Folder name, the truncated content hash at upload time */
  prefix: string;
  fileName: string;
}

export interface EntryPath {
  prefix: string;
  fileName: string;
}

/** Split `hash/name` into its two segments, or undefined if it has a different shape. */
export function parseEntryPath(relativePath: string): EntryPath | undefined {
  const segments = relativePath.split("/");
  if (segments.length !== 2 || segments.some((s) => s === "" || s === "." || s === "..")) {
    return undefined;
  }
  return { prefix: segments[0], fileName: segments[1] };
}

export function splitEntryPath(relativePath: string, operation?: string): EntryPath {
  const parsed = parseEntryPath(relativePath);
  if (!parsed) {
    throw new InvalidRemotePathError({ path: relativePath, operation });
  }
  return parsed;
}

/**
 * Snapshot of the remote store in listing order (oldest first).
 * Indices are positional and change whenever the store changes.
 */
export class Catalog {
  readonly entries: readonly Entry[];

  constructor(relativePaths: readonly string[]) {
    this.entries = relativePaths.map((relativePath, index) => ({
      index,
      relativePath,
      ...splitEntryPath(relativePath, "catalog"),
    }));
  }

  get size(): number {
    return this.entries.length;
  }

  /** Resolve a signed index (-1 is the newest entry) to a position. */
  resolveIndex(raw: number): number {
    const numFiles = this.entries.length;
    if (!Number.isInteger(raw) || raw < -numFiles || raw >= numFiles) {
      throw new InvalidIndexError({ index: raw, numFiles });
    }
    return raw < 0 ? numFiles + raw : raw;
  }

  entry(index: number): Entry {
    return this.entries[this.resolveIndex(index)];
  }
}

export interface BuildCatalogOptions {
  logger?: Logger;
}

/**
 * List the remote store once and index the result.
 * Listing failures propagate unchanged.
 */
export async function buildCatalog(
  site: RemoteSite,
  options?: BuildCatalogOptions,
): Promise<Catalog> {
  const listed = await site.listStoreEntries();
  const paths = listed.filter((path) => {
    if (parseEntryPath(path)) return true;
    options?.logger?.debug({ path }, "Ignoring listing entry outside <hash>/<file> layout");
    return false;
  });

  options?.logger?.debug({ numFiles: paths.length }, "Built remote catalog");
  return new Catalog(paths);
}
