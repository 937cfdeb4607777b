/**
 * Remote stat retrieval for selections.
 *
 * Two strategies share one interface: a bulk scan of the whole store in a
 * single remote call (needs GNU find and stat), and one stat call per entry
 * through the transport. A probe on first use decides which one runs.
 */

import type { Logger } from "pino";
import type { Catalog } from "../catalog/catalog.js";
import { StatCountMismatchError } from "../errors/catalog.js";
import { runChecked } from "../remote/exec.js";
import type { EntryStat, RemoteSite } from "../remote/interface.js";
import { quoteShellArg } from "../remote/shell.js";

export type StatStrategyName = "bulk" | "per-entry";

export type StatProgressCallback = (done: number, total: number) => void;

export interface StatStrategy {
  readonly name: StatStrategyName;
  /** Stats for `indices`, in the same order. */
  fetch(catalog: Catalog, indices: readonly number[]): Promise<EntryStat[]>;
}

/** Exits 0 only when the remote has find and a GNU-style stat. */
export const BULK_STAT_PROBE =
  "command -v find >/dev/null 2>&1 && stat --format=%s / >/dev/null 2>&1";

/** Every entry the two-level store listing shows, whatever its file type. */
export function bulkStatCommand(storeRoot: string): string {
  return (
    `cd ${quoteShellArg(storeRoot)} && ` +
    "find . -mindepth 2 -maxdepth 2 -exec stat --format='%s %Y %n' '{}' +"
  );
}

/** Parse `<size> <mtime> ./<hash>/<name>` lines into a path-keyed map. */
export function parseBulkStatOutput(stdout: string): Map<string, EntryStat> {
  const stats = new Map<string, EntryStat>();
  const pattern = /^(\d+) (\d+) (?:\.\/)?(.+)$/;

  for (const line of stdout.split("\n")) {
    const match = pattern.exec(line);
    if (!match) continue;
    stats.set(match[3], { size: Number(match[1]), mtime: Number(match[2]) });
  }

  return stats;
}

export function createBulkStatStrategy(site: RemoteSite): StatStrategy {
  return {
    name: "bulk",
    async fetch(catalog, indices) {
      const result = await runChecked(site, bulkStatCommand(site.storeRoot), {
        operation: "Scanning remote store",
        tool: "find/stat",
      });
      const all = parseBulkStatOutput(result.stdout);

      const stats: EntryStat[] = [];
      for (const index of indices) {
        const stat = all.get(catalog.entry(index).relativePath);
        if (stat) stats.push(stat);
      }

      if (stats.length !== indices.length) {
        throw new StatCountMismatchError({
          expected: indices.length,
          actual: stats.length,
          strategy: "bulk",
        });
      }
      return stats;
    },
  };
}

export interface PerEntryStatOptions {
  onProgress?: StatProgressCallback;
}

export function createPerEntryStatStrategy(
  site: RemoteSite,
  options?: PerEntryStatOptions,
): StatStrategy {
  return {
    name: "per-entry",
    async fetch(catalog, indices) {
      const stats: EntryStat[] = [];
      for (const index of indices) {
        stats.push(await site.statEntry(catalog.entry(index).relativePath));
        options?.onProgress?.(stats.length, indices.length);
      }
      return stats;
    },
  };
}

export async function probeBulkStat(site: RemoteSite): Promise<boolean> {
  const result = await site.runCommand(BULK_STAT_PROBE);
  return result.exitCode === 0;
}

export interface StatFetcher {
  fetch(catalog: Catalog, indices: readonly number[]): Promise<EntryStat[]>;
}

export interface StatFetcherOptions {
  logger?: Logger;
  /** Progress of the per-entry fallback. */
  onProgress?: StatProgressCallback;
}

/** Picks a strategy on first use and keeps it for the rest of the session. */
export function createStatFetcher(
  site: RemoteSite,
  options?: StatFetcherOptions,
): StatFetcher {
  let strategy: Promise<StatStrategy> | null = null;

  async function chooseStrategy(): Promise<StatStrategy> {
    if (await probeBulkStat(site)) {
      options?.logger?.debug("Using bulk stat scan");
      return createBulkStatStrategy(site);
    }
    options?.logger?.debug("Remote lacks find/stat, falling back to per-entry stat");
    return createPerEntryStatStrategy(site, {
      onProgress: (done, total) => {
        options?.logger?.debug({ done, total }, "Fetched remote stat");
        options?.onProgress?.(done, total);
      },
    });
  }

  return {
    async fetch(catalog, indices) {
      if (indices.length === 0) return [];
      strategy ??= chooseStrategy();
      return (await strategy).fetch(catalog, indices);
    },
  };
}

/**
 * Stats fetched for one selection pipeline, keyed by catalog index.
 * Entries are added on first demand and never invalidated.
 */
export class StatCache {
  private readonly stats = new Map<number, EntryStat>();

  get size(): number {
    return this.stats.size;
  }

  get(index: number): EntryStat | undefined {
    return this.stats.get(index);
  }

  has(index: number): boolean {
    return this.stats.has(index);
  }

  missing(indices: readonly number[]): number[] {
    return indices.filter((index) => !this.stats.has(index));
  }

  /** Store stats fetched for `indices` (same order). */
  fill(indices: readonly number[], stats: readonly EntryStat[]): void {
    if (stats.length !== indices.length) {
      throw new StatCountMismatchError({
        expected: indices.length,
        actual: stats.length,
        strategy: "cache",
      });
    }
    indices.forEach((index, i) => this.stats.set(index, stats[i]));
  }
}
