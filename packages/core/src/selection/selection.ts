/**
 * Query pipeline over a catalog snapshot.
 *
 * A Selection is an immutable value: every operation returns a new
 * Selection and leaves the receiver untouched. Selections derived from the
 * same starting point share one StatCache, so stats are fetched at most once
 * per index for the whole pipeline.
 */

import type { Logger } from "pino";
import type { Catalog, Entry } from "../catalog/catalog.js";
import {
  InvalidRegexError,
  NoMatchingRemoteFileError,
} from "../errors/catalog.js";
import { hashFile } from "../hash/engine.js";
import type { EntryStat } from "../remote/interface.js";
import { cutoffFor } from "./duration.js";
import { StatCache, type StatFetcher } from "./stats.js";

export interface SelectionDeps {
  statFetcher: StatFetcher;
  logger?: Logger;
  /** Current time in epoch seconds. Defaults to the system clock. */
  now?: () => number;
}

export interface ByHashOptions {
  /** Fail on the first file without a remote counterpart instead of warning. */
  bailOnMissing?: boolean;
}

export interface SelectionRow extends Entry {
  /** Index counted from the end of the catalog (-1 is the newest entry) */
  reverseIndex: number;
  stat?: EntryStat;
}

function systemNow(): number {
  return Date.now() / 1000;
}

function dedupe(indices: readonly number[]): number[] {
  return [...new Set(indices)];
}

function compileFilter(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    // Stateful flags would make test() depend on previous calls
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  }
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new InvalidRegexError({
      pattern,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

export class Selection implements Iterable<SelectionRow> {
  private constructor(
    readonly catalog: Catalog,
    private readonly deps: SelectionDeps,
    private readonly cache: StatCache,
    /** Selected catalog indices in current order, without duplicates */
    readonly indices: readonly number[],
  ) {}

  /** A selection over `catalog` with nothing selected yet. */
  static empty(catalog: Catalog, deps: SelectionDeps): Selection {
    return new Selection(catalog, deps, new StatCache(), []);
  }

  private with(indices: readonly number[]): Selection {
    return new Selection(this.catalog, this.deps, this.cache, indices);
  }

  private append(indices: readonly number[]): Selection {
    return this.with(dedupe([...this.indices, ...indices]));
  }

  count(): number {
    return this.indices.length;
  }

  /** True once every selected entry has its stat cached. */
  hasStats(): boolean {
    return this.indices.every((index) => this.cache.has(index));
  }

  statOf(index: number): EntryStat | undefined {
    return this.cache.get(index);
  }

  /**
   * Append entries by signed index (-1 is the newest).
   * All indices are checked before anything is selected.
   */
  byIndices(raw?: readonly number[]): Selection {
    if (!raw || raw.length === 0) return this;
    const resolved = raw.map((index) => this.catalog.resolveIndex(index));
    return this.append(resolved);
  }

  /** Append every entry whose file name matches `pattern`. */
  byFilter(pattern?: string | RegExp): Selection {
    if (pattern === undefined) return this;
    const regex = compileFilter(pattern);
    const matched = this.catalog.entries
      .filter((entry) => regex.test(entry.fileName))
      .map((entry) => entry.index);
    return this.append(matched);
  }

  /**
   * Append the entries holding the same content as the given local files.
   *
   * Folder names are truncated to `prefixLength` before comparing, so the
   * files must be hashed at the length they were uploaded with. When several
   * entries share a hash the newest one wins.
   */
  async byHash(
    files: readonly string[],
    prefixLength: number,
    options?: ByHashOptions,
  ): Promise<Selection> {
    if (files.length === 0) return this;

    const byPrefix = new Map<string, number>();
    for (const entry of this.catalog.entries) {
      byPrefix.set(entry.prefix.slice(0, prefixLength), entry.index);
    }

    const found: number[] = [];
    for (const file of files) {
      const token = await hashFile(file, prefixLength);
      const index = byPrefix.get(token);
      if (index !== undefined) {
        found.push(index);
        continue;
      }
      if (options?.bailOnMissing) {
        throw new NoMatchingRemoteFileError({ file, token });
      }
      this.deps.logger?.warn({ file, token }, `No file with same hash found on server: ${file}`);
    }

    return this.append(found);
  }

  withAll(flag = true): Selection {
    if (!flag) return this;
    return this.append(this.catalog.entries.map((entry) => entry.index));
  }

  withAllIfNone(flag = true): Selection {
    return flag && this.indices.length === 0 ? this.withAll() : this;
  }

  /** Fetch stats for every selected entry not in the cache yet. */
  async withStats(flag = true): Promise<Selection> {
    if (!flag) return this;
    const missing = this.cache.missing(this.indices);
    if (missing.length > 0) {
      const stats = await this.deps.statFetcher.fetch(this.catalog, missing);
      this.cache.fill(missing, stats);
    }
    return this;
  }

  private requireStat(index: number): EntryStat {
    const stat = this.cache.get(index);
    if (!stat) {
      throw new Error(`Stat for index ${index} was not fetched`);
    }
    return stat;
  }

  private async keepByTime(
    duration: string,
    keep: (mtime: number, cutoff: number) => boolean,
  ): Promise<Selection> {
    const cutoff = cutoffFor(duration, (this.deps.now ?? systemNow)());
    const withStats = await this.withStats();
    return this.with(
      withStats.indices.filter((index) => keep(this.requireStat(index).mtime, cutoff)),
    );
  }

  /** Keep entries modified within the last `duration` (e.g. `"2h"`). */
  async selectNewer(duration?: string): Promise<Selection> {
    if (duration === undefined) return this;
    return this.keepByTime(duration, (mtime, cutoff) => mtime >= cutoff);
  }

  /** Keep entries modified at least `duration` ago. */
  async selectOlder(duration?: string): Promise<Selection> {
    if (duration === undefined) return this;
    return this.keepByTime(duration, (mtime, cutoff) => mtime <= cutoff);
  }

  private async sortByStat(key: keyof EntryStat): Promise<Selection> {
    const withStats = await this.withStats();
    // Array.prototype.sort is stable, ties keep their current order
    const sorted = [...withStats.indices].sort(
      (a, b) => this.requireStat(a)[key] - this.requireStat(b)[key],
    );
    return this.with(sorted);
  }

  async sortBySize(flag = true): Promise<Selection> {
    return flag ? this.sortByStat("size") : this;
  }

  async sortByTime(flag = true): Promise<Selection> {
    return flag ? this.sortByStat("mtime") : this;
  }

  revert(flag = true): Selection {
    return flag ? this.with([...this.indices].reverse()) : this;
  }

  /** Keep the first `n` entries in current order. */
  first(n?: number): Selection {
    if (n === undefined) return this;
    return this.with(this.indices.slice(0, Math.max(n, 0)));
  }

  /** Keep the last `n` entries in current order. */
  last(n?: number): Selection {
    if (n === undefined) return this;
    return this.with(this.indices.slice(Math.max(this.indices.length - n, 0)));
  }

  entries(): Entry[] {
    return this.indices.map((index) => this.catalog.entry(index));
  }

  rows(): SelectionRow[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<SelectionRow> {
    const numFiles = this.catalog.size;
    for (const index of this.indices) {
      const entry = this.catalog.entry(index);
      const stat = this.cache.get(index);
      yield {
        ...entry,
        reverseIndex: index - numFiles,
        ...(stat !== undefined && { stat }),
      };
    }
  }
}
