import type { Catalog } from "../catalog/catalog.js";
import { Selection, type SelectionDeps } from "./selection.js";

/** Everything a command can ask of the selection pipeline. */
export interface SelectionQuery {
  indices?: readonly number[];
  filter?: string | RegExp;
  /** Local files to look up by content hash */
  files?: readonly string[];
  /** Hash length used for `files`; required when files are given */
  prefixLength?: number;
  bailOnMissing?: boolean;
  all?: boolean;
  allIfNone?: boolean;
  newer?: string;
  older?: string;
  sortBySize?: boolean;
  sortByTime?: boolean;
  reverse?: boolean;
  first?: number;
  last?: number;
  withStats?: boolean;
}

/**
 * Run a query in the fixed order: selection, time window, sort, reverse,
 * truncation, stats. Each step is awaited before the next starts.
 */
export async function runSelection(
  catalog: Catalog,
  deps: SelectionDeps,
  query: SelectionQuery,
): Promise<Selection> {
  let selection = Selection.empty(catalog, deps)
    .byIndices(query.indices)
    .byFilter(query.filter);

  if (query.files && query.files.length > 0) {
    if (query.prefixLength === undefined) {
      throw new TypeError("prefixLength is required when selecting by file");
    }
    selection = await selection.byHash(query.files, query.prefixLength, {
      bailOnMissing: query.bailOnMissing,
    });
  }

  selection = selection.withAll(query.all ?? false).withAllIfNone(query.allIfNone ?? false);
  selection = await selection.selectNewer(query.newer);
  selection = await selection.selectOlder(query.older);
  selection = await selection.sortBySize(query.sortBySize ?? false);
  selection = await selection.sortByTime(query.sortByTime ?? false);
  selection = selection
    .revert(query.reverse ?? false)
    .first(query.first)
    .last(query.last);

  return selection.withStats(query.withStats ?? false);
}
