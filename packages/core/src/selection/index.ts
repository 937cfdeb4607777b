export { Selection, type SelectionDeps, type SelectionRow, type ByHashOptions } from "./selection.js";
export { runSelection, type SelectionQuery } from "./query.js";
export { parseDuration, cutoffFor } from "./duration.js";
export {
  StatCache,
  createStatFetcher,
  createBulkStatStrategy,
  createPerEntryStatStrategy,
  probeBulkStat,
  bulkStatCommand,
  parseBulkStatOutput,
  BULK_STAT_PROBE,
  type StatFetcher,
  type StatFetcherOptions,
  type StatStrategy,
  type StatStrategyName,
  type StatProgressCallback,
  type PerEntryStatOptions,
} from "./stats.js";
