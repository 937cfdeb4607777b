/**
 * Integrity sweep over stored entries.
 *
 * Every entry names its own expected hash: the folder prefix. Its length
 * picks the digest algorithm, so stores mixing prefix lengths verify fine.
 * The sweep always runs to the end and reports all mismatches at once.
 * Folders too long to be a token count as mismatches with an empty `actual`.
 */

import type { Logger } from "pino";
import type { Entry } from "../catalog/catalog.js";
import {
  VerificationMismatchError,
  type MismatchedEntry,
} from "../errors/catalog.js";
import {
  digestAlgorithmFor,
  hexDigestToToken,
  MAX_HASH_LENGTH,
  type DigestAlgorithm,
} from "../hash/engine.js";
import { hashRemoteDigests } from "../hash/remote.js";
import type { RemoteSite } from "../remote/interface.js";
import type { Selection } from "../selection/selection.js";

export type VerificationOutcome =
  | { status: "verified" }
  | { status: "mismatch"; expected: string; actual: string };

export interface VerificationResult {
  entry: Entry;
  outcome: VerificationOutcome;
}

export interface VerificationReport {
  /** One result per entry, in input order */
  results: VerificationResult[];
  mismatches: MismatchedEntry[];
}

export interface VerifyOptions {
  batchSize?: number;
  logger?: Logger;
}

export async function verifyEntries(
  site: RemoteSite,
  entries: readonly Entry[],
  options?: VerifyOptions,
): Promise<VerificationReport> {
  const groups = new Map<DigestAlgorithm, number[]>();
  for (const [position, entry] of entries.entries()) {
    // Not a token this tool could have written; reported, never hashed
    if (entry.prefix.length < 1 || entry.prefix.length > MAX_HASH_LENGTH) continue;
    const algorithm = digestAlgorithmFor(entry.prefix.length);
    const group = groups.get(algorithm) ?? [];
    group.push(position);
    groups.set(algorithm, group);
  }

  const actual: string[] = new Array<string>(entries.length).fill("");
  for (const [algorithm, positions] of groups) {
    const digests = await hashRemoteDigests(
      site,
      positions.map((p) => entries[p].relativePath),
      algorithm,
      options,
    );
    positions.forEach((p, i) => {
      actual[p] = hexDigestToToken(digests[i], entries[p].prefix.length);
    });
  }

  const results: VerificationResult[] = [];
  const mismatches: MismatchedEntry[] = [];
  entries.forEach((entry, p) => {
    if (actual[p] !== "" && actual[p] === entry.prefix) {
      results.push({ entry, outcome: { status: "verified" } });
      return;
    }
    results.push({
      entry,
      outcome: { status: "mismatch", expected: entry.prefix, actual: actual[p] },
    });
    mismatches.push({
      relativePath: entry.relativePath,
      expected: entry.prefix,
      actual: actual[p],
    });
    options?.logger?.error(
      { path: entry.relativePath, expected: entry.prefix, actual: actual[p] },
      "Hash mismatch",
    );
  });

  options?.logger?.debug(
    { checked: entries.length, mismatches: mismatches.length },
    "Verification finished",
  );
  return { results, mismatches };
}

export async function verifySelection(
  site: RemoteSite,
  selection: Selection,
  options?: VerifyOptions,
): Promise<VerificationReport> {
  return verifyEntries(site, selection.entries(), options);
}

/** Throw a VerificationMismatchError listing every failed entry, if any. */
export function assertVerified(report: VerificationReport): void {
  if (report.mismatches.length > 0) {
    throw new VerificationMismatchError({
      checked: report.results.length,
      mismatches: report.mismatches,
    });
  }
}
