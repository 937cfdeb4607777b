import type { Logger } from "pino";
import { HashCountMismatchError, RemoteCommandFailureError } from "../errors/catalog.js";
import { runChecked } from "../remote/exec.js";
import type { RemoteSite } from "../remote/interface.js";
import { quoteShellArg, remotePath } from "../remote/shell.js";
import { digestAlgorithmFor, hexDigestToToken, type DigestAlgorithm } from "./engine.js";

export const DEFAULT_HASH_BATCH_SIZE = 64;
export const MIN_HASH_BATCH_SIZE = 16;
export const MAX_HASH_BATCH_SIZE = 128;

const HEX_DIGEST_LENGTH: Record<DigestAlgorithm, number> = {
  sha256: 64,
  sha512: 128,
};

export interface RemoteHashOptions {
  /** Files per remote invocation, clamped to 16..128 (default 64) */
  batchSize?: number;
  logger?: Logger;
}

export function hashUtilityFor(algorithm: DigestAlgorithm): string {
  return `${algorithm}sum`;
}

export function remoteHashCommand(
  storeRoot: string,
  relativePaths: readonly string[],
  algorithm: DigestAlgorithm,
): string {
  const args = relativePaths.map((p) => quoteShellArg(remotePath(storeRoot, p)));
  return `${hashUtilityFor(algorithm)} -- ${args.join(" ")}`;
}

/**
 * Extract hex digests from sha*sum output, one per non-empty line.
 * GNU tools prefix the line with a backslash when the file name needed escaping.
 */
export function parseHashOutput(
  stdout: string,
  algorithm: DigestAlgorithm,
): string[] {
  const pattern = new RegExp(`^\\\\?([0-9a-f]{${HEX_DIGEST_LENGTH[algorithm]}})\\s`, "i");
  const digests: string[] = [];

  for (const line of stdout.split("\n")) {
    if (line.trim() === "") continue;
    const match = pattern.exec(line);
    if (!match) {
      throw new RemoteCommandFailureError({
        operation: `${hashUtilityFor(algorithm)} (unexpected output)`,
        exitCode: 0,
        stdout: line,
      });
    }
    digests.push(match[1].toLowerCase());
  }

  return digests;
}

function clampBatchSize(batchSize: number | undefined): number {
  const size = Math.floor(batchSize ?? DEFAULT_HASH_BATCH_SIZE);
  return Math.min(MAX_HASH_BATCH_SIZE, Math.max(MIN_HASH_BATCH_SIZE, size));
}

/**
 * Compute full hex digests of remote files, batching paths into as few
 * remote invocations as the batch size allows. Output order matches input.
 */
export async function hashRemoteDigests(
  site: RemoteSite,
  relativePaths: readonly string[],
  algorithm: DigestAlgorithm,
  options?: RemoteHashOptions,
): Promise<string[]> {
  const batchSize = clampBatchSize(options?.batchSize);
  const digests: string[] = [];

  for (let start = 0; start < relativePaths.length; start += batchSize) {
    const batch = relativePaths.slice(start, start + batchSize);
    const command = remoteHashCommand(site.storeRoot, batch, algorithm);
    const result = await runChecked(site, command, {
      operation: `Computing remote ${algorithm} hashes`,
      tool: hashUtilityFor(algorithm),
    });

    const batchDigests = parseHashOutput(result.stdout, algorithm);
    if (batchDigests.length !== batch.length) {
      throw new HashCountMismatchError({
        expected: batch.length,
        actual: batchDigests.length,
      });
    }

    options?.logger?.debug(
      { algorithm, count: batch.length, offset: start },
      "Computed remote hash batch",
    );
    digests.push(...batchDigests);
  }

  return digests;
}

/** Tokens of `length` characters for remote files, in input order. */
export async function hashRemote(
  site: RemoteSite,
  relativePaths: readonly string[],
  length: number,
  options?: RemoteHashOptions,
): Promise<string[]> {
  const algorithm = digestAlgorithmFor(length);
  const digests = await hashRemoteDigests(site, relativePaths, algorithm, options);
  return digests.map((hex) => hexDigestToToken(hex, length));
}
