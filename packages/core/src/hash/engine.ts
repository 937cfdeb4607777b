/**
 * Content hashing for store entries.
 *
 * A token is the URL-safe base64 encoding of a SHA-256 or SHA-512 digest,
 * truncated to the requested length. Lengths up to 32 use SHA-256, longer
 * ones SHA-512; the remote side picks its hashing utility by the same rule.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { InvalidHashLengthError } from "../errors/catalog.js";

export type DigestAlgorithm = "sha256" | "sha512";

export const MAX_HASH_LENGTH = 64;

/** Longest token still derived from a SHA-256 digest. */
export const SHA256_MAX_LENGTH = 32;

export type HashSource =
  | Uint8Array
  | string
  | Iterable<Uint8Array>
  | AsyncIterable<Uint8Array>;

export function assertHashLength(length: number, operation?: string): void {
  if (!Number.isInteger(length) || length < 1 || length > MAX_HASH_LENGTH) {
    throw new InvalidHashLengthError({ length, operation });
  }
}

export function digestAlgorithmFor(length: number): DigestAlgorithm {
  assertHashLength(length);
  return length <= SHA256_MAX_LENGTH ? "sha256" : "sha512";
}

/** Encode raw digest bytes and truncate (not re-encode) to `length`. */
export function encodeDigest(digest: Uint8Array, length: number): string {
  assertHashLength(length);
  return Buffer.from(digest).toString("base64url").slice(0, length);
}

/** Convert a hex digest, as printed by sha256sum/sha512sum, into a token. */
export function hexDigestToToken(hexDigest: string, length: number): string {
  return encodeDigest(Buffer.from(hexDigest, "hex"), length);
}

function isAsyncIterable(
  source: HashSource,
): source is AsyncIterable<Uint8Array> {
  return Symbol.asyncIterator in Object(source);
}

/** Hash a byte stream (or whole buffer) into a token of `length` characters. */
export async function hashLocal(
  source: HashSource,
  length: number,
): Promise<string> {
  const hasher = createHash(digestAlgorithmFor(length));

  if (typeof source === "string" || source instanceof Uint8Array) {
    hasher.update(source);
  } else if (isAsyncIterable(source)) {
    for await (const chunk of source) {
      hasher.update(chunk);
    }
  } else {
    for (const chunk of source) {
      hasher.update(chunk);
    }
  }

  return encodeDigest(hasher.digest(), length);
}

/** Hash the contents of a local file. */
export async function hashFile(path: string, length: number): Promise<string> {
  assertHashLength(length, "hashFile");
  return hashLocal(createReadStream(path), length);
}
