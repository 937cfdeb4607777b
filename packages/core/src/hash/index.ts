export {
  assertHashLength,
  digestAlgorithmFor,
  encodeDigest,
  hexDigestToToken,
  hashLocal,
  hashFile,
  MAX_HASH_LENGTH,
  SHA256_MAX_LENGTH,
  type DigestAlgorithm,
  type HashSource,
} from "./engine.js";
export {
  hashRemote,
  hashRemoteDigests,
  remoteHashCommand,
  parseHashOutput,
  hashUtilityFor,
  DEFAULT_HASH_BATCH_SIZE,
  MIN_HASH_BATCH_SIZE,
  MAX_HASH_BATCH_SIZE,
  type RemoteHashOptions,
} from "./remote.js";
