export {
  verifyEntries,
  verifySelection,
  assertVerified,
  type VerificationOutcome,
  type VerificationResult,
  type VerificationReport,
  type VerifyOptions,
} from "./verifier.js";
