export {
  StoreError,
  InvalidHashLengthError,
  InvalidIndexError,
  InvalidDurationError,
  InvalidRegexError,
  InvalidRemotePathError,
  NoMatchingRemoteFileError,
  InvalidUsageError,
  MissingRemoteFilesError,
  UnknownHostError,
  NoHostsConfiguredError,
  AmbiguousHostError,
  RemoteToolMissingError,
  RemoteCommandFailureError,
  HashCountMismatchError,
  StatCountMismatchError,
  VerificationMismatchError,
  isStoreError,
  type MismatchedEntry,
} from './catalog.js'
