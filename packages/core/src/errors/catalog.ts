/**
 * Typed error catalog for the store engine.
 *
 * `exitCode` is what the CLI exits with: 2 for bad caller input,
 * 1 for remote-side or integrity failures.
 */

export class StoreError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Caller input

export class InvalidHashLengthError extends StoreError {
  constructor(details: { length: number; operation?: string }) {
    super(
      'INVALID_HASH_LENGTH',
      `Invalid hash length ${details.length}: must be between 1 and 64`,
      details,
      2,
    );
  }
}

export class InvalidIndexError extends StoreError {
  constructor(details: { index: number; numFiles: number }) {
    super(
      'INVALID_INDEX',
      `Invalid index specified: ${details.index} (catalog has ${details.numFiles} entries)`,
      details,
      2,
    );
  }
}

export class InvalidDurationError extends StoreError {
  constructor(details: { input: string; reason: string }) {
    super(
      'INVALID_DURATION',
      `Invalid duration '${details.input}': ${details.reason}`,
      details,
      2,
    );
  }
}

export class InvalidRegexError extends StoreError {
  constructor(details: { pattern: string; reason: string }) {
    super(
      'INVALID_REGEX',
      `Invalid filter regex '${details.pattern}': ${details.reason}`,
      details,
      2,
    );
  }
}

export class InvalidRemotePathError extends StoreError {
  constructor(details: { path: string; operation?: string }) {
    super(
      'INVALID_REMOTE_PATH',
      `Invalid store path '${details.path}': expected <hash>/<filename>`,
      details,
      2,
    );
  }
}

export class NoMatchingRemoteFileError extends StoreError {
  constructor(details: { file: string; token: string }) {
    super(
      'NO_MATCHING_REMOTE_FILE',
      `No file with same hash found on server: ${details.file}`,
      details,
    );
  }
}

export class InvalidUsageError extends StoreError {
  constructor(details: { reason: string; command?: string }) {
    super('INVALID_USAGE', details.reason, details, 2);
  }
}

export class MissingRemoteFilesError extends StoreError {
  constructor(details: { expected: number; found: number }) {
    super(
      'MISSING_REMOTE_FILES',
      `# of files expected/found differs: ${details.expected}/${details.found}`,
      details,
    );
  }
}

// Host configuration

export class UnknownHostError extends StoreError {
  constructor(details: { alias: string }) {
    super('UNKNOWN_HOST', `Did not find host alias: ${details.alias}`, details, 2);
  }
}

export class NoHostsConfiguredError extends StoreError {
  constructor() {
    super('NO_HOSTS_CONFIGURED', 'No hosts configured, define some!', undefined, 2);
  }
}

export class AmbiguousHostError extends StoreError {
  constructor(details: { aliases: string[] }) {
    super(
      'AMBIGUOUS_HOST',
      'More than one host configured but neither defaultHost nor --host given',
      details,
      2,
    );
  }
}

// Remote side

export class RemoteToolMissingError extends StoreError {
  constructor(details: { tool: string; command?: string }) {
    super(
      'REMOTE_TOOL_MISSING',
      `${details.tool} not found on remote site`,
      details,
    );
  }
}

export class RemoteCommandFailureError extends StoreError {
  constructor(details: {
    operation: string;
    exitCode: number;
    stdout?: string;
    stderr?: string;
  }) {
    super(
      'REMOTE_COMMAND_FAILURE',
      `${details.operation} exited with ${details.exitCode}` +
        (details.stderr ? `: ${details.stderr.trim()}` : ''),
      details,
    );
  }
}

export class HashCountMismatchError extends StoreError {
  constructor(details: { expected: number; actual: number }) {
    super(
      'HASH_COUNT_MISMATCH',
      `Remote returned ${details.actual} hashes for ${details.expected} files`,
      details,
    );
  }
}

export class StatCountMismatchError extends StoreError {
  constructor(details: { expected: number; actual: number; strategy: string }) {
    super(
      'STAT_COUNT_MISMATCH',
      `Remote returned ${details.actual} stats for ${details.expected} files`,
      details,
    );
  }
}

// Integrity

export interface MismatchedEntry {
  relativePath: string;
  expected: string;
  actual: string;
}

export class VerificationMismatchError extends StoreError {
  readonly mismatches: MismatchedEntry[];

  constructor(details: { checked: number; mismatches: MismatchedEntry[] }) {
    super(
      'VERIFICATION_MISMATCH',
      `${details.mismatches.length} of ${details.checked} files failed verification: ` +
        details.mismatches
          .map((m) => `'${m.relativePath}' (expected '${m.expected}', found '${m.actual}')`)
          .join(', '),
      details,
    );
    this.mismatches = details.mismatches;
  }
}

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreError;
}
