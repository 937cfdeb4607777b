/** Outcome of one command run on the remote site. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Remote metadata of a stored file. */
export interface EntryStat {
  /** Size in bytes */
  size: number;
  /** Modification time, seconds since the epoch */
  mtime: number;
}

/**
 * The machine hosting the store, as seen by the engine.
 * Implemented by the transport layer; connection and authentication
 * happen before any of these methods are called.
 */
export interface RemoteSite {
  /** Absolute path of the store root on the remote machine. */
  readonly storeRoot: string;

  /**
   * List all `{hash}/{filename}` paths below the store root,
   * oldest modification time first.
   */
  listStoreEntries(): Promise<string[]>;

  /** Run a shell command on the remote site. Never rejects on non-zero exit. */
  runCommand(command: string): Promise<CommandResult>;

  /**
   * Stat a single entry. Slow path used when the remote lacks the
   * utilities for a bulk scan.
   * @param relativePath - path relative to the store root
   */
  statEntry(relativePath: string): Promise<EntryStat>;

  /**
   * Copy a local file to the given path relative to the store root.
   * The parent folder must already exist.
   */
  uploadFile(localPath: string, relativePath: string): Promise<void>;
}
