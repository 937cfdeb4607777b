import { posix } from "node:path";

/** Quote a value for POSIX sh: 'it'"'"'s' style single quoting. */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Absolute remote path of an entry or folder below the store root. */
export function remotePath(storeRoot: string, relativePath: string): string {
  return posix.join(storeRoot, relativePath);
}
