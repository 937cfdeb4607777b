export interface SshTarget {
  hostname: string;
  user?: string;
  port?: number;
  /** Passed as `-o Key=Value` */
  sshOptions?: Record<string, string>;
}

/** Arguments for the OpenSSH client up to (not including) the remote command. */
export function buildSshArgs(target: SshTarget): string[] {
  const args: string[] = [];
  if (target.port !== undefined) args.push("-p", String(target.port));
  if (target.user !== undefined) args.push("-l", target.user);
  for (const [key, value] of Object.entries(target.sshOptions ?? {})) {
    args.push("-o", `${key}=${value}`);
  }
  args.push("--", target.hostname);
  return args;
}
