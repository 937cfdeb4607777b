export {
  SshRemoteSite,
  listCommand,
  statCommand,
  uploadCommand,
  SSH_ERROR_EXIT,
  type SshRemoteSiteOptions,
} from "./site.js";
export { buildSshArgs, type SshTarget } from "./args.js";
