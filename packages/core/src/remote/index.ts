export type { CommandResult, EntryStat, RemoteSite } from "./interface.js";
export { quoteShellArg, remotePath } from "./shell.js";
export {
  runChecked,
  EXIT_COMMAND_NOT_FOUND,
  type RunCheckedOptions,
} from "./exec.js";
