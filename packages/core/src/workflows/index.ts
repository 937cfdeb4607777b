export {
  pushFile,
  transformFilename,
  type PushOptions,
  type PushResult,
  type FilenameAffixes,
} from "./push.js";
export { removeEntry } from "./remove.js";
export { renameEntry } from "./rename.js";
