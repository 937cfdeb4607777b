export {
  FakeRemoteSite,
  parseQuotedArgs,
  type FakeFile,
  type FakeRemoteSiteOptions,
} from "./fake-site.js";
export { createSilentLogger } from "./logger.js";
