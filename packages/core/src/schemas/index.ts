export {
  DEFAULTS,
  HostConfigSchema,
  PrefixLengthSchema,
  StoreConfigSchema,
  type HostConfig,
  type LoggingConfig,
  type StoreConfig,
} from "./store-config.js";
