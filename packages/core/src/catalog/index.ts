export {
  Catalog,
  buildCatalog,
  parseEntryPath,
  splitEntryPath,
  type Entry,
  type EntryPath,
  type BuildCatalogOptions,
} from "./catalog.js";
