export { filesTable, namesTable, metadataTable } from "./schema.js";
export {
  saveIndex,
  loadIndex,
  readIndexMetadata,
  INDEX_FORMAT_VERSION,
} from "./indexStore.js";
export type { IndexSource } from "./indexStore.js";
export { IndexCache } from "./indexCache.js";
export type { IndexLoader } from "./indexCache.js";
