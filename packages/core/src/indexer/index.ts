export {
  buildMdfindQuery,
  buildMdfindArgs,
  parseIndexerOutput,
  createMdfindIndexer,
  type Indexer,
  type IndexerQuery,
  type MdfindIndexerOptions,
} from "./mdfind.js";
