export {
  toDirpath,
  absSlash,
  absNoSlash,
  abbrSlash,
  abbrNoSlash,
  abbreviate,
  isDirectory,
  splitRootAndQuery,
  type RootAndQuery,
} from "./dirpath.js";
