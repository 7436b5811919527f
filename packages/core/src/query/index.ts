export {
  DELIMITER,
  splitDelimited,
  parseDirpathQuery,
  tokenize,
  parseSettingsQuery,
  type DirpathQuery,
  type Tokens,
  type SettingsQuery,
} from './parse.js'
