export { globToRegExp } from './glob.js'
export { filterExcludes, stripRoot } from './excludes.js'
export { filterPaths, parentSegments, countOrderedHits } from './match.js'
export { rankItems, scoreValue, scoreWord, type RankOptions } from './fuzzy.js'
