export {
  runSearch,
  type SearchRequest,
  type SearchOutcome,
  type SearchDeps,
} from './pipeline.js'
