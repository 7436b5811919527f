import type { Logger } from 'pino'
import type { Indexer } from '../indexer/mdfind.js'
import type { SearchOptions } from '../profiles/store.js'
import { filterExcludes } from '../filter/excludes.js'
import { filterPaths } from '../filter/match.js'
import { tokenize } from '../query/parse.js'

export interface SearchRequest extends SearchOptions {
  /** Raw phrase; the last word goes to the indexer */
  query: string
}

export type SearchOutcome =
  | { status: 'too-short'; min: number; indexQuery: string }
  | { status: 'ok'; paths: string[] }

export interface SearchDeps {
  indexer: Indexer
  logger?: Logger
}

export async function runSearch(request: SearchRequest, deps: SearchDeps): Promise<SearchOutcome> {
  const { root, scope, min, excludes } = request
  const { indexQuery, refinements } = tokenize(request.query)
  const log = deps.logger

  log?.debug({ indexQuery, refinements, scope }, 'Parsed search query')

  // Below the minimum the indexer is not run at all
  if (indexQuery.length === 0 || indexQuery.length < min) {
    log?.debug({ min, indexQuery }, 'Query too short')
    return { status: 'too-short', min, indexQuery }
  }

  let paths = await deps.indexer.search({ root, query: indexQuery, scope })

  if (excludes.length > 0) {
    const before = paths.length
    paths = filterExcludes(paths, root, excludes)
    log?.debug({ excludes, kept: paths.length, total: before }, 'Applied exclude patterns')
  }

  if (refinements.length > 0) {
    const before = paths.length
    paths = filterPaths(refinements, paths, root)
    log?.debug({ kept: paths.length, total: before }, 'Applied path filter')
  }

  return { status: 'ok', paths }
}
