import { stripRoot } from './excludes.js'

/**
 * Lower-cased parent directory segments of `path` below `root`. The final
 * segment was already matched by the indexer and is dropped.
 */
export function parentSegments(path: string, root: string): string[] {
  return stripRoot(path, root).toLowerCase().split('/').slice(0, -1)
}

/**
 * Count how many of `tokens` are found, in order, in `segments`.
 *
 * Each token is looked for in the window starting at the previous hit
 * (inclusive), so two tokens may hit the same segment. A token that is not
 * found leaves the window where it was.
 */
export function countOrderedHits(tokens: string[], segments: string[]): number {
  let window = segments
  let hits = 0

  for (const token of tokens) {
    const j = window.findIndex((segment) => segment.includes(token))
    if (j !== -1) {
      hits++
      window = window.slice(j)
    }
  }
  return hits
}

/**
 * Keep the paths whose parent directories contain every token, in order.
 * Case-insensitive; surviving paths keep their order.
 */
export function filterPaths(tokens: string[], paths: string[], root: string): string[] {
  const lowered = tokens.map((t) => t.toLowerCase())
  return paths.filter(
    (path) => countOrderedHits(lowered, parentSegments(path, root)) === lowered.length,
  )
}
