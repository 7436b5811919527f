import { globToRegExp } from './glob.js'

/** Path relative to `root`; the leading "/" is kept. */
export function stripRoot(path: string, root: string): string {
  return path.startsWith(root) ? path.slice(root.length) : path
}

/**
 * Drop every path whose root-relative form matches any of `patterns`.
 * Surviving paths keep their order.
 */
export function filterExcludes(paths: string[], root: string, patterns: string[]): string[] {
  if (patterns.length === 0) return paths

  const compiled = patterns.map(globToRegExp)
  return paths.filter((path) => {
    const relative = stripRoot(path, root)
    return !compiled.some((re) => re.test(relative))
  })
}
