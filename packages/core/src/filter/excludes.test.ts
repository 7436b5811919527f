import { describe, it, expect } from 'vitest'
import { filterExcludes, stripRoot } from './excludes.js'

const ROOT = '/Users/x/Projects'
const PATHS = [
  '/Users/x/Projects/web/app/main.py',
  '/Users/x/Projects/web/app/main.pyc',
  '/Users/x/Projects/lib/node_modules/left-pad',
  '/Users/x/Projects/docs/readme.md',
]

describe('stripRoot', () => {
  it('removes the root prefix only', () => {
    expect(stripRoot('/Users/x/Projects/web', ROOT)).toBe('/web')
    expect(stripRoot('/opt/Users/x/Projects/web', ROOT)).toBe('/opt/Users/x/Projects/web')
  })
})

describe('filterExcludes', () => {
  it('returns all paths for no patterns', () => {
    expect(filterExcludes(PATHS, ROOT, [])).toEqual(PATHS)
  })

  it('drops paths matching any pattern and keeps order', () => {
    expect(filterExcludes(PATHS, ROOT, ['*.pyc', '*/node_modules/*'])).toEqual([
      '/Users/x/Projects/web/app/main.py',
      '/Users/x/Projects/docs/readme.md',
    ])
  })

  it('matches against the root-relative path', () => {
    expect(filterExcludes(PATHS, ROOT, ['/docs/*'])).toEqual(PATHS.slice(0, 3))
    expect(filterExcludes(PATHS, ROOT, ['/Users/*'])).toEqual(PATHS)
  })

  it('gives the same result for any pattern order', () => {
    const patterns = ['*.md', '*/web/*', '*left*']
    const expected = filterExcludes(PATHS, ROOT, patterns)

    expect(filterExcludes(PATHS, ROOT, [...patterns].reverse())).toEqual(expected)
    expect(filterExcludes(PATHS, ROOT, ['*/web/*', '*left*', '*.md'])).toEqual(expected)
    expect(expected).toEqual([])
  })

  it('drops both hits of a project excluded by folder', () => {
    const hits = ['/Users/x/Projects/web/app/main.py', '/Users/x/Projects/web/app/test_main.py']
    expect(filterExcludes(hits, ROOT, ['*/web/*'])).toEqual([])
  })
})
