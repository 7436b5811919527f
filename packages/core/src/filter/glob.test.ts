import { describe, it, expect } from 'vitest'
import { globToRegExp } from './glob.js'

function matches(path: string, pattern: string): boolean {
  return globToRegExp(pattern).test(path)
}

describe('globToRegExp', () => {
  it('lets * cross directory separators', () => {
    expect(matches('/web/app/main.py', '*.py')).toBe(true)
    expect(matches('/web/app/main.py', '*/web/*')).toBe(true)
    expect(matches('/web/app/main.py', '*/lib/*')).toBe(false)
  })

  it('matches ? against exactly one character', () => {
    expect(matches('ab', 'a?')).toBe(true)
    expect(matches('abc', 'a?')).toBe(false)
    expect(matches('a', 'a?')).toBe(false)
  })

  it('supports character classes and negation', () => {
    expect(matches('bx', '[abc]x')).toBe(true)
    expect(matches('dx', '[abc]x')).toBe(false)
    expect(matches('dx', '[!abc]x')).toBe(true)
    expect(matches('ax', '[!abc]x')).toBe(false)
    expect(matches('5', '[0-9]')).toBe(true)
  })

  it('allows ] as the first member of a class', () => {
    expect(matches(']', '[]]')).toBe(true)
    expect(matches('a', '[!]]')).toBe(true)
    expect(matches(']', '[!]]')).toBe(false)
  })

  it('treats an unclosed [ literally', () => {
    expect(matches('[x', '[x')).toBe(true)
  })

  it('escapes regular expression syntax', () => {
    expect(matches('a.b', 'a.b')).toBe(true)
    expect(matches('axb', 'a.b')).toBe(false)
    expect(matches('(a)+', '(a)+')).toBe(true)
  })

  it('is case-sensitive', () => {
    expect(matches('MAIN.PY', '*.py')).toBe(false)
  })

  it('is anchored at both ends', () => {
    expect(globToRegExp('app').test('/web/app/main.py')).toBe(false)
  })
})
