import { describe, it, expect } from 'vitest'
import {
  DELIMITER,
  splitDelimited,
  parseDirpathQuery,
  tokenize,
  parseSettingsQuery,
} from './parse.js'
import { MalformedQueryError, InvalidSettingValueError } from '../errors/catalog.js'

describe('splitDelimited', () => {
  it('splits into two trimmed parts', () => {
    expect(splitDelimited(`~/Code ${DELIMITER} dev`)).toEqual(['~/Code', 'dev'])
  })

  it('keeps an empty trailing part', () => {
    expect(splitDelimited(`~/Code ${DELIMITER} `)).toEqual(['~/Code', ''])
  })

  it('accepts a custom delimiter', () => {
    expect(splitDelimited('a | b', '|')).toEqual(['a', 'b'])
  })

  it('throws MalformedQueryError when the delimiter is missing', () => {
    expect(() => splitDelimited('~/Code dev')).toThrow(MalformedQueryError)
  })

  it('throws MalformedQueryError when the delimiter occurs twice', () => {
    expect(() => splitDelimited(`a ${DELIMITER} b ${DELIMITER} c`)).toThrow(
      'Expected exactly one "➣" in query, found 2',
    )
  })
})

describe('parseDirpathQuery', () => {
  it('expands the folder and keeps the remainder', () => {
    expect(parseDirpathQuery(`~/Code/ ${DELIMITER} web app`, '/Users/test')).toEqual({
      dirpath: '/Users/test/Code',
      rest: 'web app',
    })
  })
})

describe('tokenize', () => {
  it('uses the last word as the index query', () => {
    expect(tokenize('web app  main')).toEqual({
      indexQuery: 'main',
      refinements: ['web', 'app'],
    })
  })

  it('has no refinements for a single word', () => {
    expect(tokenize(' main ')).toEqual({ indexQuery: 'main', refinements: [] })
  })

  it('returns an empty index query for blank input', () => {
    expect(tokenize('   ')).toEqual({ indexQuery: '', refinements: [] })
    expect(tokenize('')).toEqual({ indexQuery: '', refinements: [] })
  })
})

describe('parseSettingsQuery', () => {
  it('parses profile, setting and value', () => {
    expect(parseSettingsQuery(`3 ${DELIMITER} min ${DELIMITER} 2`)).toEqual({
      profileId: '3',
      setting: 'min',
      value: 2,
    })
  })

  it('omits empty components', () => {
    expect(parseSettingsQuery(`3 ${DELIMITER} scope ${DELIMITER} `)).toEqual({
      profileId: '3',
      setting: 'scope',
    })
    expect(parseSettingsQuery(`0 ${DELIMITER} `)).toEqual({ profileId: '0' })
    expect(parseSettingsQuery('0')).toEqual({ profileId: '0' })
  })

  it('keeps a zero value', () => {
    expect(parseSettingsQuery(`0 ${DELIMITER} scope ${DELIMITER} 0`).value).toBe(0)
  })

  it('rejects a non-integer value', () => {
    expect(() => parseSettingsQuery(`3 ${DELIMITER} min ${DELIMITER} two`)).toThrow(
      InvalidSettingValueError,
    )
  })
})
