import { homedir } from 'node:os'
import { MalformedQueryError, InvalidSettingValueError } from '../errors/catalog.js'
import { toDirpath } from '../paths/dirpath.js'

/** Separates a folder from a keyword or query, and a profile from a setting. */
export const DELIMITER = '➣'

/**
 * Split `query` on `delimiter` into exactly two trimmed parts.
 */
export function splitDelimited(query: string, delimiter: string = DELIMITER): [string, string] {
  const parts = query.split(delimiter)
  if (parts.length !== 2) {
    throw new MalformedQueryError(
      `Expected exactly one "${delimiter}" in query, found ${parts.length - 1}`,
      { query },
    )
  }
  return [parts[0].trim(), parts[1].trim()]
}

export interface DirpathQuery {
  /** Absolute, without trailing slash */
  dirpath: string
  rest: string
}

/** "~/Code ➣ dev" → { dirpath: "/Users/me/Code", rest: "dev" } */
export function parseDirpathQuery(query: string, home: string = homedir()): DirpathQuery {
  const [dirpath, rest] = splitDelimited(query)
  return { dirpath: toDirpath(dirpath, home), rest }
}

export interface Tokens {
  /** Handed to the indexer as a filename substring */
  indexQuery: string
  /** Matched against the parent directories, in order */
  refinements: string[]
}

export function tokenize(phrase: string): Tokens {
  const words = phrase.split(/\s+/).filter((w) => w.length > 0)
  if (words.length === 0) {
    return { indexQuery: '', refinements: [] }
  }
  return {
    indexQuery: words[words.length - 1],
    refinements: words.slice(0, -1),
  }
}

export interface SettingsQuery {
  profileId: string
  setting?: string
  value?: number
}

const INTEGER_RE = /^[+-]?\d+$/

/** "3 ➣ min ➣ 2" → { profileId: "3", setting: "min", value: 2 } */
export function parseSettingsQuery(query: string): SettingsQuery {
  const [profileId, setting, value] = query.split(DELIMITER).map((s) => s.trim())
  const parsed: SettingsQuery = { profileId }

  if (setting) {
    parsed.setting = setting
  }
  if (value) {
    if (!INTEGER_RE.test(value)) {
      throw new InvalidSettingValueError(setting ?? '', value)
    }
    parsed.value = Number.parseInt(value, 10)
  }
  return parsed
}
