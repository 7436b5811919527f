export interface RankOptions {
  /**
   * Also accept values that merely contain the query's characters in order,
   * e.g. "ffr" for "fuzzy folders". Default true.
   */
  allChars?: boolean
}

const WORD_SPLIT = /[\s\-_./]+/

function charsInOrder(value: string, query: string): boolean {
  let pos = 0
  for (const ch of query) {
    pos = value.indexOf(ch, pos)
    if (pos === -1) return false
    pos++
  }
  return true
}

/**
 * Score one lower-case query word against a lower-case value; 0 means no match.
 */
export function scoreWord(value: string, word: string, allChars = true): number {
  const words = value.split(WORD_SPLIT).filter((w) => w.length > 0)
  const initials = words.map((w) => w[0]).join('')

  if (value.startsWith(word)) return 100
  if (initials.startsWith(word)) return 90
  if (words.includes(word)) return 85
  if (words.some((w) => w.startsWith(word))) return 80
  if (initials.includes(word)) return 75
  if (value.includes(word)) return 70
  if (allChars && charsInOrder(value, word)) return 60
  return 0
}

/**
 * Score `value` against every word of `query`. All words must match.
 */
export function scoreValue(value: string, query: string, allChars = true): number {
  const normalizedValue = value.toLowerCase()
  const queryWords = query.toLowerCase().split(/\s+/).filter((w) => w.length > 0)

  let total = 0
  for (const word of queryWords) {
    const score = scoreWord(normalizedValue, word, allChars)
    if (score === 0) return 0
    total += score
  }
  return total
}

/**
 * Items matching `query`, best first. Ties keep their input order; a blank
 * query returns the items unchanged.
 */
export function rankItems<T>(
  query: string,
  items: T[],
  key: (item: T) => string,
  options: RankOptions = {},
): T[] {
  if (query.trim() === '') return items

  const allChars = options.allChars ?? true
  return items
    .map((item) => ({ item, score: scoreValue(key(item), query, allChars) }))
    .filter((scored) => scored.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((scored) => scored.item)
}
