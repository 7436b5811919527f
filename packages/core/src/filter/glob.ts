const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\/]/g

function escapeRegExp(s: string): string {
  return s.replace(REGEXP_SPECIAL, '\\$&')
}

/**
 * Translate a shell-style pattern to an anchored RegExp.
 *
 *   *       any run of characters, "/" included
 *   ?       any single character
 *   [seq]   any character in seq
 *   [!seq]  any character not in seq
 *
 * An unclosed "[" is literal. Matching is case-sensitive.
 */
export function globToRegExp(pattern: string): RegExp {
  let out = ''
  let i = 0

  while (i < pattern.length) {
    const c = pattern[i++]

    if (c === '*') {
      while (pattern[i] === '*') i++
      out += '.*'
    } else if (c === '?') {
      out += '.'
    } else if (c === '[') {
      let j = i
      if (pattern[j] === '!') j++
      if (pattern[j] === ']') j++
      while (j < pattern.length && pattern[j] !== ']') j++

      if (j >= pattern.length) {
        out += '\\['
        continue
      }

      let set = pattern.slice(i, j).replace(/\\/g, '\\\\').replace(/]/g, '\\]')
      i = j + 1
      if (set.startsWith('!')) {
        set = '^' + set.slice(1)
      } else if (set.startsWith('^') || set.startsWith('[')) {
        set = '\\' + set
      }
      out += `[${set}]`
    } else {
      out += escapeRegExp(c)
    }
  }

  return new RegExp(`^${out}$`, 's')
}
