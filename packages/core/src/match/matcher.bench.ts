import { bench, describe } from 'vitest'

import type { MatchStrategy } from '../types'
import { createLikeMatcher } from './matcher'

const strategies: MatchStrategy[] = ['segment', 're2', 'backtracking']

/**
 * Deterministic lowercase strings, so every run sees the same data.
 */
function randomStrings(count: number, minLength: number, maxLength: number, seed = 42): string[] {
  let state = seed
  const next = (): number => {
    state = (Math.imul(state, 1_103_515_245) + 12_345) >>> 0
    return state
  }

  const result: string[] = []
  for (let i = 0; i < count; i++) {
    const length = minLength + (next() % (maxLength - minLength + 1))
    let value = ''
    for (let j = 0; j < length; j++) {
      value += String.fromCharCode(97 + (next() % 26))
    }
    result.push(value)
  }
  return result
}

const values = randomStrings(1_000, 10, 100)

const patterns: Array<[string, string]> = [
  ['prefix', 'abc%'],
  ['suffix', '%xyz'],
  ['contains', '%needle%'],
  ['underscore', 'a_c%'],
  ['multi-wildcard', 'a%b%c%d%e'],
  ['chained', '%a%b%c%d%e%f%g%h%'],
]

for (const [name, source] of patterns) {
  describe(`${name}: ${source}`, () => {
    for (const strategy of strategies) {
      const matcher = createLikeMatcher(source, { strategy })

      bench(strategy, () => {
        for (const value of values) {
          matcher.matches(value)
        }
      })
    }
  })
}
