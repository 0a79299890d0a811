import { describe, it, expect } from 'vitest'

import { parseLikePattern } from '../parse'
import { matchLikePattern, segmentMatchesAt, findSegment } from './segment-matcher'

function like(source: string, candidate: string | Uint8Array): boolean {
  return matchLikePattern(parseLikePattern(source), candidate)
}

describe('matchLikePattern', () => {
  describe('patterns without %', () => {
    it('matches the empty pattern only against the empty string', () => {
      expect(like('', '')).toBe(true)
      expect(like('', 'a')).toBe(false)
    })

    it('requires an exact match', () => {
      expect(like('abc', 'abc')).toBe(true)
      expect(like('abc', 'ab')).toBe(false)
      expect(like('abc', 'abcd')).toBe(false)
      expect(like('abc', 'abd')).toBe(false)
    })

    it('matches one byte per _', () => {
      expect(like('a_c', 'abc')).toBe(true)
      expect(like('a_c', 'aXc')).toBe(true)
      expect(like('a_c', 'ac')).toBe(false)
      expect(like('a_c', 'abbc')).toBe(false)
      expect(like('__', 'a')).toBe(false)
      expect(like('__', 'ab')).toBe(true)
      expect(like('__', 'abc')).toBe(false)
    })

    it('matches escaped wildcards literally', () => {
      expect(like('100\\%', '100%')).toBe(true)
      expect(like('100\\%', '100')).toBe(false)
      expect(like('100\\%', '100%extra')).toBe(false)
      expect(like('file\\_name', 'file_name')).toBe(true)
      expect(like('file\\_name', 'fileXname')).toBe(false)
      expect(like('a\\\\b', 'a\\b')).toBe(true)
    })
  })

  describe('% wildcard', () => {
    it('matches everything with a lone %', () => {
      expect(like('%', '')).toBe(true)
      expect(like('%', 'abc')).toBe(true)
      expect(like('%', 'line1\nline2')).toBe(true)
      expect(like('%%%', '')).toBe(true)
    })

    it('anchors prefix patterns at the start', () => {
      expect(like('abc%', 'abc')).toBe(true)
      expect(like('abc%', 'abcdef')).toBe(true)
      expect(like('abc%', 'xabc')).toBe(false)
    })

    it('anchors suffix patterns at the end', () => {
      expect(like('%abc', 'xyzabc')).toBe(true)
      expect(like('%abc', 'abc')).toBe(true)
      expect(like('%abc', 'abcx')).toBe(false)
    })

    it('searches inner segments anywhere', () => {
      expect(like('%abc%', 'xyzabcdef')).toBe(true)
      expect(like('%abc%', 'ab')).toBe(false)
      expect(like('%hello%', 'HELLO')).toBe(false)
    })

    it('keeps segments in pattern order', () => {
      expect(like('a%b%c', 'abc')).toBe(true)
      expect(like('a%b%c', 'a1b2c')).toBe(true)
      expect(like('a%b%c', 'acb')).toBe(false)
    })

    it('mixes % and _', () => {
      expect(like('a%b_c%d', 'a1b2c3d')).toBe(true)
      expect(like('a%b_c%d', 'aXbYcZd')).toBe(true)
      expect(like('a%b_c%d', 'abc')).toBe(false)
      expect(like('_%_', 'a')).toBe(false)
      expect(like('_%_', 'ab')).toBe(true)
      expect(like('_%_', 'abc')).toBe(true)
    })

    it('matches across line separators', () => {
      expect(like('hello%', 'hello\nworld')).toBe(true)
      expect(like('%world', 'hello\nworld')).toBe(true)
      expect(like('a_b', 'a\nb')).toBe(true)
    })
  })

  describe('repeated segments', () => {
    it('lets % match zero bytes between segments', () => {
      expect(like('a%a', 'aa')).toBe(true)
      expect(like('a%a', 'aba')).toBe(true)
      expect(like('a%a', 'a')).toBe(false)
      expect(like('a%a', 'ab')).toBe(false)
      expect(like('ab%ab', 'abab')).toBe(true)
      expect(like('ab%ab', 'abXab')).toBe(true)
      expect(like('ab%ab', 'abX')).toBe(false)
    })

    it('never lets two segments share bytes', () => {
      expect(like('%aa%aa%', 'aaaa')).toBe(true)
      expect(like('%aa%aa%', 'aaXaa')).toBe(true)
      expect(like('%aa%aa%', 'aa')).toBe(false)
      expect(like('%aa%aa%', 'aaa')).toBe(false)
      expect(like('%abc%cd%', 'abcdX')).toBe(false)
      expect(like('%abc%cd%', 'abcXcd')).toBe(true)
      expect(like('%a%a%a%', 'aaa')).toBe(true)
      expect(like('%a%a%a%', 'aa')).toBe(false)
    })

    it('keeps the tail anchor after the previous segment', () => {
      expect(like('%ab%b', 'abb')).toBe(true)
      expect(like('%ab%b', 'xab')).toBe(false)
    })
  })

  describe('byte semantics', () => {
    it('treats _ as one byte of a multi-byte character', () => {
      expect(like('caf_', 'café')).toBe(false)
      expect(like('caf__', 'café')).toBe(true)
      expect(like('a_b', 'a你b')).toBe(false)
      expect(like('a___b', 'a你b')).toBe(true)
      expect(like('a____b', 'a😀b')).toBe(true)
    })

    it('matches raw byte candidates', () => {
      expect(like('a_c', new Uint8Array([0x61, 0x00, 0x63]))).toBe(true)
      expect(like('a%', new Uint8Array([0x61, 0xff, 0xfe]))).toBe(true)
    })

    it('respects the offset of a byte view', () => {
      const bytes = new Uint8Array([0x78, 0x61, 0x62, 0x63])

      expect(like('abc', bytes.subarray(1))).toBe(true)
      expect(like('xab', bytes.subarray(0, 3))).toBe(true)
    })
  })

  it('rejects chained-wildcard patterns on long inputs', () => {
    const pattern = parseLikePattern('%a%a%a%a%a%a%a%a%a%a%a%a%b')

    expect(matchLikePattern(pattern, 'a'.repeat(20_000))).toBe(false)
    expect(matchLikePattern(pattern, 'a'.repeat(20_000) + 'b')).toBe(true)
  })
})

describe('segmentMatchesAt', () => {
  const segment = parseLikePattern('b_d').segments[0]
  const candidate = Buffer.from('abcdbxd')

  it('checks literal bytes and skips underscores', () => {
    expect(segmentMatchesAt(segment, candidate, 1)).toBe(true)
    expect(segmentMatchesAt(segment, candidate, 4)).toBe(true)
    expect(segmentMatchesAt(segment, candidate, 0)).toBe(false)
  })

  it('fails when the segment runs past the end', () => {
    expect(segmentMatchesAt(segment, candidate, 5)).toBe(false)
  })
})

describe('findSegment', () => {
  it('finds underscore segments by scanning offsets', () => {
    const segment = parseLikePattern('b_d').segments[0]
    const candidate = Buffer.from('abcdbxd')

    expect(findSegment(segment, candidate, 0)).toBe(1)
    expect(findSegment(segment, candidate, 2)).toBe(4)
    expect(findSegment(segment, candidate, 5)).toBe(-1)
  })

  it('finds literal segments by substring search', () => {
    const segment = parseLikePattern('cd').segments[0]
    const candidate = Buffer.from('abcdcd')

    expect(findSegment(segment, candidate, 0)).toBe(2)
    expect(findSegment(segment, candidate, 3)).toBe(4)
    expect(findSegment(segment, candidate, 5)).toBe(-1)
  })
})
