import { describe, it, expect } from 'vitest'
import { encodeRow, hashIdentity } from './identity.js'

describe('identity', () => {
  it('hashes equal parts to the same id', () => {
    expect(hashIdentity(['data-row', 'MathTests', 'adds'])).toBe(
      hashIdentity(['data-row', 'MathTests', 'adds'])
    )
  })

  it('keeps part boundaries apart', () => {
    expect(hashIdentity(['ab', 'c'])).not.toBe(hashIdentity(['a', 'bc']))
  })

  it('encodes rows without truncation', () => {
    const long = 'b'.repeat(120)

    expect(encodeRow([long])).toBe(`[ '${long}' ]`)
    expect(encodeRow([[[[[1]]]]])).toBe('[ [ [ [ [ 1 ] ] ] ] ]')
    expect(encodeRow([Array.from({ length: 12 }, () => 0)])).toBe(
      `[ [ ${Array.from({ length: 12 }, () => '0').join(', ')} ] ]`
    )
  })
})
