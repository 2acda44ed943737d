import { describe, it, expect } from 'vitest'
import { asDataRows, isDataRow, isIterable } from './type-guards.js'

describe('type guards', () => {
  it('recognizes iterables other than strings', () => {
    expect(isIterable([1])).toBe(true)
    expect(isIterable(new Map())).toBe(true)
    expect(isIterable('rows')).toBe(false)
    expect(isIterable({})).toBe(false)
    expect(isIterable(null)).toBe(false)
    expect(isIterable(7)).toBe(false)
  })

  it('recognizes data rows', () => {
    expect(isDataRow([])).toBe(true)
    expect(isDataRow({ length: 0 })).toBe(false)
  })

  it('passes rows through and rejects the first non-row', () => {
    const rows = asDataRows([[1], 'x', [2]], (value) => new Error(`bad ${String(value)}`))
    const seen: unknown[] = []

    expect(() => {
      for (const row of rows) {
        seen.push(row)
      }
    }).toThrow('bad x')
    expect(seen).toEqual([[1]])
  })
})
