import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { FileDataDiscoverer } from './FileDataDiscoverer.js'
import { FileDataError } from '../discovery/errors.js'

describe('FileDataDiscoverer', () => {
  const discoverer = new FileDataDiscoverer()
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'file-data-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('reads rows from a JSON file relative to the base directory', () => {
    writeFileSync(path.join(dir, 'rows.json'), JSON.stringify([[1, 'one'], [2, 'two']]))

    const rows = discoverer.getData({ kind: 'file', path: 'rows.json', baseDir: dir })

    expect(discoverer.supportsDiscoveryEnumeration()).toBe(true)
    expect([...rows]).toEqual([
      [1, 'one'],
      [2, 'two']
    ])
  })

  it('reads the file again on every request', () => {
    const file = path.join(dir, 'rows.json')
    writeFileSync(file, '[[1]]')
    const first = [...discoverer.getData({ kind: 'file', path: file })]
    writeFileSync(file, '[[2]]')
    const second = [...discoverer.getData({ kind: 'file', path: file })]

    expect(first).toEqual([[1]])
    expect(second).toEqual([[2]])
  })

  it('throws when the file cannot be read', () => {
    expect(() => discoverer.getData({ kind: 'file', path: 'missing.json', baseDir: dir })).toThrow(
      FileDataError
    )
  })

  it('throws when the file is not valid JSON', () => {
    writeFileSync(path.join(dir, 'broken.json'), '[[1,')

    expect(() => discoverer.getData({ kind: 'file', path: 'broken.json', baseDir: dir })).toThrow(
      `Could not read data file '${path.join(dir, 'broken.json')}'`
    )
  })

  it('throws when the file does not hold an array of arrays', () => {
    writeFileSync(path.join(dir, 'flat.json'), '[1, 2, 3]')

    expect(() => discoverer.getData({ kind: 'file', path: 'flat.json', baseDir: dir })).toThrow(
      `Data file '${path.join(dir, 'flat.json')}' must contain an array of arrays`
    )
  })
})
