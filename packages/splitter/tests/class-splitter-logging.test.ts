import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { splitClass } from '@stratasplit/splitter/class-splitter'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const { info } = vi.hoisted(() => ({ info: vi.fn() }))

vi.mock('@stratasplit/utils/logger', () => ({
  createLogger: () => ({ info, debug: vi.fn() }),
}))

describe('splitClass progress output', () => {
  let tempDir: string
  let classDir: string

  beforeEach(() => {
    info.mockClear()
    tempDir = mkdtempSync(path.join(tmpdir(), 'split-log-'))
    classDir = path.join(tempDir, 'cat')
    mkdirSync(classDir)
    for (let i = 0; i < 10; i++) {
      writeFileSync(path.join(classDir, `img-${i}.png`), `image ${i}`)
    }
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should print a header, one line per split and a blank separator', () => {
    splitClass(classDir, path.join(tempDir, 'out'), { ratio: [0.8, 0.1, 0.1], seed: 42 })

    expect(info.mock.calls.map(call => call[0])).toEqual([
      'Processing class \'cat\' - Total images: 10',
      '  Train images: 8',
      '  Val   images: 1',
      '  Test  images: 1',
      '',
    ])
  })

  it('should print nothing when verbose is off', () => {
    splitClass(classDir, path.join(tempDir, 'out'), { ratio: [0.8, 0.1, 0.1], seed: 42, verbose: false })

    expect(info).not.toHaveBeenCalled()
  })
})
