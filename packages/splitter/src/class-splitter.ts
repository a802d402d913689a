import type { SplitName, SplitOptions, SplitOptionsInput, SplitRatio } from './config'
import type { RandomSource } from './random'
import { mkdirSync, readdirSync, statSync } from 'node:fs'
import path from 'node:path'
import { createLogger } from '@stratasplit/utils/logger'
import { parseSplitOptions, SPLIT_NAMES } from './config'
import { classDirNotFoundError } from './errors'
import { placeFile } from './placement'
import { createRandom, shuffleInPlace } from './random'

const log = createLogger('split')

/**
 * A class directory and the qualifying image names found directly inside it.
 */
export interface ClassFolder {
  className: string
  path: string
  images: string[]
}

export type SplitAssignment = Readonly<Record<SplitName, readonly string[]>>

export interface ClassSplitSummary {
  readonly className: string
  readonly total: number
  readonly train: number
  readonly val: number
  readonly test: number
}

export type ClassSplitOptions = SplitOptionsInput & {
  /** Label used for output directories. Defaults to the base name of the class directory. */
  className?: string
  /** Overrides seed-based generator construction. */
  random?: RandomSource
}

export interface PlanOptions {
  shuffle: boolean
  random: RandomSource
}

export function hasImageExtension(fileName: string, extensions: readonly string[]): boolean {
  const lower = fileName.toLowerCase()
  return extensions.some(ext => lower.endsWith(ext))
}

/**
 * List the regular files in `classDir` whose extension is allowed. Order is
 * whatever the filesystem returns.
 */
export function readClassFolder(classDir: string, className: string, extensions: readonly string[]): ClassFolder {
  const images = readdirSync(classDir).filter(name =>
    hasImageExtension(name, extensions) && statSync(path.join(classDir, name)).isFile(),
  )
  return { className, path: classDir, images }
}

/**
 * Partition images into train/val/test. Boundaries truncate, so the test
 * slice takes the remainder. A zero-ratio split is always empty; when test
 * is zero-ratio its remainder goes to the last split with a non-zero ratio.
 */
export function planClassSplit(images: readonly string[], ratio: SplitRatio, options: PlanOptions): SplitAssignment {
  const ordered = [...images]
  if (options.shuffle) {
    shuffleInPlace(ordered, options.random)
  }

  const total = ordered.length
  const trainEnd = Math.trunc(total * ratio.train)
  const valEnd = trainEnd + Math.trunc(total * ratio.val)

  const slices: Record<SplitName, string[]> = {
    train: ratio.train > 0 ? ordered.slice(0, trainEnd) : [],
    val: ratio.val > 0 ? ordered.slice(trainEnd, valEnd) : [],
    test: ratio.test > 0 ? ordered.slice(valEnd) : [],
  }

  if (ratio.test === 0) {
    const last = SPLIT_NAMES.filter(name => ratio[name] > 0).at(-1)
    if (last === 'train') {
      slices.train = ordered
    }
    else if (last === 'val') {
      slices.val = ordered.slice(trainEnd)
    }
  }

  return slices
}

/**
 * Split one class directory into `outputDir/<split>/<className>`.
 *
 * Options are validated before the filesystem is touched. Returns
 * `undefined` when the class has no qualifying images.
 */
export function splitClass(classDir: string, outputDir: string, options: ClassSplitOptions): ClassSplitSummary | undefined {
  const { className, random, ...rest } = options
  const parsed = parseSplitOptions(rest)
  return splitClassWith(
    classDir,
    outputDir,
    className ?? path.basename(path.resolve(classDir)),
    parsed,
    random ?? createRandom(parsed.seed),
  )
}

/**
 * splitClass for already-validated options and an explicit random source.
 */
export function splitClassWith(
  classDir: string,
  outputDir: string,
  className: string,
  options: SplitOptions,
  random: RandomSource,
): ClassSplitSummary | undefined {
  if (!isDirectory(classDir)) {
    throw classDirNotFoundError(classDir)
  }

  const folder = readClassFolder(classDir, className, options.imageExtensions)
  const total = folder.images.length

  if (total === 0) {
    if (options.verbose) {
      log.info(`No images found in class '${className}'.`)
    }
    return undefined
  }

  if (options.verbose) {
    log.info(`Processing class '${className}' - Total images: ${total}`)
  }

  const assignment = planClassSplit(folder.images, options.ratio, { shuffle: options.shuffle, random })
  const mode = options.move ? 'move' : 'copy'

  for (const split of SPLIT_NAMES) {
    const files = assignment[split]
    if (files.length === 0) {
      continue
    }

    const splitDir = path.join(outputDir, split, className)
    if (options.dryRun) {
      log.debug(`[dry-run] ${files.length} file(s) → ${splitDir}`)
    }
    else {
      mkdirSync(splitDir, { recursive: true })
      for (const file of files) {
        log.debug(`${mode} ${file} → ${splitDir}`)
        placeFile(path.join(classDir, file), path.join(splitDir, file), mode)
      }
    }

    if (options.verbose) {
      log.info(`  ${capitalize(split).padEnd(5)} images: ${files.length}`)
    }
  }

  if (options.verbose) {
    log.info('')
  }

  return {
    className,
    total,
    train: assignment.train.length,
    val: assignment.val.length,
    test: assignment.test.length,
  }
}

export function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory()
  }
  catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}
