import type { ClassFolder, ClassSplitSummary } from './class-splitter'
import type { SplitOptionsInput } from './config'
import type { RandomSource } from './random'
import { readdirSync } from 'node:fs'
import path from 'node:path'
import { createLogger } from '@stratasplit/utils/logger'
import { isDirectory, readClassFolder, splitClassWith } from './class-splitter'
import { DEFAULT_IMAGE_EXTENSIONS, ImageExtensionsSchema, parseSplitOptions } from './config'
import { dataDirNotFoundError, invalidConfigError } from './errors'
import { createRandom } from './random'

const log = createLogger('dataset')

export type DatasetSplitReport = readonly ClassSplitSummary[]

export type DatasetSplitOptions = SplitOptionsInput & {
  /** Shared by every class; takes precedence over `seed`. */
  random?: RandomSource
}

/**
 * Immediate subdirectories of `dataDir`, in filesystem order.
 */
export function listClassDirectories(dataDir: string): string[] {
  if (!isDirectory(dataDir)) {
    throw dataDirNotFoundError(dataDir)
  }
  return readdirSync(dataDir).filter(name => isDirectory(path.join(dataDir, name)))
}

/**
 * Split every class directory under `dataDir` into `outputDir`.
 *
 * With a seed, each class gets a freshly seeded generator, so every class
 * shuffles from the same state. Without one, a single unseeded generator is
 * shared across the run. The first error aborts the run; classes already
 * placed are left as they are.
 */
export function splitDataset(dataDir: string, outputDir: string, options: DatasetSplitOptions): DatasetSplitReport {
  const { random, ...rest } = options
  const parsed = parseSplitOptions(rest)

  const classNames = listClassDirectories(dataDir)
  log.debug(`Found ${classNames.length} class director${classNames.length === 1 ? 'y' : 'ies'} in ${dataDir}`)

  const shared = random ?? (parsed.seed === undefined ? createRandom() : undefined)
  const report: ClassSplitSummary[] = []

  for (const className of classNames) {
    const summary = splitClassWith(
      path.join(dataDir, className),
      outputDir,
      className,
      parsed,
      shared ?? createRandom(parsed.seed),
    )
    if (summary) {
      report.push(summary)
    }
  }

  return report
}

/**
 * Enumerate classes and their qualifying images without splitting.
 * Empty classes are included.
 */
export function scanDataset(dataDir: string, extensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS): ClassFolder[] {
  const result = ImageExtensionsSchema.safeParse(extensions)
  if (!result.success) {
    throw invalidConfigError('imageExtensions must be a non-empty list of extensions')
  }
  return listClassDirectories(dataDir).map(className =>
    readClassFolder(path.join(dataDir, className), className, result.data),
  )
}
