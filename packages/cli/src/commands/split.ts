import type { SplitConfigFile, SplitOptions } from '@stratasplit/splitter'
import type { Command } from 'commander'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import {
  formatReportTable,
  parseRatioString,
  parseSplitConfigFile,
  parseSplitOptions,
  serializeReport,
  splitDataset,
} from '@stratasplit/splitter'
import { invalidConfigError } from '@stratasplit/splitter/errors'
import { createLogger, LogLevels, setLogLevel } from '@stratasplit/utils/logger'
import { InvalidArgumentError } from 'commander'

const log = createLogger('cli')

export const DEFAULT_RATIO = '0.7,0.2,0.1'

export const SEED_ENV_VAR = 'STRATASPLIT_SEED'

export interface SplitCommandOptions {
  ratio?: string
  move?: boolean
  seed?: number
  shuffle?: boolean
  ext?: string[]
  config?: string
  dryRun?: boolean
  report?: string
  quiet?: boolean
  debug?: boolean
}

export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}

export async function loadConfigFile(file: string): Promise<SplitConfigFile> {
  const content = await readFile(file, 'utf-8')
  let json: unknown
  try {
    json = JSON.parse(content)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw invalidConfigError(`could not parse ${file}: ${msg}`)
  }
  return parseSplitConfigFile(json)
}

/**
 * Merge flags, config file and environment. A flag wins over the config
 * file, which wins over the environment.
 */
export async function resolveSplitOptions(
  options: SplitCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SplitOptions> {
  const file: SplitConfigFile = options.config ? await loadConfigFile(options.config) : {}

  const envSeed = env[SEED_ENV_VAR]
  let seed = options.seed ?? file.seed
  if (seed === undefined && envSeed !== undefined && envSeed !== '') {
    const parsed = Number(envSeed)
    if (!Number.isInteger(parsed)) {
      throw invalidConfigError(`${SEED_ENV_VAR} must be an integer, got "${envSeed}"`)
    }
    seed = parsed
  }

  return parseSplitOptions({
    ratio: options.ratio !== undefined
      ? parseRatioString(options.ratio)
      : file.ratio ?? parseRatioString(DEFAULT_RATIO),
    move: options.move ?? file.move,
    seed,
    shuffle: options.shuffle === false ? false : file.shuffle,
    imageExtensions: options.ext ?? file.imageExtensions,
    verbose: options.quiet ? false : file.verbose,
    dryRun: options.dryRun ?? file.dryRun,
  })
}

export function registerSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split a class-per-directory dataset into train/val/test')
    .argument('<data-dir>', 'Dataset root, one subdirectory per class')
    .argument('<output-dir>', 'Where train/, val/ and test/ are created')
    .option('-r, --ratio <train,val,test>', `Split ratios summing to 1.0 (default: ${DEFAULT_RATIO})`)
    .option('--move', 'Move files instead of copying')
    .option('-s, --seed <seed>', `Random seed (default: $${SEED_ENV_VAR})`, parseInteger)
    .option('--no-shuffle', 'Keep directory listing order')
    .option('-e, --ext <extensions...>', 'Image extensions to include (default: .png .jpg .jpeg)')
    .option('-c, --config <file>', 'JSON file with split options')
    .option('--dry-run', 'Compute the split without touching any file')
    .option('--report <file>', 'Write the split report as JSON')
    .option('-q, --quiet', 'Suppress progress and summary output')
    .option('--debug', 'Log every file placement')
    .action(async (dataDir: string, outputDir: string, options: SplitCommandOptions) => {
      if (options.debug) {
        setLogLevel(LogLevels.debug)
      }

      const splitOptions = await resolveSplitOptions(options)
      const verb = splitOptions.move ? 'Moving' : 'Copying'
      if (splitOptions.verbose) {
        log.start(`${verb} ${dataDir} → ${outputDir}${splitOptions.dryRun ? ' (dry run)' : ''}`)
      }

      const report = splitDataset(dataDir, outputDir, splitOptions)

      if (options.report) {
        await mkdir(path.dirname(path.resolve(options.report)), { recursive: true })
        await writeFile(options.report, serializeReport(report))
        if (splitOptions.verbose) {
          log.success(`Report written: ${options.report}`)
        }
      }

      if (splitOptions.verbose) {
        console.log(`\n${formatReportTable(report)}`)
      }
    })
}
