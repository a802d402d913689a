import { z } from 'zod/v4'
import { invalidConfigError } from './errors'

export const SPLIT_NAMES = ['train', 'val', 'test'] as const

export type SplitName = (typeof SPLIT_NAMES)[number]

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg']

const fraction = z.number().min(0).max(1)

const SplitRatioFieldsSchema = z.object({
  train: fraction,
  val: fraction,
  test: fraction,
})

const SplitRatioTupleSchema = z
  .tuple([fraction, fraction, fraction])
  .transform(([train, val, test]) => ({ train, val, test }))

/**
 * Train/val/test fractions. Accepts `{ train, val, test }` or
 * `[train, val, test]`; the sum must round to 1.00.
 */
export const SplitRatioSchema = z
  .union([SplitRatioFieldsSchema, SplitRatioTupleSchema])
  .refine(ratio => roundTo2(ratio.train + ratio.val + ratio.test) === 1, {
    message: 'Ratios must sum to 1.0',
  })

export type SplitRatio = z.output<typeof SplitRatioSchema>
export type SplitRatioInput = z.input<typeof SplitRatioSchema>

/**
 * Extension allow-list, normalized to lowercase with a leading dot.
 */
export const ImageExtensionsSchema = z
  .array(z.string().trim().min(1))
  .min(1)
  .transform(exts => [...new Set(exts.map(normalizeExtension))])

export const SplitOptionsSchema = z.object({
  ratio: SplitRatioSchema,
  move: z.boolean().default(false),
  seed: z.number().int().optional(),
  shuffle: z.boolean().default(true),
  imageExtensions: ImageExtensionsSchema.default([...DEFAULT_IMAGE_EXTENSIONS]),
  verbose: z.boolean().default(true),
  dryRun: z.boolean().default(false),
})

export type SplitOptions = z.output<typeof SplitOptionsSchema>
export type SplitOptionsInput = z.input<typeof SplitOptionsSchema>

/**
 * Shape of a `--config` JSON file: every split option, all optional.
 */
export const SplitConfigFileSchema = z.strictObject({
  ratio: SplitRatioSchema.optional(),
  move: z.boolean().optional(),
  seed: z.number().int().optional(),
  shuffle: z.boolean().optional(),
  imageExtensions: ImageExtensionsSchema.optional(),
  verbose: z.boolean().optional(),
  dryRun: z.boolean().optional(),
})

export type SplitConfigFile = z.output<typeof SplitConfigFileSchema>

export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase()
  return lower.startsWith('.') ? lower : `.${lower}`
}

// toFixed rounds the exact binary value, so 0.995 (stored just below) gives 0.99
function roundTo2(value: number): number {
  return Number(value.toFixed(2))
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ')
}

export function parseSplitRatio(input: SplitRatioInput): SplitRatio {
  const result = SplitRatioSchema.safeParse(input)
  if (!result.success) {
    throw invalidConfigError(describeIssues(result.error))
  }
  return result.data
}

export function parseSplitOptions(input: SplitOptionsInput): SplitOptions {
  const result = SplitOptionsSchema.safeParse(input)
  if (!result.success) {
    throw invalidConfigError(describeIssues(result.error))
  }
  return result.data
}

export function parseSplitConfigFile(input: unknown): SplitConfigFile {
  const result = SplitConfigFileSchema.safeParse(input)
  if (!result.success) {
    throw invalidConfigError(describeIssues(result.error))
  }
  return result.data
}

/**
 * Parse a comma-separated `train,val,test` string such as `0.8,0.1,0.1`.
 */
export function parseRatioString(value: string): SplitRatio {
  const parts = value.split(',').map(part => part.trim())
  if (parts.length !== 3 || parts.some(part => part === '')) {
    throw invalidConfigError(`ratio must have three comma-separated values, got "${value}"`)
  }
  const numbers = parts.map(Number)
  if (numbers.some(n => Number.isNaN(n))) {
    throw invalidConfigError(`ratio values must be numbers, got "${value}"`)
  }
  const [train, val, test] = numbers
  return parseSplitRatio({ train, val, test })
}
