/**
 * Error codes for dataset split operations
 */
export const SplitErrorCode = {
  INVALID_CONFIG: 'INVALID_CONFIG',
  DATA_DIR_NOT_FOUND: 'DATA_DIR_NOT_FOUND',
  CLASS_DIR_NOT_FOUND: 'CLASS_DIR_NOT_FOUND',
} as const

export type SplitErrorCode = (typeof SplitErrorCode)[keyof typeof SplitErrorCode]

export class SplitError extends Error {
  constructor(
    public code: SplitErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'SplitError'
  }
}

export function invalidConfigError(reason: string): SplitError {
  return new SplitError(SplitErrorCode.INVALID_CONFIG, `Invalid split configuration: ${reason}`)
}

export function dataDirNotFoundError(dir: string): SplitError {
  return new SplitError(SplitErrorCode.DATA_DIR_NOT_FOUND, `Dataset directory not found: ${dir}`)
}

export function classDirNotFoundError(dir: string): SplitError {
  return new SplitError(SplitErrorCode.CLASS_DIR_NOT_FOUND, `Class directory not found: ${dir}`)
}
