export {
  hasImageExtension,
  planClassSplit,
  readClassFolder,
  splitClass,
  splitClassWith,
} from './class-splitter'
export type { ClassFolder, ClassSplitOptions, ClassSplitSummary, PlanOptions, SplitAssignment } from './class-splitter'

export {
  DEFAULT_IMAGE_EXTENSIONS,
  normalizeExtension,
  parseRatioString,
  parseSplitConfigFile,
  parseSplitOptions,
  parseSplitRatio,
  SPLIT_NAMES,
} from './config'
export type { SplitConfigFile, SplitName, SplitOptions, SplitOptionsInput, SplitRatio, SplitRatioInput } from './config'

export { listClassDirectories, scanDataset, splitDataset } from './dataset-splitter'
export type { DatasetSplitOptions, DatasetSplitReport } from './dataset-splitter'

export { SplitError, SplitErrorCode } from './errors'
export { createRandom, SeededRandom, shuffleInPlace } from './random'
export type { RandomSource } from './random'

export { formatReportTable, serializeReport, summarizeReport } from './report'
export type { SplitTotals } from './report'
