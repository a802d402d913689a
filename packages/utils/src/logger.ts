import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// Tagged children keep their own copy of the level, so setLogLevel walks them too
const children: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  child.level = logger.level
  children.push(child)
  return child
}

// Set global log level (root + every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
