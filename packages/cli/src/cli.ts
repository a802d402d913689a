#!/usr/bin/env node
import { createLogger } from '@stratasplit/utils/logger'
import { program } from 'commander'
import { config } from 'dotenv'

import pkg from '../package.json'
import { registerInspectCommand } from './commands/inspect'
import { registerSplitCommand } from './commands/split'

const log = createLogger('CLI')

config({ path: ['.env.local', '.env'] })

program
  .name('stratasplit')
  .description('Stratified train/val/test splitting for class-per-directory image datasets')
  .version(pkg.version)

registerSplitCommand(program)
registerInspectCommand(program)

program.parseAsync().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error)
  log.error(msg)
  process.exit(1)
})
