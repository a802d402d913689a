import type { Command } from 'commander'
import { scanDataset } from '@stratasplit/splitter'

export interface ClassCount {
  className: string
  images: number
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Count qualifying images per class without splitting')
    .argument('<data-dir>', 'Dataset root, one subdirectory per class')
    .option('-e, --ext <extensions...>', 'Image extensions to include (default: .png .jpg .jpeg)')
    .option('--json', 'Print counts as JSON')
    .action((dataDir: string, options: { ext?: string[], json?: boolean }) => {
      const counts: ClassCount[] = scanDataset(dataDir, options.ext).map(folder => ({
        className: folder.className,
        images: folder.images.length,
      }))

      if (options.json) {
        console.log(JSON.stringify(counts, null, 2))
        return
      }

      const total = counts.reduce((sum, entry) => sum + entry.images, 0)
      console.log(`\n${counts.length} classes, ${total} images:`)
      for (const entry of counts) {
        console.log(`  ${entry.className}: ${entry.images}`)
      }
    })
}
