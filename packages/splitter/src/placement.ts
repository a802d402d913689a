import { chmodSync, copyFileSync, renameSync, statSync, unlinkSync, utimesSync } from 'node:fs'

export type PlacementMode = 'copy' | 'move'

/**
 * Copy `src` to `dst`, overwriting, and carry over mode and timestamps.
 */
export function copyPreservingMetadata(src: string, dst: string): void {
  const stats = statSync(src)
  copyFileSync(src, dst)
  chmodSync(dst, stats.mode)
  utimesSync(dst, stats.atime, stats.mtime)
}

/**
 * Rename `src` to `dst`; across filesystems, copy then unlink.
 */
export function moveFile(src: string, dst: string): void {
  try {
    renameSync(src, dst)
  }
  catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error
    }
    copyPreservingMetadata(src, dst)
    unlinkSync(src)
  }
}

export function placeFile(src: string, dst: string, mode: PlacementMode): void {
  if (mode === 'move') {
    moveFile(src, dst)
  }
  else {
    copyPreservingMetadata(src, dst)
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV'
}
