import fs from 'fs-extra'
import path from 'path'
import { cancelledError } from '../errors.js'

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

/**
 * Create an empty file. Fails with EEXIST rather than touching an existing one.
 */
export async function createEmptyFile(p: string) {
  await ensureParentDir(p)
  await fs.writeFile(p, '', { flag: 'wx' })
}

export async function createDir(p: string) {
  await ensureParentDir(p)
  await fs.mkdir(p)
}

/**
 * Create a symlink at target pointing to source, relative to the target's directory.
 * If symlink fails, it throws.
 */
export async function createSymlink(sourceAbs: string, targetAbs: string) {
  await ensureParentDir(targetAbs)
  const st = await fs.stat(sourceAbs)
  const rel = path.relative(path.dirname(targetAbs), sourceAbs) || '.'
  await fs.symlink(rel, targetAbs, st.isDirectory() ? 'dir' : 'file')
}

export async function removePath(p: string) {
  await fs.remove(p)
}

/**
 * Remove only if it's an empty directory.
 */
export async function removeEmptyDir(p: string) {
  await fs.rmdir(p)
}

/**
 * Remove only if it's a symlink. Throws if it exists but isn't a symlink.
 */
export async function removeSymlink(p: string) {
  const st = await fs.lstat(p)
  if (!st.isSymbolicLink()) {
    throw new Error(`Refusing to remove non-symlink: ${p}`)
  }
  await fs.unlink(p)
}

export async function renameAtomic(from: string, to: string) {
  await fs.rename(from, to)
}

/**
 * Move across directories. fs-extra falls back to copy + remove across devices.
 */
export async function movePath(from: string, to: string) {
  await fs.move(from, to, { overwrite: false })
}

export interface CopyPathOptions {
  signal?: AbortSignal
  /** Called for every file or directory the copy visits. */
  onEntry?: (src: string) => void
}

/**
 * Copy a file or directory tree, keeping timestamps and never overwriting.
 * The signal is checked before each entry, so cancellation lands between files.
 */
export async function copyPath(from: string, to: string, opts: CopyPathOptions = {}) {
  await ensureParentDir(to)
  await fs.copy(from, to, {
    overwrite: false,
    errorOnExist: true,
    preserveTimestamps: true,
    filter: async (src: string) => {
      if (opts.signal?.aborted) throw cancelledError(src)
      opts.onEntry?.(src)
      return true
    },
  })
}

export async function pathPresent(p: string): Promise<boolean> {
  try {
    await fs.lstat(p)
    return true
  } catch {
    return false
  }
}
