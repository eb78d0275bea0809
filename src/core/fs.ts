import fs from 'fs-extra'

/**
 * Read-only filesystem access for planning and numbering.
 * Mutations go through fs-ops.
 */
export interface FS {
  lstat(p: string): Promise<fs.Stats>
  stat(p: string): Promise<fs.Stats>
  readdir(p: string): Promise<string[]>
}

export const nodeFS: FS = {
  lstat: (p) => fs.lstat(p),
  stat: (p) => fs.stat(p),
  readdir: (p) => fs.readdir(p),
}

export async function lstatOrUndefined(fsys: FS, p: string): Promise<fs.Stats | undefined> {
  try {
    return await fsys.lstat(p)
  } catch {
    return undefined
  }
}

/** A dangling symlink counts as an existing entry. */
export async function entryExists(fsys: FS, p: string): Promise<boolean> {
  return (await lstatOrUndefined(fsys, p)) !== undefined
}
