import path from 'path'

export function normalizePath(p: string): string {
  return path.resolve(p)
}

/**
 * True when `child` is `parent` itself or lives somewhere below it.
 */
export function isSameOrInside(child: string, parent: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child))
  if (rel === '') return true
  if (path.isAbsolute(rel)) return false
  return rel !== '..' && !rel.startsWith(`..${path.sep}`)
}

export function isPlainName(name: string): boolean {
  if (!name || name === '.' || name === '..') return false
  return !name.includes('/') && !name.includes(path.sep) && !name.includes('\0')
}
