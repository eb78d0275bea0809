import path from 'path'

function rand() {
  return Math.random().toString(16).slice(2)
}

/**
 * Each deleted item gets its own bucket so that two deletes of the same
 * name never collide. The basename is kept for readability.
 */
export function trashPathFor(trashDir: string, originalAbs: string, now = Date.now()) {
  return path.join(trashDir, `${now}.${rand()}`, path.basename(originalAbs))
}

/**
 * The bucket directory that holds a stored item, or undefined when the
 * path does not look like one produced by trashPathFor.
 */
export function trashBucketOf(trashDir: string, storedAbs: string): string | undefined {
  const bucket = path.dirname(storedAbs)
  return path.dirname(bucket) === path.resolve(trashDir) ? bucket : undefined
}
