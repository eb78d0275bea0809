import { ClipboardContents, ClipboardMode } from '../types.js'
import { normalizePath } from './paths.js'

/**
 * Pending copy/cut selection. Pure state, no filesystem access.
 */
export class ClipboardState {
  private mode: ClipboardMode = 'empty'
  private paths = new Set<string>()

  /** Replace the selection wholesale. An empty list clears it. */
  set(paths: string[], cut: boolean): void {
    this.paths = new Set(paths.map(normalizePath))
    this.mode = this.paths.size === 0 ? 'empty' : cut ? 'cut' : 'copy'
  }

  contents(): ClipboardContents {
    return { mode: this.mode, paths: [...this.paths] }
  }

  isEmpty(): boolean {
    return this.mode === 'empty'
  }

  /** Drop some paths, e.g. the ones a cut-paste already moved. */
  remove(paths: string[]): void {
    for (const p of paths) this.paths.delete(normalizePath(p))
    if (this.paths.size === 0) this.mode = 'empty'
  }

  clear(): void {
    this.mode = 'empty'
    this.paths = new Set()
  }

  snapshot(): ClipboardContents {
    return this.contents()
  }

  restore(contents: ClipboardContents): void {
    if (contents.mode === 'empty') this.clear()
    else this.set(contents.paths, contents.mode === 'cut')
  }
}
