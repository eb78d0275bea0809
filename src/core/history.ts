import { Operation, UndoableOperation } from '../types.js'
import { describeOperation } from './format.js'

export const DEFAULT_MAX_HISTORY = 100
export const DEFAULT_MERGE_WINDOW_MS = 1000

export interface HistoryOptions {
  maxSize?: number
  /** Collapse rename chains recorded in quick succession. Default: false. */
  mergeEnabled?: boolean
  mergeWindowMs?: number
}

export interface HistorySnapshot {
  undo: UndoableOperation[]
  redo: UndoableOperation[]
}

type MergeOutcome =
  | { type: 'none' }
  | { type: 'replace'; op: UndoableOperation }
  | { type: 'cancel' }

/**
 * Two renames of the same entry collapse into one from the first name to
 * the last. A chain that ends where it started cancels out.
 */
export function mergeOperations(prev: UndoableOperation, next: UndoableOperation, windowMs: number): MergeOutcome {
  if (next.timestamp - prev.timestamp > windowMs) return { type: 'none' }
  if (prev.undo.kind !== 'rename' || next.undo.kind !== 'rename') return { type: 'none' }
  if (prev.undo.to !== next.undo.from) return { type: 'none' }

  const from = prev.undo.from
  const to = next.undo.to
  if (from === to) return { type: 'cancel' }

  const merged: UndoableOperation = {
    id: prev.id,
    kind: 'rename',
    sourcePaths: [from],
    targetPath: to,
    timestamp: next.timestamp,
    undoable: true,
    undo: { kind: 'rename', from, to },
    description: '',
  }
  merged.description = describeOperation(merged)
  return { type: 'replace', op: merged }
}

/**
 * Undo/redo stacks. Entries live in exactly one of the two stacks until
 * they are evicted (undo side, by size) or cleared (redo side, by record).
 * The caller performs the filesystem reversal; this class only moves entries.
 */
export class HistoryManager {
  private undoStack: UndoableOperation[] = []
  private redoStack: UndoableOperation[] = []
  readonly maxSize: number
  private readonly mergeEnabled: boolean
  private readonly mergeWindowMs: number

  constructor(opts: HistoryOptions = {}) {
    this.maxSize = Math.max(1, opts.maxSize ?? DEFAULT_MAX_HISTORY)
    this.mergeEnabled = opts.mergeEnabled ?? false
    this.mergeWindowMs = opts.mergeWindowMs ?? DEFAULT_MERGE_WINDOW_MS
  }

  /**
   * Record a successful operation. Always clears the redo stack; operations
   * that cannot be undone are not kept. Returns the entries evicted by size.
   */
  record(op: Operation): UndoableOperation[] {
    this.redoStack = []
    if (!op.undoable) return []

    const top = this.peekUndo()
    if (this.mergeEnabled && top) {
      const merged = mergeOperations(top, op, this.mergeWindowMs)
      if (merged.type === 'cancel') {
        this.undoStack.pop()
        return []
      }
      if (merged.type === 'replace') {
        this.undoStack[this.undoStack.length - 1] = merged.op
        return []
      }
    }

    this.undoStack.push(op)
    return this.evict()
  }

  undo(): UndoableOperation | undefined {
    const op = this.undoStack.pop()
    if (op) this.redoStack.push(op)
    return op
  }

  redo(): UndoableOperation | undefined {
    const op = this.redoStack.pop()
    if (op) this.undoStack.push(op)
    return op
  }

  peekUndo(): UndoableOperation | undefined {
    return this.undoStack[this.undoStack.length - 1]
  }

  peekRedo(): UndoableOperation | undefined {
    return this.redoStack[this.redoStack.length - 1]
  }

  canUndo(): boolean {
    return this.undoStack.length > 0
  }

  canRedo(): boolean {
    return this.redoStack.length > 0
  }

  /** Drop the next undo entry without moving it (its target diverged). */
  discardUndo(): UndoableOperation | undefined {
    return this.undoStack.pop()
  }

  discardRedo(): UndoableOperation | undefined {
    return this.redoStack.pop()
  }

  /** Oldest first. */
  undoEntries(): readonly UndoableOperation[] {
    return [...this.undoStack]
  }

  /** Oldest first; the last entry is the next redo. */
  redoEntries(): readonly UndoableOperation[] {
    return [...this.redoStack]
  }

  clear(): void {
    this.undoStack = []
    this.redoStack = []
  }

  snapshot(): HistorySnapshot {
    return { undo: [...this.undoStack], redo: [...this.redoStack] }
  }

  restore(snapshot: HistorySnapshot): void {
    this.undoStack = snapshot.undo.slice(-this.maxSize)
    this.redoStack = snapshot.redo.slice(-this.maxSize)
  }

  private evict(): UndoableOperation[] {
    const overflow = this.undoStack.length - this.maxSize
    return overflow > 0 ? this.undoStack.splice(0, overflow) : []
  }
}
