import { describe, expect, it } from 'vitest'

import { HistoryManager, mergeOperations } from '../src/core/history.js'
import { PermanentOperation, UndoableOperation } from '../src/types.js'

function createOp(n: number, timestamp = n): UndoableOperation {
  const created = `/w/file-${n}.txt`
  return {
    id: `op-${n}`,
    kind: 'create_file',
    sourcePaths: [],
    targetPath: created,
    timestamp,
    description: `Create file 'file-${n}.txt'`,
    undoable: true,
    undo: { kind: 'create_file', created },
  }
}

function renameOp(from: string, to: string, timestamp: number): UndoableOperation {
  return {
    id: `rename-${timestamp}`,
    kind: 'rename',
    sourcePaths: [from],
    targetPath: to,
    timestamp,
    description: 'rename',
    undoable: true,
    undo: { kind: 'rename', from, to },
  }
}

const permanentDelete: PermanentOperation = {
  id: 'rm-1',
  kind: 'delete',
  sourcePaths: ['/w/gone.txt'],
  timestamp: 1,
  description: "Permanently delete 'gone.txt'",
  undoable: false,
}

describe('HistoryManager', () => {
  it('keeps at most maxSize entries and returns the evicted one', () => {
    const h = new HistoryManager({ maxSize: 100 })
    const evicted: UndoableOperation[] = []
    for (let i = 0; i < 101; i++) evicted.push(...h.record(createOp(i)))

    expect(evicted.map(op => op.id)).toEqual(['op-0'])
    const entries = h.undoEntries()
    expect(entries).toHaveLength(100)
    expect(entries[0].id).toBe('op-1')
    expect(h.peekUndo()?.id).toBe('op-100')
  })

  it('moves entries between the stacks on undo and redo', () => {
    const h = new HistoryManager()
    h.record(createOp(1))
    h.record(createOp(2))

    expect(h.undo()?.id).toBe('op-2')
    expect(h.peekUndo()?.id).toBe('op-1')
    expect(h.peekRedo()?.id).toBe('op-2')
    expect(h.redo()?.id).toBe('op-2')
    expect(h.canRedo()).toBe(false)
    expect(h.peekUndo()?.id).toBe('op-2')
  })

  it('returns undefined from empty stacks', () => {
    const h = new HistoryManager()
    expect(h.undo()).toBeUndefined()
    expect(h.redo()).toBeUndefined()
    expect(h.canUndo()).toBe(false)
  })

  it('recording clears redo, even for operations it does not keep', () => {
    const h = new HistoryManager()
    h.record(createOp(1))
    h.undo()
    expect(h.canRedo()).toBe(true)

    expect(h.record(permanentDelete)).toEqual([])
    expect(h.canRedo()).toBe(false)
    expect(h.canUndo()).toBe(false)
  })

  it('discards the top entry without moving it', () => {
    const h = new HistoryManager()
    h.record(createOp(1))
    h.record(createOp(2))
    expect(h.discardUndo()?.id).toBe('op-2')
    expect(h.canRedo()).toBe(false)
    expect(h.peekUndo()?.id).toBe('op-1')
  })

  it('trims restored snapshots to maxSize', () => {
    const h = new HistoryManager({ maxSize: 2 })
    h.restore({ undo: [createOp(1), createOp(2), createOp(3)], redo: [] })
    expect(h.undoEntries().map(op => op.id)).toEqual(['op-2', 'op-3'])
  })

  it('does not merge renames unless enabled', () => {
    const h = new HistoryManager()
    h.record(renameOp('/w/a.txt', '/w/b.txt', 1000))
    h.record(renameOp('/w/b.txt', '/w/c.txt', 1100))
    expect(h.undoEntries()).toHaveLength(2)
  })

  it('merges a rename chain into one entry', () => {
    const h = new HistoryManager({ mergeEnabled: true })
    h.record(renameOp('/w/a.txt', '/w/b.txt', 1000))
    h.record(renameOp('/w/b.txt', '/w/c.txt', 1500))

    const entries = h.undoEntries()
    expect(entries).toHaveLength(1)
    expect(entries[0].undo).toEqual({ kind: 'rename', from: '/w/a.txt', to: '/w/c.txt' })
    expect(entries[0].description).toBe("Rename 'a.txt' to 'c.txt'")
  })

  it('drops a rename chain that returns to the original name', () => {
    const h = new HistoryManager({ mergeEnabled: true })
    h.record(createOp(1))
    h.record(renameOp('/w/a.txt', '/w/b.txt', 1000))
    h.record(renameOp('/w/b.txt', '/w/a.txt', 1200))
    expect(h.undoEntries().map(op => op.id)).toEqual(['op-1'])
  })

  it('keeps renames outside the merge window apart', () => {
    const prev = renameOp('/w/a.txt', '/w/b.txt', 1000)
    expect(mergeOperations(prev, renameOp('/w/b.txt', '/w/c.txt', 2001), 1000)).toEqual({ type: 'none' })
    expect(mergeOperations(prev, renameOp('/w/x.txt', '/w/y.txt', 1001), 1000)).toEqual({ type: 'none' })
  })
})
