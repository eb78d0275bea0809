import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { OperationEngine } from '../src/engine/engine.js'
import { ActivityKind, ProgressEvent } from '../src/types.js'
import { Sandbox, makeEngine, makeSandbox, write } from './helpers.js'

describe('OperationEngine', () => {
  let box: Sandbox
  let engine: OperationEngine

  beforeEach(async () => {
    box = await makeSandbox()
    engine = makeEngine(box)
  })

  afterEach(async () => {
    await engine.idle()
    await fs.remove(box.root)
  })

  describe('copy', () => {
    it('numbers copies made next to the original', async () => {
      const doc = path.join(box.work, 'document.txt')
      await write(doc, 'hello')

      const first = await engine.copy([doc], box.work)
      const second = await engine.copy([doc], box.work)

      expect(first.success).toBe(true)
      expect(first.resultPaths).toEqual([path.join(box.work, 'document_00001.txt')])
      expect(second.resultPaths).toEqual([path.join(box.work, 'document_00002.txt')])
      expect(await fs.readFile(path.join(box.work, 'document_00002.txt'), 'utf8')).toBe('hello')
      expect(first.operation?.description).toBe(`Copy 'document.txt' to ${box.work}`)
      expect(first.items).toEqual([{ source: doc, target: first.resultPaths[0], status: 'done' }])
    })

    it('keeps the name when the target has no entry of that name', async () => {
      const doc = path.join(box.work, 'document.txt')
      await write(doc)
      const res = await engine.copy([doc], box.out)
      expect(res.resultPaths).toEqual([path.join(box.out, 'document.txt')])
      expect(await fs.readdir(box.out)).toEqual(['document.txt'])
    })

    it('preserves modification times', async () => {
      const doc = path.join(box.work, 'old.txt')
      await write(doc)
      await fs.utimes(doc, 1577836800, 1577836800)

      await engine.copy([doc], box.out)
      const st = await fs.stat(path.join(box.out, 'old.txt'))
      expect(Math.floor(st.mtimeMs / 1000)).toBe(1577836800)
    })

    it('copies directory trees', async () => {
      await write(path.join(box.work, 'tree', 'a.txt'), 'a')
      await write(path.join(box.work, 'tree', 'nested', 'b.txt'), 'b')

      const res = await engine.copy([path.join(box.work, 'tree')], box.out)
      expect(res.success).toBe(true)
      expect(await fs.readFile(path.join(box.out, 'tree', 'nested', 'b.txt'), 'utf8')).toBe('b')
    })

    it('rejects copying a directory into itself', async () => {
      const dir = path.join(box.work, 'dir')
      await fs.ensureDir(path.join(dir, 'sub'))

      const res = await engine.copy([dir], path.join(dir, 'sub'))
      expect(res.success).toBe(false)
      expect(res.errors.map(e => e.code)).toEqual(['InvalidTarget'])
      expect(await fs.readdir(path.join(dir, 'sub'))).toEqual([])
      expect(engine.canUndo()).toBe(false)
    })

    it('continues past a missing source and records the rest', async () => {
      const missing = path.join(box.work, 'missing.txt')
      const present = path.join(box.work, 'present.txt')
      await write(present)

      const res = await engine.copy([missing, present], box.out)
      expect(res.success).toBe(false)
      expect(res.items.map(i => i.status)).toEqual(['failed', 'done'])
      expect(res.errors).toEqual([expect.objectContaining({ code: 'NotFound', path: missing })])
      expect(engine.peekUndo()?.sourcePaths).toEqual([present])
    })

    it('fails every item when the target is not a directory', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)
      const res = await engine.copy([a], path.join(box.root, 'nowhere'))
      expect(res.success).toBe(false)
      expect(res.errors.map(e => e.code)).toEqual(['NotFound'])
      expect(res.items.map(i => i.status)).toEqual(['failed'])
    })

    it('plans without touching anything on dry run', async () => {
      const doc = path.join(box.work, 'document.txt')
      await write(doc)

      const dry = await engine.copy([doc], box.work, { dryRun: true, includePlanText: true })
      expect(dry.success).toBe(true)
      expect(dry.resultPaths).toEqual([path.join(box.work, 'document_00001.txt')])
      expect(dry.steps.map(s => s.status)).toEqual(['skipped', 'skipped'])
      expect(dry.planText?.split('\n')[0]).toMatch(/^- copy: Copy to temp destination \(from=/)
      expect(await fs.readdir(box.work)).toEqual(['document.txt'])
      expect(engine.canUndo()).toBe(false)

      const real = await engine.copy([doc], box.work)
      expect(real.resultPaths).toEqual([path.join(box.work, 'document_00001.txt')])
    })

    it('reports progress per item', async () => {
      await write(path.join(box.work, 'a.txt'))
      await write(path.join(box.work, 'b.txt'))
      const events: ProgressEvent[] = []

      await engine.copy([path.join(box.work, 'a.txt'), path.join(box.work, 'b.txt')], box.out, {
        onProgress: e => events.push(e),
      })
      const items = events.filter(e => e.phase === 'item')
      expect(items.map(e => [e.completed, e.total])).toEqual([[1, 2], [2, 2]])
      expect(events.some(e => e.phase === 'entry')).toBe(true)
    })
  })

  describe('move', () => {
    it('moves and numbers on collision', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a, 'moving')
      await write(path.join(box.out, 'a.txt'), 'staying')

      const res = await engine.move([a], box.out)
      expect(res.success).toBe(true)
      expect(res.resultPaths).toEqual([path.join(box.out, 'a_00001.txt')])
      expect(await fs.pathExists(a)).toBe(false)
      expect(await fs.readFile(path.join(box.out, 'a.txt'), 'utf8')).toBe('staying')
      expect(res.operation?.undo).toEqual({ kind: 'move', entries: [{ from: a, to: path.join(box.out, 'a_00001.txt') }] })
    })

    it('skips an item that is already in the target', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)

      const res = await engine.move([a], box.work)
      expect(res.success).toBe(true)
      expect(res.items.map(i => i.status)).toEqual(['skipped'])
      expect(res.warnings).toEqual([`Already in ${box.work}: a.txt`])
      expect(engine.canUndo()).toBe(false)
    })
  })

  describe('delete', () => {
    it('moves items to the trash and restores them on undo', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a, 'keep me')

      const res = await engine.delete([a])
      expect(res.success).toBe(true)
      expect(await fs.pathExists(a)).toBe(false)
      const undo = res.operation?.undo
      if (undo?.kind !== 'delete') throw new Error('expected a delete payload')
      expect(await fs.readFile(undo.entries[0].stored, 'utf8')).toBe('keep me')

      const back = await engine.undo()
      expect(back.success).toBe(true)
      expect(await fs.readFile(a, 'utf8')).toBe('keep me')
      expect(await fs.readdir(box.trash)).toEqual([])
    })

    it('permanently deletes a single file without confirmation', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)

      const res = await engine.delete([a], { permanent: true })
      expect(res.success).toBe(true)
      expect(res.operation?.undoable).toBe(false)
      expect(res.operation?.description).toBe("Permanently delete 'a.txt'")
      expect(await fs.pathExists(a)).toBe(false)
      expect(engine.canUndo()).toBe(false)
    })

    it('requires confirmation to permanently delete a directory or several items', async () => {
      const dir = path.join(box.work, 'dir')
      const a = path.join(box.work, 'a.txt')
      const b = path.join(box.work, 'b.txt')
      await fs.ensureDir(dir)
      await write(a)
      await write(b)

      const one = await engine.delete([dir], { permanent: true })
      expect(one.errors.map(e => e.code)).toEqual(['ConfirmationRequired'])
      expect(await fs.pathExists(dir)).toBe(true)

      const two = await engine.delete([a, b], { permanent: true })
      expect(two.errors.map(e => e.code)).toEqual(['ConfirmationRequired'])
      expect(await fs.pathExists(a)).toBe(true)

      const confirmed = await engine.delete([a, b], { permanent: true, confirmed: true })
      expect(confirmed.success).toBe(true)
      expect(await fs.readdir(box.work)).toEqual(['dir'])
    })

    it('refuses to delete the trash', async () => {
      await fs.ensureDir(box.trash)
      const res = await engine.delete([box.trash])
      expect(res.errors.map(e => e.code)).toEqual(['InvalidTarget'])
    })
  })

  describe('rename', () => {
    it('renames in place', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)

      const res = await engine.rename(a, 'b.txt')
      expect(res.success).toBe(true)
      expect(res.operation?.description).toBe("Rename 'a.txt' to 'b.txt'")
      expect(await fs.readdir(box.work)).toEqual(['b.txt'])
    })

    it('fails with NameConflict when the new name is taken', async () => {
      const a = path.join(box.work, 'a.txt')
      const b = path.join(box.work, 'b.txt')
      await write(a, 'A')
      await write(b, 'B')

      const res = await engine.rename(a, 'b.txt')
      expect(res.success).toBe(false)
      expect(res.errors.map(e => e.code)).toEqual(['NameConflict'])
      expect(await fs.readFile(a, 'utf8')).toBe('A')
      expect(await fs.readFile(b, 'utf8')).toBe('B')
    })

    it('rejects names with separators', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)
      const res = await engine.rename(a, 'x/y.txt')
      expect(res.errors.map(e => e.code)).toEqual(['InvalidTarget'])
    })
  })

  describe('duplicate and create', () => {
    it('duplicates next to the original with a numbered name', async () => {
      const note = path.join(box.work, 'note.txt')
      await write(note, 'n')

      const res = await engine.duplicate(note)
      expect(res.resultPaths).toEqual([path.join(box.work, 'note_00001.txt')])
      expect(res.operation?.description).toBe("Duplicate 'note.txt' as 'note_00001.txt'")
      expect(await fs.readFile(path.join(box.work, 'note_00001.txt'), 'utf8')).toBe('n')
    })

    it('creates files and folders and refuses existing names', async () => {
      const file = await engine.createFile(box.work, 'new.txt')
      const dir = await engine.createDirectory(box.work, 'folder')
      const again = await engine.createFile(box.work, 'new.txt')

      expect(file.success).toBe(true)
      expect(dir.operation?.description).toBe("Create folder 'folder'")
      expect((await fs.stat(path.join(box.work, 'folder'))).isDirectory()).toBe(true)
      expect(again.errors.map(e => e.code)).toEqual(['NameConflict'])
    })

    it('fails when the parent directory does not exist', async () => {
      const res = await engine.createFile(path.join(box.root, 'absent'), 'x.txt')
      expect(res.errors.map(e => e.code)).toEqual(['NotFound'])
    })
  })

  describe('link', () => {
    it('creates relative symlinks and removes them on undo', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)

      const res = await engine.link([a], box.out)
      const link = path.join(box.out, 'a.txt')
      expect(res.success).toBe(true)
      expect(await fs.readlink(link)).toBe(path.join('..', 'work', 'a.txt'))

      await engine.undo()
      expect(await fs.pathExists(link)).toBe(false)
      expect(await fs.pathExists(a)).toBe(true)
    })
  })

  describe('clipboard and paste', () => {
    it('fails with EmptyClipboard when nothing was copied', async () => {
      const res = await engine.paste(box.work)
      expect(res.kind).toBe('paste')
      expect(res.errors.map(e => e.code)).toEqual(['EmptyClipboard'])
    })

    it('pastes a copy with a numbered name and keeps the clipboard', async () => {
      const note = path.join(box.work, 'note.txt')
      await write(note)

      await engine.copyToClipboard([note])
      const res = await engine.paste(box.work)

      expect(res.resultPaths).toEqual([path.join(box.work, 'note_00001.txt')])
      expect(engine.clipboardContents()).toEqual({ mode: 'copy', paths: [note] })
    })

    it('clears the clipboard after a successful cut and paste', async () => {
      const a = path.join(box.work, 'a.txt')
      await write(a)

      await engine.cutToClipboard([a])
      const res = await engine.paste(box.out)

      expect(res.kind).toBe('move')
      expect(await fs.pathExists(path.join(box.out, 'a.txt'))).toBe(true)
      expect(engine.clipboardContents()).toEqual({ mode: 'empty', paths: [] })
    })

    it('keeps only the failed sources after a partial cut and paste', async () => {
      const a = path.join(box.work, 'a.txt')
      const missing = path.join(box.work, 'missing.txt')
      await write(a)

      await engine.cutToClipboard([a, missing])
      await engine.paste(box.out)

      expect(engine.clipboardContents()).toEqual({ mode: 'cut', paths: [missing] })
    })
  })

  describe('notifications and state', () => {
    it('notifies start and completion or failure', async () => {
      const events: string[] = []
      engine.subscribe({
        operationStarted: (kind: ActivityKind) => events.push(`started:${kind}`),
        operationCompleted: (kind: ActivityKind) => events.push(`completed:${kind}`),
        operationFailed: (kind, _sources, error) => events.push(`failed:${kind}:${error.code}`),
        clipboardChanged: contents => events.push(`clipboard:${contents.mode}`),
      })

      await engine.createFile(box.work, 'a.txt')
      await engine.createFile(box.work, 'a.txt')
      await engine.copyToClipboard([path.join(box.work, 'a.txt')])
      await engine.undo()

      expect(events).toEqual([
        'started:create_file',
        'completed:create_file',
        'started:create_file',
        'failed:create_file:NameConflict',
        'clipboard:copy',
        'started:undo',
        'completed:undo',
      ])
    })

    it('appends one audit line per operation', async () => {
      const auditLogPath = path.join(box.root, 'audit.jsonl')
      const audited = makeEngine(box, { config: { auditLogPath } })

      await audited.createDirectory(box.work, 'logged')
      const lines = (await fs.readFile(auditLogPath, 'utf8')).trim().split('\n')
      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0])).toMatchObject({ success: true, kind: 'create_directory' })
    })

    it('keeps operation timestamps non-decreasing', async () => {
      const times = [5000, 3000]
      const clocked = makeEngine(box, { now: () => times.shift() ?? 0 })

      const first = await clocked.createFile(box.work, 'one.txt')
      const second = await clocked.createFile(box.work, 'two.txt')
      expect(first.operation?.timestamp).toBe(5000)
      expect(second.operation?.timestamp).toBe(5000)
    })

    it('picks up exported state in a new engine', async () => {
      await engine.createFile(box.work, 'kept.txt')
      const state = engine.exportState()
      expect(state.history.undo).toHaveLength(1)

      const next = makeEngine(box, { state })
      expect(next.peekUndo()?.description).toBe("Create file 'kept.txt'")
      const res = await next.undo()
      expect(res.success).toBe(true)
      expect(await fs.pathExists(path.join(box.work, 'kept.txt'))).toBe(false)
    })

    it('runs queued operations one after another', async () => {
      const results = await Promise.all([
        engine.createFile(box.work, 'same.txt'),
        engine.createFile(box.work, 'same.txt'),
      ])
      expect(results.map(r => r.success)).toEqual([true, false])
      expect(results[1].errors.map(e => e.code)).toEqual(['NameConflict'])
    })
  })
})
