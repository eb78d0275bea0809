import { OperationError, PlannedStep, UndoPayload } from '../types.js'
import { FS, lstatOrUndefined } from './fs.js'

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathForTarget(targetAbs: string) {
  return `${targetAbs}.tmp.${rand()}`
}

export function planCopy(fromAbs: string, toAbs: string, atomic: boolean): PlannedStep[] {
  const steps: PlannedStep[] = []
  const tmp = atomic ? tmpPathForTarget(toAbs) : toAbs
  steps.push({
    kind: 'copy',
    message: atomic ? 'Copy to temp destination' : 'Copy to destination',
    paths: { from: fromAbs, to: tmp },
  })
  if (atomic) {
    steps.push({
      kind: 'rename',
      message: 'Atomically move copied temp into place',
      paths: { from: tmp, to: toAbs },
    })
  }
  return steps
}

export function planMove(fromAbs: string, toAbs: string): PlannedStep[] {
  return [{ kind: 'move', message: 'Move to destination', paths: { from: fromAbs, to: toAbs } }]
}

export function planTrash(originalAbs: string, storedAbs: string): PlannedStep[] {
  return [{ kind: 'move', message: 'Move to trash', paths: { from: originalAbs, to: storedAbs } }]
}

export function planRemove(p: string): PlannedStep[] {
  return [{ kind: 'rm', message: 'Permanently remove', paths: { path: p } }]
}

export function planRename(fromAbs: string, toAbs: string): PlannedStep[] {
  return [{ kind: 'rename', message: 'Rename in place', paths: { from: fromAbs, to: toAbs } }]
}

export function planCreateFile(p: string): PlannedStep[] {
  return [{ kind: 'touch', message: 'Create empty file', paths: { file: p } }]
}

export function planCreateDir(p: string): PlannedStep[] {
  return [{ kind: 'mkdir', message: 'Create directory', paths: { dir: p } }]
}

export function planLink(sourceAbs: string, targetAbs: string): PlannedStep[] {
  return [{ kind: 'symlink', message: 'Create symlink', paths: { source: sourceAbs, target: targetAbs } }]
}

/**
 * Steps that reverse a recorded operation, newest effect first.
 */
export function planUndo(payload: UndoPayload): PlannedStep[] {
  switch (payload.kind) {
    case 'copy':
      return [...payload.entries].reverse()
        .map((e): PlannedStep => ({ kind: 'rm', message: 'Undo: remove copy', paths: { path: e.created } }))
    case 'link':
      return [...payload.entries].reverse()
        .map((e): PlannedStep => ({ kind: 'unlink', message: 'Undo: remove symlink', paths: { target: e.created, source: e.source } }))
    case 'move':
      return [...payload.entries].reverse()
        .map((e): PlannedStep => ({ kind: 'move', message: 'Undo: move back', paths: { from: e.to, to: e.from } }))
    case 'delete':
      return [...payload.entries].reverse()
        .map((e): PlannedStep => ({ kind: 'move', message: 'Undo: restore from trash', paths: { from: e.stored, to: e.original } }))
    case 'rename':
      return [{ kind: 'rename', message: 'Undo: restore original name', paths: { from: payload.to, to: payload.from } }]
    case 'duplicate':
      return [{ kind: 'rm', message: 'Undo: remove duplicate', paths: { path: payload.created } }]
    case 'create_file':
      return [{ kind: 'rm', message: 'Undo: remove created file', paths: { path: payload.created } }]
    case 'create_directory':
      return [{ kind: 'rmdir', message: 'Undo: remove created directory', paths: { dir: payload.created } }]
    default: {
      const _exhaustive: never = payload
      throw new Error(`Unknown undo payload: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

/**
 * Steps that re-apply a recorded operation to exactly the paths it produced
 * the first time, so no renumbering happens on redo.
 */
export function planRedo(payload: UndoPayload, opts: { atomic: boolean }): PlannedStep[] {
  switch (payload.kind) {
    case 'copy':
      return payload.entries.flatMap(e => planCopy(e.source, e.created, opts.atomic))
    case 'link':
      return payload.entries.flatMap(e => planLink(e.source, e.created))
    case 'move':
      return payload.entries.flatMap(e => planMove(e.from, e.to))
    case 'delete':
      return payload.entries.flatMap(e => planTrash(e.original, e.stored))
    case 'rename':
      return planRename(payload.from, payload.to)
    case 'duplicate':
      return planCopy(payload.source, payload.created, opts.atomic)
    case 'create_file':
      return planCreateFile(payload.created)
    case 'create_directory':
      return planCreateDir(payload.created)
    default: {
      const _exhaustive: never = payload
      throw new Error(`Unknown undo payload: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

function diverged(message: string, p: string): OperationError {
  return { code: 'Diverged', message, path: p }
}

/**
 * Check a plan against the current filesystem without touching it.
 * Paths produced or consumed by earlier steps of the same plan are tracked
 * virtually, so multi-step plans (copy to temp, then rename) check cleanly.
 */
export async function preflight(fsys: FS, steps: PlannedStep[]): Promise<OperationError[]> {
  const appeared = new Set<string>()
  const vanished = new Set<string>()
  const problems: OperationError[] = []

  const exists = async (p: string) => {
    if (appeared.has(p)) return true
    if (vanished.has(p)) return false
    return (await lstatOrUndefined(fsys, p)) !== undefined
  }
  const produce = (p: string) => {
    appeared.add(p)
    vanished.delete(p)
  }
  const consume = (p: string) => {
    vanished.add(p)
    appeared.delete(p)
  }
  const needPresent = async (p: string) => {
    if (await exists(p)) return true
    problems.push(diverged(`Expected path no longer exists: ${p}`, p))
    return false
  }
  const needAbsent = async (p: string) => {
    if (!await exists(p)) return true
    problems.push(diverged(`Path is occupied: ${p}`, p))
    return false
  }

  for (const s of steps) {
    switch (s.kind) {
      case 'noop':
        break
      case 'copy':
        await needPresent(s.paths.from)
        await needAbsent(s.paths.to)
        produce(s.paths.to)
        break
      case 'move':
      case 'rename':
        await needPresent(s.paths.from)
        await needAbsent(s.paths.to)
        consume(s.paths.from)
        produce(s.paths.to)
        break
      case 'rm':
        await needPresent(s.paths.path)
        consume(s.paths.path)
        break
      case 'rmdir': {
        const dir = s.paths.dir
        if (await needPresent(dir) && !appeared.has(dir)) {
          const st = await lstatOrUndefined(fsys, dir)
          if (!st?.isDirectory()) {
            problems.push(diverged(`Expected a directory: ${dir}`, dir))
          } else if ((await fsys.readdir(dir)).length > 0) {
            problems.push(diverged(`Directory is no longer empty: ${dir}`, dir))
          }
        }
        consume(dir)
        break
      }
      case 'unlink': {
        const target = s.paths.target
        if (await needPresent(target) && !appeared.has(target)) {
          const st = await lstatOrUndefined(fsys, target)
          if (!st?.isSymbolicLink()) problems.push(diverged(`Expected a symlink: ${target}`, target))
        }
        consume(target)
        break
      }
      case 'touch':
        await needAbsent(s.paths.file)
        produce(s.paths.file)
        break
      case 'mkdir':
        await needAbsent(s.paths.dir)
        produce(s.paths.dir)
        break
      case 'symlink':
        await needPresent(s.paths.source)
        await needAbsent(s.paths.target)
        produce(s.paths.target)
        break
      default: {
        const _exhaustive: never = s
        throw new Error(`Unknown step kind: ${JSON.stringify(_exhaustive)}`)
      }
    }
  }
  return problems
}
