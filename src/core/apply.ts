import { FileOpError, cancelledError, toFileOpError } from '../errors.js'
import { Logger, PlannedStep, Step } from '../types.js'
import {
  copyPath,
  createDir,
  createEmptyFile,
  createSymlink,
  movePath,
  pathPresent,
  removeEmptyDir,
  removePath,
  removeSymlink,
  renameAtomic,
} from './fs-ops.js'

export interface ApplyOptions {
  logger?: Logger
  dryRun?: boolean
  signal?: AbortSignal
  /** Forwarded to copy steps; called once per visited entry. */
  onEntry?: (src: string) => void
}

export interface ApplyOutcome {
  ok: boolean
  steps: Step[]
  /**
   * Rollback plan in reverse order of execution.
   */
  rollbackSteps: PlannedStep[]
  error?: FileOpError
}

/** The path a failure of this step is attributed to. */
export function primaryPath(step: PlannedStep): string | undefined {
  switch (step.kind) {
    case 'noop': return step.paths.path
    case 'mkdir':
    case 'rmdir': return step.paths.dir
    case 'touch': return step.paths.file
    case 'copy':
    case 'move':
    case 'rename': return step.paths.from
    case 'rm': return step.paths.path
    case 'symlink':
    case 'unlink': return step.paths.target
  }
}

/**
 * The step that puts things back after `step` executed. Removals of user
 * data have no inverse; the trash is how deletes stay reversible.
 */
export function inverseOf(step: PlannedStep): PlannedStep | undefined {
  switch (step.kind) {
    case 'noop':
    case 'rm':
      return undefined
    case 'mkdir':
      return { kind: 'rmdir', message: 'Rollback: remove created directory', paths: { dir: step.paths.dir } }
    case 'rmdir':
      return { kind: 'mkdir', message: 'Rollback: recreate directory', paths: { dir: step.paths.dir } }
    case 'touch':
      return { kind: 'rm', message: 'Rollback: remove created file', paths: { path: step.paths.file } }
    case 'copy':
      return { kind: 'rm', message: 'Rollback: remove copied entry', paths: { path: step.paths.to } }
    case 'move':
      return { kind: 'move', message: 'Rollback: move back', paths: { from: step.paths.to, to: step.paths.from } }
    case 'rename':
      return { kind: 'rename', message: 'Rollback: rename back', paths: { from: step.paths.to, to: step.paths.from } }
    case 'symlink':
      return { kind: 'unlink', message: 'Rollback: remove created symlink', paths: { target: step.paths.target, source: step.paths.source } }
    case 'unlink':
      return step.paths.source
        ? { kind: 'symlink', message: 'Rollback: recreate symlink', paths: { source: step.paths.source, target: step.paths.target } }
        : undefined
  }
}

async function execute(step: PlannedStep, opts: ApplyOptions): Promise<void> {
  switch (step.kind) {
    case 'noop':
      return
    case 'mkdir':
      return createDir(step.paths.dir)
    case 'rmdir':
      return removeEmptyDir(step.paths.dir)
    case 'touch':
      return createEmptyFile(step.paths.file)
    case 'copy':
      return copyPath(step.paths.from, step.paths.to, { signal: opts.signal, onEntry: opts.onEntry })
    case 'move':
      return movePath(step.paths.from, step.paths.to)
    case 'rename':
      return renameAtomic(step.paths.from, step.paths.to)
    case 'rm':
      return removePath(step.paths.path)
    case 'symlink':
      return createSymlink(step.paths.source, step.paths.target)
    case 'unlink':
      return removeSymlink(step.paths.target)
    default: {
      const _exhaustive: never = step
      throw new Error(`Unknown step kind: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

export async function applyPlan(steps: PlannedStep[], opts: ApplyOptions = {}): Promise<ApplyOutcome> {
  const outcome: ApplyOutcome = { ok: true, steps: [], rollbackSteps: [] }

  for (const s of steps) {
    const step: Step = { ...s, status: 'planned' }
    if (opts.dryRun && s.kind !== 'noop') {
      step.status = 'skipped'
      outcome.steps.push(step)
      continue
    }
    const freshCopy = s.kind === 'copy' && !await pathPresent(s.paths.to)
    try {
      if (opts.signal?.aborted) throw cancelledError(primaryPath(s))
      await execute(s, opts)
      step.status = s.kind === 'noop' ? 'skipped' : 'executed'
      step.undo = inverseOf(s)
      outcome.steps.push(step)
    } catch (e) {
      const err = toFileOpError(e, primaryPath(s))
      step.status = err.code === 'Cancelled' ? 'skipped' : 'failed'
      step.error = err.message
      outcome.steps.push(step)
      outcome.ok = false
      outcome.error = err
      opts.logger?.error(`[undofs] step failed: ${step.kind} ${step.error}`)

      // A half-written copy is never worth keeping; a pre-existing entry is not ours to remove.
      if (freshCopy) {
        try {
          await removePath(s.paths.to)
        } catch (cleanupErr) {
          opts.logger?.warn(`[undofs] could not remove temp copy ${s.paths.to}: ${toFileOpError(cleanupErr).message}`)
        }
      }
      break
    }
  }

  outcome.rollbackSteps = outcome.steps
    .filter(s => s.status === 'executed')
    .flatMap(s => (s.undo ? [s.undo] : []))
    .reverse()
  return outcome
}

/**
 * Apply a rollback plan. Never honours cancellation: a rollback that stops
 * halfway would leave the tree in neither state.
 */
export async function rollbackPlan(rollbackSteps: PlannedStep[], logger?: Logger): Promise<ApplyOutcome> {
  const outcome = await applyPlan(rollbackSteps, { logger })
  if (!outcome.ok) {
    logger?.error(`[undofs] rollback incomplete: ${outcome.error?.message ?? 'unknown error'}`)
  }
  return outcome
}
