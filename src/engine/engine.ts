import path from 'path'
import PQueue from 'p-queue'

import { CancelPolicy, ConfigInput, EngineConfig, resolveConfig } from '../config.js'
import { FileOpError, cancelledError, messageOf, toFileOpError } from '../errors.js'
import { applyPlan, rollbackPlan } from '../core/apply.js'
import { tryAppendAudit } from '../core/audit.js'
import { ClipboardState } from '../core/clipboard.js'
import { describeOperation, formatPlan } from '../core/format.js'
import { FS, lstatOrUndefined, entryExists, nodeFS } from '../core/fs.js'
import { pathPresent, removeEmptyDir, removePath } from '../core/fs-ops.js'
import { HistoryManager, HistorySnapshot } from '../core/history.js'
import { OperationNotifier, OperationObserver } from '../core/notifier.js'
import { NumberingService } from '../core/numbering.js'
import { isPlainName, isSameOrInside, normalizePath } from '../core/paths.js'
import {
  planCopy,
  planCreateDir,
  planCreateFile,
  planLink,
  planMove,
  planRedo,
  planRemove,
  planRename,
  planTrash,
  planUndo,
  preflight,
} from '../core/plan.js'
import { trashBucketOf, trashPathFor } from '../core/trash.js'
import { PersistedState } from '../state/types.js'
import {
  ActivityKind,
  ClipboardContents,
  DeleteOptions,
  ItemOutcome,
  Logger,
  Operation,
  OperationError,
  OperationKind,
  OperationOptions,
  OperationResult,
  PlannedStep,
  Step,
  UndoPayload,
  UndoableOperation,
} from '../types.js'

export type TransferKind = 'copy' | 'move' | 'link'

export interface EngineOptions {
  config?: ConfigInput
  fs?: FS
  logger?: Logger
  numbering?: NumberingService
  history?: HistoryManager
  clipboard?: ClipboardState
  /** Previously exported state; seeds numbering, history and clipboard. */
  state?: PersistedState
  /** Clock for operation timestamps and trash buckets. */
  now?: () => number
}

interface RunContext {
  kind: ActivityKind
  sources: string[]
  target?: string
  startedAt: string
  startedMs: number
  notify: boolean
  steps: Step[]
  items: ItemOutcome[]
  errors: OperationError[]
  warnings: string[]
  resultPaths: string[]
}

type Prepared =
  | { type: 'run'; steps: PlannedStep[]; dest: string; resultPath?: string }
  | { type: 'skip'; warning: string }

interface Completed {
  source: string
  dest: string
  itemIndex: number
  rollback: PlannedStep[]
}

type StepRun =
  | { ok: true; rollback: PlannedStep[] }
  | { ok: false; error: FileOpError }

function nowIso() {
  return new Date().toISOString()
}

function newId() {
  return `${Date.now().toString(36)}-${Math.random().toString(16).slice(2, 10)}`
}

function uniquePaths(paths: string[]): string[] {
  return [...new Set(paths.map(normalizePath))]
}

/**
 * Runs file operations one at a time and keeps the reversible ones
 * for undo and redo.
 */
export class OperationEngine {
  readonly config: EngineConfig
  readonly fs: FS
  readonly numbering: NumberingService
  private readonly historyManager: HistoryManager
  private readonly clipboard: ClipboardState
  private readonly notifier: OperationNotifier
  private readonly logger?: Logger
  private readonly now: () => number
  private readonly queue = new PQueue({ concurrency: 1 })
  private lastTimestamp = 0

  constructor(opts: EngineOptions = {}) {
    this.config = resolveConfig(opts.config ?? {})
    this.fs = opts.fs ?? nodeFS
    this.logger = opts.logger
    this.now = opts.now ?? Date.now
    this.numbering = opts.numbering ?? new NumberingService({
      ...this.config.numbering,
      fs: this.fs,
      logger: this.logger,
    })
    this.historyManager = opts.history ?? new HistoryManager(this.config.history)
    this.clipboard = opts.clipboard ?? new ClipboardState()
    this.notifier = new OperationNotifier(this.logger)

    if (opts.state) {
      this.numbering.seed(opts.state.numbering)
      this.historyManager.restore(opts.state.history)
      this.clipboard.restore(opts.state.clipboard)
    }
  }

  copy(paths: string[], targetDir: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doTransfer('copy', paths, targetDir, opts))
  }

  move(paths: string[], targetDir: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doTransfer('move', paths, targetDir, opts))
  }

  link(paths: string[], targetDir: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doTransfer('link', paths, targetDir, opts))
  }

  delete(paths: string[], opts: DeleteOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doDelete(paths, opts))
  }

  rename(p: string, newName: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doRename(p, newName, opts))
  }

  duplicate(p: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doDuplicate(p, opts))
  }

  createFile(parentDir: string, name: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doCreate('create_file', parentDir, name, opts))
  }

  createDirectory(parentDir: string, name: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doCreate('create_directory', parentDir, name, opts))
  }

  copyToClipboard(paths: string[]): Promise<ClipboardContents> {
    return this.exclusive(async () => this.setClipboard(paths, false))
  }

  cutToClipboard(paths: string[]): Promise<ClipboardContents> {
    return this.exclusive(async () => this.setClipboard(paths, true))
  }

  clearClipboard(): Promise<ClipboardContents> {
    return this.exclusive(async () => {
      this.clipboard.clear()
      return this.clipboardChanged()
    })
  }

  clipboardContents(): ClipboardContents {
    return this.clipboard.contents()
  }

  paste(targetDir: string, opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doPaste(targetDir, opts))
  }

  undo(opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doReplay('undo', opts))
  }

  redo(opts: OperationOptions = {}): Promise<OperationResult> {
    return this.exclusive(() => this.doReplay('redo', opts))
  }

  canUndo(): boolean {
    return this.historyManager.canUndo()
  }

  canRedo(): boolean {
    return this.historyManager.canRedo()
  }

  peekUndo(): UndoableOperation | undefined {
    return this.historyManager.peekUndo()
  }

  peekRedo(): UndoableOperation | undefined {
    return this.historyManager.peekRedo()
  }

  history(): HistorySnapshot {
    return this.historyManager.snapshot()
  }

  subscribe(observer: OperationObserver): () => void {
    return this.notifier.subscribe(observer)
  }

  unsubscribe(observer: OperationObserver): boolean {
    return this.notifier.unsubscribe(observer)
  }

  exportState(): PersistedState {
    return {
      version: 1,
      numbering: this.numbering.snapshot(),
      history: this.historyManager.snapshot(),
      clipboard: this.clipboard.snapshot(),
    }
  }

  async idle(): Promise<void> {
    await this.queue.onIdle()
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add<T>(task, { throwOnTimeout: true })
  }

  private async doTransfer(kind: TransferKind, paths: string[], targetDir: string, opts: OperationOptions): Promise<OperationResult> {
    const target = normalizePath(targetDir)
    const ctx = this.begin(kind, uniquePaths(paths), target, opts)

    const targetError = await this.requireDirectory(target)
    if (targetError) return this.failAll(ctx, targetError, opts)

    const completed = await this.runBatch(ctx, opts, this.config.cancelPolicy, source =>
      this.prepareTransfer(kind, source, target, opts.dryRun ?? false))

    let operation: Operation | undefined
    if (completed.length && !opts.dryRun) {
      const sources = completed.map(c => c.source)
      const undo: UndoPayload = kind === 'move'
        ? { kind, entries: completed.map(c => ({ from: c.source, to: c.dest })) }
        : { kind, entries: completed.map(c => ({ source: c.source, created: c.dest })) }
      operation = await this.record(this.makeOperation(kind, sources, target, undo))
    }
    return this.finish(ctx, opts, operation)
  }

  private async prepareTransfer(kind: TransferKind, source: string, targetDir: string, dryRun: boolean): Promise<Prepared> {
    const st = await lstatOrUndefined(this.fs, source)
    if (!st) throw new FileOpError('NotFound', `Source does not exist: ${source}`, source)
    if (isSameOrInside(targetDir, source)) {
      throw new FileOpError('InvalidTarget', `Cannot ${kind} ${source} into itself`, source)
    }
    if (kind === 'move' && path.dirname(source) === targetDir) {
      return { type: 'skip', warning: `Already in ${targetDir}: ${path.basename(source)}` }
    }

    const desired = path.join(targetDir, path.basename(source))
    const dest = await entryExists(this.fs, desired)
      ? await this.numbering.generateNumberedName(desired, { isDirectory: st.isDirectory(), commit: !dryRun })
      : desired

    const steps = kind === 'copy'
      ? planCopy(source, dest, this.config.atomicCopy)
      : kind === 'move' ? planMove(source, dest) : planLink(source, dest)
    return { type: 'run', steps, dest, resultPath: dest }
  }

  private async doDelete(paths: string[], opts: DeleteOptions): Promise<OperationResult> {
    const permanent = opts.permanent ?? false
    const ctx = this.begin('delete', uniquePaths(paths), undefined, opts)

    if (permanent && !opts.confirmed && (ctx.sources.length > 1 || await this.anyDirectory(ctx.sources))) {
      const err = new FileOpError(
        'ConfirmationRequired',
        'Permanently deleting a directory or several items requires confirmation',
      )
      return this.failAll(ctx, err, opts)
    }

    const trashDir = this.config.trashDir
    const planned: string[] = []
    // A permanent delete cannot be put back, so whatever finished stays finished.
    const policy: CancelPolicy = permanent ? 'keep' : this.config.cancelPolicy
    const completed = await this.runBatch(ctx, opts, policy, async source => {
      if (!await entryExists(this.fs, source)) {
        throw new FileOpError('NotFound', `Path does not exist: ${source}`, source)
      }
      if (isSameOrInside(source, trashDir) || isSameOrInside(trashDir, source)) {
        throw new FileOpError('InvalidTarget', `Refusing to delete the trash or anything in it: ${source}`, source)
      }
      if (permanent) return { type: 'run', steps: planRemove(source), dest: source }
      const stored = trashPathFor(trashDir, source, this.now())
      planned.push(stored)
      return { type: 'run', steps: planTrash(source, stored), dest: stored }
    })

    if (!opts.dryRun) {
      const kept = new Set(completed.map(c => c.dest))
      await this.pruneTrashBuckets(planned.filter(p => !kept.has(p)))
    }

    let operation: Operation | undefined
    if (completed.length && !opts.dryRun) {
      const sources = completed.map(c => c.source)
      operation = await this.record(permanent
        ? this.makeOperation('delete', sources, undefined)
        : this.makeOperation('delete', sources, undefined, {
          kind: 'delete',
          entries: completed.map(c => ({ original: c.source, stored: c.dest })),
        }))
    }
    return this.finish(ctx, opts, operation)
  }

  private async doRename(p: string, newName: string, opts: OperationOptions): Promise<OperationResult> {
    const source = normalizePath(p)
    const dest = path.join(path.dirname(source), newName)
    const ctx = this.begin('rename', [source], dest, opts)

    const completed = await this.runBatch(ctx, opts, this.config.cancelPolicy, async () => {
      if (!isPlainName(newName)) {
        throw new FileOpError('InvalidTarget', `Invalid name: ${JSON.stringify(newName)}`, source)
      }
      const st = await lstatOrUndefined(this.fs, source)
      if (!st) throw new FileOpError('NotFound', `Path does not exist: ${source}`, source)
      if (dest === source) return { type: 'skip', warning: `Name unchanged: ${newName}` }

      // A hit on the same inode is a case-only rename on a case-insensitive volume.
      const existing = await lstatOrUndefined(this.fs, dest)
      if (existing && !(existing.ino === st.ino && existing.dev === st.dev)) {
        throw new FileOpError('NameConflict', `An entry named ${newName} already exists`, dest)
      }
      return { type: 'run', steps: planRename(source, dest), dest, resultPath: dest }
    })

    let operation: Operation | undefined
    if (completed.length && !opts.dryRun) {
      operation = await this.record(this.makeOperation('rename', [source], dest, { kind: 'rename', from: source, to: dest }))
    }
    return this.finish(ctx, opts, operation)
  }

  private async doDuplicate(p: string, opts: OperationOptions): Promise<OperationResult> {
    const source = normalizePath(p)
    const ctx = this.begin('duplicate', [source], undefined, opts)

    const completed = await this.runBatch(ctx, opts, this.config.cancelPolicy, async () => {
      const st = await lstatOrUndefined(this.fs, source)
      if (!st) throw new FileOpError('NotFound', `Path does not exist: ${source}`, source)
      const dest = await this.numbering.generateNumberedName(source, {
        isDirectory: st.isDirectory(),
        commit: !opts.dryRun,
      })
      ctx.target = dest
      return { type: 'run', steps: planCopy(source, dest, this.config.atomicCopy), dest, resultPath: dest }
    })

    let operation: Operation | undefined
    const done = completed[0]
    if (done && !opts.dryRun) {
      operation = await this.record(this.makeOperation('duplicate', [source], done.dest, {
        kind: 'duplicate',
        source,
        created: done.dest,
      }))
    }
    return this.finish(ctx, opts, operation)
  }

  private async doCreate(
    kind: 'create_file' | 'create_directory',
    parentDir: string,
    name: string,
    opts: OperationOptions,
  ): Promise<OperationResult> {
    const parent = normalizePath(parentDir)
    const created = path.join(parent, name)
    const ctx = this.begin(kind, [created], created, opts)

    const completed = await this.runBatch(ctx, opts, this.config.cancelPolicy, async () => {
      if (!isPlainName(name)) {
        throw new FileOpError('InvalidTarget', `Invalid name: ${JSON.stringify(name)}`, created)
      }
      const parentError = await this.requireDirectory(parent)
      if (parentError) throw parentError
      if (await entryExists(this.fs, created)) {
        throw new FileOpError('NameConflict', `An entry named ${name} already exists`, created)
      }
      const steps = kind === 'create_file' ? planCreateFile(created) : planCreateDir(created)
      return { type: 'run', steps, dest: created, resultPath: created }
    })

    let operation: Operation | undefined
    if (completed.length && !opts.dryRun) {
      operation = await this.record(this.makeOperation(kind, [], created, { kind, created }))
    }
    return this.finish(ctx, opts, operation)
  }

  private async doPaste(targetDir: string, opts: OperationOptions): Promise<OperationResult> {
    const contents = this.clipboard.contents()
    if (contents.mode === 'empty') {
      const ctx = this.begin('paste', [], normalizePath(targetDir), opts)
      ctx.errors.push({ code: 'EmptyClipboard', message: 'Clipboard is empty' })
      return this.finish(ctx, opts)
    }

    if (contents.mode === 'copy') {
      return this.doTransfer('copy', contents.paths, targetDir, opts)
    }

    const res = await this.doTransfer('move', contents.paths, targetDir, opts)
    if (!opts.dryRun) {
      // Sources left in place stay cut: failed ones, and on cancel the skipped ones too.
      const cancelled = res.errors.some(e => e.code === 'Cancelled')
      const pending = new Set(res.items
        .filter(i => i.status === 'failed' || (cancelled && i.status === 'skipped'))
        .map(i => i.source))
      if (pending.size === 0) {
        this.clipboard.clear()
      } else {
        this.clipboard.remove(contents.paths.filter(p => !pending.has(p)))
      }
      this.clipboardChanged()
    }
    return res
  }

  private async doReplay(direction: 'undo' | 'redo', opts: OperationOptions): Promise<OperationResult> {
    const op = direction === 'undo' ? this.historyManager.peekUndo() : this.historyManager.peekRedo()
    const ctx = this.begin(direction, op?.sourcePaths ?? [], op?.targetPath, opts)
    if (!op) {
      ctx.errors.push(direction === 'undo'
        ? { code: 'NothingToUndo', message: 'Nothing to undo' }
        : { code: 'NothingToRedo', message: 'Nothing to redo' })
      return this.finish(ctx, opts)
    }

    const steps = direction === 'undo'
      ? planUndo(op.undo)
      : planRedo(op.undo, { atomic: this.config.atomicCopy })
    const problems = await preflight(this.fs, steps)
    if (problems.length) {
      ctx.errors.push(...problems)
      if (!opts.dryRun) {
        if (direction === 'undo') this.historyManager.discardUndo()
        else this.historyManager.discardRedo()
        ctx.warnings.push(`Discarded history entry that no longer matches the filesystem: ${op.description}`)
        this.logger?.warn(`[undofs] ${direction} diverged, dropped: ${op.description}`)
      }
      return this.finish(ctx, opts, op)
    }

    const outcome = await applyPlan(steps, { logger: this.logger, dryRun: opts.dryRun, signal: opts.signal })
    ctx.steps.push(...outcome.steps)
    if (!outcome.ok) {
      const rb = await rollbackPlan(outcome.rollbackSteps, this.logger)
      ctx.steps.push(...rb.steps)
      if (!rb.ok) ctx.warnings.push(`Rollback incomplete: ${rb.error?.message ?? 'unknown error'}`)
      const err = outcome.error ?? new FileOpError('IOError', `${direction} failed`)
      ctx.errors.push(err.toJSON())
      return this.finish(ctx, opts, op)
    }

    ctx.resultPaths.push(...replayedPaths(op.undo, direction))
    for (const source of ctx.sources) {
      ctx.items.push({ source, status: opts.dryRun ? 'skipped' : 'done' })
    }
    if (!opts.dryRun) {
      if (direction === 'undo') this.historyManager.undo()
      else this.historyManager.redo()
      if (direction === 'undo' && op.undo.kind === 'delete') {
        await this.pruneTrashBuckets(op.undo.entries.map(e => e.stored))
      }
    }
    return this.finish(ctx, opts, op)
  }

  /**
   * Prepare and apply each source in turn. Failed items are rolled back on
   * their own and the batch goes on; cancellation stops it and applies the
   * cancel policy to what already finished.
   */
  private async runBatch(
    ctx: RunContext,
    opts: OperationOptions,
    policy: CancelPolicy,
    prepare: (source: string) => Promise<Prepared>,
  ): Promise<Completed[]> {
    const completed: Completed[] = []
    const total = ctx.sources.length
    let cancelled = false

    for (const [i, source] of ctx.sources.entries()) {
      if (!cancelled && opts.signal?.aborted) cancelled = true
      if (cancelled) {
        ctx.items.push({ source, status: 'skipped' })
        continue
      }

      let item: ItemOutcome
      try {
        const prepared = await prepare(source)
        if (prepared.type === 'skip') {
          ctx.warnings.push(prepared.warning)
          item = { source, status: 'skipped' }
        } else {
          const run = await this.runSteps(ctx, prepared.steps, opts, i, total)
          if (run.ok) {
            completed.push({ source, dest: prepared.dest, itemIndex: ctx.items.length, rollback: run.rollback })
            item = { source, target: prepared.dest, status: opts.dryRun ? 'skipped' : 'done' }
            if (prepared.resultPath) ctx.resultPaths.push(prepared.resultPath)
          } else if (run.error.code === 'Cancelled') {
            cancelled = true
            item = { source, target: prepared.dest, status: 'skipped' }
          } else {
            throw run.error
          }
        }
      } catch (e) {
        const err = toFileOpError(e, source)
        ctx.errors.push(err.toJSON())
        item = { source, status: 'failed', error: err.toJSON() }
      }
      ctx.items.push(item)
      opts.onProgress?.({ kind: ctx.kind, phase: 'item', completed: i + 1, total, path: source })
    }

    if (!cancelled) return completed

    ctx.errors.push(cancelledError().toJSON())
    if (policy === 'keep' || !completed.length) return completed

    const survivors: Completed[] = []
    for (const c of [...completed].reverse()) {
      const rb = await rollbackPlan(c.rollback, this.logger)
      ctx.steps.push(...rb.steps)
      if (rb.ok) {
        ctx.items[c.itemIndex] = { source: c.source, status: 'skipped' }
      } else {
        ctx.warnings.push(`Could not roll back ${c.source}: ${rb.error?.message ?? 'unknown error'}`)
        survivors.unshift(c)
      }
    }
    const kept = new Set(survivors.map(c => c.dest))
    ctx.resultPaths.splice(0, ctx.resultPaths.length, ...ctx.resultPaths.filter(p => kept.has(p)))
    return survivors
  }

  private async runSteps(ctx: RunContext, steps: PlannedStep[], opts: OperationOptions, index: number, total: number): Promise<StepRun> {
    const outcome = await applyPlan(steps, {
      logger: this.logger,
      dryRun: opts.dryRun,
      signal: opts.signal,
      onEntry: entry => opts.onProgress?.({ kind: ctx.kind, phase: 'entry', completed: index, total, path: entry }),
    })
    ctx.steps.push(...outcome.steps)
    if (outcome.ok) return { ok: true, rollback: outcome.rollbackSteps }

    const rb = await rollbackPlan(outcome.rollbackSteps, this.logger)
    ctx.steps.push(...rb.steps)
    if (!rb.ok) ctx.warnings.push(`Rollback incomplete: ${rb.error?.message ?? 'unknown error'}`)
    return { ok: false, error: outcome.error ?? new FileOpError('IOError', 'Step failed') }
  }

  private makeOperation(kind: OperationKind, sourcePaths: string[], targetPath: string | undefined, undo?: UndoPayload): Operation {
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp)
    const base = { id: newId(), kind, sourcePaths, targetPath, timestamp: this.lastTimestamp }
    const description = describeOperation({ kind, sourcePaths, targetPath, undoable: undo !== undefined })
    return undo
      ? { ...base, description, undoable: true, undo }
      : { ...base, description, undoable: false }
  }

  private async record(op: Operation): Promise<Operation> {
    const evicted = this.historyManager.record(op)
    for (const old of evicted) {
      if (old.undo.kind !== 'delete') continue
      for (const entry of old.undo.entries) {
        const bucket = trashBucketOf(this.config.trashDir, entry.stored) ?? entry.stored
        try {
          await removePath(bucket)
        } catch (e) {
          this.logger?.warn(`[undofs] could not purge trash ${bucket}: ${messageOf(e)}`)
        }
      }
    }
    return op
  }

  private async pruneTrashBuckets(storedPaths: string[]) {
    for (const stored of storedPaths) {
      const bucket = trashBucketOf(this.config.trashDir, stored)
      if (!bucket || !await pathPresent(bucket)) continue
      try {
        await removeEmptyDir(bucket)
      } catch (e) {
        this.logger?.debug?.(`[undofs] trash bucket kept ${bucket}: ${messageOf(e)}`)
      }
    }
  }

  private async requireDirectory(dir: string): Promise<FileOpError | undefined> {
    try {
      const st = await this.fs.stat(dir)
      return st.isDirectory() ? undefined : new FileOpError('InvalidTarget', `Not a directory: ${dir}`, dir)
    } catch (e) {
      return toFileOpError(e, dir)
    }
  }

  private async anyDirectory(paths: string[]): Promise<boolean> {
    for (const p of paths) {
      if ((await lstatOrUndefined(this.fs, p))?.isDirectory()) return true
    }
    return false
  }

  private setClipboard(paths: string[], cut: boolean): ClipboardContents {
    this.clipboard.set(paths, cut)
    return this.clipboardChanged()
  }

  private clipboardChanged(): ClipboardContents {
    const contents = this.clipboard.contents()
    this.notifier.clipboardChanged(contents)
    return contents
  }

  private begin(kind: ActivityKind, sources: string[], target: string | undefined, opts: OperationOptions): RunContext {
    const ctx: RunContext = {
      kind,
      sources,
      target,
      startedAt: nowIso(),
      startedMs: Date.now(),
      notify: !opts.dryRun,
      steps: [],
      items: [],
      errors: [],
      warnings: [],
      resultPaths: [],
    }
    if (ctx.notify) this.notifier.started(kind, sources)
    return ctx
  }

  private failAll(ctx: RunContext, err: FileOpError, opts: OperationOptions): Promise<OperationResult> {
    const json = err.toJSON()
    ctx.errors.push(json)
    for (const source of ctx.sources) ctx.items.push({ source, status: 'failed', error: json })
    return this.finish(ctx, opts)
  }

  private async finish(ctx: RunContext, opts: OperationOptions, operation?: Operation): Promise<OperationResult> {
    let result: OperationResult = {
      success: ctx.errors.length === 0,
      kind: ctx.kind,
      startedAt: ctx.startedAt,
      finishedAt: nowIso(),
      durationMs: Date.now() - ctx.startedMs,
      resultPaths: ctx.resultPaths,
      errors: ctx.errors,
      warnings: ctx.warnings,
      items: ctx.items,
      steps: ctx.steps,
      operation,
    }
    if (opts.includePlanText) {
      result.planText = formatPlan(ctx.steps)
    }
    result = await tryAppendAudit(result, this.config.auditLogPath)

    if (ctx.notify) {
      const [firstError] = ctx.errors
      if (firstError) this.notifier.failed(ctx.kind, ctx.sources, firstError)
      else this.notifier.completed(ctx.kind, ctx.sources, ctx.target)
    }
    this.logger?.info(`[undofs] ${ctx.kind} ${result.success ? 'ok' : 'fail'} (${result.durationMs}ms)`)
    return result
  }
}

/** Paths that exist again after replaying a payload in the given direction. */
function replayedPaths(payload: UndoPayload, direction: 'undo' | 'redo'): string[] {
  const undo = direction === 'undo'
  switch (payload.kind) {
    case 'copy':
    case 'link':
      return undo ? [] : payload.entries.map(e => e.created)
    case 'move':
      return payload.entries.map(e => (undo ? e.from : e.to))
    case 'delete':
      return undo ? payload.entries.map(e => e.original) : []
    case 'rename':
      return [undo ? payload.from : payload.to]
    case 'duplicate':
    case 'create_file':
    case 'create_directory':
      return undo ? [] : [payload.created]
  }
}
