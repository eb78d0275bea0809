import path from 'path'

import { SelfDropPolicy } from '../config.js'
import { isSameOrInside, normalizePath } from '../core/paths.js'
import { Logger, OperationOptions, OperationResult } from '../types.js'
import { messageOf } from '../errors.js'
import { OperationEngine, TransferKind } from './engine.js'

export type DropAction = TransferKind | 'none'

export type RequestedAction = TransferKind | 'auto'

/** Why a drop resolved to nothing (or, for self-drops, why it was redirected). */
export type DropReason =
  | 'cycle_self' // Dropping into itself
  | 'cycle_descendant' // Dropping into a descendant
  | 'not_found' // Target does not exist
  | 'not_directory' // Target is not a directory
  | 'already_there' // Every source already lives in the target
  | 'no_sources'

export const DROP_REASON_MESSAGES: Record<DropReason, string> = {
  cycle_self: 'Cannot drop a folder into itself',
  cycle_descendant: 'Cannot drop a folder into its own subfolder',
  not_found: 'Drop target does not exist',
  not_directory: 'Can only drop into folders',
  already_there: 'Items are already in this folder',
  no_sources: 'Nothing to drop',
}

export interface DropPlan {
  action: DropAction
  sources: string[]
  targetDir: string
  reason?: DropReason
  /** The self-drop policy sent the items somewhere other than the drop target. */
  redirected: boolean
  /** Runs the plan through the engine; resolves to undefined for `none`. */
  execute(opts?: OperationOptions): Promise<OperationResult | undefined>
}

export interface DropOutcome {
  plan: DropPlan
  result?: OperationResult
}

export interface DropResolverOptions {
  /** Default: the engine's configured policy. */
  selfDropPolicy?: SelfDropPolicy
  logger?: Logger
}

/**
 * Decides what a drag-and-drop gesture means. Same volume moves;
 * anything else copies.
 */
export class DropResolver {
  private readonly selfDropPolicy: SelfDropPolicy
  private readonly logger?: Logger

  constructor(private readonly engine: OperationEngine, opts: DropResolverOptions = {}) {
    this.selfDropPolicy = opts.selfDropPolicy ?? engine.config.selfDropPolicy
    this.logger = opts.logger
  }

  async resolve(dragged: string[], target: string, requested: RequestedAction = 'auto'): Promise<DropPlan> {
    const sources = [...new Set(dragged.map(normalizePath))]
    const targetDir = normalizePath(target)

    if (!sources.length) return this.plan('none', sources, targetDir, 'no_sources')

    const conflicts = sources.filter(s => isSameOrInside(targetDir, s))
    if (conflicts.length) {
      const reason: DropReason = conflicts.includes(targetDir) ? 'cycle_self' : 'cycle_descendant'
      // Only a drop made entirely of conflicting siblings can be redirected to their parent.
      const parent = path.dirname(conflicts[0])
      const redirectable = conflicts.length === sources.length && sources.every(s => path.dirname(s) === parent)
      if (this.selfDropPolicy === 'copy-outside' && redirectable) {
        return this.plan('copy', sources, parent, reason, true)
      }
      return this.plan('none', sources, targetDir, reason)
    }

    let targetDev: number
    try {
      const st = await this.engine.fs.stat(targetDir)
      if (!st.isDirectory()) return this.plan('none', sources, targetDir, 'not_directory')
      targetDev = st.dev
    } catch (e) {
      this.logger?.debug?.(`[undofs] drop target unavailable ${targetDir}: ${messageOf(e)}`)
      return this.plan('none', sources, targetDir, 'not_found')
    }

    const action: TransferKind = requested === 'auto'
      ? await this.defaultAction(sources, targetDev)
      : requested

    if (action === 'move') {
      const moving = sources.filter(s => path.dirname(s) !== targetDir)
      if (!moving.length) return this.plan('none', sources, targetDir, 'already_there')
      return this.plan('move', moving, targetDir)
    }
    return this.plan(action, sources, targetDir)
  }

  async drop(
    dragged: string[],
    target: string,
    requested: RequestedAction = 'auto',
    opts: OperationOptions = {},
  ): Promise<DropOutcome> {
    const plan = await this.resolve(dragged, target, requested)
    if (plan.reason && plan.action === 'none') {
      this.logger?.info(`[undofs] drop ignored: ${DROP_REASON_MESSAGES[plan.reason]}`)
    }
    const result = await plan.execute(opts)
    return result ? { plan, result } : { plan }
  }

  /** All sources on the target's device means move; anything else copies. */
  private async defaultAction(sources: string[], targetDev: number): Promise<TransferKind> {
    for (const s of sources) {
      try {
        if ((await this.engine.fs.stat(s)).dev !== targetDev) return 'copy'
      } catch (e) {
        this.logger?.debug?.(`[undofs] cannot stat ${s}, falling back to copy: ${messageOf(e)}`)
        return 'copy'
      }
    }
    return 'move'
  }

  private plan(action: DropAction, sources: string[], targetDir: string, reason?: DropReason, redirected = false): DropPlan {
    const engine = this.engine
    return {
      action,
      sources,
      targetDir,
      reason,
      redirected,
      async execute(opts: OperationOptions = {}) {
        switch (action) {
          case 'none': return undefined
          case 'copy': return engine.copy(sources, targetDir, opts)
          case 'move': return engine.move(sources, targetDir, opts)
          case 'link': return engine.link(sources, targetDir, opts)
        }
      },
    }
  }
}
