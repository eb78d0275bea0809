import os from 'os'
import path from 'path'
import { z } from 'zod'

import {
  DEFAULT_DIGITS,
  DEFAULT_ROLLOVER_THRESHOLD,
  DEFAULT_START_NUMBER,
  DEFAULT_TEMPLATE,
  compileTemplate,
} from './core/numbering.js'
import { DEFAULT_MAX_HISTORY, DEFAULT_MERGE_WINDOW_MS } from './core/history.js'

export interface PathEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

function xdgBase(opts: PathEnv, variable: string, fallback: string[]): string {
  const env = opts.env ?? process.env
  return env[variable] || path.join(opts.homeDir ?? os.homedir(), ...fallback)
}

export function defaultConfigPath(opts: PathEnv = {}): string {
  return path.join(xdgBase(opts, 'XDG_CONFIG_HOME', ['.config']), 'undofs', 'config.json')
}

export function defaultStatePath(opts: PathEnv = {}): string {
  return path.join(xdgBase(opts, 'XDG_STATE_HOME', ['.local', 'state']), 'undofs', 'state.json')
}

export function defaultTrashDir(opts: PathEnv = {}): string {
  return path.join(xdgBase(opts, 'XDG_DATA_HOME', ['.local', 'share']), 'undofs', 'trash')
}

const templateSchema = z.string().superRefine((t, ctx) => {
  try {
    compileTemplate(t)
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) })
  }
})

const numberingSchema = z.object({
  template: templateSchema.default(DEFAULT_TEMPLATE),
  digits: z.number().int().min(1).max(12).default(DEFAULT_DIGITS),
  startNumber: z.number().int().min(0).default(DEFAULT_START_NUMBER),
  rolloverThreshold: z.number().int().min(1).default(DEFAULT_ROLLOVER_THRESHOLD),
}).strict()

const historySchema = z.object({
  maxSize: z.number().int().min(1).default(DEFAULT_MAX_HISTORY),
  mergeEnabled: z.boolean().default(false),
  mergeWindowMs: z.number().int().min(0).default(DEFAULT_MERGE_WINDOW_MS),
}).strict()

export const configSchema = z.object({
  numbering: numberingSchema.default({}),
  history: historySchema.default({}),
  trashDir: z.string().min(1).optional(),
  cancelPolicy: z.enum(['rollback', 'keep']).default('rollback'),
  selfDropPolicy: z.enum(['noop', 'copy-outside']).default('noop'),
  atomicCopy: z.boolean().default(true),
  auditLogPath: z.string().min(1).optional(),
}).strict()

export type ConfigInput = z.input<typeof configSchema>

export type EngineConfig = Omit<z.output<typeof configSchema>, 'trashDir'> & { trashDir: string }

export type CancelPolicy = EngineConfig['cancelPolicy']
export type SelfDropPolicy = EngineConfig['selfDropPolicy']

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Fill defaults and validate. Paths are resolved to absolute ones.
 */
export function resolveConfig(input: unknown = {}, opts: PathEnv = {}): EngineConfig {
  const parsed = configSchema.safeParse(input ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config: ${issues}`)
  }
  const cfg = parsed.data
  return {
    ...cfg,
    trashDir: path.resolve(cfg.trashDir ?? defaultTrashDir(opts)),
    auditLogPath: cfg.auditLogPath ? path.resolve(cfg.auditLogPath) : undefined,
  }
}
