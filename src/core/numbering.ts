import path from 'path'

import { messageOf } from '../errors.js'
import { Logger } from '../types.js'
import { FS, entryExists, nodeFS } from './fs.js'

export const DEFAULT_TEMPLATE = '{name}_{number:05d}{ext}'
export const DEFAULT_DIGITS = 5
export const DEFAULT_START_NUMBER = 1
export const DEFAULT_ROLLOVER_THRESHOLD = 99999

export interface NumberingEntry {
  /** Highest number ever issued (or found on disk) for the key. */
  highest: number
  /** Current digit width; only ever grows. */
  width: number
}

/** Keyed by `path.join(directory, baseName)`. */
export type NumberingSnapshot = Record<string, NumberingEntry>

export interface NumberingOptions {
  template?: string
  /** Width used when the template's `{number}` carries none. */
  digits?: number
  startNumber?: number
  rolloverThreshold?: number
  fs?: FS
  logger?: Logger
  seed?: NumberingSnapshot
}

export interface GenerateOptions {
  /** Directories have no extension; `photos.2024` stays whole. */
  isDirectory?: boolean
  /** Default: true. Dry runs pass false so the counter is left alone. */
  commit?: boolean
}

export interface ParsedName {
  baseName: string
  number: number
  width: number
}

interface StemMatch {
  name: string
  number: number
  width: number
}

export interface NameTemplate {
  readonly source: string
  /** Width declared by `{number:0Nd}`, if any. */
  readonly width?: number
  render(name: string, n: number, width: number, ext: string): string
  parseStem(stem: string, minWidth: number): StemMatch | undefined
}

const EXT_TOKEN = '{ext}'
const TOKEN_SPLIT = /(\{name\}|\{number(?::0\d+d)?\})/
const NUMBER_TOKEN = /\{number(?::0(\d+)d)?\}/

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function countOf(haystack: string, needle: string) {
  return haystack.split(needle).length - 1
}

/**
 * Compile a numbering template such as `{name}_{number:05d}{ext}` or
 * `{name} ({number}){ext}`. The template must end with `{ext}`.
 */
export function compileTemplate(template: string): NameTemplate {
  const numberMatch = NUMBER_TOKEN.exec(template)
  if (countOf(template, '{name}') !== 1 || !numberMatch || countOf(template, '{number') !== 1) {
    throw new Error(`Invalid numbering template: ${template} (needs one {name} and one {number})`)
  }
  if (!template.endsWith(EXT_TOKEN) || countOf(template, EXT_TOKEN) !== 1) {
    throw new Error(`Invalid numbering template: ${template} (must end with {ext})`)
  }
  const numberToken = numberMatch[0]
  const width = numberMatch[1] ? Number(numberMatch[1]) : undefined
  const stemTemplate = template.slice(0, -EXT_TOKEN.length)
  const parts = stemTemplate.split(TOKEN_SPLIT).filter(Boolean)
  const patterns = new Map<number, RegExp>()

  function patternFor(minWidth: number): RegExp {
    const cached = patterns.get(minWidth)
    if (cached) return cached
    const body = parts
      .map(p => {
        if (p === '{name}') return '(?<name>.+)'
        if (p === numberToken) return `(?<num>\\d{${minWidth},})`
        return escapeRegExp(p)
      })
      .join('')
    const re = new RegExp(`^${body}$`)
    patterns.set(minWidth, re)
    return re
  }

  return {
    source: template,
    width,
    render(name, n, w, ext) {
      return template
        .replace('{name}', () => name)
        .replace(numberToken, () => String(n).padStart(w, '0'))
        .replace(EXT_TOKEN, () => ext)
    },
    parseStem(stem, minWidth) {
      const groups = patternFor(minWidth).exec(stem)?.groups
      if (!groups?.name || !groups.num) return undefined
      return { name: groups.name, number: Number(groups.num), width: groups.num.length }
    },
  }
}

export function splitName(base: string, isDirectory = false): { stem: string; ext: string } {
  if (isDirectory) return { stem: base, ext: '' }
  const ext = path.extname(base)
  return { stem: ext ? base.slice(0, -ext.length) : base, ext }
}

/**
 * Issues collision-free numbered names per (directory, base name).
 * Counters only move forward for the lifetime of the instance; seeded
 * values from a previous run raise them, never lower them.
 */
export class NumberingService {
  private readonly cache = new Map<string, NumberingEntry>()
  private readonly template: NameTemplate
  private readonly baseWidth: number
  private readonly startNumber: number
  private readonly rolloverThreshold: number
  private readonly fs: FS
  private readonly logger?: Logger

  constructor(opts: NumberingOptions = {}) {
    this.template = compileTemplate(opts.template ?? DEFAULT_TEMPLATE)
    this.baseWidth = this.template.width ?? opts.digits ?? DEFAULT_DIGITS
    this.startNumber = opts.startNumber ?? DEFAULT_START_NUMBER
    this.rolloverThreshold = opts.rolloverThreshold ?? DEFAULT_ROLLOVER_THRESHOLD
    this.fs = opts.fs ?? nodeFS
    this.logger = opts.logger
    if (opts.seed) this.seed(opts.seed)
  }

  static keyFor(directory: string, baseName: string): string {
    return path.join(path.resolve(directory), baseName)
  }

  parseNumberedName(p: string, opts: { isDirectory?: boolean } = {}): ParsedName {
    const { stem } = splitName(path.basename(p), opts.isDirectory)
    const parsed = this.template.parseStem(stem, this.baseWidth)
    if (!parsed) return { baseName: stem, number: 0, width: this.baseWidth }
    return { baseName: parsed.name, number: parsed.number, width: parsed.width }
  }

  async generateNumberedName(p: string, opts: GenerateOptions = {}): Promise<string> {
    const directory = path.dirname(path.resolve(p))
    const { stem, ext } = splitName(path.basename(p), opts.isDirectory)
    const own = this.template.parseStem(stem, this.baseWidth)
    const baseName = own?.name ?? stem
    const key = NumberingService.keyFor(directory, baseName)
    const known = this.cache.get(key) ?? await this.scan(directory, baseName)

    let width = Math.max(known.width, own?.width ?? this.baseWidth)
    let next = Math.max(this.startNumber, Math.max(known.highest, own?.number ?? 0) + 1)
    for (;;) {
      width = this.widthFor(next, width)
      const candidate = path.join(directory, this.template.render(baseName, next, width, ext))
      if (!await entryExists(this.fs, candidate)) {
        if (opts.commit !== false) this.cache.set(key, { highest: next, width })
        this.logger?.debug?.(`[undofs] numbered name ${path.basename(candidate)} for ${path.basename(p)}`)
        return candidate
      }
      next++
    }
  }

  /** Current counter for a key, without scanning. */
  peek(directory: string, baseName: string): NumberingEntry | undefined {
    const entry = this.cache.get(NumberingService.keyFor(directory, baseName))
    return entry ? { ...entry } : undefined
  }

  snapshot(): NumberingSnapshot {
    const out: NumberingSnapshot = {}
    for (const [k, v] of this.cache) out[k] = { ...v }
    return out
  }

  seed(entries: NumberingSnapshot): void {
    for (const [key, entry] of Object.entries(entries)) {
      const current = this.cache.get(key)
      this.cache.set(key, {
        highest: Math.max(current?.highest ?? 0, entry.highest),
        width: Math.max(current?.width ?? this.baseWidth, entry.width),
      })
    }
  }

  private capacity(width: number): number {
    return width === this.baseWidth ? this.rolloverThreshold : 10 ** width - 1
  }

  private widthFor(n: number, width: number): number {
    let w = Math.max(width, this.baseWidth)
    while (n > this.capacity(w)) w++
    return w
  }

  private async scan(directory: string, baseName: string): Promise<NumberingEntry> {
    let names: string[]
    try {
      names = await this.fs.readdir(directory)
    } catch (e) {
      this.logger?.warn(`[undofs] cannot scan ${directory} for numbering: ${messageOf(e)}`)
      return { highest: 0, width: this.baseWidth }
    }

    let highest = 0
    let width = this.baseWidth
    for (const name of names) {
      const parsed = this.template.parseStem(splitName(name).stem, this.baseWidth)
        ?? this.template.parseStem(name, this.baseWidth)
      if (!parsed || parsed.name !== baseName) continue
      if (parsed.number > highest) {
        highest = parsed.number
        width = Math.max(this.baseWidth, parsed.width)
      }
    }
    return { highest, width }
  }
}
