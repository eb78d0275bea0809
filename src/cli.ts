#!/usr/bin/env node
import path from 'path'
import { fileURLToPath } from 'url'

import { ConfigError, EngineConfig } from './config.js'
import { getGlobalConfigPath, getStatePath, readGlobalConfig } from './cli/config.js'
import { DropResolver, RequestedAction } from './engine/drop.js'
import { OperationEngine } from './engine/engine.js'
import { loadOrCreateState, saveState } from './state/io.js'
import type { Logger, OperationOptions, OperationResult } from './types.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

const stderrLogger: Logger = {
  debug: (msg) => process.stderr.write(msg + '\n'),
  info: (msg) => process.stderr.write(msg + '\n'),
  warn: (msg) => process.stderr.write(msg + '\n'),
  error: (msg) => process.stderr.write(msg + '\n'),
}

interface GlobalOptions {
  configPath: string
  statePath: string
  auditLogPath?: string
  verbose: boolean
  op: OperationOptions
}

function parseGlobalOptions(args: Argv): GlobalOptions {
  const configPath = popFlagValue(args, ['--config'])
  const statePath = popFlagValue(args, ['--state'])
  const auditLogPath = popFlagValue(args, ['--audit-log'])
  const verbose = hasFlag(args, ['-v', '--verbose'])
  const dryRun = hasFlag(args, ['--dry-run'])
  const includePlanText = hasFlag(args, ['--plan'])
  return {
    configPath: path.resolve(configPath ?? getGlobalConfigPath()),
    statePath: path.resolve(statePath ?? getStatePath()),
    auditLogPath: auditLogPath ? path.resolve(auditLogPath) : undefined,
    verbose,
    op: { dryRun, includePlanText },
  }
}

function printHelp(): void {
  const msg = `
undofs

Usage:
  undofs copy <path...> --to <dir>
  undofs move <path...> --to <dir>
  undofs link <path...> --to <dir>
  undofs delete <path...> [--permanent] [--yes]
  undofs rename <path> <new-name>
  undofs duplicate <path>
  undofs new-file <dir> <name>
  undofs new-dir <dir> <name>
  undofs clip copy|cut <path...>
  undofs clip show|clear
  undofs paste <dir>
  undofs drop <path...> --onto <dir> [--copy|--move|--link]
  undofs undo
  undofs redo
  undofs history
  undofs config path|show

Options:
  --config <path>     config file (default: $XDG_CONFIG_HOME/undofs/config.json)
  --state <path>      state file (default: $XDG_STATE_HOME/undofs/state.json)
  --audit-log <path>  append one JSON line per operation
  --dry-run           plan only, change nothing
  --plan              include the formatted plan in the output
  -v, --verbose       log to stderr
`
  process.stdout.write(msg.trimStart())
  process.stdout.write('\n')
}

function requireNoExtra(args: Argv) {
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
}

function requirePaths(args: Argv, cmd: string): string[] {
  const unknown = args.find(a => a.startsWith('-'))
  if (unknown) die(`Unknown option: ${unknown}`)
  if (!args.length) die(`${cmd} requires at least one path`)
  return args.splice(0).map(p => path.resolve(p))
}

function parseDropAction(args: Argv): RequestedAction {
  const forced = (['copy', 'move', 'link'] as const).filter(a => hasFlag(args, [`--${a}`]))
  if (forced.length > 1) die('Use only one of --copy, --move, --link')
  return forced[0] ?? 'auto'
}

function printResult(res: OperationResult): number {
  process.stdout.write(JSON.stringify(res, null, 2) + '\n')
  return res.success ? 0 : 1
}

async function loadConfig(g: GlobalOptions): Promise<EngineConfig> {
  try {
    const cfg = await readGlobalConfig(g.configPath)
    return g.auditLogPath ? { ...cfg, auditLogPath: g.auditLogPath } : cfg
  } catch (e) {
    if (e instanceof ConfigError) die(`${g.configPath}: ${e.message}`)
    throw e
  }
}

async function withEngine(g: GlobalOptions, fn: (engine: OperationEngine) => Promise<number>): Promise<number> {
  const config = await loadConfig(g)
  const state = await loadOrCreateState(g.statePath)
  const engine = new OperationEngine({ config, state, logger: g.verbose ? stderrLogger : undefined })
  const code = await fn(engine)
  await engine.idle()
  await saveState(g.statePath, engine.exportState())
  return code
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const g = parseGlobalOptions(args)
    const cmd = args.shift()
    if (!cmd) {
      printHelp()
      return 1
    }

    if (cmd === 'config') {
      const sub = args.shift()
      requireNoExtra(args)
      if (sub === 'path') {
        process.stdout.write(g.configPath + '\n')
        return 0
      }
      if (sub === 'show') {
        const cfg = await loadConfig(g)
        process.stdout.write(JSON.stringify(cfg, null, 2) + '\n')
        return 0
      }
      die('Unknown config subcommand. Expected: path|show')
    }

    if (cmd === 'copy' || cmd === 'move' || cmd === 'link') {
      const to = popFlagValue(args, ['--to'])
      if (!to) die(`${cmd} requires --to <dir>`)
      const paths = requirePaths(args, cmd)
      return await withEngine(g, async engine => printResult(await engine[cmd](paths, path.resolve(to), g.op)))
    }

    if (cmd === 'delete') {
      const permanent = hasFlag(args, ['--permanent'])
      const confirmed = hasFlag(args, ['-y', '--yes'])
      const paths = requirePaths(args, cmd)
      return await withEngine(g, async engine => printResult(await engine.delete(paths, { ...g.op, permanent, confirmed })))
    }

    if (cmd === 'rename') {
      const p = args.shift()
      const newName = args.shift()
      if (!p || !newName) die('rename requires <path> <new-name>')
      requireNoExtra(args)
      return await withEngine(g, async engine => printResult(await engine.rename(path.resolve(p), newName, g.op)))
    }

    if (cmd === 'duplicate') {
      const p = args.shift()
      if (!p) die('duplicate requires <path>')
      requireNoExtra(args)
      return await withEngine(g, async engine => printResult(await engine.duplicate(path.resolve(p), g.op)))
    }

    if (cmd === 'new-file' || cmd === 'new-dir') {
      const dir = args.shift()
      const name = args.shift()
      if (!dir || !name) die(`${cmd} requires <dir> <name>`)
      requireNoExtra(args)
      const parent = path.resolve(dir)
      return await withEngine(g, async engine => printResult(cmd === 'new-file'
        ? await engine.createFile(parent, name, g.op)
        : await engine.createDirectory(parent, name, g.op)))
    }

    if (cmd === 'clip') {
      const sub = args.shift()
      if (sub === 'copy' || sub === 'cut') {
        const paths = requirePaths(args, `clip ${sub}`)
        return await withEngine(g, async engine => {
          const contents = sub === 'cut' ? await engine.cutToClipboard(paths) : await engine.copyToClipboard(paths)
          process.stdout.write(JSON.stringify(contents, null, 2) + '\n')
          return 0
        })
      }
      if (sub === 'show') {
        requireNoExtra(args)
        return await withEngine(g, async engine => {
          const contents = engine.clipboardContents()
          if (contents.mode === 'empty') die('Clipboard is empty.', 2)
          process.stdout.write(`${contents.mode}\n${contents.paths.join('\n')}\n`)
          return 0
        })
      }
      if (sub === 'clear') {
        requireNoExtra(args)
        return await withEngine(g, async engine => {
          await engine.clearClipboard()
          return 0
        })
      }
      die('Unknown clip subcommand. Expected: copy|cut|show|clear')
    }

    if (cmd === 'paste') {
      const dir = args.shift()
      if (!dir) die('paste requires <dir>')
      requireNoExtra(args)
      return await withEngine(g, async engine => printResult(await engine.paste(path.resolve(dir), g.op)))
    }

    if (cmd === 'drop') {
      const onto = popFlagValue(args, ['--onto'])
      if (!onto) die('drop requires --onto <dir>')
      const requested = parseDropAction(args)
      const paths = requirePaths(args, cmd)
      return await withEngine(g, async engine => {
        const { plan, result } = await new DropResolver(engine).drop(paths, path.resolve(onto), requested, g.op)
        if (!result) {
          process.stdout.write(JSON.stringify({ action: plan.action, reason: plan.reason }, null, 2) + '\n')
          return 2
        }
        return printResult(result)
      })
    }

    if (cmd === 'undo' || cmd === 'redo') {
      requireNoExtra(args)
      return await withEngine(g, async engine => printResult(await engine[cmd](g.op)))
    }

    if (cmd === 'history') {
      requireNoExtra(args)
      return await withEngine(g, async engine => {
        const { undo, redo } = engine.history()
        if (!undo.length && !redo.length) die('No history.', 2)
        const lines = [
          ...[...undo].reverse().map(op => `undo  ${op.description}`),
          ...[...redo].reverse().map(op => `redo  ${op.description}`),
        ]
        process.stdout.write(lines.join('\n') + '\n')
        return 0
      })
    }

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
