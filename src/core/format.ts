import path from 'path'

import { OperationKind, PlannedStep, Step } from '../types.js'

export function formatPlan(steps: Array<Step | PlannedStep>): string {
  if (!steps.length) return 'No changes.'
  const lines: string[] = []
  for (const s of steps) {
    const paths = Object.entries(s.paths)
      .filter((kv): kv is [string, string] => typeof kv[1] === 'string')
      .map(([k, v]) => `${k}=${v}`)
      .join(' ')
    lines.push(`- ${s.kind}: ${s.message}${paths ? ` (${paths})` : ''}`)
  }
  return lines.join('\n')
}

export interface DescribeInput {
  kind: OperationKind
  sourcePaths: string[]
  targetPath?: string
  undoable: boolean
}

function quoted(p: string) {
  return `'${path.basename(p)}'`
}

function subject(paths: string[]) {
  return paths.length === 1 ? quoted(paths[0]) : `${paths.length} items`
}

/**
 * One-line summary used for history labels ("Undo Rename 'a.txt' to 'b.txt'").
 */
export function describeOperation(op: DescribeInput): string {
  const target = op.targetPath ?? ''
  switch (op.kind) {
    case 'copy':
      return `Copy ${subject(op.sourcePaths)} to ${target}`
    case 'move':
      return `Move ${subject(op.sourcePaths)} to ${target}`
    case 'link':
      return `Link ${subject(op.sourcePaths)} into ${target}`
    case 'delete':
      return `${op.undoable ? 'Delete' : 'Permanently delete'} ${subject(op.sourcePaths)}`
    case 'rename':
      return `Rename ${subject(op.sourcePaths)} to ${quoted(target)}`
    case 'duplicate':
      return `Duplicate ${subject(op.sourcePaths)} as ${quoted(target)}`
    case 'create_file':
      return `Create file ${quoted(target)}`
    case 'create_directory':
      return `Create folder ${quoted(target)}`
    default: {
      const _exhaustive: never = op.kind
      throw new Error(`Unknown operation kind: ${String(_exhaustive)}`)
    }
  }
}
