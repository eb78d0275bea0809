import { z } from 'zod'

import { ClipboardContents, UndoPayload, UndoableOperation } from '../types.js'
import { HistorySnapshot } from '../core/history.js'
import { NumberingSnapshot } from '../core/numbering.js'

export type StateVersion = 1

export interface PersistedState {
  version: StateVersion
  numbering: NumberingSnapshot
  history: HistorySnapshot
  clipboard: ClipboardContents
}

const created = z.object({ source: z.string(), created: z.string() })

const undoPayloadSchema: z.ZodType<UndoPayload, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('copy'), entries: z.array(created) }),
  z.object({ kind: z.literal('link'), entries: z.array(created) }),
  z.object({ kind: z.literal('move'), entries: z.array(z.object({ from: z.string(), to: z.string() })) }),
  z.object({ kind: z.literal('delete'), entries: z.array(z.object({ original: z.string(), stored: z.string() })) }),
  z.object({ kind: z.literal('rename'), from: z.string(), to: z.string() }),
  z.object({ kind: z.literal('create_file'), created: z.string() }),
  z.object({ kind: z.literal('create_directory'), created: z.string() }),
  z.object({ kind: z.literal('duplicate'), source: z.string(), created: z.string() }),
])

const operationSchema: z.ZodType<UndoableOperation, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  kind: z.enum(['copy', 'move', 'delete', 'rename', 'create_file', 'create_directory', 'duplicate', 'link']),
  sourcePaths: z.array(z.string()),
  targetPath: z.string().optional(),
  timestamp: z.number(),
  description: z.string(),
  undoable: z.literal(true),
  undo: undoPayloadSchema,
}).refine(op => op.kind === op.undo.kind, { message: 'undo payload does not match operation kind' })

const stateSchema = z.object({
  version: z.literal(1),
  numbering: z.record(z.object({ highest: z.number().int().min(0), width: z.number().int().min(1) })).default({}),
  history: z.object({
    undo: z.array(operationSchema).default([]),
    redo: z.array(operationSchema).default([]),
  }).default({}),
  clipboard: z.object({
    mode: z.enum(['copy', 'cut', 'empty']),
    paths: z.array(z.string()),
  }).default({ mode: 'empty', paths: [] }),
})

export function defaultState(): PersistedState {
  return {
    version: 1,
    numbering: {},
    history: { undo: [], redo: [] },
    clipboard: { mode: 'empty', paths: [] },
  }
}

export function normalizeState(input: unknown): PersistedState {
  const parsed = stateSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    throw new Error(`Invalid state file: ${issues}`)
  }
  const { numbering, history, clipboard } = parsed.data
  return {
    version: 1,
    numbering,
    history,
    clipboard: clipboard.paths.length ? clipboard : { mode: 'empty', paths: [] },
  }
}
