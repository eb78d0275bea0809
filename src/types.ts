export type OperationKind =
  | 'copy'
  | 'move'
  | 'delete'
  | 'rename'
  | 'create_file'
  | 'create_directory'
  | 'duplicate'
  | 'link'

/**
 * Everything the engine reports through results and notifications.
 * Undo and redo are activities, not recorded operations; `paste` only
 * appears when the clipboard was empty, otherwise it reports as copy or move.
 */
export type ActivityKind = OperationKind | 'undo' | 'redo' | 'paste'

export type ErrorCode =
  | 'NotFound'
  | 'PermissionDenied'
  | 'NameConflict'
  | 'InUse'
  | 'CrossDeviceError'
  | 'EmptyClipboard'
  | 'Cancelled'
  | 'NothingToUndo'
  | 'NothingToRedo'
  | 'Diverged'
  | 'ConfirmationRequired'
  | 'InvalidTarget'
  | 'IOError'

export interface OperationError {
  code: ErrorCode
  message: string
  path?: string
}

export interface CreatedEntry {
  source: string
  created: string
}

export interface MovedEntry {
  from: string
  to: string
}

export interface StoredEntry {
  original: string
  /** Where the item sits inside the trash directory. */
  stored: string
}

export type UndoPayload =
  | { kind: 'copy'; entries: CreatedEntry[] }
  | { kind: 'link'; entries: CreatedEntry[] }
  | { kind: 'move'; entries: MovedEntry[] }
  | { kind: 'delete'; entries: StoredEntry[] }
  | { kind: 'rename'; from: string; to: string }
  | { kind: 'create_file'; created: string }
  | { kind: 'create_directory'; created: string }
  | { kind: 'duplicate'; source: string; created: string }

interface OperationBase {
  id: string
  kind: OperationKind
  sourcePaths: string[]
  targetPath?: string
  timestamp: number
  description: string
}

export type UndoableOperation = OperationBase & { undoable: true; undo: UndoPayload }
export type PermanentOperation = OperationBase & { undoable: false; undo?: undefined }

export type Operation = UndoableOperation | PermanentOperation

export type StepKind =
  | 'noop'
  | 'mkdir'
  | 'touch'
  | 'copy'
  | 'move'
  | 'rename'
  | 'rm'
  | 'rmdir'
  | 'symlink'
  | 'unlink'

interface StepPaths {
  noop: { path?: string }
  mkdir: { dir: string }
  touch: { file: string }
  copy: { from: string; to: string }
  move: { from: string; to: string }
  rename: { from: string; to: string }
  rm: { path: string }
  rmdir: { dir: string }
  symlink: { source: string; target: string }
  unlink: { target: string; source?: string }
}

export type StepStatus = 'planned' | 'executed' | 'skipped' | 'failed'

interface StepOf<K extends StepKind> {
  kind: K
  message: string
  paths: StepPaths[K]
  status?: StepStatus
  error?: string
  /**
   * Rollback hint for this step. Filled in by the applier once the step
   * executed, unless the planner already provided one.
   */
  undo?: PlannedStep
}

export type Step = { [K in StepKind]: StepOf<K> }[StepKind]

export type PlannedStep = { [K in StepKind]: Omit<StepOf<K>, 'status' | 'error' | 'undo'> }[StepKind]

export type ItemStatus = 'done' | 'failed' | 'skipped'

export interface ItemOutcome {
  source: string
  target?: string
  status: ItemStatus
  error?: OperationError
}

export interface OperationResult {
  success: boolean
  kind: ActivityKind
  startedAt: string
  finishedAt: string
  durationMs: number
  /** Paths created or reached by the operation, in source order. */
  resultPaths: string[]
  errors: OperationError[]
  warnings: string[]
  items: ItemOutcome[]
  steps: Step[]
  /** The recorded (or, for undo/redo, the affected) history entry. */
  operation?: Operation
  planText?: string
}

export interface Logger {
  debug?(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface ProgressEvent {
  kind: ActivityKind
  /** `item` after each source finishes, `entry` for every file a copy visits. */
  phase: 'item' | 'entry'
  completed: number
  total: number
  path: string
}

export interface OperationOptions {
  signal?: AbortSignal
  onProgress?: (event: ProgressEvent) => void
  /**
   * If true, do not perform filesystem writes; only return the planned steps/result.
   */
  dryRun?: boolean
  /**
   * If true, return plan text in OperationResult.planText.
   */
  includePlanText?: boolean
}

export interface DeleteOptions extends OperationOptions {
  /** Default: false. Permanent deletes cannot be undone. */
  permanent?: boolean
  /**
   * Required for permanent deletes of directories or of more than one item.
   */
  confirmed?: boolean
}

export type ClipboardMode = 'copy' | 'cut' | 'empty'

export interface ClipboardContents {
  mode: ClipboardMode
  paths: string[]
}
