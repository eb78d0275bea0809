export type {
  ActivityKind,
  ClipboardContents,
  ClipboardMode,
  DeleteOptions,
  ErrorCode,
  ItemOutcome,
  Logger,
  Operation,
  OperationError,
  OperationKind,
  OperationOptions,
  OperationResult,
  PermanentOperation,
  ProgressEvent,
  Step,
  UndoPayload,
  UndoableOperation,
} from './types.js'
export type { ConfigInput, EngineConfig, CancelPolicy, SelfDropPolicy } from './config.js'
export type { EngineOptions, TransferKind } from './engine/engine.js'
export type { DropAction, DropOutcome, DropPlan, DropReason, RequestedAction } from './engine/drop.js'
export type { HistoryOptions, HistorySnapshot } from './core/history.js'
export type { NumberingOptions, NumberingSnapshot, ParsedName } from './core/numbering.js'
export type { OperationObserver } from './core/notifier.js'
export type { FS } from './core/fs.js'
export type { PersistedState } from './state/types.js'

export { FileOpError } from './errors.js'
export { resolveConfig, ConfigError, defaultConfigPath, defaultStatePath, defaultTrashDir } from './config.js'
export { OperationEngine } from './engine/engine.js'
export { DropResolver, DROP_REASON_MESSAGES } from './engine/drop.js'
export { HistoryManager } from './core/history.js'
export { NumberingService, compileTemplate } from './core/numbering.js'
export { ClipboardState } from './core/clipboard.js'
export { describeOperation, formatPlan } from './core/format.js'
export { loadOrCreateState, saveState } from './state/io.js'
