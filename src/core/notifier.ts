import { messageOf } from '../errors.js'
import { ActivityKind, ClipboardContents, Logger, OperationError } from '../types.js'

export interface OperationObserver {
  operationStarted?(kind: ActivityKind, sources: string[]): void
  operationCompleted?(kind: ActivityKind, sources: string[], target: string | undefined): void
  operationFailed?(kind: ActivityKind, sources: string[], error: OperationError): void
  clipboardChanged?(contents: ClipboardContents): void
}

type ObserverEvent = keyof OperationObserver

/**
 * Observer registry. A throwing observer is logged and skipped so that it
 * cannot fail the operation that notified it.
 */
export class OperationNotifier {
  private readonly observers = new Set<OperationObserver>()

  constructor(private readonly logger?: Logger) {}

  subscribe(observer: OperationObserver): () => void {
    this.observers.add(observer)
    return () => this.unsubscribe(observer)
  }

  unsubscribe(observer: OperationObserver): boolean {
    return this.observers.delete(observer)
  }

  get size(): number {
    return this.observers.size
  }

  started(kind: ActivityKind, sources: string[]) {
    this.each('operationStarted', o => o.operationStarted?.(kind, [...sources]))
  }

  completed(kind: ActivityKind, sources: string[], target: string | undefined) {
    this.each('operationCompleted', o => o.operationCompleted?.(kind, [...sources], target))
  }

  failed(kind: ActivityKind, sources: string[], error: OperationError) {
    this.each('operationFailed', o => o.operationFailed?.(kind, [...sources], error))
  }

  clipboardChanged(contents: ClipboardContents) {
    this.each('clipboardChanged', o => o.clipboardChanged?.({ mode: contents.mode, paths: [...contents.paths] }))
  }

  private each(event: ObserverEvent, fn: (o: OperationObserver) => void) {
    for (const o of [...this.observers]) {
      try {
        fn(o)
      } catch (e) {
        this.logger?.warn(`[undofs] observer ${event} threw: ${messageOf(e)}`)
      }
    }
  }
}
