import { describe, expect, it, vi } from 'vitest'

import { ClipboardState } from '../src/core/clipboard.js'
import { OperationNotifier, OperationObserver } from '../src/core/notifier.js'
import { Logger } from '../src/types.js'

describe('ClipboardState', () => {
  it('replaces the selection wholesale and de-duplicates paths', () => {
    const clip = new ClipboardState()
    clip.set(['/w/a.txt', '/w/a.txt', '/w/b.txt'], true)
    expect(clip.contents()).toEqual({ mode: 'cut', paths: ['/w/a.txt', '/w/b.txt'] })

    clip.set(['/w/c.txt'], false)
    expect(clip.contents()).toEqual({ mode: 'copy', paths: ['/w/c.txt'] })
  })

  it('an empty selection means an empty clipboard', () => {
    const clip = new ClipboardState()
    clip.set([], true)
    expect(clip.isEmpty()).toBe(true)
    expect(clip.contents()).toEqual({ mode: 'empty', paths: [] })
  })

  it('becomes empty once the last path is removed', () => {
    const clip = new ClipboardState()
    clip.set(['/w/a.txt', '/w/b.txt'], true)
    clip.remove(['/w/a.txt'])
    expect(clip.contents()).toEqual({ mode: 'cut', paths: ['/w/b.txt'] })
    clip.remove(['/w/b.txt'])
    expect(clip.isEmpty()).toBe(true)
  })

  it('restores a snapshot', () => {
    const clip = new ClipboardState()
    clip.restore({ mode: 'copy', paths: ['/w/a.txt'] })
    expect(clip.snapshot()).toEqual({ mode: 'copy', paths: ['/w/a.txt'] })
    clip.restore({ mode: 'empty', paths: [] })
    expect(clip.isEmpty()).toBe(true)
  })
})

describe('OperationNotifier', () => {
  it('keeps notifying the others when an observer throws', () => {
    const warn = vi.fn()
    const logger: Logger = { info: vi.fn(), warn, error: vi.fn() }
    const notifier = new OperationNotifier(logger)
    const seen: string[] = []

    notifier.subscribe({
      operationStarted: () => {
        throw new Error('observer bug')
      },
    })
    notifier.subscribe({ operationStarted: (kind, sources) => seen.push(`${kind}:${sources.join(',')}`) })
    notifier.started('copy', ['/w/a.txt'])

    expect(seen).toEqual(['copy:/w/a.txt'])
    expect(warn).toHaveBeenCalledWith('[undofs] observer operationStarted threw: observer bug')
  })

  it('stops notifying after unsubscribe', () => {
    const notifier = new OperationNotifier()
    const clipboardChanged = vi.fn()
    const observer: OperationObserver = { clipboardChanged }
    const off = notifier.subscribe(observer)

    notifier.clipboardChanged({ mode: 'copy', paths: ['/w/a.txt'] })
    off()
    notifier.clipboardChanged({ mode: 'empty', paths: [] })

    expect(clipboardChanged).toHaveBeenCalledTimes(1)
    expect(clipboardChanged).toHaveBeenCalledWith({ mode: 'copy', paths: ['/w/a.txt'] })
    expect(notifier.size).toBe(0)
  })
})
