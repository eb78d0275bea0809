import fs from 'fs-extra'
import path from 'path'

import { PersistedState, defaultState, normalizeState } from './types.js'

export async function loadOrCreateState(statePath: string): Promise<PersistedState> {
  const abs = path.resolve(statePath)
  if (!await fs.pathExists(abs)) {
    return defaultState()
  }
  const json: unknown = await fs.readJson(abs)
  return normalizeState(json)
}

export interface SaveStateOptions {
  spaces?: number
}

export async function saveState(statePath: string, state: PersistedState, opts: SaveStateOptions = {}) {
  const abs = path.resolve(statePath)
  await fs.ensureDir(path.dirname(abs))
  const spaces = opts.spaces ?? 2
  const content = JSON.stringify(state, null, spaces) + '\n'
  const tmp = `${abs}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`
  await fs.writeFile(tmp, content, 'utf8')
  await fs.rename(tmp, abs)
}
