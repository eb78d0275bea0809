import fs from 'fs-extra'
import path from 'path'

import { EngineConfig, PathEnv, defaultConfigPath, defaultStatePath, resolveConfig } from '../config.js'

export type ConfigEnv = PathEnv

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  return defaultConfigPath(opts)
}

export function getStatePath(opts: ConfigEnv = {}): string {
  return defaultStatePath(opts)
}

/**
 * Raw JSON from the config file, or `{}` when there is none.
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
  const abs = path.resolve(configPath)
  if (!await fs.pathExists(abs)) return {}
  const json: unknown = await fs.readJson(abs)
  return json ?? {}
}

export async function readGlobalConfig(configPath?: string, opts: ConfigEnv = {}): Promise<EngineConfig> {
  const raw = await readConfigFile(configPath ?? getGlobalConfigPath(opts))
  return resolveConfig(raw, opts)
}
