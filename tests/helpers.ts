import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { OperationEngine, EngineOptions } from '../src/engine/engine.js'

export interface Sandbox {
  root: string
  work: string
  out: string
  trash: string
}

export async function makeSandbox(): Promise<Sandbox> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'undofs-test-'))
  const work = path.join(root, 'work')
  const out = path.join(root, 'out')
  await fs.ensureDir(work)
  await fs.ensureDir(out)
  return { root, work, out, trash: path.join(root, 'trash') }
}

export function makeEngine(box: Sandbox, opts: EngineOptions = {}): OperationEngine {
  return new OperationEngine({ ...opts, config: { trashDir: box.trash, ...opts.config } })
}

export async function write(file: string, content = 'test content') {
  await fs.ensureDir(path.dirname(file))
  await fs.writeFile(file, content, 'utf8')
}

export function enoent(p: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, lstat '${p}'`), { code: 'ENOENT' })
}
