import fs from 'fs-extra'
import path from 'path'

import { messageOf } from '../errors.js'
import { OperationResult } from '../types.js'

export async function appendAudit(logPath: string, result: OperationResult) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(result) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Append one JSON line per result. A failing audit log never fails the
 * operation; it is reported as a warning instead.
 */
export async function tryAppendAudit(result: OperationResult, logPath: string | undefined): Promise<OperationResult> {
  if (!logPath) return result
  try {
    await appendAudit(logPath, result)
  } catch (e) {
    result.warnings.push(`Failed to write audit log: ${messageOf(e)}`)
  }
  return result
}
