import { promises as fs } from 'fs'
import path from 'path'
import { getLogger } from './logger'

export type RejectionEntry = {
  ts: string
  corr_id: string
  requester?: string
  stage: string
  reason: { code: string; category: string; http_status: number; message: string }
  context?: Record<string, unknown>
}

/**
 * appendRejection
 * Appends a single JSONL record for a rejected request. Write failures are logged and never
 * change the response already decided for the caller.
 */
export async function appendRejection(file: string, entry: RejectionEntry): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.appendFile(file, JSON.stringify(entry) + '\n')
  } catch (e) {
    getLogger().error({ event: 'rejection_audit.write_failed', file, err: e })
  }
}
