import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import { JsonErr } from './types'

export function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
}

export function jsonError(error: string, message?: string): JsonErr {
  return { error, ...(message ? { message } : {}) }
}

export function resolveDataPath(file: string) {
  return path.isAbsolute(file) ? file : path.join(process.cwd(), file)
}

/**
 * Writes `data` to a temp file beside `file`, fsyncs it and renames it over `file`.
 * Readers see either the old or the new content, never a partial one.
 */
export async function writeFileAtomic(file: string, data: string): Promise<void> {
  const dir = path.dirname(file)
  ensureDir(dir)
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${crypto.randomUUID()}.tmp`)
  try {
    const handle = await fs.promises.open(tmp, 'w')
    try {
      await handle.writeFile(data, 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await fs.promises.rename(tmp, file)
  } catch (err) {
    // a limpeza não pode esconder o erro original
    await fs.promises.rm(tmp, { force: true }).catch(() => undefined)
    throw err
  }
}
