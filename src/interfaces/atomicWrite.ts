import fsp from 'node:fs/promises'
import path from 'node:path'
import { getErrorMessage } from '../seriation/errors'
import { warn } from '../logger'

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * never see a half-written export.
 */
export async function atomicWrite(filePath: string, data: string | Buffer) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.partial`)
  try {
    if (Buffer.isBuffer(data)) await fsp.writeFile(tmp, data)
    else await fsp.writeFile(tmp, data, 'utf8')
    await fsp.rename(tmp, filePath)
  } catch (err) {
    await fsp.rm(tmp, { force: true }).catch((cleanupErr: unknown) => warn('could not remove', tmp, getErrorMessage(cleanupErr)))
    throw err
  }
  return filePath
}

export async function atomicWriteJson(filePath: string, value: unknown) {
  return atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n')
}
