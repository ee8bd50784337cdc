import fs from 'fs-extra'
import path from 'path'
import type { WriteStream } from 'fs-extra'
import type { Logger } from '@dockrun/types'
import { isValidIdentifier, stemOf } from '@dockrun/dock-utils'

/**
 * Regular, non-hidden files in `dir` whose extension is one of `extensions`
 * (case-insensitive), sorted by name. A missing directory yields [].
 */
const listInputFiles = async (
  dir: string,
  extensions: readonly string[]
): Promise<string[]> => {
  if (!(await fs.pathExists(dir))) return []
  const wanted = extensions.map((ext) => ext.toLowerCase())
  const entries = await fs.readdir(dir, { withFileTypes: true })
  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        !entry.name.startsWith('.') &&
        wanted.includes(path.extname(entry.name).toLowerCase())
    )
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name))
}

/** Drops files whose stem cannot be used as an artifact identifier. */
const withValidStems = (files: string[], logger: Logger): string[] =>
  files.filter((file) => {
    const valid = isValidIdentifier(stemOf(file))
    if (!valid) {
      logger.error(`[ERROR] Unusable file name, skipping: ${path.basename(file)}`)
    }
    return valid
  })

const closeStream = (stream: WriteStream) =>
  new Promise<void>((resolve, reject) => {
    stream.once('error', reject)
    stream.end(() => resolve())
  })

const toCsvCell = (value: string | number | null): string => {
  if (value === null) return ''
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

const toCsvRow = (values: (string | number | null)[]) =>
  values.map(toCsvCell).join(',')

export { listInputFiles, withValidStems, closeStream, toCsvRow }
