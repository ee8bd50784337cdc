import fs from 'fs-extra'
import path from 'path'

const isExecutableFile = async (file: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(file)
    if (!stats.isFile()) return false
    await fs.access(file, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Absolute path of `command` when it can be executed: a path is checked
 * directly, a bare name is looked up on PATH. Null when not found.
 */
const resolveExecutable = async (
  command: string,
  searchPath: string = process.env.PATH ?? '',
  cwd: string = process.cwd()
): Promise<string | null> => {
  if (command.includes('/') || command.includes(path.sep)) {
    const candidate = path.resolve(cwd, command)
    return (await isExecutableFile(candidate)) ? candidate : null
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (dir === '') continue
    const candidate = path.join(dir, command)
    if (await isExecutableFile(candidate)) return candidate
  }
  return null
}

export { resolveExecutable }
