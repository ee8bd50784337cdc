import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'
import type { Logger } from '@dockrun/types'
import {
  ChildProcessFailure,
  InterruptedError,
  MissingToolError,
  getErrorMessage
} from './errors.js'

export type OutputSource = 'stdout' | 'stderr'

export interface RunToolOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  logger?: Logger
  // aborting kills the child; the run then resolves as interrupted
  signal?: AbortSignal
  onLine?: (line: string, source: OutputSource) => void
}

export type ToolRunResult =
  | { kind: 'exited'; code: number }
  | { kind: 'interrupted'; signal: NodeJS.Signals }

const formatCommand = (executable: string, args: readonly string[]) =>
  [executable, ...args].join(' ')

const isSpawnError = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error && 'syscall' in error

/**
 * Runs an external tool to completion, streaming stdout and stderr line by
 * line to `onLine` as the child produces them.
 */
export async function runToolStep(
  executable: string,
  args: readonly string[],
  opts: RunToolOptions = {}
): Promise<ToolRunResult> {
  const { cwd, env, logger, onLine, signal } = opts
  const command = formatCommand(executable, args)
  logger?.info(`invoking: ${command}`)

  const child = spawn(executable, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: ['ignore', 'pipe', 'pipe'],
    signal
  })

  // ENOENT / EACCES surface as 'error' instead of 'close'
  const errorP = once(child, 'error').then(([err]) => {
    throw err
  })

  let rlOut: readline.Interface | undefined
  let rlErr: readline.Interface | undefined
  if (child.stdout) {
    rlOut = readline.createInterface({ input: child.stdout, crlfDelay: Infinity })
    rlOut.on('line', (line) => onLine?.(line.replace(/\r$/, ''), 'stdout'))
  }
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr, crlfDelay: Infinity })
    rlErr.on('line', (line) => onLine?.(line.replace(/\r$/, ''), 'stderr'))
  }

  // 'close' fires after stdio is drained
  const closeP = once(child, 'close').then(
    ([code, signal]: (number | NodeJS.Signals | null)[]): ToolRunResult =>
      typeof signal === 'string'
        ? { kind: 'interrupted', signal }
        : { kind: 'exited', code: typeof code === 'number' ? code : 1 }
  )

  try {
    return await Promise.race([closeP, errorP])
  } catch (error) {
    if (signal?.aborted) {
      const result = await closeP
      return result.kind === 'interrupted'
        ? result
        : { kind: 'interrupted', signal: 'SIGTERM' }
    }
    if (isSpawnError(error)) {
      throw new MissingToolError(executable, `${error.code}: ${getErrorMessage(error)}`)
    }
    throw error
  } finally {
    rlOut?.close()
    rlErr?.close()
  }
}

/**
 * Runs a tool and turns anything but a clean exit into a PipelineError.
 * Every output line is mirrored to the logger.
 */
export async function runToolOrThrow(
  executable: string,
  args: readonly string[],
  opts: RunToolOptions & { logger: Logger }
): Promise<void> {
  const { logger, onLine } = opts
  const result = await runToolStep(executable, args, {
    ...opts,
    onLine: (line, source) => {
      logger.info(line)
      onLine?.(line, source)
    }
  })
  const command = formatCommand(executable, args)
  if (result.kind === 'interrupted') {
    throw new InterruptedError(command, result.signal)
  }
  if (result.code !== 0) {
    logger.error(`[ERROR] Command failed with code ${result.code}: ${command}`)
    throw new ChildProcessFailure(command, result.code)
  }
}
