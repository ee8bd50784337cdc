import fs from 'fs-extra'
import path from 'path'
import { v4 as uuid } from 'uuid'
import { vi, type Mock } from 'vitest'
import type { Logger } from '@dockrun/types'
import { loadConfig, type PipelineConfig } from '../src/config/config.js'
import { ArtifactStore } from '../src/services/artifact-store.js'
import type { StageContext } from '../src/types/index.js'

type LogMethod = Mock<(message: string) => void>

export interface MockLogger extends Logger {
  info: LogMethod
  warn: LogMethod
  error: LogMethod
  debug: LogMethod
}

export const createMockLogger = (): MockLogger => ({
  info: vi.fn<(message: string) => void>(),
  warn: vi.fn<(message: string) => void>(),
  error: vi.fn<(message: string) => void>(),
  debug: vi.fn<(message: string) => void>()
})

/** Every message passed to one level of a mock logger, in order. */
export const messages = (method: LogMethod): string[] =>
  method.mock.calls.map(([message]) => message)

export const makeTempDir = async (prefix: string): Promise<string> => {
  const dir = path.join('/tmp', `${prefix}-${uuid()}`)
  await fs.ensureDir(dir)
  return dir
}

export const makeStageContext = (
  rootDir: string,
  env: NodeJS.ProcessEnv = {},
  overrides: { forceRebuild?: boolean } = {}
): StageContext & { logger: MockLogger; config: Readonly<PipelineConfig> } => {
  const logger = createMockLogger()
  const config = loadConfig({ ...env, DOCKRUN_ROOT: rootDir }, overrides)
  return { config, store: new ArtifactStore(config.artifacts, logger), logger }
}
