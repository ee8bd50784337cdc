import type { Logger, Stage } from '@dockrun/types'
import type { PipelineConfig } from '../config/config.js'
import type { ArtifactStore } from '../services/artifact-store.js'

export interface StageContext {
  config: Readonly<PipelineConfig>
  store: ArtifactStore
  logger: Logger
  signal?: AbortSignal
}

export type PipelineStage = Stage<StageContext>
