import type { Logger } from './logger.js'

export const EnvironmentTag = {
  MglTools: 'mgltools',
  Vina: 'vina',
  VizDock: 'vizdock'
} as const

export type EnvironmentTagEnum =
  (typeof EnvironmentTag)[keyof typeof EnvironmentTag]

export const StageStatus = {
  Waiting: 'Waiting',
  Running: 'Running',
  Success: 'Success',
  Error: 'Error'
} as const

export type StageStatusEnum = (typeof StageStatus)[keyof typeof StageStatus]

export interface Stage<TContext extends { logger: Logger }> {
  readonly name: string
  readonly description: string
  readonly environment?: EnvironmentTagEnum
  // Script files the stage hands to its interpreter
  readonly requiredTools?: readonly string[]
  readonly requiredInputs: readonly string[]
  readonly outputs: readonly string[]
  run: (context: TContext) => Promise<number>
}

export interface StageReport {
  name: string
  status: StageStatusEnum
  exitCode: number | null
  durationMs: number
  message: string
}

export type RunState =
  | { state: 'initializing' }
  | { state: 'running'; stageIndex: number; stage: string }
  | { state: 'aborted'; exitCode: number; stage: string | null }
  | { state: 'completed' }

export type TerminalRunState = Extract<
  RunState,
  { state: 'aborted' } | { state: 'completed' }
>

export interface PipelineReport {
  startedAt: Date
  finishedAt: Date
  exitCode: number
  finalState: TerminalRunState
  stages: StageReport[]
}
