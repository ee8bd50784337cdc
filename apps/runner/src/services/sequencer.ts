import fs from 'fs-extra'
import type {
  EnvironmentTagEnum,
  Logger,
  PipelineReport,
  RunState,
  Stage,
  StageReport,
  TerminalRunState
} from '@dockrun/types'
import {
  ExitCode,
  MissingInputError,
  MissingToolError,
  PipelineError,
  getErrorMessage
} from '../helpers/errors.js'
import { resolveExecutable } from '../helpers/resolveExecutable.js'

export interface SequencerOptions {
  environments: Readonly<Record<EnvironmentTagEnum, string>>
  resolve?: (command: string) => Promise<string | null>
}

const exitCodeFor = (error: unknown, logger: Logger): number => {
  if (error instanceof PipelineError) {
    logger.error(`[ERROR] ${error.message}`)
    return error.exitCode
  }
  logger.error(`[FATAL] ${getErrorMessage(error)}`)
  return ExitCode.Failure
}

/**
 * Runs stages strictly in order. The first nonzero exit status aborts the
 * run and becomes the run's exit status. An aborted `context.signal` stops
 * the run before the next stage starts.
 */
export class StageSequencer<
  TContext extends { logger: Logger; signal?: AbortSignal }
> {
  private readonly resolve: (command: string) => Promise<string | null>

  constructor(private readonly options: SequencerOptions) {
    this.resolve = options.resolve ?? ((command) => resolveExecutable(command))
  }

  async run(
    stages: readonly Stage<TContext>[],
    context: TContext
  ): Promise<PipelineReport> {
    const { logger } = context
    const startedAt = new Date()
    const reports: StageReport[] = stages.map((stage) => ({
      name: stage.name,
      status: 'Waiting',
      exitCode: null,
      durationMs: 0,
      message: ''
    }))
    let state: RunState = { state: 'initializing' }

    const finish = (finalState: TerminalRunState): PipelineReport => ({
      startedAt,
      finishedAt: new Date(),
      exitCode: finalState.state === 'aborted' ? finalState.exitCode : 0,
      finalState,
      stages: reports
    })

    try {
      await this.verifyTools(stages)
    } catch (error) {
      return finish({
        state: 'aborted',
        exitCode: exitCodeFor(error, logger),
        stage: null
      })
    }

    for (const [index, stage] of stages.entries()) {
      if (context.signal?.aborted) {
        logger.error(`[ABORTED] Run interrupted before stage ${stage.name}`)
        return finish({
          state: 'aborted',
          exitCode: ExitCode.Interrupted,
          stage: stage.name
        })
      }
      state = { state: 'running', stageIndex: index, stage: stage.name }
      const report = reports[index]
      logger.info(`[${index + 1}/${stages.length}] ${stage.description}`)
      report.status = 'Running'
      const started = Date.now()

      const stageLogger = logger.child?.({ label: stage.name }) ?? logger
      let exitCode: number
      try {
        await this.verifyInputs(stage)
        exitCode = await stage.run({ ...context, logger: stageLogger })
        report.message = exitCode === 0 ? 'completed' : `exited with ${exitCode}`
      } catch (error) {
        exitCode = exitCodeFor(error, stageLogger)
        report.message = getErrorMessage(error)
      }

      report.durationMs = Date.now() - started
      report.exitCode = exitCode
      report.status = exitCode === 0 ? 'Success' : 'Error'

      if (exitCode !== 0) {
        logger.error(
          `[ERROR] Stage ${state.stage} failed with exit code ${exitCode}`
        )
        return finish({ state: 'aborted', exitCode, stage: stage.name })
      }
    }

    logger.info('Workflow completed successfully!')
    return finish({ state: 'completed' })
  }

  private async verifyTools(stages: readonly Stage<TContext>[]) {
    const missing: string[] = []
    const tags = new Set<EnvironmentTagEnum>()
    for (const stage of stages) {
      if (stage.environment) tags.add(stage.environment)
    }
    for (const tag of tags) {
      const executable = this.options.environments[tag]
      if ((await this.resolve(executable)) === null) {
        missing.push(`${tag} executable "${executable}"`)
      }
    }
    for (const stage of stages) {
      for (const file of stage.requiredTools ?? []) {
        if (!(await fs.pathExists(file))) missing.push(file)
      }
    }
    if (missing.length > 0) {
      throw new MissingToolError(missing.join(', '))
    }
  }

  private async verifyInputs(stage: Stage<TContext>) {
    for (const location of stage.requiredInputs) {
      if (!(await fs.pathExists(location))) {
        throw new MissingInputError(
          `Required input for stage ${stage.name} not found: ${location}`
        )
      }
    }
  }
}
