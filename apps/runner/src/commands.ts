import path from 'path'
import { formatBox, stemOf } from '@dockrun/dock-utils'
import { loadConfig, type ConfigOverrides } from './config/config.js'
import { createConsoleLogger, createRunLogger } from './helpers/loggers.js'
import {
  ConfigError,
  ExitCode,
  PipelineError,
  getErrorMessage
} from './helpers/errors.js'
import { runDockingPipeline } from './services/pipelines/docking-pipeline.js'
import { extractResults } from './services/functions/extract-results.js'
import { searchBoxFor } from './services/functions/search-box.js'

const loadConfigOrReport = (overrides: ConfigOverrides = {}) => {
  try {
    return loadConfig(process.env, overrides)
  } catch (error) {
    console.error(error instanceof ConfigError ? error.format() : getErrorMessage(error))
    return null
  }
}

const runPipelineCommand = async (options: { force?: boolean }): Promise<number> => {
  const config = loadConfigOrReport(options.force ? { forceRebuild: true } : {})
  if (config === null) return ExitCode.Failure

  const startedAt = new Date()
  const runLog = createRunLogger(config, startedAt)
  const { logger } = runLog

  // The log is closed once the run has unwound, never from the handler
  const controller = new AbortController()
  const interruption: { exitCode?: number } = {}
  const onSignal = (signal: NodeJS.Signals) => {
    interruption.exitCode = signal === 'SIGTERM' ? ExitCode.Terminated : ExitCode.Interrupted
    logger.error(`[ABORTED] Received ${signal}, stopping pipeline`)
    controller.abort(signal)
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  logger.info('='.repeat(40))
  logger.info('Molecular Docking Pipeline Run')
  logger.info(`Started at ${startedAt.toISOString()}`)
  logger.info(`Project root: ${config.rootDir}`)
  if (config.forceRebuild) logger.info('Force rebuild: existing artifacts are rebuilt')
  logger.info('='.repeat(40))

  try {
    const report = await runDockingPipeline(config, logger, runLog.logFile, {
      signal: controller.signal
    })
    logger.info(`Log saved to ${runLog.logFile}`)
    return interruption.exitCode ?? report.exitCode
  } catch (error) {
    logger.error(`[FATAL] ${getErrorMessage(error)}`)
    if (interruption.exitCode !== undefined) return interruption.exitCode
    return error instanceof PipelineError ? error.exitCode : ExitCode.Failure
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await runLog.close()
  }
}

const runExtractCommand = async (
  dockingDir: string,
  outputCsv: string
): Promise<number> => {
  const config = loadConfigOrReport()
  if (config === null) return ExitCode.Failure
  const logger = createConsoleLogger(config.logLevel, config.logTimezone)
  try {
    await extractResults(path.resolve(dockingDir), path.resolve(outputCsv), logger)
    return 0
  } catch (error) {
    logger.error(`[ERROR] ${getErrorMessage(error)}`)
    return error instanceof PipelineError ? error.exitCode : ExitCode.Failure
  }
}

const runBoxCommand = async (
  receptorFile: string,
  options: { receptor?: string }
): Promise<number> => {
  const config = loadConfigOrReport()
  if (config === null) return ExitCode.Failure
  const logger = createConsoleLogger(config.logLevel, config.logTimezone)

  const receptor = options.receptor ?? stemOf(receptorFile)
  const result = await searchBoxFor({ config, logger }, receptor, receptorFile, new Map())
  const detail = result.kind === 'default' ? `default/${result.reason}` : result.kind
  logger.info(`Search box for ${receptor} (${detail}): ${formatBox(result.box)}`)
  return 0
}

export { runPipelineCommand, runExtractCommand, runBoxCommand }
