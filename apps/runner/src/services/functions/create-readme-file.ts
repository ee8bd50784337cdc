import Handlebars from 'handlebars'
import fs from 'fs-extra'
import path from 'path'
import moment from 'moment-timezone'
import type { DockingResult, Logger, PipelineReport } from '@dockrun/types'
import { formatAffinity } from '@dockrun/dock-utils'
import type { PipelineConfig } from '../../config/config.js'
import { getErrorMessage } from '../../helpers/errors.js'

const TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss z'

const readTemplate = async (
  templatesDir: string,
  templateName: string,
  logger: Logger
): Promise<string> => {
  const templateFile = path.join(templatesDir, `${templateName}.handlebars`)
  try {
    return await fs.readFile(templateFile, 'utf8')
  } catch (error) {
    logger.error(
      `Error in readTemplate for ${templateName}: ${getErrorMessage(error)}`
    )
    throw error
  }
}

const renderReadme = (
  template: string,
  config: Readonly<PipelineConfig>,
  report: PipelineReport,
  results: DockingResult[],
  logFile: string
): string => {
  const stamp = (date: Date) => moment(date).tz(config.logTimezone).format(TIME_FORMAT)
  return Handlebars.compile(template)({
    startedAt: stamp(report.startedAt),
    finishedAt: stamp(report.finishedAt),
    logFile: path.relative(config.rootDir, logFile),
    stages: report.stages.map((stage) => ({
      ...stage,
      seconds: (stage.durationMs / 1000).toFixed(1)
    })),
    results: results.map((result) => ({
      ...result,
      affinity: formatAffinity(result.affinity)
    })),
    hasResults: results.length > 0,
    bindingCsv: path.relative(config.dirs.results, config.files.bindingCsv)
  })
}

const createReadmeFile = async (
  config: Readonly<PipelineConfig>,
  report: PipelineReport,
  results: DockingResult[],
  logFile: string,
  logger: Logger
): Promise<string> => {
  const template = await readTemplate(config.templatesDir, 'readme', logger)
  const content = renderReadme(template, config, report, results, logFile)
  await fs.ensureDir(path.dirname(config.files.readme))
  await fs.writeFile(config.files.readme, content)
  logger.info(`README written to ${config.files.readme}`)
  return config.files.readme
}

export { createReadmeFile, renderReadme }
