import fs from 'fs-extra'
import path from 'path'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'

export const VISUALIZE_SCRIPT = 'visualize.py'

const runVisualize = async (ctx: StageContext): Promise<number> => {
  const { config, logger, signal } = ctx
  await fs.ensureDir(config.dirs.visualizations)
  await runToolOrThrow(
    config.environments.vizdock,
    [
      path.join(config.tools.scriptsDir, VISUALIZE_SCRIPT),
      config.dirs.ligands,
      config.dirs.dockingOutputs,
      config.dirs.visualizations
    ],
    {
      cwd: config.rootDir,
      env: { VIZ_IGNORE_PY_CHECK: config.vizIgnorePyCheck ? '1' : '0' },
      logger,
      signal
    }
  )
  logger.info(`Visualizations written to ${config.dirs.visualizations}`)
  return 0
}

export { runVisualize }
