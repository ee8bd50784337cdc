import path from 'path'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'

export const CHECK_PACKAGES_SCRIPT = 'check_install_packages.py'

// Scans the scripts directory for imports and installs what is missing
const runCheckPackages = async (ctx: StageContext): Promise<number> => {
  const { config, logger, signal } = ctx
  await runToolOrThrow(
    config.environments.vizdock,
    [path.join(config.tools.scriptsDir, CHECK_PACKAGES_SCRIPT)],
    { cwd: config.tools.scriptsDir, logger, signal }
  )
  return 0
}

export { runCheckPackages }
