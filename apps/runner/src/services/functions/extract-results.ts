import fs from 'fs-extra'
import path from 'path'
import type { DockingResult, Logger } from '@dockrun/types'
import { extractAffinity, splitPairStem, stemOf } from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { MissingInputError } from '../../helpers/errors.js'
import { toCsvRow } from './stage-utils.js'

export const CSV_HEADER = ['Protein', 'Ligand', 'Binding Affinity (kcal/mol)']

/**
 * Reads every docking log in `dockingDir`. Receptor and ligand come from the
 * `<receptor>__<ligand>` file stem; a stem without the delimiter is used for
 * both.
 */
const collectDockingResults = async (
  dockingDir: string,
  logger: Logger
): Promise<DockingResult[]> => {
  if (!(await fs.pathExists(dockingDir))) {
    throw new MissingInputError(`Docking directory not found: ${dockingDir}`)
  }
  const logs = (await fs.readdir(dockingDir))
    .filter((name) => name.endsWith('.log') && !name.startsWith('.'))
    .sort()

  const results: DockingResult[] = []
  for (const name of logs) {
    const stem = stemOf(name)
    const ids = splitPairStem(stem) ?? { receptor: stem, ligand: stem }
    const text = await fs.readFile(path.join(dockingDir, name), 'utf8')
    const affinity = extractAffinity(text, logger)
    results.push({ ...ids, affinity })
  }
  return results
}

const writeBindingCsv = async (
  outputCsv: string,
  results: DockingResult[]
): Promise<void> => {
  const rows = [
    toCsvRow(CSV_HEADER),
    ...results.map(({ receptor, ligand, affinity }) =>
      toCsvRow([receptor, ligand, affinity])
    )
  ]
  await fs.ensureDir(path.dirname(outputCsv))
  await fs.writeFile(outputCsv, `${rows.join('\n')}\n`)
}

/** Extraction driver: logs in `dockingDir` -> affinity table at `outputCsv`. */
const extractResults = async (
  dockingDir: string,
  outputCsv: string,
  logger: Logger
): Promise<DockingResult[]> => {
  const results = await collectDockingResults(dockingDir, logger)
  if (results.length === 0) {
    logger.info(`[INFO] No log files found in ${dockingDir}`)
    return results
  }
  await writeBindingCsv(outputCsv, results)
  logger.info(`[OK] Binding affinities saved to ${outputCsv}`)
  return results
}

const runExtractResults = async (ctx: StageContext): Promise<number> => {
  const { config, logger } = ctx
  await extractResults(config.dirs.dockingOutputs, config.files.bindingCsv, logger)
  return 0
}

export { collectDockingResults, writeBindingCsv, extractResults, runExtractResults }
