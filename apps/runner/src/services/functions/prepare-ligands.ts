import path from 'path'
import { stemOf } from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'
import { NoArtifactsProducedError } from '../../helpers/errors.js'
import { listInputFiles, withValidStems } from './stage-utils.js'

export const PREPARE_LIGAND_SCRIPT = 'prepare_ligand4.py'
export const LIGAND_EXTENSIONS = ['.pdb', '.mol2', '.sdf'] as const

/**
 * One input file per ligand stem. Directories are searched in order and
 * the first one holding a stem wins; the result is sorted by stem.
 */
const collectLigandInputs = async (
  dirs: readonly string[]
): Promise<string[]> => {
  const byStem = new Map<string, string>()
  for (const dir of dirs) {
    for (const file of await listInputFiles(dir, LIGAND_EXTENSIONS)) {
      const stem = stemOf(file)
      if (!byStem.has(stem)) byStem.set(stem, file)
    }
  }
  return [...byStem.keys()].sort().flatMap((stem) => byStem.get(stem) ?? [])
}

const runPrepareLigands = async (ctx: StageContext): Promise<number> => {
  const { config, store, logger, signal } = ctx
  const ligands = withValidStems(
    await collectLigandInputs([config.dirs.ligandsPdb, config.dirs.ligands]),
    logger
  )
  if (ligands.length === 0) {
    logger.info(
      `[INFO] No ligand files found in ${config.dirs.ligandsPdb} or ${config.dirs.ligands}`
    )
    return 0
  }

  let prepared = 0
  for (const ligandFile of ligands) {
    const key = { kind: 'ligand' as const, ligand: stemOf(ligandFile) }
    if (!(await store.shouldBuild(key, config.forceRebuild))) {
      prepared++
      continue
    }
    // prepare_ligand4 resolves the input relative to its working directory
    const published = await store.build([key], async ([staging]) => {
      await runToolOrThrow(
        config.environments.mgltools,
        [
          path.join(config.tools.mgltoolsUtilsDir, PREPARE_LIGAND_SCRIPT),
          '-l',
          path.basename(ligandFile),
          '-o',
          path.resolve(staging),
          '-A',
          config.ligandAddFlag
        ],
        { cwd: path.dirname(ligandFile), logger, signal }
      )
    })
    if (published.length > 0) {
      prepared++
      logger.info(`[OK] Ligand -> ${published[0]}`)
    } else {
      logger.error(`[ERROR] No ligand written for ${path.basename(ligandFile)}`)
    }
  }

  logger.info(
    `Ligands prepared: ${prepared} / ${ligands.length} -> ${config.dirs.preparedLigands}`
  )
  if (prepared === 0) {
    throw new NoArtifactsProducedError('No ligands were prepared')
  }
  return 0
}

export { runPrepareLigands, collectLigandInputs }
