import fs from 'fs-extra'
import path from 'path'
import { stemOf } from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'
import { NoArtifactsProducedError } from '../../helpers/errors.js'
import { listInputFiles, withValidStems } from './stage-utils.js'

export const CONVERT_SCRIPT = 'convert_sdf_to_pdb.py'
export const CONVERT_WORKSPACE = '.convert-workspace'

/**
 * The converter reads data/ligands and writes data/ligands_pdb relative to
 * its working directory. It runs inside a scratch workspace holding only
 * the pending SDF files; its outputs are published through the store.
 */
const runConvertLigands = async (ctx: StageContext): Promise<number> => {
  const { config, store, logger, signal } = ctx
  const sources = withValidStems(
    await listInputFiles(config.dirs.ligands, ['.sdf']),
    logger
  )
  if (sources.length === 0) {
    logger.info(`[INFO] No SDF files found in ${config.dirs.ligands}`)
    return 0
  }

  const pending: { source: string; key: { kind: 'ligand-pdb'; ligand: string } }[] = []
  for (const source of sources) {
    const key = { kind: 'ligand-pdb' as const, ligand: stemOf(source) }
    if (await store.shouldBuild(key, config.forceRebuild)) pending.push({ source, key })
  }
  if (pending.length === 0) {
    logger.info('[INFO] Every SDF ligand already has a PDB conversion')
    return 0
  }

  const workspace = path.join(config.dirs.ligandsPdb, CONVERT_WORKSPACE)
  const workIn = path.join(workspace, 'data', 'ligands')
  const workOut = path.join(workspace, 'data', 'ligands_pdb')
  await fs.emptyDir(workspace)
  try {
    await fs.ensureDir(workIn)
    for (const { source } of pending) {
      await fs.copy(source, path.join(workIn, path.basename(source)))
    }
    await store.build(
      pending.map(({ key }) => key),
      async (stagingPaths) => {
        await runToolOrThrow(
          config.environments.vizdock,
          [path.join(config.tools.scriptsDir, CONVERT_SCRIPT)],
          { cwd: workspace, logger, signal }
        )
        for (const [index, { key }] of pending.entries()) {
          const produced = path.join(workOut, `${key.ligand}.pdb`)
          if (await fs.pathExists(produced)) {
            await fs.move(produced, stagingPaths[index], { overwrite: true })
          }
        }
      }
    )
  } finally {
    await fs.remove(workspace)
  }

  let converted = 0
  for (const source of sources) {
    if (await store.exists({ kind: 'ligand-pdb', ligand: stemOf(source) })) converted++
  }
  logger.info(`Ligands converted: ${converted} / ${sources.length} -> ${config.dirs.ligandsPdb}`)
  if (converted === 0) {
    throw new NoArtifactsProducedError('SDF conversion produced no PDB files')
  }
  return 0
}

export { runConvertLigands }
